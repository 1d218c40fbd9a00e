/**
 * Loan Tracker - Runtime Configuration
 * Read from the environment (.env is loaded by the entry point)
 */

import { DatabaseConfig, readDatabaseConfig } from './database/connection';

export const DEFAULT_PORT = 8000;

export interface AppConfig {
  port: number;
  database: DatabaseConfig;
  /** '*' allows any origin */
  corsOrigins: '*' | string[];
}

export function parseCorsOrigins(value: string | undefined): '*' | string[] {
  if (!value || value.trim() === '*') return '*';

  const origins = value
    .split(',')
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);

  return origins.length > 0 ? origins : '*';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = parseInt(env.PORT || String(DEFAULT_PORT), 10);

  return {
    port: Number.isNaN(port) ? DEFAULT_PORT : port,
    database: readDatabaseConfig(env),
    corsOrigins: parseCorsOrigins(env.CORS_ORIGINS),
  };
}
