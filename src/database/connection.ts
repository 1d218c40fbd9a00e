/**
 * Loan Tracker - Database Connection
 * PostgreSQL connection pool management
 */

import { Pool } from 'pg';

export interface DatabaseConfig {
  url?: string;
  name?: string;
}

export function readDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  return {
    url: env.DATABASE_URL || undefined,
    name: env.DATABASE_NAME || undefined,
  };
}

/**
 * Build the pool the store and the migration runner share.
 * DATABASE_NAME, when set, overrides the database named in the URL.
 */
export function createPool(config: DatabaseConfig): Pool {
  if (!config.url) {
    throw new Error('DATABASE_URL is not set');
  }

  const pool = new Pool({
    connectionString: config.url,
    database: config.name,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('error', (err) => {
    console.error('[Database] Unexpected error on idle client:', err);
  });

  return pool;
}

export async function testConnection(pool: Pool): Promise<boolean> {
  try {
    const result = await pool.query('SELECT NOW() AS now');
    console.log('[Database] Connection test successful:', result.rows[0].now);
    return true;
  } catch (error) {
    console.error('[Database] Connection test failed:', error);
    return false;
  }
}

export async function closePool(pool: Pool): Promise<void> {
  await pool.end();
  console.log('[Database] Connection pool closed');
}
