/**
 * Loan Tracker - Database Migration Runner
 * Executes schema.sql against PostgreSQL
 */

import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { Pool } from 'pg';
import { createPool, readDatabaseConfig } from './connection';

export const SCHEMA_PATH = path.join(__dirname, 'schema.sql');

export function readSchema(): string {
  return fs.readFileSync(SCHEMA_PATH, 'utf-8');
}

/**
 * Apply the schema. Resolves false when it could not be applied.
 */
export async function migrate(pool: Pool, schema: string = readSchema()): Promise<boolean> {
  try {
    console.log('[Migrate] Executing schema...');
    await pool.query(schema);
    console.log('[Migrate] Schema applied successfully');

    const result = await pool.query<{ table_name: string }>(`
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = 'public'
      ORDER BY table_name
    `);

    console.log('[Migrate] Collections:');
    for (const row of result.rows) {
      console.log(`  - ${row.table_name}`);
    }
  } catch (error) {
    console.error('[Migrate] Migration failed:', error);
    return false;
  }

  console.log('[Migrate] Migration complete');
  return true;
}

async function main(): Promise<void> {
  dotenv.config();

  const pool = createPool(readDatabaseConfig());
  console.log('[Migrate] Connecting to database...');

  try {
    if (!(await migrate(pool))) {
      process.exitCode = 1;
    }
  } finally {
    await pool.end();
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error('[Migrate] Fatal error:', error);
    process.exit(1);
  });
}
