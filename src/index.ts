/**
 * Loan Tracker - Main Entry Point
 * Customers, referral partners and loans with partner commission on funding
 */

import * as dotenv from 'dotenv';

// Load environment variables
dotenv.config();

import { loadConfig } from './config';
import { createPool, testConnection, closePool, PostgresDocumentStore } from './database';
import { createServer } from './api';

async function bootstrap(): Promise<void> {
  console.log('='.repeat(60));
  console.log('  LOAN TRACKER API');
  console.log('='.repeat(60));

  const config = loadConfig();

  // Test database connection
  console.log('\n[Boot] Testing database connection...');
  const pool = createPool(config.database);
  const dbConnected = await testConnection(pool);
  if (!dbConnected) {
    console.error('[Boot] FATAL: Database connection failed');
    await closePool(pool);
    process.exit(1);
  }

  const store = new PostgresDocumentStore(pool);

  console.log('[Boot] Configuring Express server...');
  const app = createServer({ store, corsOrigins: config.corsOrigins });

  const server = app.listen(config.port, () => {
    console.log(`\n[Boot] Server listening on port ${config.port}`);
    console.log('[Boot] Endpoints:');
    console.log(`  - Health: http://localhost:${config.port}/health`);
    console.log(`  - Diagnostic: http://localhost:${config.port}/test`);
    console.log(`  - Customers: http://localhost:${config.port}/api/customers`);
    console.log(`  - Partners: http://localhost:${config.port}/api/partners`);
    console.log(`  - Loans: http://localhost:${config.port}/api/loans`);
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`\n[Shutdown] Received ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('[Shutdown] HTTP server closed');
    });

    await closePool(pool);

    console.log('[Shutdown] Complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error) => {
      console.error('[Shutdown] Failed:', error);
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

// Run
bootstrap().catch((error) => {
  console.error('[Boot] Fatal error during startup:', error);
  process.exit(1);
});
