/**
 * Loan Tracker - Diagnostic Route
 *
 * GET /test reports store reachability and configuration presence.
 * Failures are reported in the body; the route always answers 200.
 */

import { Router, Request, Response } from 'express';
import { DocumentStore, MAX_DESCRIBED_COLLECTIONS } from '../../database/document.store';
import { StoreError } from '../../shared/errors';

type Presence = 'set' | 'not set';

export interface DiagnosticReport {
  backend: 'running';
  database: string;
  database_url: Presence;
  database_name: Presence;
  connection_status: 'connected' | 'not connected';
  store_name: string | null;
  collections: string[];
}

const MAX_ERROR_LENGTH = 50;

function describeFailure(error: unknown): string {
  const source = error instanceof StoreError ? error.originalError : error;
  const message = source instanceof Error ? source.message : String(source);
  return message.slice(0, MAX_ERROR_LENGTH);
}

function presence(value: string | undefined): Presence {
  return value ? 'set' : 'not set';
}

export async function buildDiagnosticReport(
  store: DocumentStore,
  env: NodeJS.ProcessEnv
): Promise<DiagnosticReport> {
  const report: DiagnosticReport = {
    backend: 'running',
    database: 'not available',
    database_url: presence(env.DATABASE_URL),
    database_name: presence(env.DATABASE_NAME),
    connection_status: 'not connected',
    store_name: null,
    collections: [],
  };

  try {
    await store.ping();
  } catch (error) {
    report.database = `error: ${describeFailure(error)}`;
    return report;
  }

  report.connection_status = 'connected';

  try {
    const description = await store.describe();
    report.store_name = description.name;
    report.collections = description.collections.slice(0, MAX_DESCRIBED_COLLECTIONS);
    report.database = 'connected';
  } catch (error) {
    report.database = `connected with error: ${describeFailure(error)}`;
  }

  return report;
}

export function createDiagnosticRoutes(
  store: DocumentStore,
  env: NodeJS.ProcessEnv = process.env
): Router {
  const router = Router();

  router.get('/', async (_req: Request, res: Response) => {
    res.json(await buildDiagnosticReport(store, env));
  });

  return router;
}
