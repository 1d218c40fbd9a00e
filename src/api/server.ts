/**
 * ============================================
 * LOAN TRACKER - API SERVER
 * ============================================
 *
 * API SURFACE:
 * - GET  /
 * - GET  /health
 * - GET  /test
 * - POST|GET /api/customers
 * - POST|GET /api/partners
 * - POST|GET /api/loans
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { DocumentStore } from '../database/document.store';
import { CustomerService } from '../modules/customers';
import { PartnerService } from '../modules/partners';
import { Clock, LoanService } from '../modules/loans';
import { createCustomerRoutes } from './routes/customer.routes';
import { createPartnerRoutes } from './routes/partner.routes';
import { createLoanRoutes } from './routes/loan.routes';
import { createDiagnosticRoutes } from './routes/diagnostic.routes';
import { sendError } from './respond';

export const SERVICE_NAME = 'loan-tracker';

export interface ServerDependencies {
  store: DocumentStore;
  clock?: Clock;
  env?: NodeJS.ProcessEnv;
  corsOrigins?: '*' | string[];
}

function isMalformedJson(err: Error): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

export function createServer(deps: ServerDependencies): Express {
  const { store, clock, env = process.env, corsOrigins = '*' } = deps;

  const app = express();

  app.use(helmet());
  app.use(cors({ origin: corsOrigins === '*' ? true : corsOrigins, credentials: true }));
  app.use(express.json());

  app.get('/', (_req: Request, res: Response) => {
    res.json({ message: 'Loan Tracker Backend Ready' });
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'OK', service: SERVICE_NAME, timestamp: new Date().toISOString() });
  });

  app.use('/test', createDiagnosticRoutes(store, env));

  app.use('/api/customers', createCustomerRoutes(new CustomerService(store)));
  app.use('/api/partners', createPartnerRoutes(new PartnerService(store)));
  app.use('/api/loans', createLoanRoutes(new LoanService(store, clock)));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (isMalformedJson(err)) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    sendError(res, err);
  });

  return app;
}
