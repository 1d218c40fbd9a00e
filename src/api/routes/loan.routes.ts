/**
 * Loan Tracker - Loan API Routes
 */

import { Router, Request, Response } from 'express';
import { LoanListQuerySchema, LoanSchema, LoanService } from '../../modules/loans';
import { parseRecord } from '../../shared/validation';
import { sendError } from '../respond';

export function createLoanRoutes(loans: LoanService): Router {
  const router = Router();

  /**
   * POST /api/loans
   * Create a loan. customer_id / partner_id must reference stored records;
   * loans created as "funded" get their commission computed.
   */
  router.post('/', async (req: Request, res: Response) => {
    try {
      const candidate = parseRecord(LoanSchema, req.body);
      const id = await loans.admitLoan(candidate);
      res.status(201).json({ id: id.toString() });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /api/loans?status=funded
   * List loans, optionally filtered by status
   */
  router.get('/', async (req: Request, res: Response) => {
    try {
      const query = parseRecord(LoanListQuerySchema, req.query);
      res.json(await loans.listLoans(query));
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
