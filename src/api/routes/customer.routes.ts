/**
 * Loan Tracker - Customer API Routes
 */

import { Router, Request, Response } from 'express';
import { CustomerSchema, CustomerService } from '../../modules/customers';
import { parseRecord } from '../../shared/validation';
import { sendError } from '../respond';

export function createCustomerRoutes(customers: CustomerService): Router {
  const router = Router();

  /**
   * POST /api/customers
   * Create a customer
   */
  router.post('/', async (req: Request, res: Response) => {
    try {
      const customer = parseRecord(CustomerSchema, req.body);
      const id = await customers.createCustomer(customer);
      res.status(201).json({ id: id.toString() });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /api/customers
   */
  router.get('/', async (_req: Request, res: Response) => {
    try {
      res.json(await customers.listCustomers());
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
