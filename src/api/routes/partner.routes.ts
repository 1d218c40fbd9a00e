/**
 * Loan Tracker - Referral Partner API Routes
 */

import { Router, Request, Response } from 'express';
import { PartnerSchema, PartnerService } from '../../modules/partners';
import { parseRecord } from '../../shared/validation';
import { sendError } from '../respond';

export function createPartnerRoutes(partners: PartnerService): Router {
  const router = Router();

  /**
   * POST /api/partners
   * Create a referral partner. commission_rate defaults to 5%.
   */
  router.post('/', async (req: Request, res: Response) => {
    try {
      const partner = parseRecord(PartnerSchema, req.body);
      const id = await partners.createPartner(partner);
      res.status(201).json({ id: id.toString() });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/', async (_req: Request, res: Response) => {
    try {
      res.json(await partners.listPartners());
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
