/**
 * @file modules/loans/loan.service.test.ts
 * @description Loan admission: reference checks and commission on funding
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { InMemoryDocumentStore } from '../../../test/helpers/memory-store';
import { RecordReferenceError } from '../../shared/errors';
import { RecordId } from '../../shared/types/record-id';
import { LoanService, toIsoDate } from './loan.service';
import { LoanInput } from './loan.schema';

const ADMISSION_TIME = new Date('2026-03-15T23:30:00.000Z');
const UNKNOWN_ID = 'a1b2c3d4-e5f6-4a7b-8c9d-0e1f2a3b4c5d';

// ============================================
// MOCK DATA GENERATORS
// ============================================

function createMockLoan(overrides: Partial<LoanInput> = {}): LoanInput {
  return {
    customer_id: UNKNOWN_ID,
    amount: 1000,
    status: 'applied',
    ...overrides,
  };
}

describe('LoanService', () => {
  let store: InMemoryDocumentStore;
  let service: LoanService;
  let customerId: string;

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    store = new InMemoryDocumentStore();
    service = new LoanService(store, () => ADMISSION_TIME);
    customerId = (await store.create('customer', { first_name: 'Dana', last_name: 'Reyes' })).toString();
  });

  async function storedLoan(id: RecordId): Promise<Record<string, unknown>> {
    const doc = await store.findById('loan', id);
    if (!doc) throw new Error(`loan ${id.toString()} was not stored`);
    return doc.data;
  }

  async function rejection(candidate: LoanInput): Promise<RecordReferenceError> {
    try {
      await service.admitLoan(candidate);
    } catch (error) {
      if (error instanceof RecordReferenceError) return error;
      throw error;
    }
    throw new Error('expected the loan to be rejected');
  }

  // ============================================
  // REFERENCE CHECKS
  // ============================================

  describe('customer reference', () => {
    it('rejects an unknown customer as not found', async () => {
      const error = await rejection(createMockLoan({ customer_id: UNKNOWN_ID }));

      expect(error.field).toBe('customer_id');
      expect(error.reason).toBe('not_found');
      expect(error.message).toBe('customer_id does not match an existing customer');
    });

    it('rejects a malformed customer_id as malformed', async () => {
      const error = await rejection(createMockLoan({ customer_id: '12345' }));

      expect(error.reason).toBe('malformed');
      expect(error.message).toBe('customer_id is not a valid identifier');
    });

    it('rejects regardless of status and amount', async () => {
      for (const status of ['applied', 'funded', 'closed'] as const) {
        const error = await rejection(createMockLoan({ status, amount: 99999 }));
        expect(error.reason).toBe('not_found');
      }
    });

    it('does not persist a rejected loan', async () => {
      await rejection(createMockLoan());
      expect(await store.list('loan')).toEqual([]);
    });
  });

  describe('partner reference', () => {
    it('rejects an unknown partner', async () => {
      const error = await rejection(createMockLoan({ customer_id: customerId, partner_id: UNKNOWN_ID }));

      expect(error.field).toBe('partner_id');
      expect(error.reason).toBe('not_found');
      expect(error.message).toBe('partner_id does not match an existing partner');
    });

    it('rejects a malformed partner_id', async () => {
      const error = await rejection(createMockLoan({ customer_id: customerId, partner_id: 'partner-7' }));

      expect(error.field).toBe('partner_id');
      expect(error.reason).toBe('malformed');
    });

    it('stores references in canonical form', async () => {
      const partnerId = (await store.create('partner', { name: 'Harbor Realty', commission_rate: 5 })).toString();

      const id = await service.admitLoan(createMockLoan({
        customer_id: customerId.toUpperCase(),
        partner_id: partnerId.toUpperCase(),
      }));

      const loan = await storedLoan(id);
      expect(loan.customer_id).toBe(customerId);
      expect(loan.partner_id).toBe(partnerId);
    });
  });

  // ============================================
  // COMMISSION ON FUNDING
  // ============================================

  describe('funded loans', () => {
    it('computes commission from the partner rate', async () => {
      const partnerId = (await store.create('partner', { name: 'Harbor Realty', commission_rate: 5 })).toString();

      const id = await service.admitLoan(createMockLoan({
        customer_id: customerId,
        partner_id: partnerId,
        status: 'funded',
      }));

      expect(await storedLoan(id)).toEqual({
        customer_id: customerId,
        partner_id: partnerId,
        amount: 1000,
        status: 'funded',
        commission_amount: 50,
        funded_date: '2026-03-15',
      });
    });

    it('uses a zero rate without a partner', async () => {
      const id = await service.admitLoan(createMockLoan({ customer_id: customerId, status: 'funded' }));

      const loan = await storedLoan(id);
      expect(loan.commission_amount).toBe(0);
      expect(loan.partner_id).toBeUndefined();
    });

    it('uses a zero rate when the partner carries none', async () => {
      const partnerId = (await store.create('partner', { name: 'Legacy Partner' })).toString();

      const id = await service.admitLoan(createMockLoan({
        customer_id: customerId,
        partner_id: partnerId,
        status: 'funded',
      }));

      expect((await storedLoan(id)).commission_amount).toBe(0);
    });

    it('rounds half-up to cents', async () => {
      const partnerId = (await store.create('partner', { name: 'Harbor Realty', commission_rate: 5 })).toString();

      const id = await service.admitLoan(createMockLoan({
        customer_id: customerId,
        partner_id: partnerId,
        status: 'funded',
        amount: 2.5,
      }));

      expect((await storedLoan(id)).commission_amount).toBe(0.13);
    });

    it('overrides a caller-supplied commission', async () => {
      const id = await service.admitLoan(createMockLoan({
        customer_id: customerId,
        status: 'funded',
        commission_amount: 999,
      }));

      expect((await storedLoan(id)).commission_amount).toBe(0);
    });

    it('keeps an explicit funded_date', async () => {
      const id = await service.admitLoan(createMockLoan({
        customer_id: customerId,
        status: 'funded',
        funded_date: '2025-12-01',
      }));

      expect((await storedLoan(id)).funded_date).toBe('2025-12-01');
    });
  });

  describe('non-funded loans', () => {
    it('never computes commission or funded_date', async () => {
      const partnerId = (await store.create('partner', { name: 'Harbor Realty', commission_rate: 5 })).toString();

      const id = await service.admitLoan(createMockLoan({ customer_id: customerId, partner_id: partnerId }));

      const loan = await storedLoan(id);
      expect(loan).not.toHaveProperty('commission_amount');
      expect(loan).not.toHaveProperty('funded_date');
    });

    it('passes supplied values through unchanged', async () => {
      const id = await service.admitLoan(createMockLoan({
        customer_id: customerId,
        status: 'approved',
        commission_amount: 12.5,
        funded_date: '2026-01-02',
        application_date: '2025-12-20',
      }));

      expect(await storedLoan(id)).toEqual({
        customer_id: customerId,
        amount: 1000,
        status: 'approved',
        commission_amount: 12.5,
        funded_date: '2026-01-02',
        application_date: '2025-12-20',
      });
    });
  });

  // ============================================
  // LISTING
  // ============================================

  describe('listLoans', () => {
    it('filters by status in insertion order', async () => {
      const first = await service.admitLoan(createMockLoan({ customer_id: customerId, status: 'funded', amount: 100 }));
      await service.admitLoan(createMockLoan({ customer_id: customerId, status: 'applied', amount: 200 }));
      const third = await service.admitLoan(createMockLoan({ customer_id: customerId, status: 'funded', amount: 300 }));

      const funded = await service.listLoans({ status: 'funded' });

      expect(funded.map(loan => loan.id)).toEqual([first.toString(), third.toString()]);
      expect(funded.every(loan => loan.status === 'funded')).toBe(true);
    });

    it('lists everything without a filter', async () => {
      await service.admitLoan(createMockLoan({ customer_id: customerId }));
      await service.admitLoan(createMockLoan({ customer_id: customerId, status: 'rejected' }));

      expect(await service.listLoans()).toHaveLength(2);
    });
  });
});

describe('toIsoDate', () => {
  it('uses the UTC calendar date', () => {
    expect(toIsoDate(new Date('2026-03-15T23:30:00.000-05:00'))).toBe('2026-03-16');
  });
});
