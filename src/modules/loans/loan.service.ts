/**
 * Loan Tracker - Loan Service
 *
 * Admission of new loans:
 * 1. customer_id must resolve to a stored customer
 * 2. partner_id, when given, must resolve to a stored partner
 * 3. a loan created as "funded" gets its commission (and a funded_date
 *    if none was supplied); any other status is persisted as received
 */

import { CollectionName, DocumentStore, StoredDocument } from '../../database/document.store';
import { RecordId } from '../../shared/types/record-id';
import { RecordReferenceError } from '../../shared/errors';
import { compact } from '../../shared/validation';
import { serializeDocument, SerializedRecord } from '../../shared/serialize';
import { computeCommission, resolveCommissionRate } from './commission';
import { LoanInput, LoanListQuery } from './loan.schema';

export type Clock = () => Date;

/** UTC calendar date, YYYY-MM-DD */
export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export class LoanService {
  constructor(
    private readonly store: DocumentStore,
    private readonly clock: Clock = () => new Date()
  ) {}

  async admitLoan(candidate: LoanInput): Promise<RecordId> {
    const customer = await this.resolveReference('customer_id', 'customer', candidate.customer_id);
    const partner = candidate.partner_id
      ? await this.resolveReference('partner_id', 'partner', candidate.partner_id)
      : null;

    const loan: LoanInput = {
      ...candidate,
      customer_id: customer.id.toString(),
      partner_id: partner ? partner.id.toString() : undefined,
    };

    if (loan.status === 'funded') {
      const rate = resolveCommissionRate(partner ? partner.data : null);
      const commission = computeCommission(loan.amount, rate);
      loan.commission_amount = commission;

      if (!loan.funded_date) {
        loan.funded_date = toIsoDate(this.clock());
      }

      console.log(
        `[Loans] Funded loan admitted: amount=${loan.amount} rate=${rate}% ` +
        `commission=${commission.toFixed(2)}`
      );
    }

    return this.store.create('loan', compact(loan));
  }

  async listLoans(query: LoanListQuery = {}): Promise<SerializedRecord[]> {
    const docs = await this.store.list('loan', query.status ? { status: query.status } : undefined);
    return docs.map(serializeDocument);
  }

  private async resolveReference(
    field: 'customer_id' | 'partner_id',
    collection: CollectionName,
    value: string
  ): Promise<StoredDocument> {
    const id = RecordId.tryParse(value);
    if (!id) {
      throw new RecordReferenceError(field, 'malformed', collection);
    }

    const doc = await this.store.findById(collection, id);
    if (!doc) {
      throw new RecordReferenceError(field, 'not_found', collection);
    }

    return doc;
  }
}
