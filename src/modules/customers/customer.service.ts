/**
 * Loan Tracker - Customer Service
 */

import { DocumentStore } from '../../database/document.store';
import { RecordId } from '../../shared/types/record-id';
import { compact } from '../../shared/validation';
import { serializeDocument, SerializedRecord } from '../../shared/serialize';
import { CustomerInput } from './customer.schema';

export class CustomerService {
  constructor(private readonly store: DocumentStore) {}

  async createCustomer(customer: CustomerInput): Promise<RecordId> {
    return this.store.create('customer', compact(customer));
  }

  async listCustomers(): Promise<SerializedRecord[]> {
    const docs = await this.store.list('customer');
    return docs.map(serializeDocument);
  }
}
