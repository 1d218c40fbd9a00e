/**
 * Loan Tracker - Referral Partner Service
 */

import { DocumentStore } from '../../database/document.store';
import { RecordId } from '../../shared/types/record-id';
import { compact } from '../../shared/validation';
import { serializeDocument, SerializedRecord } from '../../shared/serialize';
import { PartnerInput } from './partner.schema';

export class PartnerService {
  constructor(private readonly store: DocumentStore) {}

  async createPartner(partner: PartnerInput): Promise<RecordId> {
    return this.store.create('partner', compact(partner));
  }

  async listPartners(): Promise<SerializedRecord[]> {
    const docs = await this.store.list('partner');
    return docs.map(serializeDocument);
  }
}
