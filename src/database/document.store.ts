/**
 * Loan Tracker - Document Store
 *
 * Collections of schema-less JSON documents, each keyed by a RecordId.
 * The PostgreSQL implementation keeps one JSONB table per collection
 * (see schema.sql).
 */

import { Pool } from 'pg';
import { RecordId } from '../shared/types/record-id';
import { StoreError } from '../shared/errors';

export type CollectionName = 'customer' | 'partner' | 'loan';

export type DocumentData = Record<string, unknown>;

export interface StoredDocument {
  id: RecordId;
  data: DocumentData;
}

/** Equality match on top-level text fields */
export type EqualityFilter = Record<string, string>;

export interface StoreDescription {
  name: string;
  collections: string[];
}

export interface DocumentStore {
  create(collection: CollectionName, data: DocumentData): Promise<RecordId>;
  list(collection: CollectionName, filter?: EqualityFilter): Promise<StoredDocument[]>;
  /** Resolves null for a malformed identifier as well as a missing one */
  findById(collection: CollectionName, id: RecordId | string): Promise<StoredDocument | null>;
  ping(): Promise<void>;
  describe(): Promise<StoreDescription>;
}

const FIELD_NAME = /^[a-z_][a-z0-9_]*$/i;

export const MAX_DESCRIBED_COLLECTIONS = 10;

export function assertFilterField(field: string): void {
  if (!FIELD_NAME.test(field)) {
    throw new Error(`Unsupported filter field: "${field}"`);
  }
}

type DocumentRow = {
  id: string;
  data: DocumentData;
};

export class PostgresDocumentStore implements DocumentStore {
  constructor(private readonly pool: Pool) {}

  async create(collection: CollectionName, data: DocumentData): Promise<RecordId> {
    const id = RecordId.generate();

    try {
      await this.pool.query(
        `INSERT INTO ${collection} (id, data) VALUES ($1, $2::jsonb)`,
        [id.toString(), JSON.stringify(data)]
      );
    } catch (error) {
      throw new StoreError(`create ${collection}`, error);
    }

    return id;
  }

  async list(collection: CollectionName, filter: EqualityFilter = {}): Promise<StoredDocument[]> {
    const clauses: string[] = [];
    const values: string[] = [];

    for (const [field, value] of Object.entries(filter)) {
      assertFilterField(field);
      values.push(value);
      clauses.push(`data ->> '${field}' = $${values.length}`);
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';

    try {
      const result = await this.pool.query<DocumentRow>(
        `SELECT id, data FROM ${collection} ${where} ORDER BY seq`,
        values
      );
      return result.rows.map(row => this.mapRow(row));
    } catch (error) {
      throw new StoreError(`list ${collection}`, error);
    }
  }

  async findById(collection: CollectionName, id: RecordId | string): Promise<StoredDocument | null> {
    const recordId = typeof id === 'string' ? RecordId.tryParse(id) : id;
    if (!recordId) return null;

    try {
      const result = await this.pool.query<DocumentRow>(
        `SELECT id, data FROM ${collection} WHERE id = $1`,
        [recordId.toString()]
      );
      if (result.rows.length === 0) return null;
      return this.mapRow(result.rows[0]);
    } catch (error) {
      throw new StoreError(`find ${collection}`, error);
    }
  }

  async ping(): Promise<void> {
    try {
      await this.pool.query('SELECT 1');
    } catch (error) {
      throw new StoreError('ping', error);
    }
  }

  async describe(): Promise<StoreDescription> {
    try {
      const nameResult = await this.pool.query<{ name: string }>(
        'SELECT current_database() AS name'
      );
      const tableResult = await this.pool.query<{ table_name: string }>(
        `SELECT table_name
         FROM information_schema.tables
         WHERE table_schema = 'public'
         ORDER BY table_name
         LIMIT ${MAX_DESCRIBED_COLLECTIONS}`
      );

      return {
        name: nameResult.rows[0]?.name ?? '',
        collections: tableResult.rows.map(row => row.table_name),
      };
    } catch (error) {
      throw new StoreError('describe', error);
    }
  }

  private mapRow(row: DocumentRow): StoredDocument {
    return {
      id: RecordId.parse(row.id),
      data: row.data,
    };
  }
}
