/**
 * Loan Tracker - Database Module Export
 */

export { createPool, readDatabaseConfig, testConnection, closePool, DatabaseConfig } from './connection';
export {
  PostgresDocumentStore,
  DocumentStore,
  StoredDocument,
  DocumentData,
  EqualityFilter,
  StoreDescription,
  CollectionName,
} from './document.store';
