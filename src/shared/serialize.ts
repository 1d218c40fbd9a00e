import { StoredDocument } from '../database/document.store';

export type SerializedRecord = { id: string } & Record<string, unknown>;

/**
 * Wire form of a stored document: its fields plus the identifier as a string.
 * Dates are already held as ISO-8601 strings.
 */
export function serializeDocument(doc: StoredDocument): SerializedRecord {
  return { ...doc.data, id: doc.id.toString() };
}
