/**
 * RecordId - Store-assigned identifier for customers, partners and loans.
 *
 * Canonical form is a lower-case UUID string. References between
 * collections are persisted in that form.
 */

import { v4 as uuidv4, validate as isUuid } from 'uuid';
import { MalformedIdentifierError } from '../errors';

export class RecordId {
  private constructor(private readonly value: string) {}

  static generate(): RecordId {
    return new RecordId(uuidv4());
  }

  static parse(input: string): RecordId {
    const trimmed = input.trim();
    if (!isUuid(trimmed)) {
      throw new MalformedIdentifierError(input);
    }
    return new RecordId(trimmed.toLowerCase());
  }

  static tryParse(input: unknown): RecordId | null {
    if (typeof input !== 'string') return null;
    try {
      return RecordId.parse(input);
    } catch (error) {
      if (error instanceof MalformedIdentifierError) return null;
      throw error;
    }
  }

  equals(other: RecordId): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}
