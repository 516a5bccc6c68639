import { CorruptedIdFormatError } from '../vault-errors';
import { hasLengthBetween, isAscii } from './ascii';

export const PATIENT_HASH_MAX_LENGTH = 64;

/**
 * Opaque hash identifying the patient a record belongs to (1-64 ASCII characters).
 */
export class PatientHashCode {
  private constructor(private readonly value: string) {}

  static from(value: string): PatientHashCode {
    if (!hasLengthBetween(value, 1, PATIENT_HASH_MAX_LENGTH)) {
      throw new CorruptedIdFormatError(
        `Patient hash code must be 1-${PATIENT_HASH_MAX_LENGTH} characters, got ${value.length}`
      );
    }
    if (!isAscii(value)) {
      throw new CorruptedIdFormatError('Patient hash code must be ASCII without NUL');
    }
    return new PatientHashCode(value);
  }

  unwrap(): string {
    return this.value;
  }

  equals(other: PatientHashCode): boolean {
    return this.value === other.value;
  }
}
