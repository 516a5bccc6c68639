import { CorruptedIdFormatError } from '../vault-errors';
import { hasLengthBetween, isAscii } from './ascii';

export const DIAGNOSTIC_NOTES_MAX_LENGTH = 128;

/**
 * Short free-text diagnostic summary (1-128 ASCII characters).
 */
export class DiagnosticNotes {
  private constructor(private readonly value: string) {}

  static from(value: string): DiagnosticNotes {
    if (!hasLengthBetween(value, 1, DIAGNOSTIC_NOTES_MAX_LENGTH)) {
      throw new CorruptedIdFormatError(
        `Diagnostic notes must be 1-${DIAGNOSTIC_NOTES_MAX_LENGTH} characters, got ${value.length}`
      );
    }
    if (!isAscii(value)) {
      throw new CorruptedIdFormatError('Diagnostic notes must be ASCII without NUL');
    }
    return new DiagnosticNotes(value);
  }

  unwrap(): string {
    return this.value;
  }

  equals(other: DiagnosticNotes): boolean {
    return this.value === other.value;
  }
}
