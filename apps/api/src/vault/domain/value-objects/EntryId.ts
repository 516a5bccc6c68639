/**
 * Wrapper for the registry-assigned vault entry identifier (1, 2, 3, ...).
 */
export class EntryId {
  private constructor(private readonly value: number) {}

  static from(value: number): EntryId {
    if (!Number.isSafeInteger(value) || value < 1) {
      throw new Error('EntryId must be a positive integer');
    }
    return new EntryId(value);
  }

  /**
   * Returns null for values that can never name an entry, so lookups can
   * report them as absent instead of malformed.
   */
  static tryFrom(value: number): EntryId | null {
    return Number.isSafeInteger(value) && value >= 1 ? new EntryId(value) : null;
  }

  unwrap(): number {
    return this.value;
  }

  equals(other: EntryId): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value.toString();
  }
}
