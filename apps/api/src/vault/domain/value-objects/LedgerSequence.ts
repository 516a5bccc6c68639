/**
 * Position of a committed mutation in the registry's ledger.
 * Starts at 0 and advances by one with every committed create, transfer or modify.
 */
export class LedgerSequence {
  private constructor(private readonly value: number) {}

  static from(value: number): LedgerSequence {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new Error('LedgerSequence must be a non-negative integer');
    }
    return new LedgerSequence(value);
  }

  static zero(): LedgerSequence {
    return new LedgerSequence(0);
  }

  unwrap(): number {
    return this.value;
  }

  equals(other: LedgerSequence): boolean {
    return this.value === other.value;
  }

  increment(): LedgerSequence {
    return new LedgerSequence(this.value + 1);
  }
}
