import { OversizedPayloadError } from '../vault-errors';

/** Exclusive upper bound on a record payload, in bytes. */
export const PAYLOAD_BYTE_SIZE_LIMIT = 1_000_000_000;

export class PayloadByteSize {
  private constructor(private readonly value: number) {}

  static from(value: number): PayloadByteSize {
    if (!Number.isInteger(value) || value <= 0 || value >= PAYLOAD_BYTE_SIZE_LIMIT) {
      throw new OversizedPayloadError(value);
    }
    return new PayloadByteSize(value);
  }

  unwrap(): number {
    return this.value;
  }

  equals(other: PayloadByteSize): boolean {
    return this.value === other.value;
  }
}
