/**
 * Identity of an authenticated principal: the medical authority of an entry
 * or an accessor in the permission table.
 */
export class PrincipalId {
  private constructor(private readonly value: string) {}

  static from(value: string): PrincipalId {
    if (!value || value.trim().length === 0) {
      throw new Error('PrincipalId cannot be empty');
    }
    return new PrincipalId(value);
  }

  static tryFrom(value: string): PrincipalId | null {
    return value.trim().length > 0 ? new PrincipalId(value) : null;
  }

  unwrap(): string {
    return this.value;
  }

  equals(other: PrincipalId): boolean {
    return this.value === other.value;
  }
}
