export const vaultErrorKinds = [
  'CorruptedIdFormat',
  'OversizedPayload',
  'ForbiddenTagType',
  'VaultEntryAbsent',
  'InvalidAuthToken',
  'PermissionBreach',
  'DuplicateVaultEntry',
] as const;

export type VaultErrorKind = (typeof vaultErrorKinds)[number];

/**
 * Base class for every failure the vault registry reports.
 *
 * All of them are raised before any write happens, so a caller that sees one
 * can rely on the registry being unchanged.
 */
export abstract class VaultRegistryError extends Error {
  abstract readonly kind: VaultErrorKind;
}

/**
 * A string field (patient hash, diagnostic notes) violates its length or
 * character-set bound.
 */
export class CorruptedIdFormatError extends VaultRegistryError {
  readonly kind = 'CorruptedIdFormat' as const;

  constructor(message: string) {
    super(message);
    this.name = 'CorruptedIdFormatError';
  }
}

export class OversizedPayloadError extends VaultRegistryError {
  readonly kind = 'OversizedPayload' as const;

  constructor(readonly payloadByteSize: number) {
    super(`Payload byte size ${payloadByteSize} is outside the accepted range`);
    this.name = 'OversizedPayloadError';
  }
}

/**
 * The classification tag list has the wrong number of tags, or one tag
 * violates its length or character-set bound.
 */
export class ForbiddenTagTypeError extends VaultRegistryError {
  readonly kind = 'ForbiddenTagType' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ForbiddenTagTypeError';
  }
}

export class VaultEntryAbsentError extends VaultRegistryError {
  readonly kind = 'VaultEntryAbsent' as const;

  constructor(readonly entryId: number) {
    super(`Vault entry ${entryId} does not exist`);
    this.name = 'VaultEntryAbsentError';
  }
}

export class InvalidAuthTokenError extends VaultRegistryError {
  readonly kind = 'InvalidAuthToken' as const;

  constructor(
    readonly entryId: number,
    readonly caller: string
  ) {
    super(`Caller ${caller} is not the medical authority of vault entry ${entryId}`);
    this.name = 'InvalidAuthTokenError';
  }
}

export class PermissionBreachError extends VaultRegistryError {
  readonly kind = 'PermissionBreach' as const;

  constructor(
    readonly entryId: number,
    readonly accessorIdentity: string
  ) {
    super(`No access permission recorded for ${accessorIdentity} on vault entry ${entryId}`);
    this.name = 'PermissionBreachError';
  }
}

/**
 * Raised when the id handed out by the registry counter is already taken.
 * Only reachable if the counter was changed outside the registry.
 */
export class DuplicateVaultEntryError extends VaultRegistryError {
  readonly kind = 'DuplicateVaultEntry' as const;

  constructor(
    readonly entryId: number,
    override readonly cause?: unknown
  ) {
    super(`Vault entry ${entryId} already exists`);
    this.name = 'DuplicateVaultEntryError';
  }
}

export const isVaultRegistryError = (error: unknown): error is VaultRegistryError =>
  error instanceof VaultRegistryError;
