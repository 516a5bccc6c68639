import { InvalidAuthTokenError } from './vault-errors';
import { VaultMetadata, VaultMetadataInput } from './VaultMetadata';
import { EntryId } from './value-objects/EntryId';
import { LedgerSequence } from './value-objects/LedgerSequence';
import { PrincipalId } from './value-objects/PrincipalId';

export type VaultEntrySnapshot = Readonly<{
  entryId: EntryId;
  metadata: VaultMetadata;
  medicalAuthority: PrincipalId;
  creationTimestamp: LedgerSequence;
}>;

/**
 * Catalog record describing one stored medical record.
 *
 * Instances are immutable: `transferAuthority` and `revise` return the
 * updated entry and leave the receiver untouched, so a repository can apply
 * them inside a transaction and discard the result on rollback.
 *
 * Invariants enforced:
 * - entryId and creationTimestamp never change
 * - only the current medical authority may transfer or revise the entry
 */
export class VaultEntry {
  private constructor(private readonly snapshot: VaultEntrySnapshot) {}

  static create(params: {
    entryId: EntryId;
    metadata: VaultMetadata;
    authority: PrincipalId;
    createdAt: LedgerSequence;
  }): VaultEntry {
    return new VaultEntry({
      entryId: params.entryId,
      metadata: params.metadata,
      medicalAuthority: params.authority,
      creationTimestamp: params.createdAt,
    });
  }

  static restore(snapshot: VaultEntrySnapshot): VaultEntry {
    return new VaultEntry(snapshot);
  }

  get entryId(): EntryId {
    return this.snapshot.entryId;
  }

  get metadata(): VaultMetadata {
    return this.snapshot.metadata;
  }

  get medicalAuthority(): PrincipalId {
    return this.snapshot.medicalAuthority;
  }

  get creationTimestamp(): LedgerSequence {
    return this.snapshot.creationTimestamp;
  }

  isAuthority(principal: PrincipalId): boolean {
    return this.snapshot.medicalAuthority.equals(principal);
  }

  /**
   * @throws {InvalidAuthTokenError} if caller is not the current authority
   */
  transferAuthority(caller: PrincipalId, newAuthority: PrincipalId): VaultEntry {
    this.assertAuthority(caller);
    return new VaultEntry({ ...this.snapshot, medicalAuthority: newAuthority });
  }

  /**
   * Replace the four metadata fields. The authority check runs before the
   * fields are validated.
   *
   * @throws {InvalidAuthTokenError} if caller is not the current authority
   */
  revise(caller: PrincipalId, input: VaultMetadataInput): VaultEntry {
    this.assertAuthority(caller);
    return new VaultEntry({ ...this.snapshot, metadata: VaultMetadata.from(input) });
  }

  toSnapshot(): VaultEntrySnapshot {
    return this.snapshot;
  }

  private assertAuthority(caller: PrincipalId): void {
    if (!this.isAuthority(caller)) {
      throw new InvalidAuthTokenError(this.snapshot.entryId.unwrap(), caller.unwrap());
    }
  }
}
