import { AccessPermission } from '../../domain/AccessPermission';
import { RegistryState } from '../../domain/RegistryState';
import { VaultEntry } from '../../domain/VaultEntry';
import { VaultMetadata } from '../../domain/VaultMetadata';
import { EntryId } from '../../domain/value-objects/EntryId';
import { PrincipalId } from '../../domain/value-objects/PrincipalId';

/**
 * Input for creating a new vault entry. The id and creation timestamp are
 * assigned by the repository.
 */
export type VaultEntryDraft = Readonly<{
  metadata: VaultMetadata;
  authority: PrincipalId;
}>;

/**
 * Repository port for the vault registry tables.
 *
 * Implementations must serialize mutations: each one reads the registry
 * state, writes, and commits without any other mutation interleaving, and a
 * failed mutation leaves every table unchanged.
 */
export abstract class VaultRegistryRepository {
  /**
   * Create an entry at id `totalVaultEntries + 1`, record an access
   * permission (true) for its authority, and advance the counter and the
   * ledger sequence. The entry is stamped with the new ledger sequence.
   *
   * Throws DuplicateVaultEntryError if a row already exists at the assigned id.
   */
  abstract appendEntry(draft: VaultEntryDraft): Promise<VaultEntry>;

  /**
   * Load the entry, apply `change` and persist what it returns, advancing the
   * ledger sequence. An error thrown by `change` aborts the mutation.
   *
   * Throws VaultEntryAbsentError if no entry exists at `entryId`.
   */
  abstract updateEntry(entryId: EntryId, change: (entry: VaultEntry) => VaultEntry): Promise<VaultEntry>;

  /**
   * Returns null if no entry exists at `entryId`.
   */
  abstract findEntry(entryId: EntryId): Promise<VaultEntry | null>;

  abstract getState(): Promise<RegistryState>;

  /**
   * Returns null if no permission row exists for the pair.
   */
  abstract findPermission(entryId: EntryId, accessorIdentity: PrincipalId): Promise<AccessPermission | null>;
}
