import {
  VaultEntryDraft,
  VaultRegistryRepository,
} from '../../../src/vault/application/ports/vault-registry-repository';
import { AccessPermission } from '../../../src/vault/domain/AccessPermission';
import { initialRegistryState, RegistryState } from '../../../src/vault/domain/RegistryState';
import { VaultEntry } from '../../../src/vault/domain/VaultEntry';
import { DuplicateVaultEntryError, VaultEntryAbsentError } from '../../../src/vault/domain/vault-errors';
import { EntryId } from '../../../src/vault/domain/value-objects/EntryId';
import { PrincipalId } from '../../../src/vault/domain/value-objects/PrincipalId';

/**
 * Mutations run without awaiting between their read and their write, so they
 * never interleave.
 */
export class InMemoryVaultRegistryRepository extends VaultRegistryRepository {
  private entries = new Map<number, VaultEntry>();
  private permissions = new Map<string, AccessPermission>();
  private state: RegistryState = initialRegistryState();

  async appendEntry(draft: VaultEntryDraft): Promise<VaultEntry> {
    const entryId = EntryId.from(this.state.totalVaultEntries + 1);
    if (this.entries.has(entryId.unwrap())) {
      throw new DuplicateVaultEntryError(entryId.unwrap());
    }
    const createdAt = this.state.ledgerSequence.increment();
    const entry = VaultEntry.create({
      entryId,
      metadata: draft.metadata,
      authority: draft.authority,
      createdAt,
    });
    this.entries.set(entryId.unwrap(), entry);
    this.permissions.set(permissionKey(entryId, draft.authority), {
      entryId,
      accessorIdentity: draft.authority,
      hasAccessRights: true,
    });
    this.state = { totalVaultEntries: entryId.unwrap(), ledgerSequence: createdAt };
    return entry;
  }

  async updateEntry(entryId: EntryId, change: (entry: VaultEntry) => VaultEntry): Promise<VaultEntry> {
    const current = this.entries.get(entryId.unwrap());
    if (!current) {
      throw new VaultEntryAbsentError(entryId.unwrap());
    }
    const updated = change(current);
    this.entries.set(entryId.unwrap(), updated);
    this.state = { ...this.state, ledgerSequence: this.state.ledgerSequence.increment() };
    return updated;
  }

  async findEntry(entryId: EntryId): Promise<VaultEntry | null> {
    return this.entries.get(entryId.unwrap()) ?? null;
  }

  async getState(): Promise<RegistryState> {
    return this.state;
  }

  async findPermission(entryId: EntryId, accessorIdentity: PrincipalId): Promise<AccessPermission | null> {
    return this.permissions.get(permissionKey(entryId, accessorIdentity)) ?? null;
  }

  /**
   * Rewinds the counter the way an external writer could, to exercise the
   * duplicate-id guard.
   */
  rewindCounter(totalVaultEntries: number): void {
    this.state = { ...this.state, totalVaultEntries };
  }
}

const permissionKey = (entryId: EntryId, accessor: PrincipalId): string =>
  `${entryId.unwrap()}::${accessor.unwrap()}`;
