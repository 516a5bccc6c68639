import { Inject, Injectable } from '@nestjs/common';
import { Selectable, Transaction } from 'kysely';
import { VaultEntryDraft, VaultRegistryRepository } from '../application/ports/vault-registry-repository';
import { AccessPermission } from '../domain/AccessPermission';
import { RegistryState } from '../domain/RegistryState';
import { VaultEntry } from '../domain/VaultEntry';
import { VaultMetadata } from '../domain/VaultMetadata';
import { DuplicateVaultEntryError, VaultEntryAbsentError } from '../domain/vault-errors';
import { EntryId } from '../domain/value-objects/EntryId';
import { LedgerSequence } from '../domain/value-objects/LedgerSequence';
import { PrincipalId } from '../domain/value-objects/PrincipalId';
import { DatabaseHandle } from '../../platform/infrastructure/database/database.service';
import { isUniqueViolation } from '../../platform/infrastructure/database/database.errors';
import { VaultDatabaseService } from './database.service';
import { REGISTRY_STATE_ROW_ID, VaultDatabase, VaultEntriesTable } from './database.types';

type EntryRow = Selectable<VaultEntriesTable>;

const ENTRY_COLUMNS = [
  'entry_id',
  'patient_hash_code',
  'medical_authority',
  'payload_byte_size',
  'creation_timestamp',
  'diagnostic_notes',
  'classification_tags',
  'created_at',
  'updated_at',
] as const;

const toEntry = (row: EntryRow): VaultEntry =>
  VaultEntry.restore({
    entryId: EntryId.from(Number(row.entry_id)),
    metadata: VaultMetadata.from({
      patientHashCode: row.patient_hash_code,
      payloadByteSize: Number(row.payload_byte_size),
      diagnosticNotes: row.diagnostic_notes,
      classificationTags: row.classification_tags,
    }),
    medicalAuthority: PrincipalId.from(row.medical_authority),
    creationTimestamp: LedgerSequence.from(Number(row.creation_timestamp)),
  });

const metadataColumns = (metadata: VaultMetadata) => ({
  patient_hash_code: metadata.patientHashCode.unwrap(),
  payload_byte_size: metadata.payloadByteSize.unwrap(),
  diagnostic_notes: metadata.diagnosticNotes.unwrap(),
  classification_tags: metadata.classificationTags.unwrap(),
});

/**
 * Postgres-backed registry. Every mutation locks the single registry_state
 * row first, which serializes all writers across API instances.
 */
@Injectable()
export class KyselyVaultRegistryRepository extends VaultRegistryRepository {
  constructor(@Inject(VaultDatabaseService) private readonly dbService: DatabaseHandle<VaultDatabase>) {
    super();
  }

  async appendEntry(draft: VaultEntryDraft): Promise<VaultEntry> {
    const db = this.dbService.getDb();
    const attempt: { entryId: EntryId | null } = { entryId: null };
    try {
      return await db.transaction().execute(async (trx) => {
        const state = await this.lockState(trx);
        const entryId = EntryId.from(state.totalVaultEntries + 1);
        attempt.entryId = entryId;

        const existing = await trx
          .selectFrom('vault.entries')
          .select('entry_id')
          .where('entry_id', '=', entryId.unwrap())
          .executeTakeFirst();
        if (existing) {
          throw new DuplicateVaultEntryError(entryId.unwrap());
        }

        const createdAt = state.ledgerSequence.increment();
        const entry = VaultEntry.create({
          entryId,
          metadata: draft.metadata,
          authority: draft.authority,
          createdAt,
        });

        await trx
          .insertInto('vault.entries')
          .values({
            entry_id: entryId.unwrap(),
            ...metadataColumns(entry.metadata),
            medical_authority: entry.medicalAuthority.unwrap(),
            creation_timestamp: createdAt.unwrap(),
          })
          .execute();

        await trx
          .insertInto('vault.access_permissions')
          .values({
            entry_id: entryId.unwrap(),
            accessor_identity: draft.authority.unwrap(),
            has_access_rights: true,
          })
          .execute();

        await this.writeState(trx, {
          totalVaultEntries: entryId.unwrap(),
          ledgerSequence: createdAt,
        });

        return entry;
      });
    } catch (error) {
      if (attempt.entryId && isUniqueViolation(error)) {
        throw new DuplicateVaultEntryError(attempt.entryId.unwrap(), error);
      }
      throw error;
    }
  }

  async updateEntry(entryId: EntryId, change: (entry: VaultEntry) => VaultEntry): Promise<VaultEntry> {
    const db = this.dbService.getDb();
    return db.transaction().execute(async (trx) => {
      const state = await this.lockState(trx);

      const row = await trx
        .selectFrom('vault.entries')
        .select(ENTRY_COLUMNS)
        .where('entry_id', '=', entryId.unwrap())
        .executeTakeFirst();
      if (!row) {
        throw new VaultEntryAbsentError(entryId.unwrap());
      }

      const updated = change(toEntry(row));

      await trx
        .updateTable('vault.entries')
        .set({
          ...metadataColumns(updated.metadata),
          medical_authority: updated.medicalAuthority.unwrap(),
          updated_at: new Date(),
        })
        .where('entry_id', '=', entryId.unwrap())
        .execute();

      await this.writeState(trx, {
        totalVaultEntries: state.totalVaultEntries,
        ledgerSequence: state.ledgerSequence.increment(),
      });

      return updated;
    });
  }

  async findEntry(entryId: EntryId): Promise<VaultEntry | null> {
    const row = await this.dbService
      .getDb()
      .selectFrom('vault.entries')
      .select(ENTRY_COLUMNS)
      .where('entry_id', '=', entryId.unwrap())
      .executeTakeFirst();
    return row ? toEntry(row) : null;
  }

  async getState(): Promise<RegistryState> {
    const row = await this.dbService
      .getDb()
      .selectFrom('vault.registry_state')
      .select(['total_vault_entries', 'ledger_sequence'])
      .where('id', '=', REGISTRY_STATE_ROW_ID)
      .executeTakeFirst();
    if (!row) {
      throw new Error('Vault registry state is missing; run the vault migrations');
    }
    return {
      totalVaultEntries: Number(row.total_vault_entries),
      ledgerSequence: LedgerSequence.from(Number(row.ledger_sequence)),
    };
  }

  async findPermission(entryId: EntryId, accessorIdentity: PrincipalId): Promise<AccessPermission | null> {
    const row = await this.dbService
      .getDb()
      .selectFrom('vault.access_permissions')
      .select(['has_access_rights'])
      .where('entry_id', '=', entryId.unwrap())
      .where('accessor_identity', '=', accessorIdentity.unwrap())
      .executeTakeFirst();
    if (!row) return null;
    return { entryId, accessorIdentity, hasAccessRights: row.has_access_rights };
  }

  private async lockState(trx: Transaction<VaultDatabase>): Promise<RegistryState> {
    const row = await trx
      .selectFrom('vault.registry_state')
      .select(['total_vault_entries', 'ledger_sequence'])
      .where('id', '=', REGISTRY_STATE_ROW_ID)
      .forUpdate()
      .executeTakeFirst();
    if (!row) {
      throw new Error('Vault registry state is missing; run the vault migrations');
    }
    return {
      totalVaultEntries: Number(row.total_vault_entries),
      ledgerSequence: LedgerSequence.from(Number(row.ledger_sequence)),
    };
  }

  private async writeState(trx: Transaction<VaultDatabase>, state: RegistryState): Promise<void> {
    await trx
      .updateTable('vault.registry_state')
      .set({
        total_vault_entries: state.totalVaultEntries,
        ledger_sequence: state.ledgerSequence.unwrap(),
        updated_at: new Date(),
      })
      .where('id', '=', REGISTRY_STATE_ROW_ID)
      .execute();
  }
}
