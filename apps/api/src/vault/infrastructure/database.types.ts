import { ColumnType } from 'kysely';

type TimestampColumn = ColumnType<Date, Date | string | undefined, Date | string>;

// pg returns int8 columns as strings.
type BigIntColumn = ColumnType<string, number | string, number | string>;

export interface VaultEntriesTable {
  entry_id: BigIntColumn;
  patient_hash_code: string;
  medical_authority: string;
  payload_byte_size: number;
  creation_timestamp: BigIntColumn;
  diagnostic_notes: string;
  classification_tags: string[];
  created_at: TimestampColumn;
  updated_at: TimestampColumn;
}

export interface VaultAccessPermissionsTable {
  entry_id: BigIntColumn;
  accessor_identity: string;
  has_access_rights: boolean;
  created_at: TimestampColumn;
}

export interface VaultRegistryStateTable {
  id: number;
  total_vault_entries: BigIntColumn;
  ledger_sequence: BigIntColumn;
  updated_at: TimestampColumn;
}

export interface VaultDatabase {
  'vault.entries': VaultEntriesTable;
  'vault.access_permissions': VaultAccessPermissionsTable;
  'vault.registry_state': VaultRegistryStateTable;
}

export const REGISTRY_STATE_ROW_ID = 1;
