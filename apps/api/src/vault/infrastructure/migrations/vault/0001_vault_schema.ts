import { Kysely, sql } from 'kysely';
import { REGISTRY_STATE_ROW_ID, VaultDatabase } from '../../database.types';

export async function up(db: Kysely<VaultDatabase>): Promise<void> {
  await db.schema.createSchema('vault').ifNotExists().execute();

  await db.schema
    .createTable('vault.registry_state')
    .addColumn('id', 'smallint', (col) => col.primaryKey().check(sql`id = ${sql.lit(REGISTRY_STATE_ROW_ID)}`))
    .addColumn('total_vault_entries', 'bigint', (col) => col.notNull().defaultTo(0))
    .addColumn('ledger_sequence', 'bigint', (col) => col.notNull().defaultTo(0))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db
    .insertInto('vault.registry_state')
    .values({ id: REGISTRY_STATE_ROW_ID, total_vault_entries: 0, ledger_sequence: 0 })
    .execute();

  await db.schema
    .createTable('vault.entries')
    .addColumn('entry_id', 'bigint', (col) => col.primaryKey())
    .addColumn('patient_hash_code', 'varchar(64)', (col) => col.notNull())
    .addColumn('medical_authority', 'varchar', (col) => col.notNull())
    .addColumn('payload_byte_size', 'integer', (col) => col.notNull())
    .addColumn('creation_timestamp', 'bigint', (col) => col.notNull())
    .addColumn('diagnostic_notes', 'varchar(128)', (col) => col.notNull())
    .addColumn('classification_tags', sql`text[]`, (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createTable('vault.access_permissions')
    .addColumn('entry_id', 'bigint', (col) => col.notNull().references('vault.entries.entry_id').onDelete('cascade'))
    .addColumn('accessor_identity', 'varchar', (col) => col.notNull())
    .addColumn('has_access_rights', 'boolean', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addPrimaryKeyConstraint('vault_access_permissions_pk', ['entry_id', 'accessor_identity'])
    .execute();
}

export async function down(db: Kysely<VaultDatabase>): Promise<void> {
  await db.schema.dropTable('vault.access_permissions').ifExists().execute();
  await db.schema.dropTable('vault.entries').ifExists().execute();
  await db.schema.dropTable('vault.registry_state').ifExists().execute();
  await db.schema.dropSchema('vault').ifExists().execute();
}
