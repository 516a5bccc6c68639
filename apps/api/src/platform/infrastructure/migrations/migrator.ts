import { promises as fs } from 'fs';
import path from 'path';
import { Logger } from '@nestjs/common';
import { FileMigrationProvider, Kysely, Migrator, PostgresDialect, type MigrationResultSet } from 'kysely';
import { Pool } from 'pg';

type MigratorConfig = {
  migrationsPath: string;
  connectionString: string;
  migrationTableName?: string;
  direction?: 'up' | 'down';
};

const logger = new Logger('Migrator');

/**
 * Apply (or roll back one step of) the migrations found in `migrationsPath`.
 *
 * Returns false if any migration failed; the caller decides the exit code.
 */
export async function runMigrations<DB>({
  migrationsPath,
  connectionString,
  migrationTableName,
  direction = 'up',
}: MigratorConfig): Promise<boolean> {
  const db = new Kysely<DB>({
    dialect: new PostgresDialect({
      pool: new Pool({ connectionString }),
    }),
  });

  const provider = new FileMigrationProvider({
    fs,
    path,
    migrationFolder: migrationsPath,
  });

  const migrator = new Migrator({
    db,
    provider,
    migrationTableName,
  });

  try {
    const migrationResult: MigrationResultSet =
      direction === 'down' ? await migrator.migrateDown() : await migrator.migrateToLatest();

    migrationResult.results?.forEach((result) => {
      if (result.status === 'Success') {
        logger.log(`Migration ${result.migrationName} ${direction} succeeded`);
      } else if (result.status === 'Error') {
        logger.error(`Migration ${result.migrationName} failed`);
      }
    });

    if (migrationResult.error) {
      logger.error('Migration failed', migrationResult.error instanceof Error ? migrationResult.error.stack : String(migrationResult.error));
      return false;
    }
    return true;
  } finally {
    await db.destroy();
  }
}

export function resolveConnectionString(envVar: string, fallback?: string): string {
  const value = process.env[envVar] ?? fallback;
  if (!value) {
    throw new Error(`Missing connection string for migrations (${envVar})`);
  }
  return value;
}

export function resolveDirection(argv: readonly string[]): 'up' | 'down' {
  return argv[2] === 'down' ? 'down' : 'up';
}
