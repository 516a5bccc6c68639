import path from 'path';
import { Logger } from '@nestjs/common';
import { config } from 'dotenv';
import {
  resolveConnectionString,
  resolveDirection,
  runMigrations,
} from '../../../platform/infrastructure/migrations/migrator';
import { VaultDatabase } from '../database.types';

config();

const logger = new Logger('VaultMigrations');

async function main(): Promise<void> {
  const connectionString = resolveConnectionString('VAULT_DATABASE_URL', process.env.DATABASE_URL);

  const succeeded = await runMigrations<VaultDatabase>({
    migrationsPath: path.join(__dirname, 'vault'),
    connectionString,
    migrationTableName: 'vault_migrations',
    direction: resolveDirection(process.argv),
  });

  if (!succeeded) {
    process.exitCode = 1;
  }
}

void main().catch((error: unknown) => {
  logger.error(error instanceof Error ? (error.stack ?? error.message) : String(error));
  process.exitCode = 1;
});
