import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Kysely, PostgresDialect } from 'kysely';
import { Pool } from 'pg';

/**
 * Narrow view of a database service that repositories depend on.
 */
export interface DatabaseHandle<DB> {
  getDb(): Kysely<DB>;
}

@Injectable()
export class DatabaseService<DB = unknown> implements DatabaseHandle<DB>, OnModuleDestroy {
  private readonly db: Kysely<DB>;

  constructor(@Inject(ConfigService) config: ConfigService) {
    const connectionString = config.get<string>('DATABASE_URL');

    if (!connectionString) {
      throw new Error('DATABASE_URL is required to start the API');
    }

    const dialect = new PostgresDialect({
      pool: new Pool({ connectionString }),
    });

    this.db = new Kysely<DB>({ dialect });
  }

  getDb(): Kysely<DB> {
    return this.db;
  }

  async onModuleDestroy(): Promise<void> {
    await this.db.destroy();
  }
}
