import {
  CompiledQuery,
  DatabaseConnection,
  DatabaseIntrospector,
  Dialect,
  Driver,
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
  QueryResult,
} from 'kysely';

type Row = Record<string, unknown>;

export type ScriptedTable = 'entries' | 'access_permissions' | 'registry_state';

const PRIMARY_KEYS: Record<ScriptedTable, readonly string[]> = {
  entries: ['entry_id'],
  access_permissions: ['entry_id', 'accessor_identity'],
  registry_state: ['id'],
};

const ASSIGNMENT = /"(\w+)" = \$(\d+)/g;

const isScriptedTable = (name: string): name is ScriptedTable => name in PRIMARY_KEYS;

const uniqueViolation = (table: string) =>
  Object.assign(new Error(`duplicate key value violates unique constraint "${table}_pkey"`), { code: '23505' });

const matches = (row: Row, clauses: ReadonlyArray<[string, unknown]>) =>
  clauses.every(([column, value]) => String(row[column]) === String(value));

/**
 * Postgres stand-in for Kysely: compiles with the real Postgres compiler and
 * runs the resulting statements against three in-memory tables. Understands
 * only the statement shapes the vault repository issues.
 */
export class ScriptedVaultStore {
  tables: Record<ScriptedTable, Row[]> = {
    entries: [],
    access_permissions: [],
    registry_state: [{ id: 1, total_vault_entries: '0', ledger_sequence: '0', updated_at: new Date(0) }],
  };
  readonly statements: string[] = [];
  readonly transactions: Array<'commit' | 'rollback'> = [];
  failNextInsertInto: { table: ScriptedTable; error: Error } | null = null;
  private saved: Record<ScriptedTable, Row[]> | null = null;

  seed(table: ScriptedTable, row: Row): void {
    this.tables[table].push(row);
  }

  begin(): void {
    this.saved = this.copyTables();
  }

  commit(): void {
    this.saved = null;
    this.transactions.push('commit');
  }

  rollback(): void {
    if (this.saved) {
      this.tables = this.saved;
    }
    this.saved = null;
    this.transactions.push('rollback');
  }

  execute(query: CompiledQuery): Row[] {
    const { sql, parameters } = query;
    this.statements.push(sql);
    const table = this.tableOf(sql);
    const [head, where = ''] = sql.split(' where ');
    const clauses = this.assignments(where, parameters);

    if (sql.startsWith('select')) {
      return this.tables[table].filter((row) => matches(row, clauses)).map((row) => ({ ...row }));
    }

    if (sql.startsWith('insert')) {
      const failure = this.failNextInsertInto;
      if (failure && failure.table === table) {
        this.failNextInsertInto = null;
        throw failure.error;
      }
      const columns = (/\(([^)]*)\) values/.exec(sql)?.[1] ?? '').split(', ').map((column) => column.replace(/"/g, ''));
      const row: Row = { created_at: new Date(), updated_at: new Date() };
      columns.forEach((column, index) => {
        row[column] = parameters[index];
      });
      const key = PRIMARY_KEYS[table].map((column): [string, unknown] => [column, row[column]]);
      if (this.tables[table].some((existing) => matches(existing, key))) {
        throw uniqueViolation(table);
      }
      this.tables[table].push(row);
      return [];
    }

    if (sql.startsWith('update')) {
      const changes = this.assignments(head, parameters);
      this.tables[table]
        .filter((row) => matches(row, clauses))
        .forEach((row) => {
          changes.forEach(([column, value]) => {
            row[column] = value;
          });
        });
      return [];
    }

    throw new Error(`Unsupported statement: ${sql}`);
  }

  private tableOf(sql: string): ScriptedTable {
    const name = /"vault"\."(\w+)"/.exec(sql)?.[1] ?? '';
    if (!isScriptedTable(name)) {
      throw new Error(`Unknown table in statement: ${sql}`);
    }
    return name;
  }

  private assignments(fragment: string, parameters: ReadonlyArray<unknown>): Array<[string, unknown]> {
    return Array.from(fragment.matchAll(ASSIGNMENT), (match): [string, unknown] => [
      match[1],
      parameters[Number(match[2]) - 1],
    ]);
  }

  private copyTables(): Record<ScriptedTable, Row[]> {
    return {
      entries: this.tables.entries.map((row) => ({ ...row })),
      access_permissions: this.tables.access_permissions.map((row) => ({ ...row })),
      registry_state: this.tables.registry_state.map((row) => ({ ...row })),
    };
  }
}

class ScriptedConnection implements DatabaseConnection {
  constructor(private readonly store: ScriptedVaultStore) {}

  async executeQuery<R>(compiledQuery: CompiledQuery): Promise<QueryResult<R>> {
    const rows = this.store.execute(compiledQuery);
    return { rows: rows as R[] };
  }

  streamQuery<R>(): AsyncIterableIterator<QueryResult<R>> {
    throw new Error('Streaming is not supported by the scripted store');
  }
}

class ScriptedDriver implements Driver {
  private readonly connection: ScriptedConnection;

  constructor(private readonly store: ScriptedVaultStore) {
    this.connection = new ScriptedConnection(store);
  }

  async init(): Promise<void> {}

  async acquireConnection(): Promise<DatabaseConnection> {
    return this.connection;
  }

  async beginTransaction(): Promise<void> {
    this.store.begin();
  }

  async commitTransaction(): Promise<void> {
    this.store.commit();
  }

  async rollbackTransaction(): Promise<void> {
    this.store.rollback();
  }

  async releaseConnection(): Promise<void> {}

  async destroy(): Promise<void> {}
}

export class ScriptedPostgresDialect implements Dialect {
  constructor(private readonly store: ScriptedVaultStore) {}

  createAdapter() {
    return new PostgresAdapter();
  }

  createDriver(): Driver {
    return new ScriptedDriver(this.store);
  }

  createQueryCompiler() {
    return new PostgresQueryCompiler();
  }

  createIntrospector(db: Kysely<unknown>): DatabaseIntrospector {
    return new PostgresIntrospector(db);
  }
}
