import postgres from 'postgres';
import { env } from './env';
import { logger } from './logger';

export type SqlValue =
  | null
  | boolean
  | number
  | string
  | Date
  | readonly SqlValue[];

export type NamedParams = Record<string, SqlValue>;

// Quoted text, comments and casts are matched first so only a bare `:name` binds.
const NAMED_PARAM_TOKENS =
  /'(?:[^']|'')*'|"(?:[^"]|"")*"|--[^\n]*|\/\*[\s\S]*?\*\/|::[A-Za-z_]\w*|:([A-Za-z_]\w*)/g;

export type Row = Record<string, unknown>;

export interface ConnectionSettings {
  host: string;
  port: number;
  user: string;
  password?: string;
  database: string;
}

export interface DatabaseOptions {
  url?: string;
  connection?: ConnectionSettings;
  maxConnections?: number;
  idleTimeoutSeconds?: number;
  connectTimeoutSeconds?: number;
}

export interface DriverAdapter {
  execute<T extends Row = Row>(query: string, values?: SqlValue[]): Promise<T[]>;
  begin<T>(callback: (driver: DriverAdapter) => Promise<T>): Promise<T>;
  end(): Promise<void>;
}

export class PostgresDriverAdapter implements DriverAdapter {
  constructor(
    private readonly sql: postgres.Sql,
    private readonly transactional: boolean = false
  ) {}

  execute<T extends Row = Row>(query: string, values: SqlValue[] = []): Promise<T[]> {
    return this.sql.unsafe<T[]>(query, values);
  }

  begin<T>(callback: (driver: DriverAdapter) => Promise<T>): Promise<T> {
    if (this.transactional) {
      throw new Error('Nested transactions are not supported');
    }

    // begin() resolves to UnwrapPromiseArray<T>, which the compiler cannot
    // reduce for a type parameter; it equals T unless T is an array of promises
    return this.sql.begin((txSql) =>
      callback(new PostgresDriverAdapter(txSql, true))
    ) as unknown as Promise<T>;
  }

  async end(): Promise<void> {
    if (this.transactional) {
      return;
    }
    await this.sql.end({ timeout: 5 });
  }
}

export class Database {
  private driverInstance: DriverAdapter | undefined;

  constructor(
    private readonly options: DatabaseOptions = {},
    private readonly overrideDriver?: DriverAdapter
  ) {}

  get databaseName(): string | undefined {
    return this.options.connection?.database;
  }

  async close(): Promise<void> {
    if (this.overrideDriver) {
      return;
    }

    if (this.driverInstance) {
      const driver = this.driverInstance;
      this.driverInstance = undefined;
      await driver.end();
    }
  }

  async findOne<T extends Row = Row>(
    query: string,
    params: NamedParams = {}
  ): Promise<T | null> {
    const rows = await this.runQuery<T>(query, params);
    return rows[0] ?? null;
  }

  async find<T extends Row = Row>(
    query: string,
    params: NamedParams = {}
  ): Promise<T[]> {
    return this.runQuery<T>(query, params);
  }

  async execute(query: string, params: NamedParams = {}): Promise<boolean> {
    await this.runQuery(query, params);
    return true;
  }

  /**
   * Multi-row INSERT built from positional values. `casts` maps a column to
   * a SQL type appended to its placeholder, e.g. `{ parents: 'text[]' }`.
   */
  async insertRows(
    table: string,
    columns: readonly string[],
    rows: readonly SqlValue[][],
    casts: Readonly<Record<string, string>> = {}
  ): Promise<number> {
    if (!rows.length) {
      return 0;
    }

    if (!columns.length) {
      throw new Error(`Cannot insert into ${table} without columns`);
    }

    const values: SqlValue[] = [];
    const tuples = rows.map((row, rowIndex) => {
      if (row.length !== columns.length) {
        throw new Error(
          `Row ${rowIndex} has ${row.length} values, expected ${columns.length}`
        );
      }

      const placeholders = row.map((value, columnIndex) => {
        values.push(value);
        const cast = casts[columns[columnIndex]];
        return cast ? `$${values.length}::${cast}` : `$${values.length}`;
      });

      return `(${placeholders.join(', ')})`;
    });

    const statement = `INSERT INTO ${this.identifier(table)} (${columns
      .map((column) => this.identifier(column))
      .join(', ')}) VALUES ${tuples.join(', ')}`;

    await this.send(statement, values);
    return rows.length;
  }

  async tableExists(tableName: string): Promise<boolean> {
    const row = await this.findOne<{ exists: number }>(
      `SELECT 1 AS exists FROM information_schema.tables
       WHERE table_schema = 'public' AND table_name = :tableName`,
      { tableName }
    );

    return Number(row?.exists) === 1;
  }

  identifier(identifier: string): string {
    if (!identifier) {
      throw new Error('Identifier cannot be empty');
    }

    return identifier
      .split('.')
      .map((segment) => {
        if (!segment) {
          throw new Error(`Invalid identifier segment in "${identifier}"`);
        }
        return `"${segment.replace(/"/g, '""')}"`;
      })
      .join('.');
  }

  literal(value: string): string {
    return `'${value.replace(/'/g, "''")}'`;
  }

  async transaction<T>(callback: (tx: Database) => Promise<T>): Promise<T> {
    return this.driver.begin((txDriver) =>
      callback(new Database(this.options, txDriver))
    );
  }

  private get driver(): DriverAdapter {
    if (this.overrideDriver) {
      return this.overrideDriver;
    }

    if (!this.driverInstance) {
      this.driverInstance = new PostgresDriverAdapter(this.createSql());
    }

    return this.driverInstance;
  }

  private createSql(): postgres.Sql {
    const settings = {
      max: this.options.maxConnections ?? env.DB_POOL_MAX,
      idle_timeout: this.options.idleTimeoutSeconds ?? env.DB_IDLE_TIMEOUT,
      connect_timeout:
        this.options.connectTimeoutSeconds ?? env.DB_CONNECT_TIMEOUT,
      onnotice: (notice: postgres.Notice) => {
        logger.debug('[DB Notice]', { message: notice.message });
      },
    };

    if (this.options.url) {
      return postgres(this.options.url, settings);
    }

    const connection = this.options.connection;
    if (!connection) {
      throw new Error('Database has neither a URL nor connection settings');
    }

    return postgres({
      ...settings,
      host: connection.host,
      port: connection.port,
      username: connection.user,
      password: connection.password,
      database: connection.database,
    });
  }

  private async runQuery<T extends Row = Row>(
    query: string,
    params: NamedParams
  ): Promise<T[]> {
    const { sql, values } = this.prepare(query, params);
    return this.send<T>(sql, values);
  }

  private async send<T extends Row = Row>(
    sql: string,
    values: SqlValue[]
  ): Promise<T[]> {
    const start = Date.now();

    logger.debug('[DB Query]', {
      sql: sql.substring(0, 200) + (sql.length > 200 ? '...' : ''),
      params: values.length,
    });

    try {
      const rows = await this.driver.execute<T>(sql, values);
      logger.debug(`[DB Duration] ${Date.now() - start}ms, rows: ${rows.length}`);
      return rows;
    } catch (error) {
      logger.debug('[DB Error]', { error });
      throw error;
    }
  }

  /**
   * Replace `:name` with `$n`. Casts (`::int`), quoted text and comments are
   * copied through untouched; a name used twice shares one placeholder.
   */
  private prepare(
    query: string,
    params: NamedParams
  ): { sql: string; values: SqlValue[] } {
    const values: SqlValue[] = [];
    const placeholders = new Map<string, string>();

    const sql = query.replace(NAMED_PARAM_TOKENS, (token, name?: string) => {
      if (name === undefined) {
        return token;
      }

      const existing = placeholders.get(name);
      if (existing) {
        return existing;
      }

      if (!Object.prototype.hasOwnProperty.call(params, name)) {
        throw new Error(`Missing value for parameter :${name}`);
      }

      values.push(params[name]);
      const placeholder = `$${values.length}`;
      placeholders.set(name, placeholder);
      return placeholder;
    });

    return { sql, values };
  }
}
