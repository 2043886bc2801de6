import { Database, type ConnectionSettings } from '../helpers/database';
import { env } from '../helpers/env';
import { logger } from '../helpers/logger';
import { mergeTaxonTables, type MergeSeeds, type MergeSummary } from './taxon-merge';

/**
 * What the command line needs from the database, one database at a time.
 */
export interface TableCatalog {
  listTables(databaseName: string, prefix?: string): Promise<string[]>;
  tableExists(databaseName: string, tableName: string): Promise<boolean>;
  mergeTables(
    databaseName: string,
    sourceTables: readonly string[],
    destinationTable: string
  ): Promise<MergeSummary>;
  ensureDatabase(databaseName: string): Promise<boolean>;
}

export type DatabaseFactory = (databaseName: string) => Database;

/**
 * One pooled connection per database name. `DATABASE_URL`, when set, supplies
 * host, port and credentials; its path is replaced by the database name.
 */
export function createDatabaseFactory(
  connection: Omit<ConnectionSettings, 'database'>,
  url: string | undefined = env.DATABASE_URL
): DatabaseFactory {
  return (databaseName) => {
    if (url) {
      const target = new URL(url);
      target.pathname = `/${encodeURIComponent(databaseName)}`;
      return new Database({ url: target.toString() });
    }

    return new Database({ connection: { ...connection, database: databaseName } });
  };
}

export class TaxonCatalog implements TableCatalog {
  private readonly databases = new Map<string, Database>();

  constructor(
    private readonly factory: DatabaseFactory,
    private readonly adminDatabaseName: string = env.ADMIN_DB_NAME,
    private readonly seeds?: MergeSeeds
  ) {}

  database(databaseName: string): Database {
    let db = this.databases.get(databaseName);
    if (!db) {
      db = this.factory(databaseName);
      this.databases.set(databaseName, db);
    }
    return db;
  }

  async databaseExists(databaseName: string): Promise<boolean> {
    const row = await this.database(this.adminDatabaseName).findOne<{ exists: number }>(
      'SELECT 1 AS exists FROM pg_database WHERE datname = :databaseName',
      { databaseName }
    );
    return Number(row?.exists) === 1;
  }

  async ensureDatabase(databaseName: string): Promise<boolean> {
    if (await this.databaseExists(databaseName)) {
      return false;
    }

    const admin = this.database(this.adminDatabaseName);
    await admin.execute(`CREATE DATABASE ${admin.identifier(databaseName)}`);
    logger.success(`Created database ${databaseName}`);
    return true;
  }

  async listTables(databaseName: string, prefix?: string): Promise<string[]> {
    if (!(await this.databaseExists(databaseName))) {
      return [];
    }

    const rows = await this.database(databaseName).find<{ table_name: string }>(
      `SELECT table_name FROM information_schema.tables
       WHERE table_schema = 'public' AND table_type = 'BASE TABLE'
       ORDER BY table_name`
    );

    const tables = rows.map((row) => row.table_name);
    return prefix ? tables.filter((table) => table.startsWith(prefix)) : tables;
  }

  async tableExists(databaseName: string, tableName: string): Promise<boolean> {
    return this.database(databaseName).tableExists(tableName);
  }

  async mergeTables(
    databaseName: string,
    sourceTables: readonly string[],
    destinationTable: string
  ): Promise<MergeSummary> {
    return this.database(databaseName).transaction((tx) =>
      mergeTaxonTables(tx, sourceTables, destinationTable, this.seeds)
    );
  }

  async close(): Promise<void> {
    const databases = [...this.databases.values()];
    this.databases.clear();
    await Promise.all(databases.map((db) => db.close()));
  }
}
