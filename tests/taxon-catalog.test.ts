import { afterEach, describe, expect, it, vi } from 'vitest';
import mergeCommand from '../commands/merge';
import type { ParsedConfig } from '../src/cli/arguments';
import { createDatabaseFactory, TaxonCatalog } from '../src/db/taxon-catalog';
import { loadMergeSeeds, type MergeSeeds } from '../src/db/taxon-merge';
import { Database } from '../src/helpers/database';
import { parseEnv } from '../src/helpers/env';
import { logger } from '../src/helpers/logger';
import { FakeDriver } from './helpers/fake-driver';

const SEEDS: MergeSeeds = {
  sourceRanking: [
    { id: 1, name: 'taxon_ncbi', forZoology: 1, forBotany: 2, forMycology: 3, general: 1 },
  ],
  taxonRanks: [{ id: 1, name: 'kingdom', ord: 10 }],
};

const squash = (sql: string | undefined) => sql?.replace(/\s+/g, ' ').trim();

function setup(databaseExists = true) {
  const admin = new FakeDriver().on(/pg_database/, databaseExists ? [{ exists: 1 }] : []);
  const target = new FakeDriver();
  const factory = vi.fn((name: string) => new Database({}, name === 'postgres' ? admin : target));
  const catalog = new TaxonCatalog(factory, 'postgres', SEEDS);
  return { admin, target, factory, catalog };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createDatabaseFactory', () => {
  it('opens the named database with the shared connection settings', () => {
    const factory = createDatabaseFactory(
      { host: 'db.internal', port: 5433, user: 'loader', password: 'test-secret' },
      undefined
    );

    expect(factory('taxa').databaseName).toBe('taxa');
  });
});

describe('TaxonCatalog', () => {
  it('lists no tables for a database that does not exist', async () => {
    const { admin, factory, catalog } = setup(false);

    expect(await catalog.listTables('missing_db')).toEqual([]);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(factory).toHaveBeenCalledWith('postgres');
    expect(admin.queries[0]?.values).toEqual(['missing_db']);
  });

  it('lists base tables, optionally by prefix', async () => {
    const { target, catalog } = setup();
    target.on(/information_schema\.tables/, [
      { table_name: 'merged_table' },
      { table_name: 'taxon_col' },
      { table_name: 'taxon_ncbi' },
    ]);

    expect(await catalog.listTables('taxa')).toEqual(['merged_table', 'taxon_col', 'taxon_ncbi']);
    expect(await catalog.listTables('taxa', 'taxon_')).toEqual(['taxon_col', 'taxon_ncbi']);
  });

  it('creates a database only when it is missing', async () => {
    vi.spyOn(logger, 'success').mockImplementation(() => {});
    const missing = setup(false);
    const present = setup(true);

    expect(await missing.catalog.ensureDatabase('taxa')).toBe(true);
    expect(missing.admin.statements[1]).toBe('CREATE DATABASE "taxa"');
    expect(logger.success).toHaveBeenCalledWith('Created database taxa');

    expect(await present.catalog.ensureDatabase('taxa')).toBe(false);
    expect(present.admin.statements).toHaveLength(1);
  });

  it('reuses one database handle per name', () => {
    const { factory, catalog } = setup();

    expect(catalog.database('taxa')).toBe(catalog.database('taxa'));
    expect(factory).toHaveBeenCalledTimes(1);
  });
});

describe('mergeTables', () => {
  it('rebuilds the lookups, copies every source and enriches in one transaction', async () => {
    vi.spyOn(logger, 'info').mockImplementation(() => {});
    const { target, catalog } = setup();
    target.on(/count\(\*\)/, [{ count: 42 }]);

    const summary = await catalog.mergeTables('taxa', ['taxon_col', 'taxon_ncbi'], 'merged_table');

    expect(summary).toEqual({
      destination: 'merged_table',
      sources: ['taxon_col', 'taxon_ncbi'],
      created: true,
      rows: 42,
    });
    expect(target.events).toEqual(['BEGIN', 'COMMIT']);

    const statements = target.statements;
    expect(statements).toHaveLength(23);
    expect(statements.slice(0, 2)).toEqual([
      'DROP TABLE IF EXISTS source_ranking',
      'DROP TABLE IF EXISTS taxonranks',
    ]);
    expect(statements[4]).toBe(
      'CREATE INDEX IF NOT EXISTS idx_taxonranks_name ON taxonranks (name)'
    );
    expect(statements[5]).toBe(
      'INSERT INTO "source_ranking" ("id", "name", "for_zoology", "for_botany", "for_mycology", "general") VALUES ($1, $2, $3, $4, $5, $6)'
    );
    expect(target.queries[5]?.values).toEqual([1, 'taxon_ncbi', 1, 2, 3, 1]);
    expect(statements[6]).toBe('INSERT INTO "taxonranks" ("id", "name", "ord") VALUES ($1, $2, $3)');
    expect(statements[9]).toBe(
      'CREATE INDEX IF NOT EXISTS "idx_merged_table_id" ON "merged_table" ("id")'
    );
    expect(squash(statements[15])).toBe(
      `UPDATE "taxon_col" SET label = trim(replace(scientificname, coalesce(scientificnameauthorship, ''), ''))`
    );
    expect(squash(statements[18])).toBe(
      'INSERT INTO "merged_table" (tid, "taxonid", "label", "scientificnameauthorship", "taxonrank", "taxonomicstatus", "parents", "parent_ids", source) ' +
        `SELECT id, "taxonid", "label", "scientificnameauthorship", "taxonrank", "taxonomicstatus", "parents", "parent_ids", 'taxon_ncbi' AS source FROM "taxon_ncbi"`
    );
    expect(squash(statements[21])).toBe(
      'UPDATE "merged_table" AS t SET kingdom = k.label FROM "merged_table" AS k ' +
        "WHERE k.tid = ANY(t.parent_ids) AND k.source = t.source AND k.taxonrank = 'kingdom'"
    );
  });

  it('appends to an existing destination', async () => {
    vi.spyOn(logger, 'info').mockImplementation(() => {});
    const { target, catalog } = setup();
    target.on(/AS exists FROM information_schema\.tables/, [{ exists: 1 }]);

    const summary = await catalog.mergeTables('taxa', ['taxon_col'], 'merged_table');

    expect(summary.created).toBe(false);
    expect(summary.rows).toBe(0);
  });

  it('rolls back when a copy fails', async () => {
    vi.spyOn(logger, 'info').mockImplementation(() => {});
    const { target, catalog } = setup();
    target.failWhen(/INSERT INTO "merged_table"/, new Error('disk full'));

    await expect(
      catalog.mergeTables('taxa', ['taxon_col'], 'merged_table')
    ).rejects.toThrow('disk full');
    expect(target.events).toEqual(['BEGIN', 'ROLLBACK']);
  });

  it('refuses to merge a table into itself', async () => {
    const { target, catalog } = setup();

    await expect(
      catalog.mergeTables('taxa', ['taxon_col'], 'taxon_col')
    ).rejects.toThrow('Destination table taxon_col cannot also be a source');
    expect(target.statements).toEqual([]);
  });

  it('refuses a lookup table as destination or source', async () => {
    const { target, catalog } = setup();

    await expect(
      catalog.mergeTables('taxa', ['taxon_col'], 'taxonranks')
    ).rejects.toThrow('Destination table taxonranks is a merge lookup table');
    await expect(
      catalog.mergeTables('taxa', ['source_ranking'], 'merged_table')
    ).rejects.toThrow('Source table source_ranking is a merge lookup table');
    expect(target.statements).toEqual([]);
    expect(target.events).toEqual(['BEGIN', 'ROLLBACK', 'BEGIN', 'ROLLBACK']);
  });
});

describe('loadMergeSeeds', () => {
  it('reads the bundled ranking and rank tables', () => {
    const seeds = loadMergeSeeds();

    expect(seeds.sourceRanking).toHaveLength(8);
    expect(seeds.taxonRanks).toHaveLength(79);
    expect(loadMergeSeeds()).toBe(seeds);
  });
});

describe('merge command', () => {
  const env = parseEnv({ DB_NAME: 'taxa' });
  const config: ParsedConfig = {
    tableName: 'merged_table',
    databaseName: 'taxa',
    merge: true,
    connection: { host: 'localhost', port: 5432, user: 'postgres', database: 'taxa' },
    warnings: [],
  };

  it('merges every prefixed table except the destination', async () => {
    vi.spyOn(logger, 'info').mockImplementation(() => {});
    vi.spyOn(logger, 'success').mockImplementation(() => {});
    const { target, catalog } = setup();
    target.on(/information_schema\.tables\s+WHERE table_schema = 'public' AND table_type/, [
      { table_name: 'merged_table' },
      { table_name: 'taxon_col' },
    ]);
    const mergeTables = vi.spyOn(catalog, 'mergeTables');

    const summary = await mergeCommand.action(config, { catalog, env });

    expect(mergeTables).toHaveBeenCalledWith('taxa', ['taxon_col'], 'merged_table');
    expect(summary?.sources).toEqual(['taxon_col']);
  });

  it('leaves lookup tables out of the sources under a loose prefix', async () => {
    vi.spyOn(logger, 'info').mockImplementation(() => {});
    vi.spyOn(logger, 'success').mockImplementation(() => {});
    const { target, catalog } = setup();
    target.on(/table_type = 'BASE TABLE'/, [
      { table_name: 'taxon_col' },
      { table_name: 'taxonranks' },
    ]);
    const mergeTables = vi.spyOn(catalog, 'mergeTables');

    await mergeCommand.action(config, {
      catalog,
      env: parseEnv({ DB_NAME: 'taxa', TAXON_TABLE_PREFIX: 'taxon' }),
    });

    expect(mergeTables).toHaveBeenCalledWith('taxa', ['taxon_col'], 'merged_table');
  });

  it('does nothing without source tables', async () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => {});
    const { catalog } = setup();
    const mergeTables = vi.spyOn(catalog, 'mergeTables');

    expect(await mergeCommand.action(config, { catalog, env })).toBeNull();
    expect(mergeTables).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('No taxon_* tables in taxa, nothing to merge');
  });
});
