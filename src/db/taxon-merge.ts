import { readFileSync } from 'fs';
import { z } from 'zod';
import type { Database } from '../helpers/database';
import { logger } from '../helpers/logger';

const sourceRankingSchema = z.array(
  z.object({
    id: z.number().int(),
    name: z.string().min(1),
    forZoology: z.number().int(),
    forBotany: z.number().int(),
    forMycology: z.number().int(),
    general: z.number().int(),
  })
);

const taxonRankSchema = z.array(
  z.object({
    id: z.number().int(),
    name: z.string().min(1),
    ord: z.number().int(),
  })
);

export type SourceRanking = z.infer<typeof sourceRankingSchema>[number];
export type TaxonRank = z.infer<typeof taxonRankSchema>[number];

export interface MergeSeeds {
  sourceRanking: SourceRanking[];
  taxonRanks: TaxonRank[];
}

export interface MergeSummary {
  destination: string;
  sources: string[];
  created: boolean;
  rows: number;
}

export const SOURCE_RANKING_TABLE = 'source_ranking';
export const TAXON_RANKS_TABLE = 'taxonranks';

const LOOKUP_TABLES = new Set([SOURCE_RANKING_TABLE, TAXON_RANKS_TABLE]);

/**
 * Tables the merge rebuilds for itself. They are never a source or a destination.
 */
export function isLookupTable(table: string): boolean {
  return LOOKUP_TABLES.has(table);
}

const DESTINATION_COLUMNS: ReadonlyArray<[string, string]> = [
  ['id', 'bigserial PRIMARY KEY'],
  ['tid', 'integer'],
  ['taxonid', 'character varying'],
  ['label', 'character varying'],
  ['scientificnameauthorship', 'character varying'],
  ['taxonrank', 'character varying'],
  ['taxonrank_id', 'integer'],
  ['taxonomicstatus', 'character varying'],
  ['parents', 'text[]'],
  ['parent_ids', 'int[]'],
  ['source', 'character varying'],
  ['source_id', 'integer'],
  ['kingdom', 'character varying'],
];

const DESTINATION_INDEXES = [
  'id',
  'label',
  'tid',
  'taxonid',
  'parents',
  'taxonrank',
];

const COPIED_COLUMNS = [
  'taxonid',
  'label',
  'scientificnameauthorship',
  'taxonrank',
  'taxonomicstatus',
  'parents',
  'parent_ids',
];

const dataFile = (name: string) =>
  new URL(`../../data/${name}`, import.meta.url);

let cachedSeeds: MergeSeeds | undefined;

export function loadMergeSeeds(): MergeSeeds {
  if (!cachedSeeds) {
    cachedSeeds = {
      sourceRanking: sourceRankingSchema.parse(
        JSON.parse(readFileSync(dataFile('source-ranking.json'), 'utf-8'))
      ),
      taxonRanks: taxonRankSchema.parse(
        JSON.parse(readFileSync(dataFile('taxon-ranks.json'), 'utf-8'))
      ),
    };
  }
  return cachedSeeds;
}

async function createLookupTables(db: Database, seeds: MergeSeeds): Promise<void> {
  await db.execute(`DROP TABLE IF EXISTS ${SOURCE_RANKING_TABLE}`);
  await db.execute(`DROP TABLE IF EXISTS ${TAXON_RANKS_TABLE}`);

  await db.execute(`CREATE TABLE ${SOURCE_RANKING_TABLE} (
    id bigserial PRIMARY KEY,
    name character varying,
    for_zoology integer,
    for_botany integer,
    for_mycology integer,
    general integer
  )`);

  await db.execute(`CREATE TABLE ${TAXON_RANKS_TABLE} (
    id bigserial PRIMARY KEY,
    name character varying,
    ord integer
  )`);

  await db.execute(
    `CREATE INDEX IF NOT EXISTS idx_taxonranks_name ON ${TAXON_RANKS_TABLE} (name)`
  );

  await db.insertRows(
    SOURCE_RANKING_TABLE,
    ['id', 'name', 'for_zoology', 'for_botany', 'for_mycology', 'general'],
    seeds.sourceRanking.map((source) => [
      source.id,
      source.name,
      source.forZoology,
      source.forBotany,
      source.forMycology,
      source.general,
    ])
  );

  await db.insertRows(
    TAXON_RANKS_TABLE,
    ['id', 'name', 'ord'],
    seeds.taxonRanks.map((rank) => [rank.id, rank.name, rank.ord])
  );
}

async function createDestination(db: Database, destination: string): Promise<void> {
  const table = db.identifier(destination);
  const columns = DESTINATION_COLUMNS.map(
    ([name, type]) => `${db.identifier(name)} ${type}`
  ).join(',\n    ');

  await db.execute(`CREATE TABLE IF NOT EXISTS ${table} (\n    ${columns}\n  )`);

  for (const column of DESTINATION_INDEXES) {
    await db.execute(
      `CREATE INDEX IF NOT EXISTS ${db.identifier(
        `idx_${destination}_${column}`
      )} ON ${table} (${db.identifier(column)})`
    );
  }
}

async function copySource(
  db: Database,
  source: string,
  destination: string
): Promise<void> {
  const from = db.identifier(source);
  const columns = COPIED_COLUMNS.map((column) => db.identifier(column)).join(', ');

  logger.info(`Updating labels in ${source}`);
  await db.execute(
    `UPDATE ${from} SET label = trim(replace(scientificname, coalesce(scientificnameauthorship, ''), ''))`
  );

  logger.info(`Copying ${source} into ${destination}`);
  await db.execute(
    `INSERT INTO ${db.identifier(destination)} (tid, ${columns}, source)
     SELECT id, ${columns}, ${db.literal(source)} AS source FROM ${from}`
  );
}

async function enrichDestination(db: Database, destination: string): Promise<void> {
  const table = db.identifier(destination);

  logger.info(`Resolving rank ids in ${destination}`);
  await db.execute(
    `UPDATE ${table} AS t SET taxonrank_id = r.id
     FROM ${TAXON_RANKS_TABLE} AS r
     WHERE t.taxonrank = r.name`
  );

  logger.info(`Resolving source ids in ${destination}`);
  await db.execute(
    `UPDATE ${table} AS t SET source_id = s.id
     FROM ${SOURCE_RANKING_TABLE} AS s
     WHERE t.source = s.name`
  );

  logger.info(`Resolving kingdoms in ${destination}`);
  await db.execute(
    `UPDATE ${table} AS t SET kingdom = k.label
     FROM ${table} AS k
     WHERE k.tid = ANY(t.parent_ids)
       AND k.source = t.source
       AND k.taxonrank = 'kingdom'`
  );
}

/**
 * Copy every source table into `destination` and enrich the merged rows with
 * rank, source and kingdom. Lookup tables are rebuilt; the destination is
 * created only when absent. Run inside a transaction by the caller.
 */
export async function mergeTaxonTables(
  db: Database,
  sources: readonly string[],
  destination: string,
  seeds: MergeSeeds = loadMergeSeeds()
): Promise<MergeSummary> {
  if (sources.includes(destination)) {
    throw new Error(`Destination table ${destination} cannot also be a source`);
  }
  if (isLookupTable(destination)) {
    throw new Error(`Destination table ${destination} is a merge lookup table`);
  }
  const lookupSource = sources.find(isLookupTable);
  if (lookupSource) {
    throw new Error(`Source table ${lookupSource} is a merge lookup table`);
  }

  await createLookupTables(db, seeds);

  const created = !(await db.tableExists(destination));
  await createDestination(db, destination);

  for (const source of sources) {
    await copySource(db, source, destination);
  }

  await enrichDestination(db, destination);

  const row = await db.findOne<{ count: number }>(
    `SELECT count(*)::int AS count FROM ${db.identifier(destination)}`
  );

  return {
    destination,
    sources: [...sources],
    created,
    rows: Number(row?.count ?? 0),
  };
}
