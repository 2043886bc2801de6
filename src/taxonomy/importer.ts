import type { Database, SqlValue } from '../helpers/database';
import { env } from '../helpers/env';
import { logger } from '../helpers/logger';
import type { TaxonTreeBuilder } from './builder';
import { columnNames } from './fields';

export interface ColumnDefinition {
  name: string;
  type: string;
}

export interface ImportSummary {
  table: string;
  inserted: number;
  batches: number;
}

const ARRAY_CASTS = { parents: 'text[]', parent_ids: 'int[]' } as const;

/**
 * Writes a built taxon tree into one table: a varchar column per header,
 * plus the classification as parallel label and id arrays.
 */
export class TaxonImporter {
  constructor(
    private readonly db: Database,
    private readonly batchSize: number = env.IMPORT_BATCH_SIZE
  ) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new Error(`Batch size must be a positive integer, got ${batchSize}`);
    }
  }

  fields(headers: readonly string[]): ColumnDefinition[] {
    return [
      { name: 'id', type: 'bigserial PRIMARY KEY' },
      { name: 'label', type: 'character varying' },
      ...columnNames(headers).map((name) => ({
        name,
        type: 'character varying',
      })),
      { name: 'parents', type: 'text[]' },
      { name: 'parent_ids', type: 'int[]' },
      {
        name: 'created_at',
        type: 'timestamp without time zone DEFAULT NOW()',
      },
    ];
  }

  async createTable(table: string, headers: readonly string[]): Promise<void> {
    const columns = this.fields(headers)
      .map((field) => `${this.db.identifier(field.name)} ${field.type}`)
      .join(',\n  ');

    await this.db.execute(
      `CREATE TABLE IF NOT EXISTS ${this.db.identifier(table)} (\n  ${columns}\n)`
    );
  }

  async createIndex(table: string, column: string = 'taxonid'): Promise<void> {
    await this.db.execute(
      `CREATE INDEX IF NOT EXISTS ${this.db.identifier(
        `${table}_${column}_idx`
      )} ON ${this.db.identifier(table)} (${this.db.identifier(column)})`
    );
  }

  async insert(table: string, builder: TaxonTreeBuilder): Promise<ImportSummary> {
    const dataColumns = columnNames(builder.headers);
    const columns = ['id', ...dataColumns, 'parents', 'parent_ids'];

    let batch: SqlValue[][] = [];
    let inserted = 0;
    let batches = 0;

    const flush = async () => {
      if (batch.length === 0) return;
      inserted += await this.db.insertRows(table, columns, batch, ARRAY_CASTS);
      batches++;
      batch = [];
    };

    for (const { record } of builder.entries()) {
      batch.push([
        record.id,
        ...dataColumns.map((_, index) => record.cells[index] ?? null),
        record.classification,
        record.classificationIds,
      ]);

      if (batch.length >= this.batchSize) {
        await flush();
      }
    }
    await flush();

    logger.debug(`Inserted ${inserted} rows into ${table}`, { batches });
    return { table, inserted, batches };
  }

  async run(table: string, builder: TaxonTreeBuilder): Promise<ImportSummary> {
    await this.createTable(table, builder.headers);
    if (columnNames(builder.headers).includes('taxonid')) {
      await this.createIndex(table);
    }
    return this.insert(table, builder);
  }
}
