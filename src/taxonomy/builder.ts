import { logger } from '../helpers/logger';
import { slug } from './fields';
import type { TaxonRow } from './reader';
import { ROOT_ID, TaxonTree } from './tree';

const PROGRESS_INTERVAL = 100_000;

export interface TaxonRecord {
  id: number;
  cells: string[];
  classification: string[];
  classificationIds: number[];
}

export interface TaxonEntry {
  tag: string;
  record: TaxonRecord;
}

export type ApplyResult = 'header' | 'added' | 'deferred' | 'skipped';

export interface BuildSummary {
  rows: number;
  nodes: number;
  retried: number;
  failed: number;
}

/**
 * Builds the taxonomic tree from checklist rows. Columns 0-2 are taxonID,
 * parentNameUsageID and acceptedNameUsageID. Synonyms hang under the parent
 * of their accepted name. Rows whose parent or accepted name has not been
 * seen yet are deferred and retried after the main pass.
 */
export class TaxonTreeBuilder {
  readonly tree = new TaxonTree<TaxonRecord>();

  private headerNames: string[] = [];
  private readonly order: string[] = [];
  private deferred: TaxonRow[] = [];
  private rowCount = 0;
  private startedAt = Date.now();

  get headers(): readonly string[] {
    return this.headerNames;
  }

  get pending(): readonly TaxonRow[] {
    return this.deferred;
  }

  apply(row: TaxonRow): ApplyResult {
    if (row.header) {
      this.headerNames = row.cells.map((cell) => slug(cell));
      return 'header';
    }

    const [taxonId = '', parentUsage = '', acceptedUsage = ''] = row.cells;
    const identifier = taxonId.toLowerCase();
    if (!identifier) {
      return 'skipped';
    }

    let parentId = parentUsage.toLowerCase();
    const acceptedId = acceptedUsage.toLowerCase();

    if (acceptedId && acceptedId !== identifier) {
      const accepted = this.tree.get(acceptedId);
      if (!accepted) {
        return this.defer(row);
      }
      parentId = accepted.parent ?? ROOT_ID;
    }

    const record: TaxonRecord = {
      id: this.tree.size + 1,
      cells: row.cells,
      classification: [],
      classificationIds: [],
    };

    try {
      this.tree.add(taxonId, identifier, parentId || ROOT_ID, record);
    } catch {
      return this.defer(row);
    }

    if (parentId) {
      for (const ancestor of this.tree.ancestors(identifier)) {
        record.classification.push(ancestor.tag);
        record.classificationIds.push(ancestor.data?.id ?? 0);
      }
    }

    this.order.push(identifier);
    this.trackProgress();
    return 'added';
  }

  /**
   * Re-apply deferred rows until a pass adds nothing. Returns the rows that
   * never found their parent.
   */
  retryDeferred(): TaxonRow[] {
    let retried = 0;

    while (this.deferred.length > 0) {
      const batch = this.deferred;
      this.deferred = [];

      let added = 0;
      for (const row of batch) {
        retried++;
        if (this.apply(row) === 'added') {
          added++;
        }
      }

      if (added === 0) {
        break;
      }
    }

    logger.debug('Deferred rows retried', { retried });
    return [...this.deferred];
  }

  async build(rows: AsyncIterable<TaxonRow> | Iterable<TaxonRow>): Promise<BuildSummary> {
    this.startedAt = Date.now();
    let count = 0;

    for await (const row of rows) {
      if (!row.header) {
        count++;
      }
      this.apply(row);
    }

    const retried = this.deferred.length;
    const failed = this.retryDeferred();

    if (failed.length > 0) {
      logger.warn(`${failed.length} rows could not be placed in the tree`, {
        lines: failed.slice(0, 20).map((row) => row.line),
      });
    }

    return {
      rows: count,
      nodes: this.tree.size,
      retried,
      failed: failed.length,
    };
  }

  /**
   * Nodes in the order they joined the tree.
   */
  *entries(): Generator<TaxonEntry> {
    for (const identifier of this.order) {
      const node = this.tree.get(identifier);
      if (node?.data) {
        yield { tag: node.tag, record: node.data };
      }
    }
  }

  private defer(row: TaxonRow): ApplyResult {
    this.deferred.push(row);
    return 'deferred';
  }

  private trackProgress(): void {
    this.rowCount++;
    if (this.rowCount % PROGRESS_INTERVAL === 0) {
      const seconds = (Date.now() - this.startedAt) / 1000;
      logger.info(`Rows: ${this.rowCount}, Time: ${seconds.toFixed(2)}s`);
    }
  }
}
