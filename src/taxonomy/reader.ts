import csvParser from 'csv-parser';
import { createReadStream } from 'fs';

export interface TaxonRow {
  cells: string[];
  line: number;
  header: boolean;
}

export interface ReadOptions {
  /** Number of leading rows treated as header rows */
  headerRows?: number;
  separator?: string;
  /** Quote character. Checklists are unquoted, so by default nothing quotes. */
  quote?: string;
}

const NO_QUOTE = '\0';

function toCells(record: unknown): string[] {
  if (typeof record !== 'object' || record === null) {
    return [];
  }

  const cells: string[] = [];
  for (const [key, value] of Object.entries(record)) {
    const index = Number(key);
    if (Number.isInteger(index) && index >= 0) {
      cells[index] = typeof value === 'string' ? value.replace(/\r$/, '') : '';
    }
  }

  return Array.from(cells, (cell) => cell ?? '');
}

/**
 * Stream a Darwin Core Archive data file (tab separated by default) one row
 * at a time. Blank rows are skipped and do not count towards `line`.
 */
export async function* readTaxonRows(
  filePath: string,
  options: ReadOptions = {}
): AsyncGenerator<TaxonRow> {
  const headerRows = options.headerRows ?? 1;
  const parser = createReadStream(filePath, { encoding: 'utf-8' }).pipe(
    csvParser({
      separator: options.separator ?? '\t',
      quote: options.quote ?? NO_QUOTE,
      escape: options.quote ?? NO_QUOTE,
      headers: false,
    })
  );

  let line = 0;
  for await (const record of parser) {
    const cells = toCells(record);
    if (cells.every((cell) => cell.trim() === '')) {
      continue;
    }

    line++;
    yield { cells, line, header: line <= headerRows };
  }
}
