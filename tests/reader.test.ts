import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterAll, describe, expect, it } from 'vitest';
import { TaxonTreeBuilder } from '../src/taxonomy/builder';
import { columnNames, slug } from '../src/taxonomy/fields';
import { readTaxonRows, type TaxonRow } from '../src/taxonomy/reader';

const workDir = mkdtempSync(join(tmpdir(), 'taxon-loader-reader-'));

function writeChecklist(name: string, content: string): string {
  const path = join(workDir, name);
  writeFileSync(path, content);
  return path;
}

async function collect(rows: AsyncIterable<TaxonRow>): Promise<TaxonRow[]> {
  const result: TaxonRow[] = [];
  for await (const row of rows) {
    result.push(row);
  }
  return result;
}

afterAll(() => {
  rmSync(workDir, { recursive: true, force: true });
});

describe('slug', () => {
  it('folds punctuation runs into underscores', () => {
    expect(slug('dwc:taxonID')).toBe('dwc_taxonid');
    expect(slug('Scientific Name (full)')).toBe('scientific_name_full_');
    expect(slug('col:notho__type')).toBe('col_notho_type');
  });
});

describe('columnNames', () => {
  it('strips vocabulary prefixes and numbers repeats', () => {
    expect(
      columnNames(['dwc_taxonid', 'col_taxonid', 'dcterms_modified', 'remarks', ''])
    ).toEqual(['taxonid', 'taxonid_2', 'modified', 'remarks', 'column']);
  });
});

describe('readTaxonRows', () => {
  it('yields the header and data rows with line numbers', async () => {
    const path = writeChecklist(
      'Taxon.tsv',
      [
        'dwc:taxonID\tdwc:parentNameUsageID\tdwc:acceptedNameUsageID\tdwc:scientificName',
        'K1\t\t\tAnimalia',
        '',
        'P1\tK1\t\tChordata',
        '',
      ].join('\n')
    );

    expect(await collect(readTaxonRows(path))).toEqual([
      {
        cells: [
          'dwc:taxonID',
          'dwc:parentNameUsageID',
          'dwc:acceptedNameUsageID',
          'dwc:scientificName',
        ],
        line: 1,
        header: true,
      },
      { cells: ['K1', '', '', 'Animalia'], line: 2, header: false },
      { cells: ['P1', 'K1', '', 'Chordata'], line: 3, header: false },
    ]);
  });

  it('honours a custom separator and header count', async () => {
    const path = writeChecklist('taxa.csv', 'id,parent\nA,\n');

    expect(await collect(readTaxonRows(path, { separator: ',', headerRows: 0 }))).toEqual([
      { cells: ['id', 'parent'], line: 1, header: false },
      { cells: ['A', ''], line: 2, header: false },
    ]);
  });

  it('keeps a stray double quote inside its own cell', async () => {
    const path = writeChecklist(
      'Quoted.tsv',
      'taxonID\tparent\taccepted\tname\n1\t\t\t"Aus bus\n2\t1\t\tCus\n3\t1\t\tDus\n'
    );

    expect(await collect(readTaxonRows(path))).toEqual([
      { cells: ['taxonID', 'parent', 'accepted', 'name'], line: 1, header: true },
      { cells: ['1', '', '', '"Aus bus'], line: 2, header: false },
      { cells: ['2', '1', '', 'Cus'], line: 3, header: false },
      { cells: ['3', '1', '', 'Dus'], line: 4, header: false },
    ]);
  });

  it('feeds the tree builder', async () => {
    const path = writeChecklist(
      'Small.tsv',
      'dwc:taxonID\tdwc:parentNameUsageID\tdwc:acceptedNameUsageID\nB\tA\t\nA\t\t\n'
    );

    const builder = new TaxonTreeBuilder();
    const summary = await builder.build(readTaxonRows(path));

    expect(summary).toEqual({ rows: 2, nodes: 2, retried: 1, failed: 0 });
    expect(builder.tree.get('b')?.data?.classification).toEqual(['A']);
  });
});
