const VOCABULARY_PREFIX = /^(dwc|col|dcterms)_/;

/**
 * Lowercase identifier with every run of non-alphanumerics folded to `_`.
 * `dwc:taxonID` becomes `dwc_taxonid`.
 */
export function slug(value: string): string {
  return value.replace(/[^\p{L}\p{N}]+/gu, '_').toLowerCase();
}

/**
 * Column name for a slugged header, without its vocabulary prefix.
 */
export function columnName(header: string): string {
  return header.replace(VOCABULARY_PREFIX, '');
}

/**
 * Column names for a header row. Repeats get a numeric suffix so the
 * CREATE TABLE stays valid.
 */
export function columnNames(headers: readonly string[]): string[] {
  const seen = new Map<string, number>();

  return headers.map((header) => {
    const base = columnName(header) || 'column';
    const count = (seen.get(base) ?? 0) + 1;
    seen.set(base, count);
    return count === 1 ? base : `${base}_${count}`;
  });
}
