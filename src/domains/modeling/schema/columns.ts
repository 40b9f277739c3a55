// ──────────────────────────────────────────
// Modeling: Column-name canonicalization
// ──────────────────────────────────────────
// Synonyms live in column-synonyms.json, one table per category. Keys there
// are written the way they appear in exports and pass through the same
// canonicalizeHeader() as incoming headers.

import synonyms from './column-synonyms.json';
import { Category, RawRecord, RawTable } from '../../../shared/types';

export const SYNONYM_TABLE_VERSION: number = synonyms.version;

export function canonicalizeHeader(header: string): string {
  return header.trim().toLowerCase().replace(/\s+/g, '_');
}

function buildLookup(entries: Record<string, string>): Map<string, string> {
  return new Map(Object.entries(entries).map(([from, to]) => [canonicalizeHeader(from), to]));
}

const lookups: Record<Category, Map<string, string>> = {
  marketing: buildLookup(synonyms.marketing),
  business: buildLookup(synonyms.business),
};

export function canonicalColumnName(header: string, category: Category): string {
  const key = canonicalizeHeader(header);
  return lookups[category].get(key) ?? key;
}

/**
 * Re-keys every row by canonical column name. When two source columns land on
 * the same canonical name the first one wins; the later one stays available
 * under its own canonicalized header when that name is still free.
 */
export function canonicalizeTable(table: RawTable, category: Category): RawTable {
  const mapping: Array<[source: string, target: string]> = [];
  const taken = new Set<string>();

  for (const column of table.columns) {
    const mapped = canonicalColumnName(column, category);
    const fallback = canonicalizeHeader(column);
    const target = !taken.has(mapped) ? mapped : !taken.has(fallback) ? fallback : null;
    if (target === null || target === '') continue;
    taken.add(target);
    mapping.push([column, target]);
  }

  const rows = table.rows.map((row) => {
    const out: RawRecord = {};
    for (const [source, target] of mapping) {
      out[target] = row[source] ?? '';
    }
    return out;
  });

  return { columns: mapping.map(([, target]) => target), rows };
}

export function pickColumns(row: RawRecord, columns: readonly string[]): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const column of columns) {
    picked[column] = row[column] ?? '';
  }
  return picked;
}
