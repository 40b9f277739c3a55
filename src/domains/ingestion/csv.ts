// ──────────────────────────────────────────
// Ingestion: CSV reader
// ──────────────────────────────────────────

import Papa from 'papaparse';
import { NotTabularError } from '../../shared/errors';
import { RawRecord, RawTable } from '../../shared/types';

export function emptyTable(): RawTable {
  return { columns: [], rows: [] };
}

/**
 * Parses comma-separated text with a header row into string-valued records.
 * Rows shorter than the header keep their missing cells as empty strings;
 * cells beyond the header are dropped.
 */
export function parseCsv(text: string): RawTable {
  const result = Papa.parse<Record<string, unknown>>(text.replace(/^\uFEFF/, ''), {
    header: true,
    delimiter: ',',
    skipEmptyLines: 'greedy',
  });

  const columns = (result.meta.fields ?? []).filter((f) => f.trim() !== '');
  if (columns.length === 0) {
    throw new NotTabularError('no header row');
  }

  const quoteError = result.errors.find((e) => e.type === 'Quotes');
  if (quoteError) {
    const where = quoteError.row === undefined ? '' : ` at row ${quoteError.row + 1}`;
    throw new NotTabularError(`${quoteError.message}${where}`);
  }

  const rows = result.data.map((parsed) => {
    const record: RawRecord = {};
    for (const column of columns) {
      const value = parsed[column];
      record[column] = typeof value === 'string' ? value : '';
    }
    return record;
  });

  return { columns, rows };
}
