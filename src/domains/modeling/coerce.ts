// ──────────────────────────────────────────
// Modeling: Value coercion
// ──────────────────────────────────────────

import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat';

dayjs.extend(customParseFormat);

// Month-first for slashed dates, matching how the exports are produced.
const DATE_FORMATS = [
  'YYYY-MM-DD',
  'YYYY-M-D',
  'YYYY/MM/DD',
  'YYYY/M/D',
  'MM/DD/YYYY',
  'M/D/YYYY',
  'MM/DD/YY',
  'M/D/YY',
  'MMM D, YYYY',
  'MMMM D, YYYY',
  'MMM D YYYY',
  'MMMM D YYYY',
  'D MMM YYYY',
  'D MMMM YYYY',
  'D-MMM-YYYY',
  'DD-MMM-YY',
  'D-MMM-YY',
  'YYYYMMDD',
];

const ISO_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})[T ]\d{1,2}:\d{2}/;

// Plain decimal notation only (no 0x/0b/0o literals).
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Anything that is not a finite decimal, including blanks, becomes 0. */
export function parseDecimal(value: string | undefined): number {
  if (value === undefined) return 0;
  const trimmed = value.trim();
  if (!DECIMAL.test(trimmed)) return 0;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : 0;
}

export function toCount(value: string | undefined): number {
  return Math.max(0, Math.trunc(parseDecimal(value)));
}

export function toAmount(value: string | undefined): number {
  return Math.max(0, parseDecimal(value));
}

/**
 * Parses a free-form calendar date to YYYY-MM-DD. Timestamps keep the date
 * they were written with; the time part is dropped. Returns null when no
 * format matches exactly (so "2024-02-30" is rejected rather than rolled over).
 */
export function parseCalendarDate(value: string | undefined): string | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  if (trimmed === '') return null;

  const timestamp = ISO_TIMESTAMP.exec(trimmed);
  const candidate = timestamp ? timestamp[1] : trimmed;

  const parsed = dayjs(candidate, DATE_FORMATS, true);
  return parsed.isValid() ? parsed.format('YYYY-MM-DD') : null;
}
