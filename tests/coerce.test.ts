import { describe, it, expect } from 'vitest';
import { parseCalendarDate, parseDecimal, toAmount, toCount } from '../src/domains/modeling/coerce';

describe('parseDecimal', () => {
  it('parses trimmed decimals', () => {
    expect(parseDecimal(' 12.5 ')).toBe(12.5);
    expect(parseDecimal('1e3')).toBe(1000);
    expect(parseDecimal('-4')).toBe(-4);
    expect(parseDecimal('.5')).toBe(0.5);
    expect(parseDecimal('+3.')).toBe(3);
  });

  it('coerces blanks and non-numeric text to 0', () => {
    expect(parseDecimal('')).toBe(0);
    expect(parseDecimal('   ')).toBe(0);
    expect(parseDecimal('n/a')).toBe(0);
    expect(parseDecimal('1,000')).toBe(0);
    expect(parseDecimal('Infinity')).toBe(0);
    expect(parseDecimal('0x1F')).toBe(0);
    expect(parseDecimal('0b11')).toBe(0);
    expect(parseDecimal('0o7')).toBe(0);
    expect(parseDecimal('12abc')).toBe(0);
    expect(parseDecimal(undefined)).toBe(0);
  });
});

describe('toCount / toAmount', () => {
  it('truncates counts and clamps negatives', () => {
    expect(toCount('12.9')).toBe(12);
    expect(toCount('-3')).toBe(0);
    expect(toCount('abc')).toBe(0);
  });

  it('keeps decimals for amounts and clamps negatives', () => {
    expect(toAmount('7.25')).toBe(7.25);
    expect(toAmount('-3')).toBe(0);
  });
});

describe('parseCalendarDate', () => {
  it.each([
    ['2024-01-05', '2024-01-05'],
    ['2024-1-5', '2024-01-05'],
    ['2024/01/05', '2024-01-05'],
    ['01/05/2024', '2024-01-05'],
    ['1/5/2024', '2024-01-05'],
    ['1/5/24', '2024-01-05'],
    ['Jan 5, 2024', '2024-01-05'],
    ['January 5, 2024', '2024-01-05'],
    ['5 Jan 2024', '2024-01-05'],
    ['5-Jan-2024', '2024-01-05'],
    ['05-Jan-24', '2024-01-05'],
    ['Jan 5 2024', '2024-01-05'],
    ['January 5 2024', '2024-01-05'],
    ['20240105', '2024-01-05'],
    [' 2024-01-05 ', '2024-01-05'],
    ['2024-01-05 10:00:00', '2024-01-05'],
    ['2024-01-05 9:30', '2024-01-05'],
    ['2024-01-05T23:59:00-08:00', '2024-01-05'],
  ])('parses %s', (input, expected) => {
    expect(parseCalendarDate(input)).toBe(expected);
  });

  it.each([['not-a-date'], [''], ['2024-02-30'], ['13/01/2024']])('rejects %s', (input) => {
    expect(parseCalendarDate(input)).toBeNull();
  });

  it('rejects a missing value', () => {
    expect(parseCalendarDate(undefined)).toBeNull();
  });
});
