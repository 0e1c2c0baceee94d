import { describe, it, expect } from 'vitest';
import { expandScientific, isEmptyRow, normalizeCell } from '@/lib/normalize/cell-normalizer';
import { normalizeRows } from '@/lib/normalize';

describe('normalizeCell', () => {
  it('trims whitespace', () => {
    expect(normalizeCell('  SF1234  ')).toBe('SF1234');
    expect(normalizeCell('\t上海\n')).toBe('上海');
  });

  it('turns missing values and stringified NaN into empty strings', () => {
    expect(normalizeCell(null)).toBe('');
    expect(normalizeCell(undefined)).toBe('');
    expect(normalizeCell('nan')).toBe('');
    expect(normalizeCell('NaN')).toBe('');
    expect(normalizeCell(Number.NaN)).toBe('');
  });

  it('expands integer-like scientific notation', () => {
    expect(normalizeCell('1.23E+11')).toBe('123000000000');
    expect(normalizeCell('1.23e+11')).toBe('123000000000');
    expect(normalizeCell('4.5E3')).toBe('4500');
    expect(normalizeCell('-2.5E+1')).toBe('-25');
    expect(normalizeCell(' 1.230E+2 ')).toBe('123');
  });

  it('leaves true floating-point values alone', () => {
    expect(normalizeCell('1.2345E+2')).toBe('1.2345E+2');
    expect(normalizeCell('1.5E-3')).toBe('1.5E-3');
    expect(normalizeCell('100.50')).toBe('100.50');
    expect(normalizeCell('12.5')).toBe('12.5');
    expect(normalizeCell('100.00')).toBe('100.00');
    expect(normalizeCell(12.5)).toBe('12.5');
  });

  it('strips a float-rendered ".0" from integers', () => {
    expect(normalizeCell('100.0')).toBe('100');
    expect(normalizeCell('-7.0')).toBe('-7');
  });

  it('renders integers without exponent form', () => {
    expect(normalizeCell(123456789012)).toBe('123456789012');
    expect(normalizeCell(1e21)).toBe('1000000000000000000000');
  });

  it('renders small fractions in plain decimal form', () => {
    expect(normalizeCell(1e-7)).toBe('0.0000001');
    expect(normalizeCell(1.5e-10)).toBe('0.00000000015');
    expect(normalizeCell(-2.5e-8)).toBe('-0.000000025');
    expect(normalizeCell(0.25)).toBe('0.25');
  });

  it('renders booleans and dates', () => {
    expect(normalizeCell(true)).toBe('TRUE');
    expect(normalizeCell(false)).toBe('FALSE');
    expect(normalizeCell(new Date(2023, 9, 21))).toBe('2023-10-21');
    expect(normalizeCell(new Date(2023, 9, 21, 8, 5, 9))).toBe('2023-10-21 08:05:09');
  });

  it('is idempotent', () => {
    const inputs = ['  1.23E+11 ', '100.0', '1.5E-3', 'nan', ' text ', 42, 0.1, 3e-9];
    for (const input of inputs) {
      const once = normalizeCell(input);
      expect(normalizeCell(once)).toBe(once);
    }
  });
});

describe('expandScientific', () => {
  it('returns null for values that are not integer-like scientific notation', () => {
    expect(expandScientific('abc')).toBeNull();
    expect(expandScientific('123')).toBeNull();
    expect(expandScientific('1.2345E+2')).toBeNull();
    expect(expandScientific('1E-2')).toBeNull();
  });

  it('handles zero mantissas', () => {
    expect(expandScientific('0.0E+0')).toBe('0');
    expect(expandScientific('0.5E+1')).toBe('5');
  });
});

describe('isEmptyRow', () => {
  it('is true when every cell is blank', () => {
    expect(isEmptyRow({ OrderId: ' ', Amount: '' })).toBe(true);
    expect(isEmptyRow(['', '   '])).toBe(true);
  });

  it('is false when any cell has content', () => {
    expect(isEmptyRow({ OrderId: '', Amount: '0' })).toBe(false);
  });
});

describe('normalizeRows', () => {
  it('keys cells by column and normalizes date columns first', () => {
    const rows = normalizeRows(
      {
        sheetName: 'Sheet1',
        headerRow: 1,
        header: ['OrderId', 'Date', 'Amount'],
        rows: [['K1', 45220, 1e-7]],
      },
      ['Date']
    );

    expect(rows).toEqual([{ OrderId: 'K1', Date: '2023-10-21', Amount: '0.0000001' }]);
  });

  it('stores a column named __proto__ as an ordinary field', () => {
    const [row] = normalizeRows(
      {
        sheetName: 'Sheet1',
        headerRow: 1,
        header: ['__proto__', 'Amount'],
        rows: [[' K1 ', '5']],
      },
      []
    );

    expect(Object.entries(row)).toEqual([
      ['__proto__', 'K1'],
      ['Amount', '5'],
    ]);
  });
});
