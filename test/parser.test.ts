import { describe, it, expect } from 'vitest';
import * as XLSX from 'xlsx';
import {
  columnIndexToLetter,
  extractTable,
  listSheetNames,
  parseExcelBuffer,
  uniqueHeaderNames,
} from '@/lib/excel/parser';
import { ConfigurationError } from '@/lib/config/validator';

function buildWorkbook(sheets: Record<string, unknown[][]>): Buffer {
  const workbook = XLSX.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), name);
  }
  return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
}

const orders = buildWorkbook({
  Orders: [
    ['Shipping report'],
    ['OrderId', 'Date', 'Amount', '', 'Amount'],
    ['K1', '2023-10-21', 100, null, 5],
    ['K1', '2023-10-21', 20],
    ['K2', '2023-10-22', 123456789012345],
  ],
  Notes: [['Note'], ['hello']],
});

describe('parseExcelBuffer', () => {
  it('reads every sheet with raw values', () => {
    const workbook = parseExcelBuffer(orders);

    expect(workbook.sheetNames).toEqual(['Orders', 'Notes']);
    expect(workbook.sheets[0].data[2]).toEqual(['K1', '2023-10-21', 100, null, 5]);
    expect(workbook.sheets[1].data).toEqual([['Note'], ['hello']]);
  });

  it('keeps long numeric identifiers exact', () => {
    const workbook = parseExcelBuffer(orders);
    expect(workbook.sheets[0].data[4][2]).toBe(123456789012345);
  });

  it('keeps CSV text as text', () => {
    const csv = Buffer.from('OrderId,Amount\n00123,1.50\n');
    const workbook = parseExcelBuffer(csv);

    expect(workbook.sheets[0].data[1]).toEqual(['00123', '1.50']);
  });
});

describe('date-formatted cells', () => {
  function buildDated(): Buffer {
    const sheet = XLSX.utils.aoa_to_sheet([
      ['Id', 'Shipped', 'Amount'],
      ['K1', 45220, 0.5],
    ]);
    sheet['B2'] = { t: 'n', v: 45220.5, z: 'yyyy-mm-dd hh:mm:ss' };
    sheet['C2'] = { t: 'n', v: 0.5, z: '0.00' };

    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, 'Orders');
    return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  }

  it('become Dates whose local fields show the stored day and time', () => {
    const [, row] = parseExcelBuffer(buildDated()).sheets[0].data;
    const shipped = row[1];

    expect(shipped).toBeInstanceOf(Date);
    if (shipped instanceof Date) {
      expect([shipped.getFullYear(), shipped.getMonth() + 1, shipped.getDate()]).toEqual([
        2023, 10, 21,
      ]);
      expect([shipped.getHours(), shipped.getMinutes(), shipped.getSeconds()]).toEqual([
        12, 0, 0,
      ]);
    }
  });

  it('leaves numbers with numeric formats as numbers', () => {
    const [, row] = parseExcelBuffer(buildDated()).sheets[0].data;
    expect(row[2]).toBe(0.5);
  });
});

describe('listSheetNames', () => {
  it('lists sheets in workbook order', () => {
    expect(listSheetNames(orders)).toEqual(['Orders', 'Notes']);
  });
});

describe('extractTable', () => {
  it('uses the configured 1-based header row', () => {
    const table = extractTable(parseExcelBuffer(orders), { headerRow: 2 });

    expect(table.sheetName).toBe('Orders');
    expect(table.headerRow).toBe(2);
    expect(table.header).toEqual(['OrderId', 'Date', 'Amount', 'Unnamed: 3', 'Amount.1']);
    expect(table.rows).toEqual([
      ['K1', '2023-10-21', 100, null, 5],
      ['K1', '2023-10-21', 20, null, null],
      ['K2', '2023-10-22', 123456789012345, null, null],
    ]);
  });

  it('selects a sheet by name', () => {
    const table = extractTable(parseExcelBuffer(orders), { sheetName: 'Notes', headerRow: 1 });

    expect(table.header).toEqual(['Note']);
    expect(table.rows).toEqual([['hello']]);
  });

  it('fails on an unknown sheet', () => {
    expect(() =>
      extractTable(parseExcelBuffer(orders), { sheetName: 'Missing', headerRow: 1 })
    ).toThrow('Sheet "Missing" not found (available: Orders, Notes)');
  });

  it('fails when the header row is beyond the sheet', () => {
    expect(() => extractTable(parseExcelBuffer(orders), { headerRow: 9 })).toThrow(
      ConfigurationError
    );
  });
});

describe('uniqueHeaderNames', () => {
  it('names blanks by position and suffixes repeats', () => {
    expect(uniqueHeaderNames(['A', '', 'A', 'A', 'A.1'])).toEqual([
      'A',
      'Unnamed: 1',
      'A.1',
      'A.2',
      'A.1.1',
    ]);
  });
});

describe('columnIndexToLetter', () => {
  it('converts zero-based indices to column letters', () => {
    expect(columnIndexToLetter(0)).toBe('A');
    expect(columnIndexToLetter(25)).toBe('Z');
    expect(columnIndexToLetter(26)).toBe('AA');
  });
});
