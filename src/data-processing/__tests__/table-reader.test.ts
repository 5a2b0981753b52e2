import * as XLSX from 'xlsx';
import { describe, expect, it } from 'vitest';
import { FormatError } from '../../errors';
import { readTable } from '../importers/table-reader';

describe('readTable', () => {
  it('reads CSV text into headers and string cells', () => {
    const table = readTable('Product,Cost\nHouse Vodka,$20\n');
    expect(table.headers).toEqual(['Product', 'Cost']);
    expect(table.rows).toEqual([['House Vodka', '$20']]);
  });

  it('keeps numeric-looking CSV cells as text', () => {
    const table = readTable('Product,Cost\nRum,15');
    expect(table.rows).toEqual([['Rum', '15']]);
  });

  it('honors quoted fields containing commas', () => {
    const table = readTable('Product,Cost\n"Gin, London Dry","$1,200"\n');
    expect(table.rows).toEqual([['Gin, London Dry', '$1,200']]);
  });

  it('strips a UTF-8 byte order mark', () => {
    const table = readTable('\uFEFFProduct,Cost\nRum,15');
    expect(table.headers[0]).toBe('Product');
  });

  it('reads CSV whose first header starts with "<" as CSV', () => {
    const table = readTable('<Bottle>,Cost\nGin,20');
    expect(table.headers).toEqual(['<Bottle>', 'Cost']);
    expect(table.rows).toEqual([['Gin', '20']]);
  });

  it('pads short rows with empty cells', () => {
    const table = readTable('Product,Cost,Inventory\nWhiskey,30\n');
    expect(table.rows).toEqual([['Whiskey', '30', '']]);
  });

  it('drops cells beyond the header row', () => {
    const table = readTable('Product,Cost\nMerlot,10,extra\n');
    expect(table.headers).toEqual(['Product', 'Cost']);
    expect(table.rows).toEqual([['Merlot', '10']]);
  });

  it('returns no rows for a header-only file', () => {
    const table = readTable('Product,Cost\n');
    expect(table.headers).toEqual(['Product', 'Cost']);
    expect(table.rows).toEqual([]);
  });

  it('reads the first sheet of a workbook buffer as formatted text', () => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.aoa_to_sheet([
        ['Product', 'Cost'],
        ['House Vodka', 20]
      ]),
      'Spirits'
    );
    const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });

    const table = readTable(buffer, { source: 'spirits.xlsx' });
    expect(table.headers).toEqual(['Product', 'Cost']);
    expect(table.rows).toEqual([['House Vodka', '20']]);
  });

  it('rejects empty input', () => {
    expect(() => readTable('')).toThrow(FormatError);
    expect(() => readTable('  \n  ')).toThrow(FormatError);
    expect(() => readTable(Buffer.alloc(0))).toThrow(FormatError);
  });

  it('names the source in the error message', () => {
    expect(() => readTable('', { source: 'wine.csv' })).toThrow('wine.csv is empty');
  });

  it('rejects binary text', () => {
    expect(() => readTable('Product\u0000Cost')).toThrow(FormatError);
  });
});
