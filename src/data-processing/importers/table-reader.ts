// Table Reader: turns uploaded CSV text or a workbook buffer into a RawTable

import * as XLSX from 'xlsx';
import { FormatError } from '../../errors';
import Logger from '../../logger';
import type { RawCell, RawTable } from '../../types';

export interface ReadTableOptions {
  /** Label used in log lines and error messages (usually the file name) */
  source?: string;
}

function toRawCell(value: unknown): RawCell {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number' || typeof value === 'string') return value;
  return String(value);
}

/** Text starting with "<" is sniffed as HTML by the spreadsheet library; a quoted first field keeps it CSV */
function quoteLeadingField(text: string): string {
  if (!text.startsWith('<')) return text;
  const end = text.search(/[,\t;\r\n]/);
  const field = end === -1 ? text : text.slice(0, end);
  const rest = end === -1 ? '' : text.slice(end);
  return `"${field.replace(/"/g, '""')}"${rest}`;
}

function parseWorkbook(input: string | Buffer, source: string): XLSX.WorkBook {
  try {
    // raw: keep CSV cells as text so "$1,200" reaches the currency parser untouched
    return typeof input === 'string' ? XLSX.read(input, { type: 'string', raw: true }) : XLSX.read(input, { type: 'buffer' });
  } catch (err) {
    throw new FormatError(`Could not read ${source} as a table`, { cause: err });
  }
}

/**
 * Read the first sheet of an upload. Strings are parsed as CSV; buffers may be any
 * workbook format the spreadsheet library understands (xlsx, xls, csv bytes).
 * CSV text is always read as CSV, even when its first header starts with "<";
 * a buffer beginning with "<" is still taken for an HTML or XML workbook.
 *
 * Throws FormatError when there is no usable header row.
 */
export function readTable(input: string | Buffer, options: ReadTableOptions = {}): RawTable {
  const source = options.source ?? 'upload';

  if (typeof input === 'string') {
    input = input.replace(/^\uFEFF/, '');
    if (input.trim() === '') throw new FormatError(`${source} is empty`);
    if (input.includes('\u0000')) throw new FormatError(`${source} is not a text table`);
    input = quoteLeadingField(input);
  } else if (input.length === 0) {
    throw new FormatError(`${source} is empty`);
  }

  const workbook = parseWorkbook(input, source);
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) throw new FormatError(`${source} has no sheets`);

  const grid: unknown[][] = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: typeof input === 'string',
    defval: '',
    blankrows: false
  });

  const [headerRow, ...dataRows] = grid;
  if (!headerRow) throw new FormatError(`${source} has no header row`);

  // The sheet range is as wide as the longest row, so the header row may carry blank padding
  const headerCells = headerRow.map((h) => String(h ?? ''));
  let width = headerCells.length;
  while (width > 0 && headerCells[width - 1].trim() === '') width--;
  if (width === 0) throw new FormatError(`${source} has an empty header row`);
  const headers = headerCells.slice(0, width);

  let overflowRows = 0;
  const rows = dataRows.map((cells) => {
    if (cells.slice(width).some((cell) => toRawCell(cell) !== '')) overflowRows++;
    return headers.map((_, i) => toRawCell(cells[i]));
  });
  if (overflowRows > 0) {
    Logger.warn(`${source}: ${overflowRows} row(s) have more cells than headers; extra cells ignored`);
  }

  Logger.debug(`Read ${rows.length} rows × ${headers.length} columns from ${source}`);
  return { headers, rows };
}
