// CSV Export: regenerates an upload-compatible CSV from a dataset

import * as XLSX from 'xlsx';
import { CATEGORY_LAYOUTS } from '../category-layouts';
import { type Category, EXPORT_FILE_EXTENSION, EXPORT_FILE_SUFFIX } from '../constants';
import type { CategoryDataset, CellValue } from '../types';
import { roundTo } from './calculators/formulas';

/** Numbers keep full precision (no display rounding); null is an empty cell */
function serializeCell(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '';
  return typeof value === 'number' ? String(value) : value;
}

/** Percent columns are uploaded as "20%", so a stored 0.2 goes back out the same way */
function serializePercent(value: CellValue | undefined): string {
  return typeof value === 'number' ? `${roundTo(value * 100, 6)}%` : serializeCell(value);
}

/** Render a dataset as CSV text: header row, then one line per row in dataset order */
export function toCsv(dataset: CategoryDataset): string {
  const { percentFields } = CATEGORY_LAYOUTS[dataset.category];
  const serializers = dataset.columns.map((column) => (Object.hasOwn(percentFields, column) ? serializePercent : serializeCell));
  const grid = [dataset.columns, ...dataset.rows.map((row) => dataset.columns.map((column, c) => serializers[c](row[column])))];
  const sheet = XLSX.utils.aoa_to_sheet(grid);
  return XLSX.utils.sheet_to_csv(sheet);
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Export file name in local time.
 *
 * @example
 * exportFilename('wine', new Date(2024, 2, 5, 9, 7, 3)) // => 'wine_inventory_20240305_090703.csv'
 */
export function exportFilename(category: Category, date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${category}${EXPORT_FILE_SUFFIX}${day}_${time}${EXPORT_FILE_EXTENSION}`;
}
