// Inventory Store Operations: import, manual edits, recalculation and export

import { CATEGORY_LAYOUTS, derivedFields, knownFields } from './category-layouts';
import { type Category, FIELD } from './constants';
import { recalculate } from './data-processing/calculators/recalculate';
import { exportFilename, toCsv } from './data-processing/csv-export';
import { normalize } from './data-processing/importers/normalize';
import { isBlank, parseCurrency, parseNumeric, parsePercentage } from './data-processing/importers/parsers';
import { readTable } from './data-processing/importers/table-reader';
import type { InventoryStore, ReadonlyInventoryStore } from './inventory-store';
import Logger from './logger';
import type { CategoryDataset, CellValue, CsvExport, ImportWarning, InventoryRow } from './types';

export interface ImportOptions {
  /** Label for logs and errors, usually the uploaded file name */
  source?: string;
  now?: Date;
}

/**
 * Replace a category's dataset with a freshly normalized upload.
 * A FormatError propagates and leaves the store untouched.
 */
export function importCategory(
  store: InventoryStore,
  category: Category,
  input: string | Buffer,
  options: ImportOptions = {}
): CategoryDataset {
  const warnings: ImportWarning[] = [];
  const table = readTable(input, { source: options.source });
  const dataset = normalize(table, category, { locations: store.locations, distributors: store.distributors, warnings });

  store.datasets[category] = dataset;
  store.metadata.lastImport[category] = (options.now ?? new Date()).toISOString();
  store.metadata.warnings[category] = warnings;

  Logger.info(`Imported ${dataset.rows.length} ${category} rows${options.source ? ` from ${options.source}` : ''}`, {
    warnings: warnings.length
  });
  return dataset;
}

/** Recalculate every derived column of a category in place of the stored dataset */
export function recalculateCategory(store: InventoryStore, category: Category): CategoryDataset {
  const dataset = recalculate(store.datasets[category], { locations: store.locations });
  store.datasets[category] = dataset;
  return dataset;
}

// ============================================================================
// MANUAL EDITS
// ============================================================================

/**
 * Coerce an edited value by field kind. Grid edits arrive either as numbers
 * (already in stored units, e.g. a margin of 0.25) or as typed text ("25%", "$30").
 */
function coerceEdit(store: ReadonlyInventoryStore, category: Category, field: string, value: CellValue): CellValue {
  const layout = CATEGORY_LAYOUTS[category];
  const context = `${layout.label} edit "${field}"`;

  if (derivedFields(layout).includes(field)) {
    throw new Error(`"${field}" is calculated and cannot be edited`);
  }
  if (Object.hasOwn(layout.percentFields, field)) {
    return typeof value === 'number' ? value : parsePercentage(value, layout.percentFields[field], context);
  }
  if (Object.hasOwn(layout.numericDefaults, field)) {
    return parseNumeric(value, layout.numericDefaults[field], context);
  }
  if (store.locations.includes(field)) {
    return parseNumeric(value, 0, context);
  }
  if (layout.currencyFields.includes(field)) {
    return parseCurrency(value, context);
  }
  if (
    field === FIELD.DISTRIBUTOR &&
    typeof value === 'string' &&
    !isBlank(value) &&
    store.distributors.length > 0 &&
    !store.distributors.includes(value.trim())
  ) {
    Logger.warn(`Unknown distributor "${value}" in ${context}`);
  }
  return value ?? '';
}

function assertRowIndex(dataset: CategoryDataset, rowIndex: number): void {
  if (!Number.isInteger(rowIndex) || rowIndex < 0 || rowIndex >= dataset.rows.length) {
    throw new RangeError(`Row ${rowIndex} is out of range for ${dataset.category} (${dataset.rows.length} rows)`);
  }
}

/**
 * Set one editable cell. Derived columns are left stale until the next recalculation,
 * matching a spreadsheet in manual-recalc mode.
 */
export function updateCell(store: InventoryStore, category: Category, rowIndex: number, field: string, value: CellValue): void {
  const dataset = store.datasets[category];
  assertRowIndex(dataset, rowIndex);
  dataset.rows[rowIndex][field] = coerceEdit(store, category, field, value);
  if (!dataset.columns.includes(field)) dataset.columns.push(field);
}

function blankRow(store: ReadonlyInventoryStore, category: Category, columns: string[]): InventoryRow {
  const layout = CATEGORY_LAYOUTS[category];
  const derived = derivedFields(layout);
  const row: InventoryRow = {};
  for (const column of columns) {
    if (derived.includes(column)) row[column] = null;
    else if (Object.hasOwn(layout.percentFields, column)) row[column] = layout.percentFields[column];
    else if (Object.hasOwn(layout.numericDefaults, column)) row[column] = layout.numericDefaults[column];
    else if (layout.currencyFields.includes(column) || store.locations.includes(column)) row[column] = 0;
    else row[column] = '';
  }
  return row;
}

/** Append a row filled with category defaults, then apply the given values */
export function appendRow(store: InventoryStore, category: Category, values: Record<string, CellValue> = {}): InventoryRow {
  const dataset = store.datasets[category];
  if (dataset.columns.length === 0) dataset.columns.push(...knownFields(CATEGORY_LAYOUTS[category]));

  const row = blankRow(store, category, dataset.columns);
  for (const [field, value] of Object.entries(values)) {
    row[field] = coerceEdit(store, category, field, value);
    if (!dataset.columns.includes(field)) dataset.columns.push(field);
  }
  dataset.rows.push(row);
  return row;
}

/** Remove a row and return it */
export function removeRow(store: InventoryStore, category: Category, rowIndex: number): InventoryRow {
  const dataset = store.datasets[category];
  assertRowIndex(dataset, rowIndex);
  const [removed] = dataset.rows.splice(rowIndex, 1);
  return removed;
}

// ============================================================================
// EXPORT
// ============================================================================

/** Render a category as CSV with the conventional timestamped file name */
export function exportCategory(store: ReadonlyInventoryStore, category: Category, now: Date = new Date()): CsvExport {
  return { filename: exportFilename(category, now), csv: toCsv(store.datasets[category]) };
}
