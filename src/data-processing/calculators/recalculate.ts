// Recalculation Engine
// Re-derives every computed column from the editable columns, like a spreadsheet recalc

import { CATEGORY_LAYOUTS } from '../../category-layouts';
import { DEFAULT_LOCATIONS, FIELD } from '../../constants';
import Logger from '../../logger';
import type { CategoryDataset, DerivedField, InventoryRow } from '../../types';
import { cellNumber } from '../importers/parsers';
import { roundTo } from './formulas';

export interface RecalculateOptions {
  /** Location count columns that sum into Inventory when present */
  locations?: readonly string[];
}

/** Evaluate one derived field against a row and apply its rounding rule */
export function evaluateDerived(derived: DerivedField, row: InventoryRow): number | null {
  const raw = derived.compute(row);
  return raw === null ? null : roundTo(raw, derived.decimals, derived.rounding);
}

/** Total on-hand count across location columns */
export function sumLocations(row: InventoryRow, locations: readonly string[]): number {
  return locations.reduce((total, loc) => total + cellNumber(row[loc]), 0);
}

/**
 * Recalculate all derived columns of a dataset. Pure: returns a new dataset and
 * leaves the input untouched. An empty dataset is returned as-is.
 */
export function recalculate(dataset: CategoryDataset, options: RecalculateOptions = {}): CategoryDataset {
  if (dataset.rows.length === 0) return dataset;

  const layout = CATEGORY_LAYOUTS[dataset.category];
  const locations = (options.locations ?? DEFAULT_LOCATIONS).filter((loc) => dataset.columns.includes(loc));

  const rows = dataset.rows.map((source) => {
    const row: InventoryRow = { ...source };
    if (locations.length > 0) row[FIELD.INVENTORY] = sumLocations(row, locations);
    for (const derived of layout.derived) {
      row[derived.field] = evaluateDerived(derived, row);
    }
    return row;
  });

  const columns = [...dataset.columns];
  if (locations.length > 0 && !columns.includes(FIELD.INVENTORY)) columns.push(FIELD.INVENTORY);
  for (const derived of layout.derived) {
    if (!columns.includes(derived.field)) columns.push(derived.field);
  }

  Logger.debug(`Recalculated ${rows.length} ${layout.label.toLowerCase()} rows`);
  return { ...dataset, columns, rows };
}
