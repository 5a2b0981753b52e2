// Dataset filtering for the inventory grid (search box + column pickers)

import { FIELD } from '../../constants';
import type { CategoryDataset, DatasetFilter, InventoryRow } from '../../types';

function matchesSearch(row: InventoryRow, needle: string): boolean {
  const product = row[FIELD.PRODUCT];
  if (product === null || product === undefined) return false;
  return String(product).toLowerCase().includes(needle);
}

/**
 * Keep rows whose Product contains `search` (case-insensitive) and whose filtered
 * columns hold one of the accepted values. Columns the dataset lacks are ignored.
 */
export function filterDataset(dataset: CategoryDataset, filter: DatasetFilter): CategoryDataset {
  const needle = filter.search?.trim().toLowerCase() ?? '';
  const columnFilters = Object.entries(filter.columnFilters ?? {}).filter(
    ([column, values]) => values.length > 0 && dataset.columns.includes(column)
  );

  const rows = dataset.rows.filter((row) => {
    if (needle && dataset.columns.includes(FIELD.PRODUCT) && !matchesSearch(row, needle)) return false;
    return columnFilters.every(([column, values]) => values.includes(row[column] ?? null));
  });

  return { ...dataset, rows };
}
