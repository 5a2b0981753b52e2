// Summary Metrics: the dashboard's headline numbers per category

import { CATEGORY_LAYOUTS } from '../../category-layouts';
import { CATEGORIES, type Category, FIELD } from '../../constants';
import type { ReadonlyInventoryStore } from '../../inventory-store';
import type { CategoryDataset, DatasetSummary, StoreSummary } from '../../types';
import { cellNumber } from '../importers/parsers';
import { roundTo } from './formulas';

/** Product count, total inventory value and average margin for one dataset */
export function summarizeDataset(dataset: CategoryDataset): DatasetSummary {
  const { marginField } = CATEGORY_LAYOUTS[dataset.category];
  const totalValue = dataset.rows.reduce((sum, row) => sum + cellNumber(row[FIELD.VALUE]), 0);

  let averageMargin: number | null = null;
  if (marginField && dataset.rows.length > 0) {
    const marginSum = dataset.rows.reduce((sum, row) => sum + cellNumber(row[marginField]), 0);
    averageMargin = roundTo(marginSum / dataset.rows.length, 4);
  }

  return {
    category: dataset.category,
    productCount: dataset.rows.length,
    totalValue: roundTo(totalValue, 2),
    averageMargin
  };
}

/** Per-category summaries plus the value of everything on hand */
export function summarizeStore(store: ReadonlyInventoryStore): StoreSummary {
  const { datasets } = store;
  const categories: Record<Category, DatasetSummary> = {
    spirits: summarizeDataset(datasets.spirits),
    wine: summarizeDataset(datasets.wine),
    beer: summarizeDataset(datasets.beer),
    ingredients: summarizeDataset(datasets.ingredients)
  };
  const grandTotal = CATEGORIES.reduce((sum, category) => sum + categories[category].totalValue, 0);
  return { categories, grandTotalValue: roundTo(grandTotal, 2) };
}
