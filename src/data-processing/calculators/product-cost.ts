// Product Cost Lookup: unit cost of any stocked product, used for recipe costing

import { CATEGORY, type Category, FIELD } from '../../constants';
import type { ReadonlyInventoryStore } from '../../inventory-store';
import type { ProductCost, RecipeIngredient } from '../../types';
import { cellNumber } from '../importers/parsers';
import { roundTo } from './formulas';

/** Where recipe products are looked up, in priority order, and which unit cost column applies */
const COST_SOURCES: ReadonlyArray<{ category: Category; costColumn: string }> = [
  { category: CATEGORY.SPIRITS, costColumn: FIELD.COST_PER_OZ },
  { category: CATEGORY.INGREDIENTS, costColumn: FIELD.COST_PER_UNIT }
];

function productKey(name: unknown): string {
  return typeof name === 'string' || typeof name === 'number' ? String(name).trim().toLowerCase() : '';
}

/**
 * Unit and total cost of `amount` of a product. Spirits win over ingredients when a
 * name appears in both; unknown products cost nothing.
 */
export function getProductCost(store: ReadonlyInventoryStore, productName: string, amount = 1): ProductCost {
  const key = productKey(productName);
  if (key) {
    for (const { category, costColumn } of COST_SOURCES) {
      const dataset = store.datasets[category];
      if (!dataset.columns.includes(costColumn)) continue;
      const match = dataset.rows.find((row) => productKey(row[FIELD.PRODUCT]) === key);
      if (match) {
        const costPerUnit = cellNumber(match[costColumn]);
        return { costPerUnit, totalCost: costPerUnit * amount, source: category };
      }
    }
  }
  return { costPerUnit: 0, totalCost: 0, source: null };
}

/** Total ingredient cost of a recipe, rounded to cents */
export function calculateRecipeCost(store: ReadonlyInventoryStore, ingredients: RecipeIngredient[]): number {
  const total = ingredients.reduce((sum, ing) => sum + getProductCost(store, ing.product, ing.amount).totalCost, 0);
  return roundTo(total, 2);
}

/** Sorted product names available for recipes */
export function availableProducts(store: ReadonlyInventoryStore): string[] {
  const names = new Set<string>();
  for (const { category } of COST_SOURCES) {
    for (const row of store.datasets[category].rows) {
      const name = row[FIELD.PRODUCT];
      if (typeof name === 'string' && name.trim() !== '') names.add(name);
    }
  }
  return [...names].sort((a, b) => a.localeCompare(b));
}
