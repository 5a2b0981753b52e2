// Inventory Store: explicit container for one dataset per category

import { CATEGORIES, type Category, DEFAULT_LOCATIONS } from './constants';
import type { CategoryDataset, ImportWarning } from './types';

export interface InventoryStoreMetadata {
  /** ISO timestamp of the last successful import per category */
  lastImport: Record<Category, string | null>;
  /** Cell-level warnings from the latest import of each category */
  warnings: Record<Category, ImportWarning[]>;
}

export interface InventoryStore {
  datasets: Record<Category, CategoryDataset>;
  /** Location count columns that sum into Inventory */
  locations: string[];
  /** Known distributors; empty accepts any */
  distributors: string[];
  metadata: InventoryStoreMetadata;
}

export type ReadonlyInventoryStore = Readonly<InventoryStore>;

export function createEmptyDataset(category: Category): CategoryDataset {
  return { category, columns: [], rows: [] };
}

function perCategory<T>(make: (category: Category) => T): Record<Category, T> {
  return {
    spirits: make('spirits'),
    wine: make('wine'),
    beer: make('beer'),
    ingredients: make('ingredients')
  };
}

export function createInventoryStore(
  locations: readonly string[] = DEFAULT_LOCATIONS,
  distributors: readonly string[] = []
): InventoryStore {
  return {
    datasets: perCategory(createEmptyDataset),
    locations: [...locations],
    distributors: [...distributors],
    metadata: {
      lastImport: perCategory(() => null),
      warnings: perCategory(() => [])
    }
  };
}

/** Categories that currently hold at least one row */
export function loadedCategories(store: ReadonlyInventoryStore): Category[] {
  return CATEGORIES.filter((category) => store.datasets[category].rows.length > 0);
}
