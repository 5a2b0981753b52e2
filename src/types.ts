// Shared type definitions

import type { Category } from './constants';
import type { LogLevel } from './logger';

// ============================================================================
// TABLES AND DATASETS
// ============================================================================

/** A cell as read from an upload, before normalization */
export type RawCell = string | number | null;

/** Tabular upload: header row plus data rows, in file order */
export interface RawTable {
  headers: string[];
  rows: RawCell[][];
}

/** A normalized cell. `null` marks "no value" (e.g. BTG Price on a bottle-only wine) */
export type CellValue = string | number | null;

export type InventoryRow = Record<string, CellValue>;

/** Ordered rows of one category; `columns` is the display and export order */
export interface CategoryDataset {
  category: Category;
  columns: string[];
  rows: InventoryRow[];
}

/** Cell-level problem that was degraded to a default during import */
export interface ImportWarning {
  category: Category;
  /** Zero-based data row index, or null for header-level issues */
  row: number | null;
  field: string | null;
  value: string | null;
  message: string;
}

// ============================================================================
// CATEGORY FIELD LAYOUTS
// ============================================================================

export type RoundingMode = 'nearest' | 'up';

/** Whether import fills a derived column only when the upload lacks it, or always recomputes it */
export type ImportFill = 'missing' | 'always';

export interface DerivedField {
  field: string;
  decimals: number;
  rounding: RoundingMode;
  onImport: ImportFill;
  /** Raw (unrounded) value from the row's current cells; null means "no value" */
  compute: (row: InventoryRow) => number | null;
}

export interface CategoryLayout {
  category: Category;
  label: string;
  /** Known source header spelling → canonical field (case-sensitive, after trim) */
  headerAliases: Record<string, string>;
  textFields: string[];
  /** Fields cleaned with currency rules ($ and , stripped; unparseable → 0) */
  currencyFields: string[];
  /** Fields written as percentages ("20%") and stored as fractions, with their default */
  percentFields: Record<string, number>;
  /** Plain numeric fields and the value used when missing or unparseable */
  numericDefaults: Record<string, number>;
  /** Cost basis for Value (Cost, or Cost per Keg/Case for beer) */
  costField: string;
  marginField: string | null;
  /** Evaluated in order; later entries may read earlier results */
  derived: DerivedField[];
}

// ============================================================================
// ANALYTICS
// ============================================================================

export interface DatasetSummary {
  category: Category;
  productCount: number;
  totalValue: number;
  averageMargin: number | null;
}

export interface StoreSummary {
  categories: Record<Category, DatasetSummary>;
  grandTotalValue: number;
}

export interface DatasetFilter {
  /** Case-insensitive substring match on Product */
  search?: string;
  /** Column → accepted values; empty lists are ignored */
  columnFilters?: Record<string, CellValue[]>;
}

export interface ProductCost {
  costPerUnit: number;
  totalCost: number;
  source: Category | null;
}

export interface RecipeIngredient {
  product: string;
  amount: number;
}

// ============================================================================
// EXPORT
// ============================================================================

export interface CsvExport {
  filename: string;
  csv: string;
}

// ============================================================================
// CONFIG
// ============================================================================

export interface AppConfig {
  restaurantName: string;
  locations: string[];
  distributors: string[];
  exportDir: string;
  logLevel: LogLevel;
}

export type AppConfigPatch = Partial<AppConfig>;
