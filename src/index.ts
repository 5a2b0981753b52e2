// Public API

export { CATEGORY_LAYOUTS, derivedFields, knownFields } from './category-layouts';
export type { CliOptions, ParsedArgs, Printer } from './cli';
export { EXIT, InventoryCLI, parseCliArgs, runInventoryCLI } from './cli';
export { default as ConfigManager } from './config-manager';
export type { Category } from './constants';
export { CATEGORIES, CATEGORY, FIELD, isCategory } from './constants';
export { importFile, readUpload, writeExport } from './data-pipeline';
export * from './data-processing/calculators';
export { exportFilename, toCsv } from './data-processing/csv-export';
export * from './data-processing/importers';
export { FormatError } from './errors';
export type { InventoryStore, InventoryStoreMetadata, ReadonlyInventoryStore } from './inventory-store';
export { createEmptyDataset, createInventoryStore, loadedCategories } from './inventory-store';
export type { ImportOptions } from './inventory-store-operations';
export {
  appendRow,
  exportCategory,
  importCategory,
  recalculateCategory,
  removeRow,
  updateCell
} from './inventory-store-operations';
export type { LogLevel } from './logger';
export { default as Logger, getErrorMessage } from './logger';
export type * from './types';
export { appConfigSchema, validateCategoryColumns, validateConfigPatch } from './validators';
