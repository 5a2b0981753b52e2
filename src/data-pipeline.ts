// Data Pipeline: file-level glue between the filesystem and the inventory store.
// Reads uploads from disk, imports them, and writes timestamped exports.

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Category } from './constants';
import type { InventoryStore, ReadonlyInventoryStore } from './inventory-store';
import { exportCategory, importCategory } from './inventory-store-operations';
import Logger from './logger';
import type { CategoryDataset } from './types';

const WORKBOOK_EXTENSIONS = new Set(['.xlsx', '.xls', '.ods']);

/** Read an upload: workbooks as bytes, everything else as UTF-8 text */
export function readUpload(filePath: string): string | Buffer {
  const ext = path.extname(filePath).toLowerCase();
  return WORKBOOK_EXTENSIONS.has(ext) ? fs.readFileSync(filePath) : fs.readFileSync(filePath, 'utf8');
}

/** Import one file into the store, replacing that category's dataset */
export function importFile(store: InventoryStore, category: Category, filePath: string, now?: Date): CategoryDataset {
  return importCategory(store, category, readUpload(filePath), { source: path.basename(filePath), now });
}

/** Write a category export into `outDir` and return the written path */
export function writeExport(store: ReadonlyInventoryStore, category: Category, outDir: string, now?: Date): string {
  const { filename, csv } = exportCategory(store, category, now);
  fs.mkdirSync(outDir, { recursive: true });
  const target = path.join(outDir, filename);
  fs.writeFileSync(target, csv, 'utf8');
  Logger.info(`Exported ${store.datasets[category].rows.length} ${category} rows to ${target}`);
  return target;
}
