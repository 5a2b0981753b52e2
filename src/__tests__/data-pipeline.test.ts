import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { importFile, readUpload, writeExport } from '../data-pipeline';
import { createInventoryStore } from '../inventory-store';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bev-pipeline-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('readUpload', () => {
  it('reads CSV as text and workbooks as bytes', () => {
    fs.writeFileSync(path.join(dir, 'beer.csv'), 'Product,Cost\n');
    fs.writeFileSync(path.join(dir, 'beer.XLSX'), 'not really a workbook');

    expect(readUpload(path.join(dir, 'beer.csv'))).toBe('Product,Cost\n');
    expect(Buffer.isBuffer(readUpload(path.join(dir, 'beer.XLSX')))).toBe(true);
  });
});

describe('importFile / writeExport', () => {
  it('round-trips a beer upload through the store to disk', () => {
    const upload = path.join(dir, 'beer.csv');
    fs.writeFileSync(upload, 'Product,Keg/Case Cost,Size,Target Margin,Inventory\nHouse IPA,$180,120,0.25,2\n');

    const store = createInventoryStore();
    importFile(store, 'beer', upload, new Date('2024-06-01T00:00:00.000Z'));
    expect(store.metadata.lastImport.beer).toBe('2024-06-01T00:00:00.000Z');

    const target = writeExport(store, 'beer', path.join(dir, 'nested', 'out'), new Date(2024, 5, 1, 8, 30, 0));
    expect(target).toBe(path.join(dir, 'nested', 'out', 'beer_inventory_20240601_083000.csv'));
    expect(fs.readFileSync(target, 'utf8').trimEnd().split('\n')).toEqual([
      'Product,Cost per Keg/Case,Size,Margin,Inventory,Cost/Unit,Value,Menu Price',
      'House IPA,180,120,0.25,2,1.5,360,2'
    ]);
  });
});
