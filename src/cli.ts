/**
 * Command line front end for the inventory engine.
 * Usage: bev-inventory <command> [arguments] [options]
 */

import * as path from 'node:path';
import ConfigManager from './config-manager';
import { CATEGORIES, type Category, isCategory } from './constants';
import { recalculate } from './data-processing/calculators/recalculate';
import { getProductCost } from './data-processing/calculators/product-cost';
import { summarizeDataset } from './data-processing/calculators/summary';
import { parseDecimal } from './data-processing/importers/parsers';
import { importFile, writeExport } from './data-pipeline';
import { FormatError } from './errors';
import { createInventoryStore, type InventoryStore } from './inventory-store';
import { recalculateCategory } from './inventory-store-operations';
import Logger, { getErrorMessage } from './logger';
import type { AppConfig, DatasetSummary } from './types';

export interface CliOptions {
  out?: string;
  dataDir?: string;
  recalc?: boolean;
  format?: 'json' | 'table';
  spirits?: string;
  ingredients?: string;
}

export interface ParsedArgs {
  command: string | undefined;
  positionals: string[];
  options: CliOptions;
}

export type Printer = (line: string) => void;

/** Exit codes */
export const EXIT = { OK: 0, FAILED: 1, USAGE: 2 } as const;

const USAGE = [
  'Usage: bev-inventory <command> [arguments] [options]',
  '',
  'Commands:',
  '  import  <category> <file>     Normalize an upload and write an export CSV',
  '  recalc  <category> <file>     Normalize, recalculate every derived column, and export',
  '  summary <category> <file>     Print product count, total value and average margin',
  '  cost    <product> <amount>    Look up a product cost (needs --spirits and/or --ingredients)',
  '',
  'Options:',
  '  --out <dir>                   Export directory (default: exportDir from config)',
  '  --data-dir <dir>              Directory holding bev-inventory.json and the log (default: cwd)',
  '  --recalc                      Recalculate after import (import, summary)',
  '  --format json|table           Output format for summary and cost',
  '  --spirits <file>              Spirits upload for cost lookups',
  '  --ingredients <file>          Ingredients upload for cost lookups',
  '',
  `Categories: ${CATEGORIES.join(', ')}`
].join('\n');

/** Split argv into command, positionals and options. Unknown flags are reported by the caller. */
export function parseCliArgs(args: string[]): ParsedArgs & { unknown: string[] } {
  const [command, ...rest] = args;
  const positionals: string[] = [];
  const options: CliOptions = {};
  const unknown: string[] = [];

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    const next = rest[i + 1];
    if (arg === '--recalc') {
      options.recalc = true;
    } else if (arg === '--format' && next !== undefined) {
      if (next === 'json' || next === 'table') options.format = next;
      else unknown.push(`--format ${next}`);
      i++;
    } else if (arg === '--out' && next !== undefined) {
      options.out = next;
      i++;
    } else if (arg === '--data-dir' && next !== undefined) {
      options.dataDir = next;
      i++;
    } else if (arg === '--spirits' && next !== undefined) {
      options.spirits = next;
      i++;
    } else if (arg === '--ingredients' && next !== undefined) {
      options.ingredients = next;
      i++;
    } else if (arg.startsWith('--')) {
      unknown.push(arg);
    } else {
      positionals.push(arg);
    }
  }

  return { command, positionals, options, unknown };
}

function formatSummary(restaurantName: string, summary: DatasetSummary, format: CliOptions['format']): string {
  if (format === 'json') return JSON.stringify({ restaurant: restaurantName, ...summary }, null, 2);
  const margin = summary.averageMargin === null ? 'n/a' : `${(summary.averageMargin * 100).toFixed(1)}%`;
  return [
    `Restaurant     : ${restaurantName}`,
    `Category       : ${summary.category}`,
    `Products       : ${summary.productCount}`,
    `Total Value    : $${summary.totalValue.toFixed(2)}`,
    `Average Margin : ${margin}`
  ].join('\n');
}

/**
 * Inventory CLI commands. Each returns an exit code; output goes through `print`.
 */
export class InventoryCLI {
  constructor(
    private readonly store: InventoryStore,
    private readonly config: AppConfig,
    private readonly dataDir: string,
    private readonly print: Printer
  ) {}

  /** import / recalc: normalize a file, optionally recalculate, and write the export */
  importAndExport(category: Category, file: string, options: CliOptions, recalc: boolean): number {
    const dataset = importFile(this.store, category, file);
    if (recalc) recalculateCategory(this.store, category);

    const warnings = this.store.metadata.warnings[category].length;
    const outDir = options.out ?? path.resolve(this.dataDir, this.config.exportDir);
    const target = writeExport(this.store, category, outDir);

    this.print(`Imported ${dataset.rows.length} ${category} rows${warnings > 0 ? ` (${warnings} cell warnings)` : ''}`);
    this.print(`Wrote ${target}`);
    return EXIT.OK;
  }

  summary(category: Category, file: string, options: CliOptions): number {
    const imported = importFile(this.store, category, file);
    const dataset = options.recalc ? recalculate(imported, { locations: this.store.locations }) : imported;
    this.print(formatSummary(this.config.restaurantName, summarizeDataset(dataset), options.format));
    return EXIT.OK;
  }

  cost(product: string, amountText: string, options: CliOptions): number {
    const amount = parseDecimal(amountText);
    if (amount === null) {
      this.print(`Amount "${amountText}" is not a number`);
      return EXIT.USAGE;
    }
    if (!options.spirits && !options.ingredients) {
      this.print('cost needs --spirits and/or --ingredients');
      return EXIT.USAGE;
    }
    if (options.spirits) importFile(this.store, 'spirits', options.spirits);
    if (options.ingredients) importFile(this.store, 'ingredients', options.ingredients);

    const result = getProductCost(this.store, product, amount);
    if (options.format === 'json') {
      this.print(JSON.stringify({ product, amount, ...result }, null, 2));
    } else if (result.source === null) {
      this.print(`${product}: not found in inventory`);
    } else {
      this.print(`${product} (${result.source}): $${result.costPerUnit.toFixed(4)}/unit × ${amount} = $${result.totalCost.toFixed(2)}`);
    }
    return EXIT.OK;
  }
}

const COMMANDS = new Set(['import', 'recalc', 'summary', 'cost']);

function dispatch(cli: InventoryCLI, parsed: ParsedArgs, print: Printer): number {
  const { command, positionals, options } = parsed;

  if (command === 'cost') {
    const [product, amount] = positionals;
    if (product === undefined || amount === undefined) {
      print(USAGE);
      return EXIT.USAGE;
    }
    return cli.cost(product, amount, options);
  }

  if (command === 'import' || command === 'recalc' || command === 'summary') {
    const [category, file] = positionals;
    if (category === undefined || file === undefined) {
      print(USAGE);
      return EXIT.USAGE;
    }
    if (!isCategory(category)) {
      print(`Unknown category "${category}". Expected one of: ${CATEGORIES.join(', ')}`);
      return EXIT.USAGE;
    }
    if (command === 'summary') return cli.summary(category, file, options);
    return cli.importAndExport(category, file, options, command === 'recalc' || options.recalc === true);
  }

  print(USAGE);
  return EXIT.USAGE;
}

/**
 * Parse arguments and execute the requested command. Returns the process exit code.
 */
export function runInventoryCLI(args: string[], print: Printer = console.log): number {
  const parsed = parseCliArgs(args);
  const { command } = parsed;
  if (command === undefined || !COMMANDS.has(command)) {
    print(USAGE);
    return command === undefined || command === 'help' || command === '--help' ? EXIT.OK : EXIT.USAGE;
  }
  if (parsed.unknown.length > 0) {
    print(`Unknown option(s): ${parsed.unknown.join(', ')}`);
    print(USAGE);
    return EXIT.USAGE;
  }

  const dataDir = path.resolve(parsed.options.dataDir ?? process.cwd());
  Logger.init(dataDir);
  try {
    const config = new ConfigManager(dataDir).loadConfig();
    Logger.setLevel(config.logLevel);
    const store = createInventoryStore(config.locations, config.distributors);
    return dispatch(new InventoryCLI(store, config, dataDir, print), parsed, print);
  } catch (err) {
    if (err instanceof FormatError) {
      Logger.error('Import rejected:', err);
      print(`Import failed: ${err.message}`);
    } else {
      Logger.error('Command failed:', err);
      print(`Error: ${getErrorMessage(err)}`);
    }
    return EXIT.FAILED;
  } finally {
    Logger.close();
  }
}
