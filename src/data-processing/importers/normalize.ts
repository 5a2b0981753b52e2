// Ingestion Normalizer
// Raw upload table → typed, defaulted dataset for one category

import { CATEGORY_LAYOUTS } from '../../category-layouts';
import { type Category, DEFAULT_LOCATIONS, FIELD, LEGACY_COLUMNS } from '../../constants';
import { FormatError } from '../../errors';
import Logger from '../../logger';
import type { CategoryDataset, CategoryLayout, ImportWarning, InventoryRow, RawTable } from '../../types';
import { validateCategoryColumns } from '../../validators';
import { evaluateDerived, sumLocations } from '../calculators/recalculate';
import { cleanHeader, type DegradeHandler, isBlank, parseCurrency, parseNumeric, parsePercentage } from './parsers';

export interface NormalizeOptions {
  /** Location count columns that sum into Inventory when present */
  locations?: readonly string[];
  /** Collects cell-level problems that were degraded to defaults */
  warnings?: ImportWarning[];
  /** Known distributors; other non-blank Distributor values are kept but reported. Empty means any */
  distributors?: readonly string[];
}

interface ResolvedColumns {
  columns: string[];
  /** Source column index for each entry of `columns` */
  sourceIndexes: number[];
}

type HeaderWarn = (message: string) => void;

/** Trim headers and apply the category's alias table. First occurrence wins on duplicates. */
function resolveColumns(headers: string[], layout: CategoryLayout, warn: HeaderWarn): ResolvedColumns {
  const trimmed = headers.map(cleanHeader);
  const present = new Set(trimmed);
  const columns: string[] = [];
  const sourceIndexes: number[] = [];

  trimmed.forEach((header, index) => {
    if (header === '') {
      warn(`Column ${index + 1} has no header and was skipped`);
      return;
    }
    let name = header;
    if (Object.hasOwn(layout.headerAliases, header)) {
      const canonical = layout.headerAliases[header];
      if (present.has(canonical)) {
        warn(`"${header}" kept as-is because "${canonical}" is also present`);
      } else {
        name = canonical;
      }
    }
    if (columns.includes(name)) {
      warn(`Duplicate column "${name}" ignored`);
      return;
    }
    columns.push(name);
    sourceIndexes.push(index);
  });

  return { columns, sourceIndexes };
}

/**
 * Normalize a raw upload into a dataset for `category`.
 *
 * Malformed cells never fail the import: they take the category default and are
 * reported through the logger and `options.warnings`. Only a table without any
 * usable header raises FormatError.
 */
export function normalize(table: RawTable, category: Category, options: NormalizeOptions = {}): CategoryDataset {
  const layout = CATEGORY_LAYOUTS[category];
  const locations = options.locations ?? DEFAULT_LOCATIONS;

  const headerWarn: HeaderWarn = (message) => {
    Logger.warn(`${layout.label} import: ${message}`);
    options.warnings?.push({ category, row: null, field: null, value: null, message });
  };

  const { columns: sourceColumns, sourceIndexes } = resolveColumns(table.headers, layout, headerWarn);
  if (sourceColumns.length === 0) throw new FormatError(`${layout.label} upload has no usable column headers`);

  for (const issue of validateCategoryColumns(category, sourceColumns).issues) {
    headerWarn(issue);
  }

  const supplied = new Set(sourceColumns);
  const knownDistributors =
    options.distributors && options.distributors.length > 0 && supplied.has(FIELD.DISTRIBUTOR) ? new Set(options.distributors) : null;
  const presentLocations = locations.filter((loc) => supplied.has(loc));

  const rows = table.rows.map((cells, r) => {
    const row: InventoryRow = {};
    sourceColumns.forEach((column, k) => {
      row[column] = cells[sourceIndexes[k]] ?? '';
    });

    // A blank derived cell (the BTG Price of a bottle-only wine) is derived again, not cleaned to 0
    const blankDerived = new Set(layout.derived.filter((d) => supplied.has(d.field) && isBlank(row[d.field])).map((d) => d.field));

    const context = (field: string) => `${layout.label} row ${r + 1} "${field}"`;
    const onDegrade =
      (field: string): DegradeHandler =>
      (message, value) =>
        options.warnings?.push({ category, row: r, field, value, message });

    for (const field of layout.currencyFields) {
      if (supplied.has(field)) row[field] = parseCurrency(row[field], context(field), onDegrade(field));
    }
    for (const [field, fallback] of Object.entries(layout.percentFields)) {
      row[field] = parsePercentage(row[field], fallback, context(field), onDegrade(field));
    }
    for (const [field, fallback] of Object.entries(layout.numericDefaults)) {
      row[field] = parseNumeric(row[field], fallback, context(field), onDegrade(field));
    }
    for (const loc of presentLocations) {
      row[loc] = parseNumeric(row[loc], 0, context(loc), onDegrade(loc));
    }
    if (presentLocations.length > 0) row[FIELD.INVENTORY] = sumLocations(row, presentLocations);

    const distributor = row[FIELD.DISTRIBUTOR];
    if (knownDistributors && typeof distributor === 'string' && !isBlank(distributor) && !knownDistributors.has(distributor.trim())) {
      const message = `Unknown distributor "${distributor}" in ${context(FIELD.DISTRIBUTOR)}`;
      Logger.warn(message);
      options.warnings?.push({ category, row: r, field: FIELD.DISTRIBUTOR, value: distributor, message });
    }

    for (const derived of layout.derived) {
      if (derived.onImport === 'missing' && supplied.has(derived.field) && !blankDerived.has(derived.field)) continue;
      row[derived.field] = evaluateDerived(derived, row);
    }

    for (const legacy of LEGACY_COLUMNS) delete row[legacy];
    return row;
  });

  const columns = sourceColumns.filter((c) => !LEGACY_COLUMNS.includes(c));
  const materialized = [...Object.keys(layout.percentFields), ...Object.keys(layout.numericDefaults), ...layout.derived.map((d) => d.field)];
  for (const field of materialized) {
    if (!columns.includes(field)) columns.push(field);
  }

  Logger.info(`Normalized ${rows.length} ${layout.label.toLowerCase()} rows (${columns.length} columns)`);
  return { category, columns, rows };
}
