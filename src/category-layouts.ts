// Category Field Layouts
// One declarative table per inventory category. The normalizer and the
// recalculation engine are generic and read everything category-specific from here.

import { BTG_POURS_PER_BOTTLE, BTG_YES, CATEGORY, type Category, FIELD, NEAT_POUR_OZ, RETAIL_MARKUP } from './constants';
import { marginPrice, safeRatio } from './data-processing/calculators/formulas';
import { cellNumber } from './data-processing/importers/parsers';
import type { CategoryLayout, DerivedField, InventoryRow } from './types';

function num(row: InventoryRow, field: string): number {
  return cellNumber(row[field]);
}

// ============================================================================
// SHARED DERIVATIONS
// ============================================================================

function valueOf(costField: string): DerivedField {
  return {
    field: FIELD.VALUE,
    decimals: 2,
    rounding: 'nearest',
    onImport: 'always',
    compute: (row) => num(row, FIELD.INVENTORY) * num(row, costField)
  };
}

function costRatio(field: string, costField: string, sizeField: string): DerivedField {
  return {
    field,
    decimals: 4,
    rounding: 'nearest',
    onImport: 'missing',
    compute: (row) => safeRatio(num(row, costField), num(row, sizeField))
  };
}

const suggestedRetail: DerivedField = {
  field: FIELD.SUGGESTED_RETAIL,
  decimals: 0,
  rounding: 'up',
  onImport: 'missing',
  compute: (row) => num(row, FIELD.COST) * RETAIL_MARKUP
};

// ============================================================================
// LAYOUTS
// ============================================================================

const SPIRITS_LAYOUT: CategoryLayout = {
  category: CATEGORY.SPIRITS,
  label: 'Spirits',
  headerAliases: {
    'Bottle Cost': FIELD.COST,
    'Size (oz)': FIELD.SIZE_OZ,
    Size: FIELD.SIZE_OZ,
    'Target Margin': FIELD.MARGIN,
    'Total Inventory': FIELD.INVENTORY,
    'Neat Pour': FIELD.NEAT_PRICE,
    'Suggested Price': FIELD.NEAT_PRICE,
    Notes: FIELD.ORDER_NOTES
  },
  textFields: [FIELD.PRODUCT, FIELD.TYPE, FIELD.USE, FIELD.DISTRIBUTOR, FIELD.ORDER_NOTES],
  currencyFields: [FIELD.COST, FIELD.COST_PER_OZ, FIELD.NEAT_PRICE, FIELD.SUGGESTED_RETAIL],
  percentFields: { [FIELD.MARGIN]: 0.2 },
  numericDefaults: { [FIELD.SIZE_OZ]: 33.8, [FIELD.INVENTORY]: 0 },
  costField: FIELD.COST,
  marginField: FIELD.MARGIN,
  derived: [
    costRatio(FIELD.COST_PER_OZ, FIELD.COST, FIELD.SIZE_OZ),
    valueOf(FIELD.COST),
    {
      field: FIELD.NEAT_PRICE,
      decimals: 0,
      rounding: 'nearest',
      onImport: 'missing',
      compute: (row) => marginPrice(NEAT_POUR_OZ * num(row, FIELD.COST_PER_OZ), num(row, FIELD.MARGIN))
    },
    suggestedRetail
  ]
};

const WINE_LAYOUT: CategoryLayout = {
  category: CATEGORY.WINE,
  label: 'Wine',
  headerAliases: {
    'Bottle Cost': FIELD.COST,
    'Size (oz)': FIELD.SIZE_OZ,
    Size: FIELD.SIZE_OZ,
    'Target Margin': FIELD.MARGIN,
    'Total Inventory': FIELD.INVENTORY,
    'By The Glass': FIELD.BTG,
    'Suggested Price': FIELD.BOTTLE_PRICE,
    Notes: FIELD.ORDER_NOTES
  },
  textFields: [FIELD.PRODUCT, FIELD.TYPE, FIELD.DISTRIBUTOR, FIELD.ORDER_NOTES, FIELD.BTG],
  currencyFields: [FIELD.COST, FIELD.BOTTLE_PRICE, FIELD.BTG_PRICE, FIELD.SUGGESTED_RETAIL],
  percentFields: {},
  numericDefaults: { [FIELD.SIZE_OZ]: 25.3, [FIELD.MARGIN]: 0.33, [FIELD.INVENTORY]: 0 },
  costField: FIELD.COST,
  marginField: FIELD.MARGIN,
  derived: [
    valueOf(FIELD.COST),
    {
      field: FIELD.BOTTLE_PRICE,
      decimals: 0,
      rounding: 'nearest',
      onImport: 'missing',
      compute: (row) => marginPrice(num(row, FIELD.COST), num(row, FIELD.MARGIN))
    },
    {
      field: FIELD.BTG_PRICE,
      decimals: 0,
      rounding: 'nearest',
      onImport: 'missing',
      // Exact match only: "yes" or "Y" are bottle-only wines
      compute: (row) => (row[FIELD.BTG] === BTG_YES ? num(row, FIELD.BOTTLE_PRICE) / BTG_POURS_PER_BOTTLE : null)
    },
    suggestedRetail
  ]
};

const BEER_LAYOUT: CategoryLayout = {
  category: CATEGORY.BEER,
  label: 'Beer',
  headerAliases: {
    Cost: FIELD.KEG_CASE_COST,
    'Keg/Case Cost': FIELD.KEG_CASE_COST,
    'Target Margin': FIELD.MARGIN,
    'Total Inventory': FIELD.INVENTORY,
    Unit: FIELD.UOM,
    'Suggested Price': FIELD.MENU_PRICE,
    Notes: FIELD.ORDER_NOTES
  },
  textFields: [FIELD.PRODUCT, FIELD.TYPE, FIELD.UOM, FIELD.DISTRIBUTOR, FIELD.ORDER_NOTES],
  currencyFields: [FIELD.KEG_CASE_COST, FIELD.COST_PER_UNIT, FIELD.MENU_PRICE],
  percentFields: {},
  numericDefaults: { [FIELD.SIZE]: 1, [FIELD.MARGIN]: 0.25, [FIELD.INVENTORY]: 0 },
  costField: FIELD.KEG_CASE_COST,
  marginField: FIELD.MARGIN,
  derived: [
    costRatio(FIELD.COST_PER_UNIT, FIELD.KEG_CASE_COST, FIELD.SIZE),
    valueOf(FIELD.KEG_CASE_COST),
    {
      field: FIELD.MENU_PRICE,
      decimals: 2,
      rounding: 'nearest',
      onImport: 'missing',
      compute: (row) => marginPrice(num(row, FIELD.COST_PER_UNIT), num(row, FIELD.MARGIN))
    }
  ]
};

const INGREDIENTS_LAYOUT: CategoryLayout = {
  category: CATEGORY.INGREDIENTS,
  label: 'Ingredients',
  headerAliases: {
    Size: FIELD.SIZE_YIELD,
    Yield: FIELD.SIZE_YIELD,
    'Total Inventory': FIELD.INVENTORY,
    Unit: FIELD.UOM,
    Notes: FIELD.ORDER_NOTES
  },
  textFields: [FIELD.PRODUCT, FIELD.UOM, FIELD.DISTRIBUTOR, FIELD.ORDER_NOTES],
  currencyFields: [FIELD.COST, FIELD.COST_PER_UNIT],
  percentFields: {},
  numericDefaults: { [FIELD.SIZE_YIELD]: 1, [FIELD.INVENTORY]: 0 },
  costField: FIELD.COST,
  marginField: null,
  derived: [costRatio(FIELD.COST_PER_UNIT, FIELD.COST, FIELD.SIZE_YIELD), valueOf(FIELD.COST)]
};

export const CATEGORY_LAYOUTS: Record<Category, CategoryLayout> = {
  [CATEGORY.SPIRITS]: SPIRITS_LAYOUT,
  [CATEGORY.WINE]: WINE_LAYOUT,
  [CATEGORY.BEER]: BEER_LAYOUT,
  [CATEGORY.INGREDIENTS]: INGREDIENTS_LAYOUT
};

/** Every field the layout for a category knows about, in canonical order */
export function knownFields(layout: CategoryLayout): string[] {
  const fields = new Set<string>([
    ...layout.textFields,
    layout.costField,
    ...layout.currencyFields,
    ...Object.keys(layout.percentFields),
    ...Object.keys(layout.numericDefaults),
    ...layout.derived.map((d) => d.field)
  ]);
  return [...fields];
}

/** Fields computed by the recalculation engine (never hand-edited) */
export function derivedFields(layout: CategoryLayout): string[] {
  return layout.derived.map((d) => d.field);
}
