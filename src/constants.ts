// Application-wide Constants
// Single source of truth for category identifiers, field names and default values

// ============================================================================
// CATEGORIES
// ============================================================================

export const CATEGORY = {
  SPIRITS: 'spirits',
  WINE: 'wine',
  BEER: 'beer',
  INGREDIENTS: 'ingredients'
} as const;

export type Category = (typeof CATEGORY)[keyof typeof CATEGORY];

export const CATEGORIES: readonly Category[] = [CATEGORY.SPIRITS, CATEGORY.WINE, CATEGORY.BEER, CATEGORY.INGREDIENTS];

export function isCategory(value: string): value is Category {
  return CATEGORIES.some((category) => category === value);
}

// ============================================================================
// CANONICAL FIELD NAMES
// ============================================================================

export const FIELD = {
  PRODUCT: 'Product',
  TYPE: 'Type',
  COST: 'Cost',
  KEG_CASE_COST: 'Cost per Keg/Case',
  SIZE_OZ: 'Size (oz.)',
  SIZE: 'Size',
  SIZE_YIELD: 'Size/Yield',
  UOM: 'UoM',
  MARGIN: 'Margin',
  INVENTORY: 'Inventory',
  USE: 'Use',
  DISTRIBUTOR: 'Distributor',
  ORDER_NOTES: 'Order Notes',
  BTG: 'BTG',

  // Derived
  COST_PER_OZ: 'Cost/Oz',
  COST_PER_UNIT: 'Cost/Unit',
  VALUE: 'Value',
  NEAT_PRICE: 'Neat Price',
  BOTTLE_PRICE: 'Bottle Price',
  BTG_PRICE: 'BTG Price',
  MENU_PRICE: 'Menu Price',
  SUGGESTED_RETAIL: 'Suggested Retail'
} as const;

/** Columns removed from the product and dropped on import when older exports still carry them */
export const LEGACY_COLUMNS: readonly string[] = ['Par'];

/** The only BTG flag value that counts as "sold by the glass" (exact match) */
export const BTG_YES = 'Yes';

/** Pours per bottle used for the by-the-glass price */
export const BTG_POURS_PER_BOTTLE = 4;

/** Neat pour size in ounces */
export const NEAT_POUR_OZ = 2;

/** Retail (take-home) bottle price multiplier */
export const RETAIL_MARKUP = 1.44;

// ============================================================================
// LOCATIONS
// ============================================================================

/** Storage areas whose per-location counts sum into Inventory */
export const DEFAULT_LOCATIONS: readonly string[] = ['Bar', 'Back Bar', 'Storage'];

// ============================================================================
// EXPORT
// ============================================================================

export const EXPORT_FILE_SUFFIX = '_inventory_';
export const EXPORT_FILE_EXTENSION = '.csv';

// ============================================================================
// CONFIG
// ============================================================================

export const CONFIG_FILE_NAME = 'bev-inventory.json';
