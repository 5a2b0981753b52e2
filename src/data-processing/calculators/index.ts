// Data Calculators: re-exports for public API

export { filterDataset } from './filters';
export { marginPrice, roundTo, safeRatio } from './formulas';
export { availableProducts, calculateRecipeCost, getProductCost } from './product-cost';
export type { RecalculateOptions } from './recalculate';
export { evaluateDerived, recalculate, sumLocations } from './recalculate';
export { summarizeDataset, summarizeStore } from './summary';
