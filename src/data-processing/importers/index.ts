// Data Importers: re-exports for public API

export type { NormalizeOptions } from './normalize';
export { normalize } from './normalize';
export type { DegradeHandler } from './parsers';
export { cellNumber, cleanHeader, parseCurrency, parseDecimal, parseNumeric, parsePercentage } from './parsers';
export type { ReadTableOptions } from './table-reader';
export { readTable } from './table-reader';
