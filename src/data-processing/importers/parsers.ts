// Pure Parsing Functions for uploaded cells

import Logger from '../../logger';

/** Called when a non-empty cell could not be parsed and was replaced by a default */
export type DegradeHandler = (message: string, value: string) => void;

const DECIMAL_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

/** Strip surrounding whitespace from a column header */
export function cleanHeader(header: string): string {
  return header.trim();
}

/** Strict decimal parse: the whole string must be a number ("12abc" is not) */
export function parseDecimal(text: string): number | null {
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : null;
}

/** Missing, null or whitespace-only */
export function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

function degrade(value: unknown, fallback: number, context: string, onDegrade?: DegradeHandler): number {
  const message = `Unparseable value "${String(value)}" in ${context}, using ${fallback}`;
  Logger.warn(message);
  onDegrade?.(message, String(value));
  return fallback;
}

/**
 * Parse a currency cell: "$12,345.67" → 12345.67.
 * Empty cells are 0; anything unparseable is 0 as well.
 */
export function parseCurrency(value: unknown, context: string, onDegrade?: DegradeHandler): number {
  if (typeof value === 'number') return Number.isFinite(value) ? value : degrade(value, 0, context, onDegrade);
  if (isBlank(value)) return 0;
  const cleaned = String(value).replace(/[$,]/g, '');
  const n = parseDecimal(cleaned);
  return n === null ? degrade(value, 0, context, onDegrade) : n;
}

/**
 * Parse a percentage cell into a fraction: "20%" → 0.2, "20" → 0.2.
 * Missing or unparseable cells take the fallback (already a fraction).
 */
export function parsePercentage(value: unknown, fallback: number, context: string, onDegrade?: DegradeHandler): number {
  if (typeof value === 'number') return Number.isFinite(value) ? value / 100 : degrade(value, fallback, context, onDegrade);
  if (isBlank(value)) return fallback;
  const n = parseDecimal(String(value).replace(/%/g, ''));
  return n === null ? degrade(value, fallback, context, onDegrade) : n / 100;
}

/** Parse a plain numeric cell, using the fallback when missing or unparseable */
export function parseNumeric(value: unknown, fallback: number, context: string, onDegrade?: DegradeHandler): number {
  if (typeof value === 'number') return Number.isFinite(value) ? value : degrade(value, fallback, context, onDegrade);
  if (isBlank(value)) return fallback;
  const n = parseDecimal(String(value));
  return n === null ? degrade(value, fallback, context, onDegrade) : n;
}

/**
 * Read a cell as a number for formula evaluation. Hand-edited cells may still be
 * text ("$20"), so currency punctuation is tolerated; anything else reads as 0.
 */
export function cellNumber(value: unknown): number {
  if (typeof value === 'number') return Number.isFinite(value) ? value : 0;
  if (typeof value !== 'string') return 0;
  return parseDecimal(value.replace(/[$,]/g, '')) ?? 0;
}
