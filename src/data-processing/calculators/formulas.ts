// Spreadsheet Formula Helpers
// Pure arithmetic shared by the category field layouts

import type { RoundingMode } from '../../types';

/**
 * Round half away from zero to a number of decimal places, like a spreadsheet ROUND.
 * Non-finite input rounds to 0.
 *
 * @example
 * roundTo(1.9685, 0)  // => 2
 * roundTo(1.005, 2)   // => 1.01
 * roundTo(2.01, 0, 'up') // => 3
 */
export function roundTo(value: number, decimals: number, mode: RoundingMode = 'nearest'): number {
  if (!Number.isFinite(value)) return 0;
  const factor = 10 ** decimals;
  const magnitude = Math.abs(value);
  const scaled =
    mode === 'up' ? Math.ceil(magnitude * factor - Number.EPSILON * factor) : Math.round((magnitude + Number.EPSILON) * factor);
  const result = (Math.sign(value) * scaled) / factor;
  // Avoid -0 leaking into exports
  return result === 0 ? 0 : result;
}

/** numerator / denominator, or 0 when the denominator is not positive */
export function safeRatio(numerator: number, denominator: number): number {
  if (!(denominator > 0)) return 0;
  return numerator / denominator;
}

/**
 * Price that yields the target margin: cost / (1 − margin).
 * A margin of 1 or more has no finite price and yields 0.
 */
export function marginPrice(cost: number, margin: number): number {
  if (!(margin < 1)) return 0;
  return cost / (1 - margin);
}
