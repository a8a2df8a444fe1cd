/**
 * Size rounding helpers
 */

// Absorbs binary representation noise such as 0.3 * 10 = 2.9999999999999996
const FLOOR_EPSILON = 1e-9;

/**
 * Round a size down to the venue's precision
 */
export function floorToDecimals(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.floor(value * factor + FLOOR_EPSILON) / factor;
}

export function roundToDecimals(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
