/**
 * Numeric helpers shared by the statistics modules
 */

/**
 * Round to a fixed number of decimal places
 */
export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
