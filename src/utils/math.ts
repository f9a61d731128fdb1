/**
 * Numeric helpers for dose and cost figures
 */

export function roundTo(value: number, decimals: number = 2): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

export function inRange(value: number, min: number, max: number): boolean {
  return value >= min && value <= max;
}

export function rangesOverlap(a_min: number, a_max: number, b_min: number, b_max: number): boolean {
  return a_min <= b_max && b_min <= a_max;
}
