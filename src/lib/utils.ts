/**
 * Clamp a number between min and max
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * True for finite whole numbers (pixel coordinates and sizes)
 */
export function isPixel(value: number): boolean {
  return Number.isSafeInteger(value);
}

/**
 * True for whole numbers greater than zero (widths and heights)
 */
export function isPositivePixel(value: number): boolean {
  return isPixel(value) && value > 0;
}
