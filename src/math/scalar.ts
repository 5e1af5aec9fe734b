/**
 * Scalar utilities for range math
 */

/**
 * Clamp a value into [min, max].
 * Non-finite input collapses to min.
 */
export function clamp(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) return min;
  if (value <= min) return min;
  if (value >= max) return max;
  return value;
}

export function isFiniteNumber(v: unknown): v is number {
  return typeof v === "number" && Number.isFinite(v);
}

/**
 * Count the digits after the decimal point, including exponent notation
 * such as 1e-7.
 */
export function decimalPlaces(value: number): number {
  if (!Number.isFinite(value)) return 0;
  const text = String(value).toLowerCase();
  const expIndex = text.indexOf("e-");
  if (expIndex >= 0) {
    const frac = Number.parseInt(text.slice(expIndex + 2), 10);
    return Number.isFinite(frac) ? frac : 0;
  }
  const dotIndex = text.indexOf(".");
  if (dotIndex < 0) return 0;
  return text.length - dotIndex - 1;
}

export function roundToPrecision(value: number, precision: number): number {
  if (precision <= 0) return Math.round(value);
  const factor = 10 ** precision;
  return Math.round(value * factor) / factor;
}

/**
 * Position of value within [min, max] as a 0-1 ratio.
 * An empty range reports 0.
 */
export function ratio(value: number, min: number, max: number): number {
  const span = max - min;
  if (span <= 0) return 0;
  return clamp((value - min) / span, 0, 1);
}
