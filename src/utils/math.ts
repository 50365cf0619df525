/**
 * Shared math utility functions.
 *
 * Pure functions with zero external dependencies.
 */

/**
 * Clamp a numeric value to the inclusive range [min, max].
 *
 * Replaces the common pattern `Math.max(min, Math.min(max, value))`.
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/** Clamp to the unit interval [0, 1]. */
export function clamp01(value: number): number {
  return clamp(value, 0, 1);
}
