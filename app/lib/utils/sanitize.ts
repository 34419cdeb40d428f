/**
 * Numeric Sanitization Utilities
 *
 * Used by the override resolver (untrusted CSV cells) and by the physics step
 * (clamping battery charge and gene fields).
 */

export function clamp(v: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, v));
}

export function clamp01(x: number): number {
  return clamp(x, 0, 1);
}

export interface FiniteBounds {
  min?: number;
  max?: number;
  /** exclusive lower bound, for fields that must be strictly positive */
  minExclusive?: boolean;
}

/**
 * Returns x when it is a finite number inside the bounds, otherwise null.
 * Numeric strings are not coerced: callers decide how raw cells are parsed.
 */
export function sanitizeFinite(x: unknown, bounds?: FiniteBounds): number | null {
  if (typeof x !== "number" || !Number.isFinite(x)) {
    return null;
  }
  const min = bounds?.min;
  const max = bounds?.max;

  if (min !== undefined) {
    if (bounds?.minExclusive ? x <= min : x < min) {
      return null;
    }
  }
  if (max !== undefined && x > max) {
    return null;
  }
  return x;
}

/**
 * Parse one CSV cell. Empty cells are absent (undefined); numeric text becomes a
 * number; anything else stays as the raw trimmed string for the caller to reject.
 */
export function parseNumericCell(raw: string | undefined): number | string | undefined {
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  if (trimmed === "") return undefined;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : trimmed;
}

export function describeBounds(bounds: FiniteBounds): string {
  const lo = bounds.min === undefined ? "(-inf" : `${bounds.minExclusive ? "(" : "["}${bounds.min}`;
  const hi = bounds.max === undefined ? "inf)" : `${bounds.max}]`;
  return `${lo}, ${hi}`;
}
