/**
 * Utility functions used across the winmatch tooling
 */

/**
 * Check if value is a plain object (not null, not array)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Stable JSON stringification for consistent output
 */
export function stableStringify(value: unknown, space?: number): string {
  return JSON.stringify(
    value,
    (_key, val: unknown) => {
      if (!isPlainObject(val)) {
        return val;
      }
      const sorted: Record<string, unknown> = {};
      for (const k of Object.keys(val).sort()) {
        sorted[k] = val[k];
      }
      return sorted;
    },
    space
  );
}

/**
 * Message of an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
