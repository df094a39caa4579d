/**
 * Type guard utilities for strict boolean expressions
 */

export function isNonNullish<T>(value: T | null | undefined): value is T {
  return value !== null && value !== undefined;
}

export function hasContent(value: string | null | undefined): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Return the first argument with non-blank content, trimmed.
 */
export function firstWithContent(...values: Array<string | null | undefined>): string | undefined {
  for (const value of values) {
    if (hasContent(value)) {
      return value.trim();
    }
  }
  return undefined;
}
