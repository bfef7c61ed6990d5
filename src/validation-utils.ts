/**
 * Runtime guards for untyped JSON input
 *
 * Why: OpenAPI documents arrive as parsed JSON. Every node is checked before
 * use instead of trusting the declared shape.
 */

/**
 * Checks if a value is a plain JSON object (not null, not an array)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keeps only the string entries of an array-like value
 */
export function stringArray(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}

/**
 * Returns the value if it is a finite number
 */
export function finiteNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}
