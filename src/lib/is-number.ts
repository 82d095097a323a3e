/**
 * Type guard to check if a value is a valid number.
 *
 * @example
 * ```typescript
 * isNumber(42);    // true
 * isNumber(NaN);   // false
 * isNumber('123'); // false
 * ```
 */
export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && !isNaN(value);
}
