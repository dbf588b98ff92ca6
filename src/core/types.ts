/**
 * Common utility types
 */

/**
 * A value that may be omitted. Used for "no recorded state" and absent znodes.
 * @example const state: Optional<TableState> = undefined; // table has no record yet
 */
export type Optional<T> = T | undefined;

/**
 * Helper predicate for nullish checks.
 * @example
 * ```typescript
 * if (!isNullish(payload)) {
 *   // payload: Uint8Array
 * }
 * ```
 */
export const isNullish = (v: unknown): v is null | undefined => v == null;
