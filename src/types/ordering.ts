/**
 * Ordering type definitions
 */

/**
 * Result of comparing two values.
 *
 * -1 (less), 0 (equal) or 1 (greater), so results plug straight into
 * Array.prototype.sort.
 */
export type Ordering = -1 | 0 | 1;

/**
 * A string comparator returning an Ordering.
 */
export type Comparator = (lhs: string, rhs: string) => Ordering;
