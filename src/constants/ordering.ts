/**
 * Ordering constants
 */

export const ORDERING = {
  Less: -1,
  Equal: 0,
  Greater: 1,
} as const;
