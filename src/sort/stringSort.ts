/**
 * Sort wrappers
 *
 * Thin conveniences over Array.prototype.sort, which is stable.
 * All of them sort in place and return the same array.
 */

import type { Comparator } from "@/types/ordering";

/**
 * @example
 * stringSort(["b", "á", "a"], lexicalCmp) // ["a", "á", "b"]
 */
export function stringSort<T extends string>(items: T[], cmp: Comparator): T[] {
  return items.sort(cmp);
}

/**
 * Compares `map(item)` instead of the item, e.g. to ignore leading
 * whitespace.
 *
 * @example
 * stringSortBy([" b", "a"], lexicalCmp, (s) => s.trimStart()) // ["a", " b"]
 */
export function stringSortBy<T extends string>(
  items: T[],
  cmp: Comparator,
  map: (item: string) => string,
): T[] {
  return items.sort((lhs, rhs) => cmp(map(lhs), map(rhs)));
}

/**
 * Sorts arbitrary items by a string key.
 *
 * The key is recomputed on every comparison; see sortByCachedKey for
 * expensive keys.
 */
export function sortBy<T>(
  items: T[],
  cmp: Comparator,
  key: (item: T) => string,
): T[] {
  return items.sort((lhs, rhs) => cmp(key(lhs), key(rhs)));
}
