/**
 * Precomputed sort keys
 *
 * A key stores the folded form of a string next to the original,
 * so sorting n strings folds each one once instead of once per
 * comparison. Comparing keys gives exactly the order `compare` gives on
 * the originals, provided both keys were built with the same options.
 */

import type { CompareOptions, Ordering, SortKey } from "@/types";
import { ORDERING } from "@/constants/ordering";
import { collectCodePoints, iterateCodePoints } from "@/iter/transliterate";
import {
  comparePrimary,
  createProducer,
  resolveCompareOptions,
} from "@/compare/comparators";
import { codePointCmp } from "@/compare/tieBreak";

/**
 * @example
 * toSortKey("Straße") // { original: "Straße", folded: "strasse" }
 */
export function toSortKey(text: string, options?: CompareOptions): SortKey {
  return {
    original: text,
    folded: collectCodePoints(
      createProducer(text, resolveCompareOptions(options)),
    ),
  };
}

export function compareSortKeys(
  lhs: SortKey,
  rhs: SortKey,
  options?: CompareOptions,
): Ordering {
  const primary = comparePrimary(
    iterateCodePoints(lhs.folded),
    iterateCodePoints(rhs.folded),
    resolveCompareOptions(options),
  );
  return primary !== ORDERING.Equal
    ? primary
    : codePointCmp(lhs.original, rhs.original);
}

/**
 * Returns a new array of `items` ordered by `key(item)`, computing each
 * sort key once.
 */
export function sortByCachedKey<T>(
  items: readonly T[],
  key: (item: T) => string,
  options?: CompareOptions,
): T[] {
  const resolved = resolveCompareOptions(options);
  const decorated = items.map((item) => ({
    item,
    sortKey: toSortKey(key(item), resolved),
  }));
  decorated.sort((lhs, rhs) =>
    compareSortKeys(lhs.sortKey, rhs.sortKey, resolved),
  );
  return decorated.map(({ item }) => item);
}

/**
 * Returns a new, sorted copy of `items`.
 *
 * @example
 * sortByKey(["item10", "item2"], { mode: "natural" }) // ["item2", "item10"]
 */
export function sortByKey(
  items: readonly string[],
  options?: CompareOptions,
): string[] {
  return sortByCachedKey(items, (item) => item, options);
}
