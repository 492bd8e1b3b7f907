/**
 * foldsort — total-order string comparison with ASCII folding
 *
 * Non-ASCII characters compare like their closest ASCII representation
 * ("á" like "a", "ß" like "ss"). Natural mode compares digit runs by
 * value ("50" < "100") and skips punctuation ("f-5" next to "f5").
 * Strings that fold to the same ASCII fall back to a code point
 * comparison of the originals, so the order is always total.
 *
 * @example
 * import { naturalLexicalCmp, stringSort } from "foldsort";
 *
 * stringSort(["ß", "é", "100", "hello", "world", "50", ".", "B!"], naturalLexicalCmp);
 * // [".", "50", "100", "B!", "é", "hello", "ß", "world"]
 */

export type {
  CharProducer,
  Comparator,
  CompareOptions,
  LexicalCompareOptions,
  NaturalCompareOptions,
  Ordering,
  OrderingMode,
  ProducerOptions,
  ResolvedCompareOptions,
  ResolvedLexicalCompareOptions,
  ResolvedNaturalCompareOptions,
  SortKey,
  TransliterationTable,
} from "./types";
export { ORDERING } from "./constants/ordering";
export {
  codePointCmp,
  compare,
  compareCharStreams,
  compareNatural,
  createComparator,
  lexicalCaseSensitiveCmp,
  lexicalCmp,
  lexicalOnlyAlnumCmp,
  naturalLexicalCaseSensitiveCmp,
  naturalCmp,
  naturalLexicalCmp,
  onlyAlnumCmp,
  resolveCompareOptions,
} from "./compare";
export {
  collectCodePoints,
  iterateCaseFolded,
  iterateCodePoints,
  iterateTransliterated,
  onlyAlphanumeric,
  PeekableChars,
  transliterate,
} from "./iter";
export {
  getTransliterationTable,
  loadTransliterationTable,
  transliterateChar,
} from "./transliteration";
export { TransliterationTableError } from "./utils/transliterationValidation";
export {
  compareSortKeys,
  sortBy,
  sortByCachedKey,
  sortByKey,
  stringSort,
  stringSortBy,
  toSortKey,
} from "./sort";
