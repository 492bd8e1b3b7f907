/**
 * Character producer types
 *
 * Producers yield Unicode code points one at a time. They are created
 * fresh for every comparison and are consumed exactly once.
 */

export type CharProducer = Iterator<number, void, undefined>;

export type ProducerOptions = {
  /**
   * Fold every emitted letter to lower case: ASCII by range, letters
   * without a table entry by their Unicode lower case
   */
  caseInsensitive: boolean;
};
