/**
 * One-character lookahead over a producer.
 */

import type { CharProducer } from "@/types/iter";

export class PeekableChars {
  private buffered: number | undefined = undefined;
  private hasBuffered = false;

  constructor(private readonly source: CharProducer) {}

  /**
   * The next code point without consuming it; undefined once exhausted.
   */
  peek(): number | undefined {
    if (!this.hasBuffered) {
      const result = this.source.next();
      this.buffered = result.done ? undefined : result.value;
      this.hasBuffered = true;
    }
    return this.buffered;
  }

  /**
   * Consumes and returns the next code point; undefined once exhausted.
   */
  next(): number | undefined {
    const codePoint = this.peek();
    if (codePoint !== undefined) {
      this.hasBuffered = false;
      this.buffered = undefined;
    }
    return codePoint;
  }
}
