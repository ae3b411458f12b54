import { fromIteratorResult, isNone, none } from "@lookaround/option";

import type { BaseLogger } from "@lookaround/logger";
import type { Option } from "@lookaround/option";

export type PeekableSource<T> = Iterable<T> | Iterator<T>;

// strings are iterable but `in` throws on primitives
const isIterable = <T,>(source: PeekableSource<T>): source is Iterable<T> =>
  typeof source === "string" || Symbol.iterator in source;

const toIterator = <T,>(source: PeekableSource<T>): Iterator<T> =>
  isIterable(source) ? source[Symbol.iterator]() : source;

/**
 * Pull interface over a source iterator that stays exhausted once the
 * source has reported `done`, even if the source would resume later.
 */
export class SourceCursor<T> {
  private readonly inner: Iterator<T>;
  private fused = false;
  private pulled = 0;

  constructor(
    source: PeekableSource<T>,
    private readonly logger: BaseLogger,
  ) {
    this.inner = toIterator(source);
  }

  get exhausted(): boolean {
    return this.fused;
  }

  pull(): Option<T> {
    if (this.fused) {
      return none();
    }

    const item = fromIteratorResult(this.inner.next());
    if (isNone(item)) {
      this.fused = true;
      this.logger.debug("source exhausted", { pulled: this.pulled });
      return item;
    }

    this.pulled++;
    return item;
  }
}
