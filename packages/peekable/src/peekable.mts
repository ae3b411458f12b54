/**
 * Iterator adapter with multi-item forward peek and backward peek
 *
 * Upcoming items are pulled from the source on demand into a fixed-size
 * lookahead buffer; every advanced item is cloned into a fixed-size history
 * buffer, newest first. Neither buffer ever grows. Any position the adapter
 * cannot serve (past the end, before the start, beyond a capacity) is None.
 *
 * @example
 * ```typescript
 * const iter = new Peekable([10, 11, 12, 13], {
 *   forwardCapacity: 2,
 *   backwardCapacity: 2,
 * });
 *
 * iter.next();          // { done: false, value: 10 }
 * iter.peek();          // Some(11)
 * iter.peekNth(1);      // Some(12)
 * iter.peekNth(2);      // None, forward capacity is 2
 * iter.advance();       // Some(11)
 * iter.peekBwdNth(1);   // Some(10)
 * ```
 */

import { CircularBuffer } from "@lookaround/circular-buffer";
import { isNone, isSome, none } from "@lookaround/option";

import { resolvePeekableOptions } from "./config.mjs";
import { CloneError } from "./errors.mjs";
import { SourceCursor } from "./source-cursor.mjs";

import type { BaseLogger } from "@lookaround/logger";
import type { Option } from "@lookaround/option";
import type { CloneFn, PeekableOptions } from "./config.mjs";
import type { PeekableSource } from "./source-cursor.mjs";

/**
 * - `fresh`: nothing advanced yet
 * - `active`: at least one item advanced, more may follow
 * - `exhausted`: source done and lookahead drained; terminal
 */
export type PeekableState = "fresh" | "active" | "exhausted";

const isIndex = (value: number): boolean =>
  Number.isSafeInteger(value) && value >= 0;

export class Peekable<T> implements IterableIterator<T> {
  private readonly cursor: SourceCursor<T>;
  private readonly forward: CircularBuffer<T>;
  private readonly backward: CircularBuffer<T>;
  private readonly clone: CloneFn<T>;
  private readonly logger: BaseLogger;
  private advancedCount = 0;

  /**
   * Takes over `source`. Iterating the source elsewhere afterwards
   * makes the lookahead stale.
   *
   * @throws InvalidPeekableConfigError when a capacity is not a
   * non-negative integer or `clone`/`logger` are malformed
   */
  constructor(source: PeekableSource<T>, options?: PeekableOptions<T>) {
    const resolved = resolvePeekableOptions(options);

    this.logger = resolved.logger;
    this.clone = resolved.clone;
    this.cursor = new SourceCursor(source, resolved.logger);
    this.forward = new CircularBuffer<T>(resolved.forwardCapacity);
    this.backward = new CircularBuffer<T>(resolved.backwardCapacity);

    this.logger.debug("peekable created", {
      forwardCapacity: resolved.forwardCapacity,
      backwardCapacity: resolved.backwardCapacity,
    });
  }

  static from<T>(
    source: PeekableSource<T>,
    options?: PeekableOptions<T>,
  ): Peekable<T> {
    return new Peekable(source, options);
  }

  [Symbol.iterator](): Peekable<T> {
    return this;
  }

  /**
   * Advance and return the next item.
   * Drains the lookahead before pulling from the source.
   *
   * @throws CloneError when the clone function throws; the item is
   * still consumed but not recorded in history
   */
  advance(): Option<T> {
    const buffered = this.forward.popFront();
    const item = isSome(buffered) ? buffered : this.cursor.pull();

    if (isSome(item)) {
      this.record(item.value);
    }

    return item;
  }

  next(): IteratorResult<T, undefined> {
    const item = this.advance();
    return isSome(item)
      ? { done: false, value: item.value }
      : { done: true, value: undefined };
  }

  /**
   * Peek the item `index` steps ahead; 0 is what the next advance returns.
   * Pulls from the source only as far as needed. Repeated peeks with no
   * advance in between return the same item.
   *
   * None when `index` is at or beyond the forward capacity, or the source
   * ends first.
   */
  peekFwdNth(index: number): Option<T> {
    if (!isIndex(index)) {
      return none();
    }

    if (index >= this.forward.getCapacity()) {
      this.logger.trace("forward peek beyond capacity", {
        index,
        forwardCapacity: this.forward.getCapacity(),
      });
      return none();
    }

    while (this.forward.length <= index) {
      const pulled = this.cursor.pull();
      if (isNone(pulled)) {
        return pulled;
      }
      this.forward.pushBack(pulled.value);
    }

    return this.forward.get(index);
  }

  peekFwd(): Option<T> {
    return this.peekFwdNth(0);
  }

  /**
   * Alias for {@link peekFwd}.
   */
  peek(): Option<T> {
    return this.peekFwd();
  }

  /**
   * Alias for {@link peekFwdNth}.
   */
  peekNth(index: number): Option<T> {
    return this.peekFwdNth(index);
  }

  /**
   * Peek the item advanced `index` steps ago; 0 is the most recent one.
   * Never touches the source.
   *
   * None when fewer than `index + 1` items have been advanced, or
   * `index` is at or beyond the backward capacity.
   *
   * The value is the history entry itself, shared by every later peek at
   * that position. Treat it as read-only; copy it before changing it.
   */
  peekBwdNth(index: number): Option<T> {
    return isIndex(index) ? this.backward.get(index) : none();
  }

  peekBwd(): Option<T> {
    return this.peekBwdNth(0);
  }

  get state(): PeekableState {
    if (this.cursor.exhausted && this.forward.isEmpty()) {
      return "exhausted";
    }
    return this.advancedCount === 0 ? "fresh" : "active";
  }

  get forwardCapacity(): number {
    return this.forward.getCapacity();
  }

  get backwardCapacity(): number {
    return this.backward.getCapacity();
  }

  /** Items pulled from the source but not yet advanced. */
  get buffered(): number {
    return this.forward.length;
  }

  get historyLength(): number {
    return this.backward.length;
  }

  get advanced(): number {
    return this.advancedCount;
  }

  private record(item: T): void {
    this.advancedCount++;

    if (this.backward.getCapacity() === 0) {
      return;
    }

    let copy: T;
    try {
      copy = this.clone(item);
    } catch (error) {
      this.logger.error("clone into history failed", {
        advanced: this.advancedCount,
        error,
      });
      throw new CloneError(error, item);
    }
    this.backward.pushFront(copy);
  }
}

export const peekable = <T,>(
  source: PeekableSource<T>,
  options?: PeekableOptions<T>,
): Peekable<T> => new Peekable(source, options);
