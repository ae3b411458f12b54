import { silentLogger } from "@lookaround/logger";

import { OptionsValidator } from "./validators.mjs";

import type { BaseLogger } from "@lookaround/logger";

export const DEFAULT_FORWARD_CAPACITY = 1;
export const DEFAULT_BACKWARD_CAPACITY = 1;

export type CloneFn<T> = (item: T) => T;

export interface PeekableOptions<T> {
  /**
   * How many upcoming items can be peeked. 0 disables forward peek.
   * @default 1
   */
  forwardCapacity?: number;
  /**
   * How many past items are kept for backward peek. 0 disables backward peek.
   * @default 1
   */
  backwardCapacity?: number;
  /**
   * Produces the independent copy that is kept in history.
   * @default defaultClone
   */
  clone?: CloneFn<T>;
  /**
   * @default silentLogger
   */
  logger?: BaseLogger;
}

export interface ResolvedPeekableOptions<T> {
  readonly forwardCapacity: number;
  readonly backwardCapacity: number;
  readonly clone: CloneFn<T>;
  readonly logger: BaseLogger;
}

/**
 * Primitives and functions are returned as-is; objects are deep-copied
 * with `structuredClone`, which drops prototypes. Pass your own `clone`
 * for class instances.
 */
export const defaultClone = <T,>(item: T): T =>
  typeof item === "object" && item !== null ? structuredClone(item) : item;

const validator: OptionsValidator = new OptionsValidator("Peekable");

export const resolvePeekableOptions = <T,>(
  options: PeekableOptions<T> = {},
): ResolvedPeekableOptions<T> => {
  const {
    forwardCapacity = DEFAULT_FORWARD_CAPACITY,
    backwardCapacity = DEFAULT_BACKWARD_CAPACITY,
    clone = defaultClone,
    logger = silentLogger,
  } = options;

  validator.requireCapacity("forwardCapacity", forwardCapacity);
  validator.requireCapacity("backwardCapacity", backwardCapacity);
  validator.requireFunction("clone", clone);
  validator.requireLogger("logger", logger);

  return { forwardCapacity, backwardCapacity, clone, logger };
};
