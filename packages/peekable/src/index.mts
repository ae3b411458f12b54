/**
 * @lookaround/peekable - iterator adapter with forward and backward peek
 *
 * @packageDocumentation
 */

export { Peekable, peekable } from "./peekable.mjs";
export type { PeekableState } from "./peekable.mjs";
export { SourceCursor } from "./source-cursor.mjs";
export type { PeekableSource } from "./source-cursor.mjs";
export {
  DEFAULT_BACKWARD_CAPACITY,
  DEFAULT_FORWARD_CAPACITY,
  defaultClone,
  resolvePeekableOptions,
} from "./config.mjs";
export type {
  CloneFn,
  PeekableOptions,
  ResolvedPeekableOptions,
} from "./config.mjs";
export {
  CloneError,
  InvalidPeekableConfigError,
  PeekableError,
} from "./errors.mjs";
export type { Option } from "@lookaround/option";
export { isNone, isSome } from "@lookaround/option";
