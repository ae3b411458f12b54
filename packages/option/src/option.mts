/**
 * @module option
 * @description Option type for results that may be unavailable.
 * Every peek and pop in this project answers with an Option rather than
 * `undefined`, so a sequence that yields `undefined` as a real item still
 * reads unambiguously.
 *
 * @example
 * ```typescript
 * import { some, none, isSome, getOrElse } from '@lookaround/option';
 *
 * const next = some(42);
 * if (isSome(next)) {
 *   console.log(next.value);
 * }
 *
 * const label = getOrElse(() => 'end of input')(none());
 * ```
 */

/**
 * A value that is either present (Some) or unavailable (None).
 *
 * @category Core Types
 */
export type Option<T> = Some<T> | None;

/**
 * @category Core Types
 */
export interface Some<T> {
  readonly _tag: 'Some';
  readonly value: T;
}

/**
 * @category Core Types
 */
export interface None {
  readonly _tag: 'None';
}

const NONE: None = Object.freeze({ _tag: 'None' });

/**
 * Wraps a value in Some. `undefined` and `null` are wrapped as-is.
 *
 * @category Constructors
 * @example
 * some(undefined); // => { _tag: 'Some', value: undefined }
 */
export const some = <T,>(value: T): Option<T> => ({
  _tag: 'Some',
  value,
});

/**
 * The None variant. Always the same frozen instance.
 *
 * @category Constructors
 */
export const none = (): Option<never> => NONE;

/**
 * Creates an Option from a nullable value.
 *
 * @category Constructors
 * @example
 * fromNullable(map.get(key));
 */
export const fromNullable = <T,>(value: T | null | undefined): Option<T> =>
  value === null || value === undefined ? none() : some(value);

/**
 * Bridges the iterator protocol: a yielded result becomes Some,
 * a finished one becomes None (its return value is dropped).
 *
 * @category Constructors
 * @example
 * const it = [1, 2][Symbol.iterator]();
 * fromIteratorResult(it.next()); // => Some(1)
 */
export const fromIteratorResult = <T, TReturn = unknown>(
  result: IteratorResult<T, TReturn>,
): Option<T> => (result.done ? none() : some(result.value));

/**
 * @category Type Guards
 */
export const isSome = <T,>(option: Option<T>): option is Some<T> =>
  option._tag === 'Some';

/**
 * @category Type Guards
 */
export const isNone = <T,>(option: Option<T>): option is None =>
  option._tag === 'None';

/**
 * Maps a function over the value in Some, does nothing for None.
 *
 * @category Transformations
 * @example
 * map((n: number) => n * 2)(iter.peek()); // => Some(doubled) or None
 */
export const map =
  <A, B>(fn: (value: A) => B) =>
  (option: Option<A>): Option<B> =>
    isSome(option) ? some(fn(option.value)) : none();

/**
 * Returns the value if Some, otherwise the fallback's result.
 *
 * @category Extractors
 * @example
 * getOrElse(() => 0)(iter.peekBwd());
 */
export const getOrElse =
  <T,>(fallback: () => T) =>
  (option: Option<T>): T =>
    isSome(option) ? option.value : fallback();

/**
 * Unwraps to `T | undefined`. Loses the Some(undefined)/None distinction,
 * so only use it where items are never `undefined`.
 *
 * @category Extractors
 */
export const toUndefined = <T,>(option: Option<T>): T | undefined =>
  isSome(option) ? option.value : undefined;
