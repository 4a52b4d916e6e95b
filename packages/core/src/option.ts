/**
 * Option and Result
 *
 * Elements pushed through a producer may be `undefined` or `null`
 * themselves, so an absent result is `null` and a present one is boxed:
 *
 * ```typescript
 * some(undefined)  // { value: undefined }
 * none             // null
 * ```
 */

import { NoValueError } from "./errors.js";

// ============================================================================
// Option
// ============================================================================

export type Defined<A> = { readonly value: A };
export type None = null;
export type Option<A> = Defined<A> | None;

export const none: Option<never> = null;

export function some<A>(value: A): Defined<A> {
  return { value };
}

export function isSome<A>(option: Option<A>): option is Defined<A> {
  return option !== null;
}

export function isNone<A>(option: Option<A>): option is None {
  return option === null;
}

export function getOrElse<A, B>(option: Option<A>, fallback: () => B): A | B {
  return option === null ? fallback() : option.value;
}

/**
 * @throws NoValueError on `None`
 */
export function unwrap<A>(option: Option<A>): A {
  if (option === null) throw new NoValueError();
  return option.value;
}

export function mapOption<A, B>(option: Option<A>, f: (a: A) => B): Option<B> {
  return option === null ? none : some(f(option.value));
}

/**
 * Unbox to `A | undefined`; loses the distinction for producers of `undefined`.
 */
export function toUndefined<A>(option: Option<A>): A | undefined {
  return option === null ? undefined : option.value;
}

// ============================================================================
// Result
// ============================================================================

export type Ok<A> = { readonly ok: true; readonly value: A };
export type Err<E> = { readonly ok: false; readonly error: E };
export type Result<A, E> = Ok<A> | Err<E>;

export function ok<A>(value: A): Ok<A> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}
