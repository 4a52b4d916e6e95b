/**
 * Step results
 *
 * Every step function returns one of two variants: keep going, possibly
 * carrying an updated accumulator, or stop with a final value. Adapters
 * pass a `Stop` outward untouched and deliver no further elements once one
 * has been seen.
 */

export interface Continue<C> {
  readonly type: "continue";
  readonly value: C;
}

export interface Stop<B> {
  readonly type: "stop";
  readonly value: B;
}

/**
 * `B` is the type carried by a stop, `C` the type carried by a continue.
 */
export type StepResult<B, C = undefined> = Continue<C> | Stop<B>;

/**
 * Caller logic invoked once per element.
 */
export type Step<T, R> = (item: T) => StepResult<R>;

/**
 * Shared continue-without-payload, returned per element without allocating.
 */
export const CONTINUE: Continue<undefined> = Object.freeze({ type: "continue", value: undefined });

export function proceed<C>(value: C): Continue<C> {
  return { type: "continue", value };
}

export function stop<B>(value: B): Stop<B> {
  return { type: "stop", value };
}

export function isStop<B, C>(result: StepResult<B, C>): result is Stop<B> {
  return result.type === "stop";
}

export function isContinue<B, C>(result: StepResult<B, C>): result is Continue<C> {
  return result.type === "continue";
}
