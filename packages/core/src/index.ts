/**
 * @sluice/core: push-based internal iteration
 *
 * A producer pushes its elements into a step function instead of handing
 * out an iterator. Implement one method, `traverse`, and get the full set of
 * adapters and terminal operations, with exact short-circuiting at any
 * nesting depth.
 *
 * @example
 * ```typescript
 * import { from, range, ordNumber } from "@sluice/core";
 *
 * from([[1, 2], [], [3]])
 *   .flatMap((xs) => from(xs))
 *   .take(2)
 *   .toArray(); // [1, 2]; the producer for [3] is never built
 *
 * range(0, 10).filter((x) => x % 3 === 0).maxByKey((x) => -x, ordNumber); // some(0)
 * ```
 */

export type { Continue, Stop, StepResult, Step } from "./step.js";
export { CONTINUE, proceed, stop, isStop, isContinue } from "./step.js";

export type { Defined, None, Option, Ok, Err, Result } from "./option.js";
export {
  none,
  some,
  isSome,
  isNone,
  getOrElse,
  unwrap,
  mapOption,
  toUndefined,
  ok,
  err,
} from "./option.js";

export {
  Producer,
  MapProducer,
  FilterProducer,
  FilterMapProducer,
  FlatMapProducer,
  TakeProducer,
  SkipProducer,
  TakeWhileProducer,
  SkipWhileProducer,
  StepByProducer,
  EnumerateProducer,
  InspectProducer,
  ChainProducer,
  ScanProducer,
} from "./producer.js";

export type { Emit } from "./sources.js";
export {
  ArrayProducer,
  RangeProducer,
  RepeatProducer,
  IterableProducer,
  FnProducer,
  SuccessorsProducer,
  from,
  range,
  fromFn,
  successors,
  empty,
  once,
  repeatN,
} from "./sources.js";

export type { IntoProducer, Builder, Collector } from "./bridge.js";
export { toProducer, isIntoProducer, arrayCollector } from "./bridge.js";

export type { SluiceConfig, GuardsConfig, ReuseGuardMode } from "./config.js";
export { config } from "./config.js";

export type { Logger, LogLevel } from "./logger.js";
export { createLogger, logger } from "./logger.js";

export type { SluiceErrorCode } from "./errors.js";
export { SluiceError, ProducerConsumedError, NoValueError, ConfigError } from "./errors.js";

export { invariant, unreachable, assertCount } from "./safety.js";

export type { Eq, Ord, Ordering, Hash } from "@sluice/std";
export {
  ordNumber,
  ordString,
  ordBoolean,
  ordBigInt,
  ordDate,
  ordBy,
  reverseOrd,
  fromCompare,
} from "@sluice/std";
