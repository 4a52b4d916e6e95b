/**
 * Bridging contracts
 *
 * `IntoProducer` turns a container into a producer; `Collector` builds a
 * container back from the elements of a traversal. Concrete containers live
 * in @sluice/collections; only arrays are handled here.
 */

import type { Producer } from "./producer.js";

/**
 * Anything that can hand out a producer over its elements, in its natural
 * order. Every `Producer` is one (it returns itself).
 */
export interface IntoProducer<T> {
  intoProducer(): Producer<T>;
}

/**
 * Receives elements in traversal order, then produces the container.
 */
export interface Builder<A, R> {
  accept(item: A): void;
  finish(): R;
}

/**
 * Starts a fresh `Builder` for each `collect` call.
 */
export interface Collector<A, R> {
  begin(): Builder<A, R>;
}

export function toProducer<T>(source: IntoProducer<T>): Producer<T> {
  return source.intoProducer();
}

export function isIntoProducer<T>(value: IntoProducer<T> | Iterable<T>): value is IntoProducer<T> {
  return (
    typeof value === "object" &&
    value !== null &&
    "intoProducer" in value &&
    typeof value.intoProducer === "function"
  );
}

export function arrayCollector<A>(): Collector<A, A[]> {
  return {
    begin: () => {
      const items: A[] = [];
      return {
        accept: (item) => {
          items.push(item);
        },
        finish: () => items,
      };
    },
  };
}
