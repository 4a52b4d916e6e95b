/**
 * Collectors: build containers from the elements of a traversal.
 *
 * ```typescript
 * from(words).collect(groupBy((w: string) => w.length)); // Map<number, string[]>
 * from(pairs).collect(toHashMap(eqPoint, hashPoint));
 * ```
 *
 * Map-like collectors keep the last value for a repeated key.
 */

import type { Builder, Collector } from "@sluice/core";
import type { Eq, Hash } from "@sluice/std";
import { HashMap } from "./hash-map.js";
import { HashSet } from "./hash-set.js";

function collector<A, R>(begin: () => Builder<A, R>): Collector<A, R> {
  return { begin };
}

export function toSet<A>(): Collector<A, Set<A>> {
  return collector<A, Set<A>>(() => {
    const set = new Set<A>();
    return {
      accept: (item) => {
        set.add(item);
      },
      finish: () => set,
    };
  });
}

export function toMap<K, V>(): Collector<readonly [K, V], Map<K, V>> {
  return collector<readonly [K, V], Map<K, V>>(() => {
    const map = new Map<K, V>();
    return {
      accept: ([k, v]) => {
        map.set(k, v);
      },
      finish: () => map,
    };
  });
}

export function toHashSet<K>(eq: Eq<K>, hash: Hash<K>): Collector<K, HashSet<K>> {
  return collector<K, HashSet<K>>(() => {
    const set = new HashSet(eq, hash);
    return {
      accept: (item) => {
        set.add(item);
      },
      finish: () => set,
    };
  });
}

export function toHashMap<K, V>(eq: Eq<K>, hash: Hash<K>): Collector<readonly [K, V], HashMap<K, V>> {
  return collector<readonly [K, V], HashMap<K, V>>(() => {
    const map = new HashMap<K, V>(eq, hash);
    return {
      accept: ([k, v]) => {
        map.set(k, v);
      },
      finish: () => map,
    };
  });
}

/** Plain object from `[key, value]` pairs */
export function toRecord<V>(): Collector<readonly [string, V], Record<string, V>> {
  return collector<readonly [string, V], Record<string, V>>(() => {
    const record: Record<string, V> = {};
    return {
      accept: ([k, v]) => {
        record[k] = v;
      },
      finish: () => record,
    };
  });
}

/** Concatenate string elements with no separator */
export function toText(): Collector<string, string> {
  return collector<string, string>(() => {
    const parts: string[] = [];
    return {
      accept: (item) => {
        parts.push(item);
      },
      finish: () => parts.join(""),
    };
  });
}

/**
 * Bucket elements by `key`. Buckets appear in order of first occurrence and
 * keep traversal order inside.
 */
export function groupBy<A, K>(key: (item: A) => K): Collector<A, Map<K, A[]>> {
  return collector<A, Map<K, A[]>>(() => {
    const groups = new Map<K, A[]>();
    return {
      accept: (item) => {
        const k = key(item);
        const group = groups.get(k);
        if (group === undefined) groups.set(k, [item]);
        else group.push(item);
      },
      finish: () => groups,
    };
  });
}

/** `[matching, rest]`, each in traversal order */
export function partition<A>(predicate: (item: A) => boolean): Collector<A, [A[], A[]]> {
  return collector<A, [A[], A[]]>(() => {
    const yes: A[] = [];
    const no: A[] = [];
    return {
      accept: (item) => {
        (predicate(item) ? yes : no).push(item);
      },
      finish: () => [yes, no],
    };
  });
}
