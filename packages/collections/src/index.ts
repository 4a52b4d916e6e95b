/**
 * @sluice/collections
 *
 * Containers that turn into producers, and collectors that turn producers
 * back into containers.
 */

export { HashSet } from "./hash-set.js";
export { HashMap } from "./hash-map.js";
export { RoseTree, PreOrderProducer, PostOrderProducer, tree } from "./tree.js";
export {
  toSet,
  toMap,
  toHashSet,
  toHashMap,
  toRecord,
  toText,
  groupBy,
  partition,
} from "./collectors.js";
