/**
 * RoseTree<T>: a value with any number of child trees.
 *
 * Both traversals are plain recursion over the children; a `Stop` from the
 * step unwinds the recursion directly, so no iterator state is kept per
 * level.
 *
 * @example
 * ```typescript
 * const t = tree(1, tree(2), tree(3, tree(4)));
 * t.preOrder().toArray();  // [1, 2, 3, 4]
 * t.postOrder().toArray(); // [2, 4, 3, 1]
 * ```
 */

import {
  CONTINUE,
  Producer,
  some,
  type IntoProducer,
  type Option,
  type Step,
  type StepResult,
} from "@sluice/core";

export class RoseTree<T> implements IntoProducer<T> {
  constructor(
    readonly value: T,
    readonly children: readonly RoseTree<T>[] = [],
  ) {}

  /** Node first, then each child subtree left to right */
  preOrder(): Producer<T> {
    return new PreOrderProducer(this);
  }

  /** Each child subtree left to right, then the node */
  postOrder(): Producer<T> {
    return new PostOrderProducer(this);
  }

  /** Pre-order */
  intoProducer(): Producer<T> {
    return this.preOrder();
  }

  /** Same shape, every value mapped */
  map<U>(f: (value: T) => U): RoseTree<U> {
    return new RoseTree(
      f(this.value),
      this.children.map((child) => child.map(f)),
    );
  }

  depth(): number {
    let deepest = 0;
    for (const child of this.children) deepest = Math.max(deepest, child.depth());
    return deepest + 1;
  }
}

export function tree<T>(value: T, ...children: RoseTree<T>[]): RoseTree<T> {
  return new RoseTree(value, children);
}

function visitPre<T, R>(node: RoseTree<T>, step: Step<T, R>): StepResult<R> {
  const here = step(node.value);
  if (here.type === "stop") return here;
  for (const child of node.children) {
    const result = visitPre(child, step);
    if (result.type === "stop") return result;
  }
  return CONTINUE;
}

function visitPost<T, R>(node: RoseTree<T>, step: Step<T, R>): StepResult<R> {
  for (const child of node.children) {
    const result = visitPost(child, step);
    if (result.type === "stop") return result;
  }
  return step(node.value);
}

export class PreOrderProducer<T> extends Producer<T> {
  constructor(private readonly root: RoseTree<T>) {
    super();
  }

  override traverse<R>(step: Step<T, R>): StepResult<R> {
    return visitPre(this.root, step);
  }
}

export class PostOrderProducer<T> extends Producer<T> {
  constructor(private readonly root: RoseTree<T>) {
    super();
  }

  override traverse<R>(step: Step<T, R>): StepResult<R> {
    return visitPost(this.root, step);
  }

  /** The root is always visited last */
  override _last(): Option<T> {
    return some(this.root.value);
  }
}
