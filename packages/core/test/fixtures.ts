import { findCursorInForest } from '../src/entities/forest-operations.js';
import type { ForestCursor } from '../src/entities/ForestCursor.js';
import { tree, type Forest, type Tree } from '../src/entities/Tree.js';

/**
 * Shorthand tree builder for test forests
 */
export function t<V>(value: V, ...children: Tree<V>[]): Tree<V> {
  return tree(value, children);
}

export const identity = <V>(value: V): V => value;

/**
 * Two roots, two levels below each:
 * 0[-1[-10,-20], 1[10,20]], 100[-100[-110,-120], 101[110,120]]
 */
export const exampleForest: Forest<number> = [
  t(0, t(-1, t(-10), t(-20)), t(1, t(10), t(20))),
  t(100, t(-100, t(-110), t(-120)), t(101, t(110), t(120))),
];

export const exampleShape = '0(-1(-10 -20) 1(10 20)) 100(-100(-110 -120) 101(110 120))';

/**
 * Compact one-line rendering of a forest: `value(children...)`
 */
export function show<V>(forest: Forest<V>): string {
  const render = (node: Tree<V>): string =>
    node.children.length > 0
      ? `${String(node.value)}(${node.children.map(render).join(' ')})`
      : String(node.value);
  return forest.map(render).join(' ');
}

/**
 * Cursor on the first node with the given value; fails the test when absent
 */
export function focusOn<V>(forest: Forest<V>, value: V): ForestCursor<V> {
  const cursor = findCursorInForest((candidate) => candidate === value, forest);
  if (!cursor) {
    throw new Error(`Test forest has no node ${String(value)}`);
  }
  return cursor;
}
