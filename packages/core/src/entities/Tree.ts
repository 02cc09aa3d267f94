/**
 * Tree / Forest - plain immutable data for ordered multi-way trees
 *
 * Children are owned values, so a tree can never contain itself. All
 * navigation and editing goes through ForestCursor or the forest operations.
 */

export interface Tree<V> {
  readonly value: V;
  readonly children: readonly Tree<V>[];
}

/**
 * Ordered roots, in display order
 */
export type Forest<V> = readonly Tree<V>[];

export function tree<V>(value: V, children: readonly Tree<V>[] = []): Tree<V> {
  return { value, children };
}

export function leaf<V>(value: V): Tree<V> {
  return { value, children: [] };
}

export function forestSize<V>(forest: Forest<V>): number {
  let count = 0;
  for (const root of forest) {
    count += 1 + forestSize(root.children);
  }
  return count;
}

/**
 * Values in pre-order: each node before its children, siblings left to right
 */
export function forestValues<V>(forest: Forest<V>): V[] {
  const values: V[] = [];
  const visit = (node: Tree<V>): void => {
    values.push(node.value);
    for (const child of node.children) {
      visit(child);
    }
  };
  for (const root of forest) {
    visit(root);
  }
  return values;
}

/**
 * Replace the value of every node, keeping the shape
 */
export function mapForest<V, W>(forest: Forest<V>, fn: (value: V) => W): Forest<W> {
  return forest.map((node) => tree(fn(node.value), mapForest(node.children, fn)));
}
