/**
 * Forest Operations
 *
 * Search, ancestry and flattening utilities built on ForestCursor:
 * - Locator: pre-order search returning a value or a focused cursor
 * - Ancestry: the values above a focus
 * - Flatten/Unflatten: cursor <-> forest, forest <-> indented rows
 * - Placements: the parent/position view handed to persistence
 */

import { InvalidRowsError } from '../errors/cursor.js';
import { fail, succeed, type OperationResult } from '../types/result.js';
import { ForestCursor } from './ForestCursor.js';
import type { Forest, Tree } from './Tree.js';

export type ValuePredicate<V> = (value: V) => boolean;

/**
 * One rendered line of a flattened forest
 */
export interface Row<V> {
  depth: number;
  value: V;
}

/**
 * Where a node sits: its parent's key (null for roots) and its index among
 * its siblings
 */
export interface Placement<K> {
  key: K;
  parentKey: K | null;
  position: number;
}

// Locator
/**
 * Cursor on the first node, in pre-order, whose value satisfies the predicate
 */
export function findCursorInForest<V>(
  predicate: ValuePredicate<V>,
  forest: Forest<V>
): ForestCursor<V> | null {
  let current = fromFlatForest(forest);
  while (current) {
    if (predicate(current.label())) return current;
    current = current.nextInPreOrder();
  }
  return null;
}

/**
 * First value, in pre-order, that satisfies the predicate. Payloads are
 * non-null so that `null` always means no match.
 */
export function findInForest<V extends NonNullable<unknown>>(
  predicate: ValuePredicate<V>,
  forest: Forest<V>
): V | null {
  return findCursorInForest(predicate, forest)?.label() ?? null;
}

// Ancestry
/**
 * Values above the focus, immediate parent first and root last
 */
export function ancestorsOf<V>(cursor: ForestCursor<V>): V[] {
  return cursor.crumbs.map((crumb) => crumb.value);
}

// Flatten / Unflatten
export function toFlatForest<V>(cursor: ForestCursor<V>): Forest<V> {
  return cursor.toForest();
}

export function fromFlatForest<V>(forest: Forest<V>): ForestCursor<V> | null {
  const result = ForestCursor.fromForest(forest);
  return result.success ? result.data : null;
}

/**
 * Pre-order rows with their nesting depth, roots at depth 0
 */
export function toRows<V>(forest: Forest<V>): Row<V>[] {
  const rows: Row<V>[] = [];
  const visit = (node: Tree<V>, depth: number): void => {
    rows.push({ depth, value: node.value });
    for (const child of node.children) {
      visit(child, depth + 1);
    }
  };
  for (const root of forest) {
    visit(root, 0);
  }
  return rows;
}

interface RowNode<V> {
  value: V;
  children: RowNode<V>[];
}

/**
 * Rebuild a forest from pre-order rows. Each row may be at most one level
 * deeper than the row above it.
 */
export function fromRows<V>(rows: readonly Row<V>[]): OperationResult<Forest<V>, InvalidRowsError> {
  const roots: RowNode<V>[] = [];
  const openNodes: RowNode<V>[] = [];

  for (const [index, row] of rows.entries()) {
    if (!Number.isInteger(row.depth) || row.depth < 0) {
      return fail(new InvalidRowsError(`Row ${index} has invalid depth ${row.depth}`, index));
    }
    if (row.depth > openNodes.length) {
      const message =
        index === 0
          ? `Row 0 must be at depth 0 (got ${row.depth})`
          : `Row ${index} at depth ${row.depth} is more than one level below the previous row`;
      return fail(new InvalidRowsError(message, index, { depth: row.depth }));
    }

    openNodes.length = row.depth;
    const node: RowNode<V> = { value: row.value, children: [] };
    const parent = openNodes[row.depth - 1];
    if (parent) {
      parent.children.push(node);
    } else {
      roots.push(node);
    }
    openNodes.push(node);
  }

  return succeed(roots);
}

// Persistence view
export function toPlacements<V, K>(forest: Forest<V>, keyOf: (value: V) => K): Placement<K>[] {
  const placements: Placement<K>[] = [];
  const visit = (siblings: Forest<V>, parentKey: K | null): void => {
    siblings.forEach((node, position) => {
      const key = keyOf(node.value);
      placements.push({ key, parentKey, position });
      visit(node.children, key);
    });
  };
  visit(forest, null);
  return placements;
}
