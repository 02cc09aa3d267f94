/**
 * Relocation primitives
 *
 * Each primitive detaches the focused subtree as a unit and reattaches it
 * relative to a target node addressed by key. The returned cursor stays on
 * the moved node. Targets inside the moved subtree are refused, since the
 * subtree cannot become its own descendant.
 */

import {
  CyclicMoveError,
  TargetNotFoundError,
  type InvalidOperationError,
} from '../errors/cursor.js';
import { fail, succeed, type OperationResult } from '../types/result.js';
import { findCursorInForest } from './forest-operations.js';
import { ForestCursor } from './ForestCursor.js';
import type { Tree } from './Tree.js';

export type KeyOf<V, K> = (value: V) => K;

export type RelocationResult<V> = OperationResult<ForestCursor<V>, InvalidOperationError>;

type Attach<V> = (target: ForestCursor<V>, subtree: Tree<V>) => ForestCursor<V>;

function relocate<V, K>(
  operation: string,
  targetKey: K,
  keyOf: KeyOf<V, K>,
  cursor: ForestCursor<V>,
  attach: Attach<V>
): RelocationResult<V> {
  const matchesTarget = (value: V): boolean => keyOf(value) === targetKey;
  const subtree = cursor.tree;

  if (findCursorInForest(matchesTarget, [subtree])) {
    return fail(new CyclicMoveError(targetKey, operation, keyOf(subtree.value)));
  }

  const target = findCursorInForest(matchesTarget, cursor.remove());
  if (!target) {
    return fail(new TargetNotFoundError(targetKey, operation));
  }

  return succeed(attach(target, subtree));
}

/**
 * Move the focus to be the immediate next sibling of the target, at the
 * target's level
 */
export function moveToAfter<V, K>(
  targetKey: K,
  keyOf: KeyOf<V, K>,
  cursor: ForestCursor<V>
): RelocationResult<V> {
  return relocate('moveToAfter', targetKey, keyOf, cursor, (target, subtree) =>
    target.insertAfter(subtree)
  );
}

/**
 * Move the focus to be the target's first child; existing children follow it
 */
export function moveToFirstChildOf<V, K>(
  targetKey: K,
  keyOf: KeyOf<V, K>,
  cursor: ForestCursor<V>
): RelocationResult<V> {
  return relocate('moveToFirstChildOf', targetKey, keyOf, cursor, (target, subtree) =>
    target.prependChild(subtree)
  );
}

/**
 * Move the focus to be the target's last child
 */
export function moveToLastChildOf<V, K>(
  targetKey: K,
  keyOf: KeyOf<V, K>,
  cursor: ForestCursor<V>
): RelocationResult<V> {
  return relocate('moveToLastChildOf', targetKey, keyOf, cursor, (target, subtree) =>
    target.appendChild(subtree)
  );
}

/**
 * Move the focus to the front of the root list. Never fails.
 */
export function moveToFirstRootPosition<V>(cursor: ForestCursor<V>): ForestCursor<V> {
  return ForestCursor.fromRoots(cursor.tree, cursor.remove());
}
