/**
 * Row-by-row reordering
 *
 * goUp and goDown translate "move this row one step up/down" into one of the
 * relocation primitives plus its anchor. They only classify; applying the
 * move is left to applyVerticalMove or the caller.
 */

import { succeed } from '../types/result.js';
import type { ForestCursor } from './ForestCursor.js';
import {
  moveToAfter,
  moveToFirstChildOf,
  moveToFirstRootPosition,
  type KeyOf,
  type RelocationResult,
} from './relocation.js';

export type VerticalMove<V> =
  | { type: 'first-root' }
  | { type: 'first-child-of'; anchor: V }
  | { type: 'after'; anchor: V };

export type GoUpResult<V> = VerticalMove<V>;

export type GoDownResult<V> = Exclude<VerticalMove<V>, { type: 'first-root' }>;

/**
 * The relocation that moves the focus one step up, or null when it already
 * sits on the first row.
 *
 * A node with a previous sibling indents into that sibling's last visible
 * descendant. A first child outdents: it becomes the grandparent's first
 * child, or, when the parent is a root, lands after the previous root or at
 * the front of the roots.
 */
export function goUp<V>(cursor: ForestCursor<V>): GoUpResult<V> | null {
  const previous = cursor.previousSibling();
  if (previous) {
    return { type: 'first-child-of', anchor: previous.lastDescendant().label() };
  }

  const parent = cursor.parent();
  if (!parent) return null;

  const grandparent = parent.parent();
  if (grandparent) {
    return { type: 'first-child-of', anchor: grandparent.label() };
  }

  const previousRoot = parent.previousSibling();
  if (previousRoot) {
    return { type: 'after', anchor: previousRoot.label() };
  }

  return { type: 'first-root' };
}

/**
 * The relocation that moves the focus one step down, or null when it is the
 * last root.
 *
 * A node with a next sibling drops into it as its first child; the last child
 * of a parent outdents to follow that parent. goUp reverses the first case
 * when the node has no previous sibling.
 */
export function goDown<V>(cursor: ForestCursor<V>): GoDownResult<V> | null {
  const next = cursor.nextSibling();
  if (next) {
    return { type: 'first-child-of', anchor: next.label() };
  }

  const parent = cursor.parent();
  if (!parent) return null;

  return { type: 'after', anchor: parent.label() };
}

export function applyVerticalMove<V, K>(
  move: VerticalMove<V>,
  keyOf: KeyOf<V, K>,
  cursor: ForestCursor<V>
): RelocationResult<V> {
  switch (move.type) {
    case 'first-root':
      return succeed(moveToFirstRootPosition(cursor));
    case 'first-child-of':
      return moveToFirstChildOf(keyOf(move.anchor), keyOf, cursor);
    case 'after':
      return moveToAfter(keyOf(move.anchor), keyOf, cursor);
  }
}
