import { EmptyForestError } from '../errors/cursor.js';
import { fail, succeed, type OperationResult } from '../types/result.js';
import { tree, type Forest, type Tree } from './Tree.js';

/**
 * One level of context above the focus: the ancestor's value and the
 * ancestor's own siblings at its level.
 */
export interface Crumb<V> {
  readonly value: V;
  /** Left siblings of the ancestor, closest last */
  readonly before: readonly Tree<V>[];
  /** Right siblings of the ancestor, closest first */
  readonly after: readonly Tree<V>[];
}

/**
 * Immutable zipper over a forest
 *
 * Key principles:
 * - Immutable API: every step and edit returns a new cursor
 * - No back-pointers: the path to the roots is a list of crumbs, folded
 *   outwards to rebuild the forest
 * - Structural absence is `null`, never an exception
 */
export class ForestCursor<V> {
  private constructor(
    private readonly _focus: Tree<V>,
    private readonly _before: readonly Tree<V>[],
    private readonly _after: readonly Tree<V>[],
    private readonly _crumbs: readonly Crumb<V>[]
  ) {}

  /**
   * Focus the first root of a forest
   */
  static fromForest<V>(forest: Forest<V>): OperationResult<ForestCursor<V>, EmptyForestError> {
    const [first, ...rest] = forest;
    if (!first) {
      return fail(new EmptyForestError());
    }
    return succeed(ForestCursor.fromRoots(first, rest));
  }

  /**
   * Focus `first` as the first root, followed by the `following` roots
   */
  static fromRoots<V>(first: Tree<V>, following: Forest<V> = []): ForestCursor<V> {
    return new ForestCursor(first, [], following, []);
  }

  // Core getters
  get tree(): Tree<V> {
    return this._focus;
  }

  get depth(): number {
    return this._crumbs.length;
  }

  get isRoot(): boolean {
    return this._crumbs.length === 0;
  }

  get crumbs(): readonly Crumb<V>[] {
    return this._crumbs;
  }

  label(): V {
    return this._focus.value;
  }

  // Navigation methods
  parent(): ForestCursor<V> | null {
    const [crumb, ...rest] = this._crumbs;
    if (!crumb) return null;

    const rebuilt = tree(crumb.value, [...this._before, this._focus, ...this._after]);
    return new ForestCursor(rebuilt, crumb.before, crumb.after, rest);
  }

  firstChild(): ForestCursor<V> | null {
    return this.childAt(0);
  }

  lastChild(): ForestCursor<V> | null {
    return this.childAt(this._focus.children.length - 1);
  }

  nextSibling(): ForestCursor<V> | null {
    const [next, ...rest] = this._after;
    if (!next) return null;
    return new ForestCursor(next, [...this._before, this._focus], rest, this._crumbs);
  }

  previousSibling(): ForestCursor<V> | null {
    const previous = this._before[this._before.length - 1];
    if (!previous) return null;
    return new ForestCursor(
      previous,
      this._before.slice(0, -1),
      [this._focus, ...this._after],
      this._crumbs
    );
  }

  /**
   * The row below this one in the pre-order flattening
   */
  nextInPreOrder(): ForestCursor<V> | null {
    const child = this.firstChild();
    if (child) return child;

    let current: ForestCursor<V> | null = this;
    while (current) {
      const sibling = current.nextSibling();
      if (sibling) return sibling;
      current = current.parent();
    }
    return null;
  }

  /**
   * The row above this one in the pre-order flattening
   */
  previousInPreOrder(): ForestCursor<V> | null {
    const sibling = this.previousSibling();
    if (sibling) return sibling.lastDescendant();
    return this.parent();
  }

  /**
   * Follow last children down to a leaf; the focus itself when it has none
   */
  lastDescendant(): ForestCursor<V> {
    let current: ForestCursor<V> = this;
    let child = current.lastChild();
    while (child) {
      current = child;
      child = current.lastChild();
    }
    return current;
  }

  /**
   * The root whose tree contains the focus
   */
  root(): ForestCursor<V> {
    let current: ForestCursor<V> = this;
    let parent = current.parent();
    while (parent) {
      current = parent;
      parent = current.parent();
    }
    return current;
  }

  // Structural edits
  /**
   * Insert a subtree as the next sibling of the focus and focus it
   */
  insertAfter(subtree: Tree<V>): ForestCursor<V> {
    return new ForestCursor(subtree, [...this._before, this._focus], this._after, this._crumbs);
  }

  /**
   * Insert a subtree as the first child of the focus and focus it
   */
  prependChild(subtree: Tree<V>): ForestCursor<V> {
    const crumb: Crumb<V> = { value: this._focus.value, before: this._before, after: this._after };
    return new ForestCursor(subtree, [], this._focus.children, [crumb, ...this._crumbs]);
  }

  /**
   * Insert a subtree as the last child of the focus and focus it
   */
  appendChild(subtree: Tree<V>): ForestCursor<V> {
    const crumb: Crumb<V> = { value: this._focus.value, before: this._before, after: this._after };
    return new ForestCursor(subtree, this._focus.children, [], [crumb, ...this._crumbs]);
  }

  /**
   * The forest without the focused subtree
   */
  remove(): Forest<V> {
    const [crumb, ...rest] = this._crumbs;
    if (!crumb) {
      return [...this._before, ...this._after];
    }
    const parentTree = tree(crumb.value, [...this._before, ...this._after]);
    return new ForestCursor(parentTree, crumb.before, crumb.after, rest).toForest();
  }

  // Serialization methods
  /**
   * Rebuild the whole forest, focus included
   */
  toForest(): Forest<V> {
    const top = this.root();
    return [...top._before, top._focus, ...top._after];
  }

  private childAt(index: number): ForestCursor<V> | null {
    const children = this._focus.children;
    const child = children[index];
    if (!child) return null;

    const crumb: Crumb<V> = { value: this._focus.value, before: this._before, after: this._after };
    return new ForestCursor(
      child,
      children.slice(0, index),
      children.slice(index + 1),
      [crumb, ...this._crumbs]
    );
  }
}
