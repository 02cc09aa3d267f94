import type pino from 'pino';
import {
  findCursorInForest,
  toPlacements,
  toRows,
  type Placement,
  type Row,
} from '../entities/forest-operations.js';
import type { ForestCursor } from '../entities/ForestCursor.js';
import { validateForest } from '../entities/ForestValidation.js';
import {
  moveToAfter,
  moveToFirstChildOf,
  moveToFirstRootPosition,
  moveToLastChildOf,
  type KeyOf,
  type RelocationResult,
} from '../entities/relocation.js';
import type { Forest } from '../entities/Tree.js';
import { applyVerticalMove, goDown, goUp, type VerticalMove } from '../entities/vertical-moves.js';
import { type InvalidOperationError, TargetNotFoundError } from '../errors/cursor.js';
import { DuplicateKeyError } from '../errors/service.js';
import { fail, succeed, type OperationResult } from '../types/result.js';
import { cfg } from '../utils/config.js';
import { createModuleLogger } from '../utils/logger.js';

/**
 * OutlineReorderService - holds the current forest of a reorderable outline
 * and applies drag/keyboard edits to it one at a time.
 *
 * Each edit reads the held forest, relocates one subtree, and stores the
 * result before returning, so callers feeding events in order never merge
 * concurrent edits.
 */

export interface OutlineReorderServiceOptions {
  logger?: pino.Logger;
  /** Depth past which construction logs a deep nesting warning */
  maxDepth?: number;
}

export type DropPosition = 'first' | 'last';

export class OutlineReorderService<V, K> {
  private constructor(
    private _forest: Forest<V>,
    private readonly keyOf: KeyOf<V, K>,
    private readonly logger: pino.Logger
  ) {}

  /**
   * Validate a forest and wrap it in a service. Fails with DuplicateKeyError
   * when a key addresses more than one node.
   */
  static create<V, K>(
    forest: Forest<V>,
    keyOf: KeyOf<V, K>,
    options: OutlineReorderServiceOptions = {}
  ): OperationResult<OutlineReorderService<V, K>, DuplicateKeyError> {
    const logger = options.logger ?? createModuleLogger('OutlineReorderService');

    const validation = validateForest(forest, keyOf, {
      maxDepth: options.maxDepth ?? cfg.OUTLINE_MAX_DEPTH,
    });
    if (!validation.isValid) {
      const error = new DuplicateKeyError(
        validation.errors.map((entry) => entry.key),
        'create'
      );
      logger.warn({ error: error.toJSON() }, error.message);
      return fail(error);
    }
    for (const warning of validation.warnings) {
      logger.warn({ key: warning.key, ...warning.details }, warning.message);
    }

    return succeed(new OutlineReorderService(forest, keyOf, logger));
  }

  get forest(): Forest<V> {
    return this._forest;
  }

  rows(): Row<V>[] {
    return toRows(this._forest);
  }

  placements(): Placement<K>[] {
    return toPlacements(this._forest, this.keyOf);
  }

  /**
   * Move a node one step up. Succeeds with null when it is already on the
   * first row.
   */
  moveUp(key: K): OperationResult<VerticalMove<V> | null, InvalidOperationError> {
    return this.step('moveUp', key, goUp);
  }

  /**
   * Move a node one step down. Succeeds with null when it is the last root.
   */
  moveDown(key: K): OperationResult<VerticalMove<V> | null, InvalidOperationError> {
    return this.step('moveDown', key, goDown);
  }

  dropAfter(key: K, targetKey: K): RelocationResult<V> {
    return this.relocate('dropAfter', key, (cursor) => moveToAfter(targetKey, this.keyOf, cursor));
  }

  dropInto(key: K, targetKey: K, position: DropPosition = 'last'): RelocationResult<V> {
    return this.relocate('dropInto', key, (cursor) =>
      position === 'first'
        ? moveToFirstChildOf(targetKey, this.keyOf, cursor)
        : moveToLastChildOf(targetKey, this.keyOf, cursor)
    );
  }

  dropAtTop(key: K): RelocationResult<V> {
    return this.relocate('dropAtTop', key, (cursor) => succeed(moveToFirstRootPosition(cursor)));
  }

  private step(
    operation: string,
    key: K,
    classify: (cursor: ForestCursor<V>) => VerticalMove<V> | null
  ): OperationResult<VerticalMove<V> | null, InvalidOperationError> {
    const cursor = this.focus(key);
    if (!cursor) {
      return this.reject(new TargetNotFoundError(key, operation));
    }

    const move = classify(cursor);
    if (!move) {
      this.logger.debug({ operation, key }, `${operation}: ${String(key)} is already at the edge`);
      return succeed(null);
    }

    const result = applyVerticalMove(move, this.keyOf, cursor);
    if (!result.success) {
      return this.reject(result.error);
    }

    this.commit(operation, key, result.data);
    return succeed(move);
  }

  private relocate(
    operation: string,
    key: K,
    move: (cursor: ForestCursor<V>) => RelocationResult<V>
  ): RelocationResult<V> {
    const cursor = this.focus(key);
    if (!cursor) {
      return this.reject(new TargetNotFoundError(key, operation));
    }

    const result = move(cursor);
    if (!result.success) {
      return this.reject(result.error);
    }

    this.commit(operation, key, result.data);
    return result;
  }

  private focus(key: K): ForestCursor<V> | null {
    return findCursorInForest((value) => this.keyOf(value) === key, this._forest);
  }

  private commit(operation: string, key: K, cursor: ForestCursor<V>): void {
    this._forest = cursor.toForest();
    this.logger.debug({ operation, key, depth: cursor.depth }, `${operation} applied to ${String(key)}`);
  }

  private reject<E extends InvalidOperationError>(error: E): { success: false; error: E } {
    this.logger.warn({ error: error.toJSON() }, error.message);
    return fail(error);
  }
}
