/**
 * Cursor-specific error classes
 *
 * Errors for contract violations against the forest cursor: a focus
 * requested on an empty forest, a relocation whose target cannot be used,
 * or an indented row listing that does not describe a forest.
 */

import { TreeshiftError } from './base.js';

/**
 * Base class for cursor-related errors
 */
export abstract class CursorError extends TreeshiftError {
  constructor(message: string, operation?: string, context?: Record<string, unknown>) {
    super(message, 'cursor', operation, context);
  }
}

/**
 * Returned when a cursor is requested on a forest without roots
 */
export class EmptyForestError extends CursorError {
  constructor(operation = 'fromForest') {
    super('Cannot focus a cursor on an empty forest', operation);
  }
}

/**
 * Base class for relocations that cannot be carried out as asked
 */
export abstract class InvalidOperationError extends CursorError {
  constructor(
    message: string,
    operation: string,
    public readonly targetKey: unknown,
    context?: Record<string, unknown>
  ) {
    super(message, operation, { ...context, targetKey });
  }
}

/**
 * Returned when no node in the forest carries the target key
 */
export class TargetNotFoundError extends InvalidOperationError {
  constructor(targetKey: unknown, operation: string) {
    super(`No node found for key ${String(targetKey)}`, operation, targetKey);
  }
}

/**
 * Returned when the target lies inside the subtree being moved
 */
export class CyclicMoveError extends InvalidOperationError {
  constructor(
    targetKey: unknown,
    operation: string,
    public readonly focusKey: unknown
  ) {
    super(
      `Cannot move ${String(focusKey)} relative to ${String(targetKey)}: target is inside the moved subtree`,
      operation,
      targetKey,
      { focusKey }
    );
  }
}

/**
 * Returned when an indented row listing cannot be rebuilt into a forest
 */
export class InvalidRowsError extends CursorError {
  constructor(
    message: string,
    public readonly rowIndex: number,
    context?: Record<string, unknown>
  ) {
    super(message, 'fromRows', { ...context, rowIndex });
  }
}
