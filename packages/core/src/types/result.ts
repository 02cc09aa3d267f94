import type { TreeshiftError } from '../errors/base.js';

/**
 * Outcome of an operation that can be refused as an invalid operation.
 *
 * Structural absence (no parent, no row above) is `null`, never a failed
 * result; a failed result always means the caller asked for something the
 * forest cannot do.
 */
export type OperationResult<T, E extends TreeshiftError = TreeshiftError> =
  | { success: true; data: T }
  | { success: false; error: E };

export function succeed<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function fail<E extends TreeshiftError>(error: E): { success: false; error: E } {
  return { success: false, error };
}
