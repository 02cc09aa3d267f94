import { findCursorInForest, toRows } from './forest-operations.js';
import type { KeyOf } from './relocation.js';
import type { Forest } from './Tree.js';

/**
 * ForestValidation - Utilities for checking a forest before it is edited
 *
 * Provides validation functions for:
 * - Duplicate key detection (keys must address exactly one node)
 * - Deep nesting warnings
 * - Pre-validation of drop targets
 */

export interface ForestValidationResult {
  isValid: boolean;
  errors: ForestValidationError[];
  warnings: ForestValidationWarning[];
}

export interface ForestValidationError {
  type: 'duplicate_key' | 'focus_not_found' | 'target_not_found' | 'cycle';
  key: unknown;
  message: string;
  details?: Record<string, unknown>;
}

export interface ForestValidationWarning {
  type: 'deep_nesting';
  key: unknown;
  message: string;
  details?: Record<string, unknown>;
}

export interface ForestValidationOptions {
  maxDepth?: number;
}

export const DEFAULT_MAX_DEPTH = 10;

/**
 * Keys carried by more than one node, in the order their first repeat appears
 */
export function findDuplicateKeys<V, K>(forest: Forest<V>, keyOf: KeyOf<V, K>): K[] {
  const seen = new Set<K>();
  const duplicates: K[] = [];

  for (const { value } of toRows(forest)) {
    const key = keyOf(value);
    if (seen.has(key) && !duplicates.includes(key)) {
      duplicates.push(key);
    }
    seen.add(key);
  }

  return duplicates;
}

export function validateForest<V, K>(
  forest: Forest<V>,
  keyOf: KeyOf<V, K>,
  options: ForestValidationOptions = {}
): ForestValidationResult {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;

  const errors: ForestValidationError[] = findDuplicateKeys(forest, keyOf).map((key) => ({
    type: 'duplicate_key',
    key,
    message: `Duplicate key found: "${String(key)}"`,
  }));

  const warnings: ForestValidationWarning[] = [];
  for (const { depth, value } of toRows(forest)) {
    if (depth > maxDepth) {
      const key = keyOf(value);
      warnings.push({
        type: 'deep_nesting',
        key,
        message: `Node "${String(key)}" exceeds maximum depth of ${maxDepth} (current: ${depth})`,
        details: { maxDepth, currentDepth: depth },
      });
    }
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Validates a drop before it is attempted, so a drag UI can refuse targets
 * inside the dragged subtree while the pointer is still moving
 */
export function validateMove<V, K>(
  focusKey: K,
  targetKey: K,
  forest: Forest<V>,
  keyOf: KeyOf<V, K>
): ForestValidationResult {
  const errors: ForestValidationError[] = [];
  const warnings: ForestValidationWarning[] = [];

  const focus = findCursorInForest((value) => keyOf(value) === focusKey, forest);
  const target = findCursorInForest((value) => keyOf(value) === targetKey, forest);

  if (!focus) {
    errors.push({
      type: 'focus_not_found',
      key: focusKey,
      message: `Node to move not found: "${String(focusKey)}"`,
    });
  }

  if (!target) {
    errors.push({
      type: 'target_not_found',
      key: targetKey,
      message: `Target not found: "${String(targetKey)}"`,
    });
  }

  if (!focus || !target) {
    return { isValid: false, errors, warnings };
  }

  const insideFocus = findCursorInForest((value) => keyOf(value) === targetKey, [focus.tree]);
  if (insideFocus) {
    errors.push({
      type: 'cycle',
      key: focusKey,
      message: `Moving "${String(focusKey)}" next to "${String(targetKey)}" would place it inside itself`,
      details: { focusKey, targetKey },
    });
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings,
  };
}
