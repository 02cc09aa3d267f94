/**
 * Centralized error handling for treeshift
 */

// Base error classes and utilities
export {
  TreeshiftError,
  isTreeshiftError,
  extractErrorDetails,
} from './base.js';

// Cursor errors
export {
  CursorError,
  EmptyForestError,
  InvalidOperationError,
  TargetNotFoundError,
  CyclicMoveError,
  InvalidRowsError,
} from './cursor.js';

// Service errors
export { ServiceError, DuplicateKeyError, OutlineParseError } from './service.js';
