/**
 * treeshift core - an ordered-forest cursor for drag-to-reorder outlines
 *
 * The cursor and its operations are pure and synchronous; the reorder
 * service wraps them with validation and logging for UI hosts.
 */

// Forest data
export { tree, leaf, forestSize, forestValues, mapForest, type Tree, type Forest } from './entities/Tree.js';

// Cursor
export { ForestCursor, type Crumb } from './entities/ForestCursor.js';

// Locator, ancestry, flattening
export {
  findInForest,
  findCursorInForest,
  ancestorsOf,
  toFlatForest,
  fromFlatForest,
  toRows,
  fromRows,
  toPlacements,
  type ValuePredicate,
  type Row,
  type Placement,
} from './entities/forest-operations.js';

// Relocation
export {
  moveToAfter,
  moveToFirstChildOf,
  moveToLastChildOf,
  moveToFirstRootPosition,
  type KeyOf,
  type RelocationResult,
} from './entities/relocation.js';

// Row-by-row reordering
export {
  goUp,
  goDown,
  applyVerticalMove,
  type VerticalMove,
  type GoUpResult,
  type GoDownResult,
} from './entities/vertical-moves.js';

// Validation
export {
  findDuplicateKeys,
  validateForest,
  validateMove,
  DEFAULT_MAX_DEPTH,
  type ForestValidationResult,
  type ForestValidationError,
  type ForestValidationWarning,
  type ForestValidationOptions,
} from './entities/ForestValidation.js';

// Outline payloads
export {
  outlineItemSchema,
  outlineTreeSchema,
  outlineForestSchema,
  outlineKey,
  parseOutlineForest,
  parseOutlineJson,
  type OutlineItem,
  type OutlineTree,
} from './schemas/outline.js';

// Service
export {
  OutlineReorderService,
  type OutlineReorderServiceOptions,
  type DropPosition,
} from './services/OutlineReorderService.js';

// Results and errors
export { succeed, fail, type OperationResult } from './types/result.js';
export * from './errors/index.js';

// Configuration and logging
export { cfg, configSchema, type AppConfig } from './utils/config.js';
export { logger, createModuleLogger, createLoggerFactory, LoggerFactory } from './utils/logger.js';
