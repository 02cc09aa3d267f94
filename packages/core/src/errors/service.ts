/**
 * Service-specific error classes
 *
 * Errors raised by the reorder service and the outline loaders
 */

import { TreeshiftError } from './base.js';

/**
 * Base class for service-related errors
 */
export abstract class ServiceError extends TreeshiftError {
  constructor(
    message: string,
    service: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(message, `service.${service}`, operation, context);
  }
}

/**
 * Error thrown when a forest carries the same key on more than one node
 */
export class DuplicateKeyError extends ServiceError {
  constructor(
    public readonly keys: readonly unknown[],
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Duplicate node keys: ${keys.map(String).join(', ')}`,
      'reorder',
      operation,
      { ...context, keys }
    );
  }
}

/**
 * Error returned when persisted outline data fails schema validation
 */
export class OutlineParseError extends ServiceError {
  constructor(
    message: string,
    public readonly validationErrors: Array<{ field: string; message: string; code: string }>,
    context?: Record<string, unknown>
  ) {
    super(message, 'outline', 'parse', { ...context, validationErrors });
  }
}
