/**
 * Shared Error Utilities
 *
 * Export barrel for domain-specific error utilities.
 */

export {
  TRANSFORM_ERROR_CODES,
  TRANSFORM_ERROR_MESSAGES,
  isTransformErrorCode,
  TransformError,
  type TransformErrorCode,
} from './transform.js';
