/**
 * MCP Server Module Exports
 *
 * @module server
 */

// Error handling
export {
  CuratorError,
  isCuratorError,
  formatErrorResponse,
  validationError,
  notFoundError,
  invalidReferenceError,
  unknownDatatypeError,
  propertyNotFoundError,
  duplicateLabelDescriptionError,
  wikiPageOperationError,
  wikibaseApiError,
  backendUnavailableError,
  type ErrorCategory,
} from './errors.js';

// Configuration
export {
  CuratorConfigSchema,
  LOOKUP_BACKENDS,
  loadCuratorConfig,
  type CuratorConfig,
  type LookupBackendMode,
} from './config.js';

// Process context
export { createCuratorContext, closeCuratorContext, type CuratorContext } from './context.js';
