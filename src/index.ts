/**
 * pathwalk
 *
 * Object-traversal request routing: paths are resolved by walking a tree of
 * resources one segment at a time instead of matching URL patterns.
 *
 * @packageDocumentation
 */

// =============================================================================
// Parameters module - Descriptors, coercers, value bag and binder
// =============================================================================
export * from './params/index.js';

// =============================================================================
// Resource module - Traversal tree and authoring API
// =============================================================================
export * from './resource/index.js';

// =============================================================================
// Resolver module - Method selection and traversal
// =============================================================================
export * from './resolver/index.js';

// =============================================================================
// Site module - Root fallback, rewrites and dispatch
// =============================================================================
export * from './site/index.js';

// =============================================================================
// Request helpers
// =============================================================================
export * from './request/index.js';

// =============================================================================
// Events module
// =============================================================================
export * from './events/index.js';

// =============================================================================
// Outcome classification
// =============================================================================
export * from './types/index.js';

// =============================================================================
// Logging API
// =============================================================================
export {
  type ComponentLogger,
  createLogger,
  getRootLogger,
  type LogFields,
  type LogLevel,
  logDebug,
  logError,
  logInfo,
  logTrace,
  logWarn,
  setRootLogger,
} from './logging/index.js';
