/**
 * cfgtree - Main module exports
 * Public API surface for the library
 */

// Core types
export * from './core/types.js'
// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger } from './utils/logger.js'
export type { LoggerOptions } from './utils/logger.js'
export { readAll, writeAll } from './utils/file-io.js'
export type { WriteOptions } from './utils/file-io.js'

// Format backends
export {
  BackendRegistry,
  createDefaultBackendRegistry,
  JSON_FILENAME_PATTERN,
  YAML_FILENAME_PATTERN,
} from './backends/backend-registry.js'
export type {
  BackendMatcher,
  BackendDescriptor,
  RegisterBackendOptions,
} from './backends/backend-registry.js'
export type { FormatBackend, SaveOptions } from './backends/format-backend.js'
export { JsonBackend } from './backends/json-backend.js'
export { YamlBackend } from './backends/yaml-backend.js'

// Path resolution
export * from './modules/path-resolver/index.js'

// Config accessor
export * from './modules/config-accessor/index.js'
