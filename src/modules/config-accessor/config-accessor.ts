/**
 * ConfigAccessor interface — public contract for reading and writing one
 * configuration file.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigAccessor()` from config-accessor-impl.ts.
 */

import type { AccessMode, BackendId, TreeMapping, TreeNode } from '../../core/types.js'
import type {
  BackendMatcher,
  BackendRegistry,
  RegisterBackendOptions,
} from '../../backends/backend-registry.js'
import type { FormatBackend } from '../../backends/format-backend.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/**
 * Options for creating a config accessor.
 */
export interface ConfigAccessorOptions {
  /** Path of the config file; its suffix selects the format backend */
  filename: string
  /** Disable set() (and save()). Wins over `rw` when both are given. */
  ro?: boolean
  /** Enable save() */
  rw?: boolean
  /** Dense output on save, for formats that support it (default: false) */
  compact?: boolean
  /** Registry to dispatch through (default: a fresh registry with JSON and YAML) */
  registry?: BackendRegistry
}

/**
 * Options for ConfigAccessor.get().
 */
export interface GetOptions {
  /**
   * Returned when the query does not resolve. Counts as supplied whenever
   * the key is present, even with an undefined value.
   */
  default?: TreeNode
  /** Throw RequiredValueMissingError when the query does not resolve and no default is given */
  required?: boolean
}

// ---------------------------------------------------------------------------
// ConfigAccessor interface
// ---------------------------------------------------------------------------

/**
 * Uniform query access to a JSON, YAML or custom-format config file.
 *
 * The file is loaded lazily on first data access and cached thereafter.
 */
export interface ConfigAccessor {
  /** Config file path given at construction */
  readonly filename: string

  /** Effective access mode derived from the `ro` and `rw` options */
  readonly mode: AccessMode

  /** Whether save() writes dense output */
  readonly compact: boolean

  /** Backend id recorded by the last successful load, or null */
  readonly format: BackendId | null

  /** Whether the file has been loaded */
  readonly isLoaded: boolean

  /**
   * Look up a dotted path, or the first resolving path of a list.
   * @returns the located value, `options.default`, or undefined
   * @throws {RequiredValueMissingError} if nothing resolves, no default is given and `required` is set
   */
  get(query: string | readonly string[], options?: GetOptions): TreeNode | undefined

  /**
   * Whether a top-level key exists.
   */
  has(key: string): boolean

  /**
   * Assign a top-level key. Nested paths are not interpreted.
   * @throws {ReadOnlyViolationError} in read-only mode
   */
  set(key: string, value: TreeNode): void

  /**
   * Load the file if it has not been loaded yet and return its tree.
   * @throws {NoMatchingBackendError} if no backend handles the filename
   * @throws {InvalidConfigRootError} if the root is not a mapping
   */
  load(): TreeMapping

  /**
   * Discard the cached tree (and any unsaved changes) and load again.
   */
  reload(): TreeMapping

  /**
   * Write the tree back through the backend that loaded it.
   * @throws {ReadOnlyViolationError} unless the accessor is read-write
   * @throws {NoFormatSetError} if nothing has been loaded
   */
  save(): void

  /**
   * Add a format backend to this accessor's registry.
   * Only affects loads that have not happened yet.
   */
  registerBackend(match: BackendMatcher, backend: FormatBackend, options?: RegisterBackendOptions): void
}
