/**
 * ConfigAccessor implementation — lazy loading through a backend registry,
 * dotted-path queries, and the read/write policy gate.
 */

import { z } from 'zod'
import { createLogger } from '../../utils/logger.js'
import {
  ConfigError,
  InvalidConfigRootError,
  NoFormatSetError,
  ReadOnlyViolationError,
  RequiredValueMissingError,
} from '../../core/errors.js'
import {
  describeNode,
  isTreeMapping,
  type AccessMode,
  type BackendId,
  type TreeMapping,
  type TreeNode,
} from '../../core/types.js'
import {
  BackendRegistry,
  createDefaultBackendRegistry,
  type BackendMatcher,
  type RegisterBackendOptions,
} from '../../backends/backend-registry.js'
import type { FormatBackend } from '../../backends/format-backend.js'
import { resolveFirst } from '../path-resolver/path-resolver.js'
import type { ConfigAccessor, ConfigAccessorOptions, GetOptions } from './config-accessor.js'

const logger = createLogger('config-accessor')

// ---------------------------------------------------------------------------
// Option validation
// ---------------------------------------------------------------------------

export const ConfigAccessorOptionsSchema = z.object({
  filename: z.string().min(1, 'filename must not be empty'),
  ro: z.boolean().default(false),
  rw: z.boolean().default(false),
  compact: z.boolean().default(false),
  registry: z.instanceof(BackendRegistry).optional(),
})

function parseOptions(options: ConfigAccessorOptions): z.infer<typeof ConfigAccessorOptionsSchema> {
  const result = ConfigAccessorOptionsSchema.safeParse(options)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`)
      .join('\n')
    throw new ConfigError(`Invalid config accessor options:\n${issues}`, {
      issues: result.error.issues,
    })
  }
  return result.data
}

// ---------------------------------------------------------------------------
// ConfigAccessorImpl
// ---------------------------------------------------------------------------

export class ConfigAccessorImpl implements ConfigAccessor {
  readonly filename: string
  readonly compact: boolean
  private readonly _ro: boolean
  private readonly _rw: boolean
  private readonly _registry: BackendRegistry
  private _tree: TreeMapping | null = null
  private _format: BackendId | null = null

  constructor(options: ConfigAccessorOptions) {
    const parsed = parseOptions(options)
    this.filename = parsed.filename
    this.compact = parsed.compact
    this._ro = parsed.ro
    this._rw = parsed.rw
    this._registry = parsed.registry ?? createDefaultBackendRegistry()
  }

  get mode(): AccessMode {
    if (this._ro) return 'read-only'
    if (this._rw) return 'read-write'
    return 'in-memory'
  }

  get format(): BackendId | null {
    return this._format
  }

  get isLoaded(): boolean {
    return this._tree !== null
  }

  get(query: string | readonly string[], options: GetOptions = {}): TreeNode | undefined {
    const tree = this.load()
    const chain = typeof query === 'string' ? [query] : query
    const result = resolveFirst(tree, chain)
    if (result.found) {
      return result.value
    }

    if ('default' in options) {
      return options.default
    }
    if (options.required) {
      throw new RequiredValueMissingError(result.query, this.filename)
    }
    logger.trace({ filename: this.filename, query: result.query }, 'Config value not found')
    return undefined
  }

  has(key: string): boolean {
    return Object.hasOwn(this.load(), key)
  }

  set(key: string, value: TreeNode): void {
    if (this._ro) {
      throw new ReadOnlyViolationError('Attempt to change readonly config.', {
        filePath: this.filename,
        key,
      })
    }
    // Own data property, so keys such as '__proto__' are stored like any other
    Object.defineProperty(this.load(), key, {
      value,
      enumerable: true,
      writable: true,
      configurable: true,
    })
  }

  load(): TreeMapping {
    if (this._tree !== null) {
      return this._tree
    }

    const backendId = this._registry.resolve(this.filename)
    const backend = this._registry.get(backendId)
    const tree = backend.load(this.filename)
    if (!isTreeMapping(tree)) {
      throw new InvalidConfigRootError(this.filename, describeNode(tree))
    }

    this._tree = tree
    this._format = backendId
    logger.debug({ filename: this.filename, format: backendId }, 'Config loaded')
    return tree
  }

  reload(): TreeMapping {
    this._tree = null
    this._format = null
    return this.load()
  }

  save(): void {
    if (this.mode !== 'read-write') {
      throw new ReadOnlyViolationError("Attempt to save file without 'rw' mode enabled.", {
        filePath: this.filename,
        mode: this.mode,
      })
    }

    const format = this._format
    if (format === null || this._tree === null) {
      throw new NoFormatSetError(this.filename)
    }

    this._registry.get(format).save(this.filename, this._tree, { compact: this.compact })
    logger.debug({ filename: this.filename, format, compact: this.compact }, 'Config saved')
  }

  registerBackend(
    match: BackendMatcher,
    backend: FormatBackend,
    options: RegisterBackendOptions = {}
  ): void {
    if (this.isLoaded) {
      logger.warn(
        { filename: this.filename, backend: backend.id },
        'Backend registered after load; it applies from the next reload'
      )
    }
    this._registry.register(match, backend, options)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigAccessor instance.
 *
 * @example
 * const config = createConfigAccessor({ filename: 'settings.yaml', rw: true })
 * const name = config.get('companies.acme.users.0.name')
 * config.set('updated', true)
 * config.save()
 */
export function createConfigAccessor(options: ConfigAccessorOptions): ConfigAccessor {
  return new ConfigAccessorImpl(options)
}
