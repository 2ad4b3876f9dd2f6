/**
 * BackendRegistry — ordered filename → format backend dispatch
 *
 * Holds an ordered list of (match, backend id) descriptors plus the backend
 * implementation for each id. Given a filename, the first descriptor whose
 * match accepts it wins. Every accessor owns its own registry; there is no
 * process-wide list.
 */

import { NoMatchingBackendError } from '../core/errors.js'
import type { BackendId } from '../core/types.js'
import type { FormatBackend } from './format-backend.js'
import { JsonBackend } from './json-backend.js'
import { YamlBackend } from './yaml-backend.js'

/** Filename test: a pattern or a predicate */
export type BackendMatcher = RegExp | ((filename: string) => boolean)

/**
 * A single dispatch rule.
 */
export interface BackendDescriptor {
  /** Test applied to the filename */
  match: BackendMatcher
  /** Backend selected when the test passes */
  backendId: BackendId
}

/**
 * Options for BackendRegistry.register().
 */
export interface RegisterBackendOptions {
  /**
   * Where the new descriptor goes in match order.
   * 'append' (default) keeps existing descriptors ahead of it;
   * 'prepend' makes it the first one tried.
   */
  position?: 'append' | 'prepend'
}

/** Pattern matching JSON config filenames (.json, .jsn) */
export const JSON_FILENAME_PATTERN = /\.jso?n$/i

/** Pattern matching YAML config filenames (.yaml, .yml) */
export const YAML_FILENAME_PATTERN = /\.ya?ml$/i

function matches(matcher: BackendMatcher, filename: string): boolean {
  if (matcher instanceof RegExp) {
    // Reset state so global/sticky patterns test from the start every time
    matcher.lastIndex = 0
    return matcher.test(filename)
  }
  return matcher(filename)
}

/**
 * BackendRegistry manages format dispatch for one accessor.
 *
 * Usage:
 * ```typescript
 * const registry = createDefaultBackendRegistry()
 * registry.register(/\.ini$/i, new IniBackend())
 * const backend = registry.get(registry.resolve('settings.ini'))
 * ```
 */
export class BackendRegistry {
  private readonly _backends = new Map<BackendId, FormatBackend>()
  private readonly _descriptors: BackendDescriptor[] = []

  /**
   * Register a backend and the filename test that selects it.
   * Re-registering an id replaces the stored implementation.
   */
  register(
    match: BackendMatcher,
    backend: FormatBackend,
    options: RegisterBackendOptions = {}
  ): void {
    this._backends.set(backend.id, backend)
    const descriptor: BackendDescriptor = { match, backendId: backend.id }
    if (options.position === 'prepend') {
      this._descriptors.unshift(descriptor)
    } else {
      this._descriptors.push(descriptor)
    }
  }

  /**
   * Return the id of the first backend whose test accepts the filename.
   * @throws {NoMatchingBackendError} if no descriptor matches
   */
  resolve(filename: string): BackendId {
    for (const descriptor of this._descriptors) {
      if (matches(descriptor.match, filename)) {
        return descriptor.backendId
      }
    }
    throw new NoMatchingBackendError(filename, {
      registered: this._descriptors.map((d) => d.backendId),
    })
  }

  /**
   * Retrieve a registered backend by id.
   * @throws {NoMatchingBackendError} if the id was never registered
   */
  get(id: BackendId): FormatBackend {
    const backend = this._backends.get(id)
    if (backend === undefined) {
      throw new NoMatchingBackendError(id, { reason: 'unknown backend id' })
    }
    return backend
  }

  /**
   * Whether a backend with this id has been registered.
   */
  has(id: BackendId): boolean {
    return this._backends.has(id)
  }

  /**
   * Return all descriptors in match order.
   */
  list(): BackendDescriptor[] {
    return this._descriptors.map((d) => ({ ...d }))
  }
}

/**
 * Create a registry holding the built-in JSON and YAML backends.
 */
export function createDefaultBackendRegistry(): BackendRegistry {
  const registry = new BackendRegistry()
  registry.register(JSON_FILENAME_PATTERN, new JsonBackend())
  registry.register(YAML_FILENAME_PATTERN, new YamlBackend())
  return registry
}
