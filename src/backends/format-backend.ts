/**
 * FormatBackend interface definition
 *
 * One implementation exists per serialization format. Adding a format means
 * writing a class that satisfies this interface and registering it with a
 * BackendRegistry; the accessor core needs no changes.
 *
 * @example
 * ```typescript
 * class IniBackend implements FormatBackend {
 *   readonly id = 'ini'
 *   readonly displayName = 'INI'
 *   load(filePath: string): TreeNode { ... }
 *   save(filePath: string, tree: TreeNode, options: SaveOptions): void { ... }
 * }
 * registry.register(/\.ini$/i, new IniBackend())
 * ```
 */

import type { BackendId, TreeNode } from '../core/types.js'

/** Options passed to FormatBackend.save() */
export interface SaveOptions {
  /**
   * Prefer dense output over indented output.
   * Formats without such a concept ignore it.
   */
  compact?: boolean
}

/**
 * FormatBackend — decodes a file into a tree and encodes a tree back into
 * a file. Implementations hold no state between calls.
 */
export interface FormatBackend {
  /**
   * Unique identifier for this backend.
   * Recorded as the accessor's `format` after a successful load.
   * @example "json"
   */
  readonly id: BackendId

  /**
   * Human-readable name of the format.
   * @example "JSON"
   */
  readonly displayName: string

  /**
   * Read and decode a file.
   * @throws {ConfigFileNotFoundError} if the file is missing or unreadable
   * @throws {ConfigDecodeError} if the content is not valid for this format
   */
  load(filePath: string): TreeNode

  /**
   * Encode a tree and replace the file with the result.
   * Either the full content is written or the target is left untouched.
   * @throws {FileWriteError} if the target cannot be written
   */
  save(filePath: string, tree: TreeNode, options: SaveOptions): void
}
