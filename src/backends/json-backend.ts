/**
 * JsonBackend — JSON config files (.json, .jsn)
 */

import { ConfigDecodeError } from '../core/errors.js'
import { findInvalidTreeNode, isTreeNode, type TreeNode } from '../core/types.js'
import { readAll, writeAll } from '../utils/file-io.js'
import type { FormatBackend, SaveOptions } from './format-backend.js'

export class JsonBackend implements FormatBackend {
  readonly id = 'json'
  readonly displayName = 'JSON'

  load(filePath: string): TreeNode {
    const raw = readAll(filePath)
    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch (err) {
      throw new ConfigDecodeError(filePath, this.displayName, err)
    }
    if (!isTreeNode(parsed)) {
      throw new ConfigDecodeError(filePath, this.displayName, undefined, findInvalidTreeNode(parsed))
    }
    return parsed
  }

  save(filePath: string, tree: TreeNode, options: SaveOptions): void {
    // Pretty output unless compact was requested
    const output = options.compact
      ? JSON.stringify(tree)
      : JSON.stringify(tree, null, 2)
    writeAll(filePath, `${output}\n`)
  }
}
