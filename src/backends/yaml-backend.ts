/**
 * YamlBackend — YAML config files (.yaml, .yml)
 *
 * Documents are parsed with the core schema, so timestamps and binary tags
 * stay plain strings and every decoded value is a valid tree node. YAML has
 * no compact form; the compact option is ignored.
 */

import yaml from 'js-yaml'
import { ConfigDecodeError } from '../core/errors.js'
import { findInvalidTreeNode, isTreeNode, type TreeNode } from '../core/types.js'
import { readAll, writeAll } from '../utils/file-io.js'
import type { FormatBackend, SaveOptions } from './format-backend.js'

export class YamlBackend implements FormatBackend {
  readonly id = 'yaml'
  readonly displayName = 'YAML'

  load(filePath: string): TreeNode {
    const raw = readAll(filePath)
    let parsed: unknown
    try {
      parsed = yaml.load(raw, { filename: filePath, schema: yaml.CORE_SCHEMA })
    } catch (err) {
      throw new ConfigDecodeError(filePath, this.displayName, err)
    }
    // An empty document decodes to undefined
    if (parsed === undefined) return null
    if (!isTreeNode(parsed)) {
      throw new ConfigDecodeError(filePath, this.displayName, undefined, findInvalidTreeNode(parsed))
    }
    return parsed
  }

  save(filePath: string, tree: TreeNode, _options: SaveOptions): void {
    writeAll(filePath, yaml.dump(tree, { schema: yaml.CORE_SCHEMA }))
  }
}
