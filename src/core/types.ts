/**
 * Core type definitions for cfgtree
 * The in-memory shape of a decoded configuration file
 */

/** A leaf value in a decoded config tree */
export type TreeScalar = string | number | boolean | null

/** An ordered, 0-indexed list of tree nodes */
export type TreeSequence = TreeNode[]

/** A string-keyed map of tree nodes */
export interface TreeMapping {
  [key: string]: TreeNode
}

/** Any node of a decoded config tree */
export type TreeNode = TreeScalar | TreeSequence | TreeMapping

/** Identifier of a registered format backend (e.g. 'json', 'yaml') */
export type BackendId = string

/**
 * Access mode of a configuration accessor.
 *  - read-only: set() and save() both fail
 *  - in-memory: set() is allowed, save() fails
 *  - read-write: set() and save() are both allowed
 */
export type AccessMode = 'read-only' | 'in-memory' | 'read-write'

/**
 * Return true if the node is a mapping (a plain object, not an array).
 */
export function isTreeMapping(node: unknown): node is TreeMapping {
  return typeof node === 'object' && node !== null && !Array.isArray(node)
}

/**
 * Return true if the node is a sequence.
 */
export function isTreeSequence(node: unknown): node is TreeSequence {
  return Array.isArray(node)
}

/**
 * Human-readable name of a node's kind, used in error messages.
 */
export function describeNode(node: unknown): string {
  if (node === null) return 'null'
  if (node === undefined) return 'nothing'
  if (Array.isArray(node)) return 'a sequence'
  if (typeof node === 'object') return 'a mapping'
  return `a ${typeof node}`
}

/**
 * Explain why a value is not a tree node, or return undefined if it is one.
 * The reason names the offending dotted path, e.g. "non-finite number at 'limits.max'".
 */
export function findInvalidTreeNode(value: unknown, path: string[] = []): string | undefined {
  const where = path.length === 0 ? 'at the root' : `at '${path.join('.')}'`
  if (value === null) return undefined
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return undefined
    case 'number':
      return Number.isFinite(value) ? undefined : `non-finite number ${where}`
    case 'object': {
      if (Array.isArray(value)) {
        for (const [index, item] of value.entries()) {
          const reason = findInvalidTreeNode(item, [...path, String(index)])
          if (reason !== undefined) return reason
        }
        return undefined
      }
      const proto: unknown = Object.getPrototypeOf(value)
      if (proto !== Object.prototype && proto !== null) {
        const ctor = value.constructor.name
        return `unsupported ${ctor === '' ? 'object' : ctor} value ${where}`
      }
      for (const [key, item] of Object.entries(value)) {
        const reason = findInvalidTreeNode(item, [...path, key])
        if (reason !== undefined) return reason
      }
      return undefined
    }
    default:
      return `unsupported ${typeof value} value ${where}`
  }
}

/**
 * Return true if the value is made only of mappings, sequences and scalars.
 * Non-finite numbers and non-plain objects (dates, buffers) are rejected.
 */
export function isTreeNode(value: unknown): value is TreeNode {
  return findInvalidTreeNode(value) === undefined
}
