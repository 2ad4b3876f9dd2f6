/**
 * Dotted-path resolution over decoded config trees.
 *
 * Traversal is driven by the type of each node: a mapping is indexed by the
 * segment as a key, a sequence by the segment as a decimal index. Results
 * carry an explicit `found` flag so stored `false`, `0`, `''` and `null`
 * values are never mistaken for absent ones.
 */

import { isTreeMapping, isTreeSequence, type TreeNode } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

/** A path that located a node */
export interface PathFound {
  found: true
  value: TreeNode
}

/** A path that stopped before consuming all of its segments */
export interface PathNotFound {
  found: false
  /** Segment that could not be followed */
  missingSegment: string
  /** Number of segments consumed before stopping */
  depth: number
}

export type PathResolution = PathFound | PathNotFound

/** First path of a chain that located a node */
export interface ChainFound {
  found: true
  value: TreeNode
  /** The path that resolved */
  path: string
}

/** Every path of a chain failed */
export interface ChainNotFound {
  found: false
  /** Attempted paths joined with ' | ', for diagnostics */
  query: string
}

export type ChainResolution = ChainFound | ChainNotFound

// ---------------------------------------------------------------------------
// Path parsing
// ---------------------------------------------------------------------------

const INDEX_PATTERN = /^\d+$/

/**
 * Split a dotted path into segments. The empty string is the empty path.
 *
 * @example
 * parsePath('companies.acme.users.1.name') // ['companies', 'acme', 'users', '1', 'name']
 */
export function parsePath(path: string): string[] {
  if (path === '') return []
  return path.split('.')
}

/**
 * Step from a node into one child, or return undefined if the segment does
 * not address a child of this node.
 */
function step(node: TreeNode, segment: string): { value: TreeNode } | undefined {
  if (isTreeSequence(node)) {
    if (!INDEX_PATTERN.test(segment)) return undefined
    const index = Number(segment)
    if (index >= node.length) return undefined
    const value = node[index]
    return value === undefined ? undefined : { value }
  }
  if (isTreeMapping(node)) {
    if (!Object.hasOwn(node, segment)) return undefined
    const value = node[segment]
    return value === undefined ? undefined : { value }
  }
  return undefined
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Resolve a dotted path against a tree.
 *
 * @example
 * resolvePath({ users: [{ name: 'Lisa' }] }, 'users.0.name') // { found: true, value: 'Lisa' }
 */
export function resolvePath(tree: TreeNode, path: string): PathResolution {
  const segments = parsePath(path)
  let cursor: TreeNode = tree
  for (let depth = 0; depth < segments.length; depth++) {
    const segment = segments[depth] ?? ''
    const next = step(cursor, segment)
    if (next === undefined) {
      return { found: false, missingSegment: segment, depth }
    }
    cursor = next.value
  }
  return { found: true, value: cursor }
}

/**
 * Try each path in order and return the first that resolves.
 */
export function resolveFirst(tree: TreeNode, paths: readonly string[]): ChainResolution {
  for (const path of paths) {
    const result = resolvePath(tree, path)
    if (result.found) {
      return { found: true, value: result.value, path }
    }
  }
  return { found: false, query: paths.join(' | ') }
}
