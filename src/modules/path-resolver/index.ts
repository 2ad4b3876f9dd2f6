/**
 * Barrel exports for the path-resolver module.
 */

export { parsePath, resolvePath, resolveFirst } from './path-resolver.js'
export type {
  PathFound,
  PathNotFound,
  PathResolution,
  ChainFound,
  ChainNotFound,
  ChainResolution,
} from './path-resolver.js'
