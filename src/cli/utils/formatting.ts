/**
 * CLI output formatting utilities
 *
 * Renders tree values for `cfgtree get` and coerces command-line strings
 * into typed tree values for `cfgtree set` and `--default`.
 */

import yaml from 'js-yaml'
import type { TreeNode } from '../../core/types.js'
import type { BackendDescriptor, BackendRegistry } from '../../backends/backend-registry.js'

/** Output style for structured values */
export type ValueOutputFormat = 'text' | 'json'

/** Decimal digits a double always round-trips */
const MAX_EXACT_DECIMAL_DIGITS = 15

/**
 * Coerce a raw command-line string into a scalar tree value.
 *
 * @example
 * coerceValue('true') // true
 * coerceValue('42')   // 42
 * coerceValue('4.5')  // 4.5
 * coerceValue('null') // null
 * coerceValue('acme') // 'acme'
 * coerceValue('12345678901234567890') // '12345678901234567890'
 *
 * Numbers that a double cannot hold exactly stay strings.
 */
export function coerceValue(raw: string): TreeNode {
  const trimmed = raw.trim()
  if (trimmed === 'true') return true
  if (trimmed === 'false') return false
  if (trimmed === 'null') return null
  if (/^-?\d+$/.test(trimmed)) {
    const n = parseInt(trimmed, 10)
    return Number.isSafeInteger(n) ? n : raw
  }
  if (/^-?\d*\.\d+$/.test(trimmed)) {
    const significant = trimmed.replace(/[-.]/g, '').replace(/^0+/, '')
    return significant.length <= MAX_EXACT_DECIMAL_DIGITS ? parseFloat(trimmed) : raw
  }
  return raw
}

/**
 * Render a value for stdout, always ending in a newline.
 *
 * In text mode scalars print bare and structures print as YAML.
 * In json mode everything prints as indented JSON.
 */
export function formatValue(value: TreeNode, format: ValueOutputFormat = 'text'): string {
  if (format === 'json') {
    return `${JSON.stringify(value, null, 2)}\n`
  }
  if (value !== null && typeof value === 'object') {
    return yaml.dump(value)
  }
  return `${String(value)}\n`
}

/**
 * A row in the `cfgtree formats` listing.
 */
export interface FormatRow {
  match: string
  backendId: string
  displayName: string
}

function describeMatcher(descriptor: BackendDescriptor): string {
  return descriptor.match instanceof RegExp ? descriptor.match.toString() : '<predicate>'
}

/**
 * Build format listing rows in match order.
 */
export function buildFormatRows(registry: BackendRegistry): FormatRow[] {
  return registry.list().map((descriptor) => ({
    match: describeMatcher(descriptor),
    backendId: descriptor.backendId,
    displayName: registry.get(descriptor.backendId).displayName,
  }))
}

/**
 * Render format rows as an aligned plain-text table.
 */
export function formatFormatTable(rows: FormatRow[]): string {
  const header = { match: 'MATCH', backendId: 'BACKEND', displayName: 'FORMAT' }
  const all = [header, ...rows]
  const matchWidth = Math.max(...all.map((r) => r.match.length))
  const idWidth = Math.max(...all.map((r) => r.backendId.length))
  return all
    .map((r) => `${r.match.padEnd(matchWidth)}  ${r.backendId.padEnd(idWidth)}  ${r.displayName}`)
    .join('\n') + '\n'
}
