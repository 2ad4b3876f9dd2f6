/**
 * Tests for YamlBackend
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, writeFile, readFile, rm } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { YamlBackend } from '../../src/backends/yaml-backend.js'
import { ConfigDecodeError, ConfigFileNotFoundError } from '../../src/core/errors.js'
import type { TreeNode } from '../../src/core/types.js'

let testDir: string

beforeEach(async () => {
  testDir = join(tmpdir(), `cfgtree-yaml-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  await mkdir(testDir, { recursive: true })
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
})

describe('YamlBackend', () => {
  const backend = new YamlBackend()

  it('identifies itself as yaml', () => {
    expect(backend.id).toBe('yaml')
    expect(backend.displayName).toBe('YAML')
  })

  describe('load', () => {
    it('decodes nested mappings and sequences', async () => {
      const file = join(testDir, 'app.yaml')
      await writeFile(
        file,
        'companies:\n  acme:\n    users:\n      - name: Lisa\n      - name: Tom\nretries: 3\nverbose: false\n',
        'utf-8'
      )
      expect(backend.load(file)).toEqual({
        companies: { acme: { users: [{ name: 'Lisa' }, { name: 'Tom' }] } },
        retries: 3,
        verbose: false,
      })
    })

    it('keeps timestamps as strings', async () => {
      const file = join(testDir, 'dates.yml')
      await writeFile(file, 'released: 2024-01-15\n', 'utf-8')
      expect(backend.load(file)).toEqual({ released: '2024-01-15' })
    })

    it('decodes an empty document to null', async () => {
      const file = join(testDir, 'empty.yaml')
      await writeFile(file, '', 'utf-8')
      expect(backend.load(file)).toBeNull()
    })

    it('throws ConfigFileNotFoundError for a missing file', () => {
      expect(() => backend.load(join(testDir, 'missing.yaml'))).toThrow(ConfigFileNotFoundError)
    })

    it('throws ConfigDecodeError for invalid syntax', async () => {
      const file = join(testDir, 'bad.yaml')
      await writeFile(file, 'key: [unclosed\n', 'utf-8')
      expect(() => backend.load(file)).toThrow(ConfigDecodeError)
    })

    it('names the non-finite number it rejects', async () => {
      const file = join(testDir, 'inf.yaml')
      await writeFile(file, 'limits:\n  - 1\n  - .inf\n', 'utf-8')
      expect(() => backend.load(file)).toThrow(
        `Failed to decode YAML config file at ${file}: non-finite number at 'limits.1'`
      )
    })
  })

  describe('save', () => {
    it('writes block-style YAML', async () => {
      const file = join(testDir, 'out.yaml')
      backend.save(file, { name: 'acme', tags: ['a', 'b'] }, {})
      const text = await readFile(file, 'utf-8')
      expect(text).toBe('name: acme\ntags:\n  - a\n  - b\n')
    })

    it('ignores the compact option', async () => {
      const pretty = join(testDir, 'pretty.yaml')
      const compact = join(testDir, 'compact.yaml')
      backend.save(pretty, { name: 'acme', tags: ['a'] }, {})
      backend.save(compact, { name: 'acme', tags: ['a'] }, { compact: true })
      expect(await readFile(compact, 'utf-8')).toBe(await readFile(pretty, 'utf-8'))
    })

    it('round-trips a tree', () => {
      const file = join(testDir, 'round.yml')
      const tree: TreeNode = {
        companies: { acme: { users: [{ name: 'Lisa', admin: true }, { name: 'Tom', age: 0 }] } },
        empty: '',
        nothing: null,
        ratio: 0.5,
      }
      backend.save(file, tree, {})
      expect(backend.load(file)).toEqual(tree)
    })
  })
})
