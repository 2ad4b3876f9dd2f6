/**
 * Unit tests for the `cfgtree get` and `cfgtree has` commands
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdir, writeFile, rm } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { runGet, GET_EXIT_SUCCESS, GET_EXIT_ABSENT, GET_EXIT_ERROR } from '../get.js'
import { runHas, HAS_EXIT_PRESENT, HAS_EXIT_ABSENT, HAS_EXIT_ERROR } from '../has.js'

// ---------------------------------------------------------------------------
// Test setup
// ---------------------------------------------------------------------------

let testDir: string
let yamlFile: string

beforeEach(async () => {
  testDir = join(
    tmpdir(),
    `cfgtree-get-cmd-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`
  )
  await mkdir(testDir, { recursive: true })
  yamlFile = join(testDir, 'app.yaml')
  await writeFile(
    yamlFile,
    'companies:\n  acme:\n    users:\n      - name: Lisa\n      - name: Tom\nhello: world\nenabled: false\nport: 8080\n',
    'utf-8'
  )
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
  vi.restoreAllMocks()
})

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function captureOutput(): { getStdout: () => string; getStderr: () => string; restore: () => void } {
  let stdout = ''
  let stderr = ''
  const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation((data: string | Uint8Array) => {
    stdout += typeof data === 'string' ? data : data.toString()
    return true
  })
  const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation((data: string | Uint8Array) => {
    stderr += typeof data === 'string' ? data : data.toString()
    return true
  })
  return {
    getStdout: () => stdout,
    getStderr: () => stderr,
    restore: (): void => {
      stdoutSpy.mockRestore()
      stderrSpy.mockRestore()
    },
  }
}

// ---------------------------------------------------------------------------
// get
// ---------------------------------------------------------------------------

describe('runGet', () => {
  it('prints a nested scalar', () => {
    const { getStdout, restore } = captureOutput()
    try {
      const exitCode = runGet(yamlFile, ['companies.acme.users.1.name'])
      expect(exitCode).toBe(GET_EXIT_SUCCESS)
      expect(getStdout()).toBe('Tom\n')
    } finally {
      restore()
    }
  })

  it('prints false and numbers as text', () => {
    const { getStdout, restore } = captureOutput()
    try {
      expect(runGet(yamlFile, ['enabled'])).toBe(GET_EXIT_SUCCESS)
      expect(runGet(yamlFile, ['port'])).toBe(GET_EXIT_SUCCESS)
      expect(getStdout()).toBe('false\n8080\n')
    } finally {
      restore()
    }
  })

  it('prints structures as YAML', () => {
    const { getStdout, restore } = captureOutput()
    try {
      expect(runGet(yamlFile, ['companies.acme'])).toBe(GET_EXIT_SUCCESS)
      expect(getStdout()).toBe('users:\n  - name: Lisa\n  - name: Tom\n')
    } finally {
      restore()
    }
  })

  it('prints JSON with --json', () => {
    const { getStdout, restore } = captureOutput()
    try {
      expect(runGet(yamlFile, ['companies.acme.users.0'], { json: true })).toBe(GET_EXIT_SUCCESS)
      expect(getStdout()).toBe('{\n  "name": "Lisa"\n}\n')
    } finally {
      restore()
    }
  })

  it('resolves the first path of a chain', () => {
    const { getStdout, restore } = captureOutput()
    try {
      expect(runGet(yamlFile, ['goodbye', 'hello'])).toBe(GET_EXIT_SUCCESS)
      expect(getStdout()).toBe('world\n')
    } finally {
      restore()
    }
  })

  it('returns GET_EXIT_ABSENT and prints nothing for a missing path', () => {
    const { getStdout, getStderr, restore } = captureOutput()
    try {
      expect(runGet(yamlFile, ['missing'])).toBe(GET_EXIT_ABSENT)
      expect(getStdout()).toBe('')
      expect(getStderr()).toBe('')
    } finally {
      restore()
    }
  })

  it('prints the coerced default for a missing path', () => {
    const { getStdout, restore } = captureOutput()
    try {
      expect(runGet(yamlFile, ['missing'], { default: '3', json: true })).toBe(GET_EXIT_SUCCESS)
      expect(getStdout()).toBe('3\n')
    } finally {
      restore()
    }
  })

  it('returns GET_EXIT_ERROR for a missing required path', () => {
    const { getStderr, restore } = captureOutput()
    try {
      expect(runGet(yamlFile, ['a', 'b'], { required: true })).toBe(GET_EXIT_ERROR)
      expect(getStderr()).toBe("  Error: Required value 'a | b' not found in config.\n")
    } finally {
      restore()
    }
  })

  it('returns GET_EXIT_ERROR for an unsupported format', async () => {
    const file = join(testDir, 'app.toml')
    await writeFile(file, 'a = 1\n', 'utf-8')
    const { getStderr, restore } = captureOutput()
    try {
      expect(runGet(file, ['a'])).toBe(GET_EXIT_ERROR)
      expect(getStderr()).toBe(`  Error: No format backend could be found to handle '${file}'\n`)
    } finally {
      restore()
    }
  })
})

// ---------------------------------------------------------------------------
// has
// ---------------------------------------------------------------------------

describe('runHas', () => {
  it('returns HAS_EXIT_PRESENT for a top-level key', () => {
    const { getStdout, restore } = captureOutput()
    try {
      expect(runHas(yamlFile, 'enabled')).toBe(HAS_EXIT_PRESENT)
      expect(getStdout()).toBe('true\n')
    } finally {
      restore()
    }
  })

  it('returns HAS_EXIT_ABSENT for a nested path', () => {
    const { getStdout, restore } = captureOutput()
    try {
      expect(runHas(yamlFile, 'companies.acme')).toBe(HAS_EXIT_ABSENT)
      expect(getStdout()).toBe('false\n')
    } finally {
      restore()
    }
  })

  it('returns HAS_EXIT_ERROR for a missing file', () => {
    const missing = join(testDir, 'missing.json')
    const { getStderr, restore } = captureOutput()
    try {
      expect(runHas(missing, 'a')).toBe(HAS_EXIT_ERROR)
      expect(getStderr()).toBe(`  Error: Config file does not exist or is not readable: ${missing}\n`)
    } finally {
      restore()
    }
  })
})
