/**
 * Whole-file read and write primitives used by the format backends.
 *
 * Writes replace the target atomically: content goes to a temp file beside
 * the real file (symlinks are followed) which takes over the target's
 * permission bits and is then renamed over it, so a failed write never
 * leaves a half-written config file behind.
 */

import {
  accessSync,
  appendFileSync,
  chmodSync,
  constants,
  readFileSync,
  realpathSync,
  renameSync,
  statSync,
  unlinkSync,
  writeFileSync,
} from 'fs'
import { ConfigFileNotFoundError, FileWriteError } from '../core/errors.js'

/** Options for writeAll() */
export interface WriteOptions {
  /** Append to the existing file instead of replacing it */
  append?: boolean
}

/**
 * Read an entire UTF-8 text file.
 * @throws {ConfigFileNotFoundError} if the path is missing, a directory, or unreadable
 */
export function readAll(filePath: string): string {
  try {
    return readFileSync(filePath, 'utf-8')
  } catch (err) {
    throw new ConfigFileNotFoundError(filePath, err)
  }
}

/** An existing write target, resolved through any symlinks */
interface ExistingTarget {
  realPath: string
  mode: number
}

/**
 * Resolve an existing target and check that it may be written.
 * Returns null when nothing exists at the path yet.
 * A file with every write bit cleared counts as read-only even for
 * privileged users.
 */
function resolveExistingTarget(filePath: string): ExistingTarget | null {
  let realPath: string
  try {
    realPath = realpathSync(filePath)
  } catch {
    return null
  }
  const mode = statSync(realPath).mode & 0o7777
  accessSync(realPath, constants.W_OK)
  if ((mode & 0o222) === 0) {
    throw new Error(`target is read-only (mode ${mode.toString(8)})`)
  }
  return { realPath, mode }
}

/**
 * Write text to a file, replacing it (atomically) or appending to it.
 * @throws {FileWriteError} if the destination cannot be written
 */
export function writeAll(filePath: string, content: string, options: WriteOptions = {}): void {
  if (options.append) {
    try {
      appendFileSync(filePath, content, 'utf-8')
    } catch (err) {
      throw new FileWriteError(filePath, err)
    }
    return
  }

  let target: ExistingTarget | null
  try {
    target = resolveExistingTarget(filePath)
  } catch (err) {
    throw new FileWriteError(filePath, err)
  }

  const destination = target?.realPath ?? filePath
  const tmpPath = `${destination}.tmp.${String(process.pid)}.${String(Date.now())}`
  try {
    writeFileSync(tmpPath, content, 'utf-8')
    if (target !== null) {
      chmodSync(tmpPath, target.mode)
    }
    renameSync(tmpPath, destination)
  } catch (err) {
    try {
      unlinkSync(tmpPath)
    } catch {
      // temp file was never created
    }
    throw new FileWriteError(filePath, err)
  }
}
