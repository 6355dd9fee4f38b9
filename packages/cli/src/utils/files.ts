import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import { logger } from '@wordvm/core'
import type { SafePromise } from '@wordvm/types'
import { safeError, safeResult, safeTry } from '@wordvm/types'

/**
 * Bare snapshot names live in the snapshot directory; anything with a
 * directory part is used as given.
 */
export function resolveSnapshotPath(name: string, snapshotDir: string): string {
  return dirname(name) === '.' ? join(snapshotDir, name) : name
}

export async function readBinaryFile(path: string): SafePromise<Uint8Array> {
  const [error, contents] = await safeTry(readFile(path))
  if (error) {
    return safeError(new Error(`Failed to read ${path}: ${error.message}`))
  }
  return safeResult(new Uint8Array(contents))
}

export async function readTextFile(path: string): SafePromise<string> {
  const [error, contents] = await safeTry(readFile(path, 'utf-8'))
  if (error) {
    return safeError(new Error(`Failed to read ${path}: ${error.message}`))
  }
  return safeResult(contents)
}

export async function writeBinaryFile(
  path: string,
  bytes: Uint8Array,
): SafePromise<void> {
  const [dirError] = await safeTry(mkdir(dirname(path), { recursive: true }))
  if (dirError) {
    return safeError(dirError)
  }
  const [error] = await safeTry(writeFile(path, bytes))
  if (error) {
    return safeError(new Error(`Failed to write ${path}: ${error.message}`))
  }
  logger.info('Wrote file', { path, bytes: bytes.length })
  return safeResult(undefined)
}
