/**
 * Terminal transports
 *
 * Blocking byte I/O on a file descriptor (stdin/stdout by default).
 * The machine executes synchronously, so reads block until a byte arrives.
 */

import { readSync, writeSync } from 'node:fs'
import type { ByteSink, ByteSource, Safe } from '@wordvm/types'
import { TransportError, safeError, safeResult } from '@wordvm/types'

export interface TerminalOptions {
  /** File descriptor to read from or write to */
  fd?: number
}

function isRetryable(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'EAGAIN' || error.code === 'EINTR')
  )
}

/**
 * Reads one byte at a time; end of file reports exhaustion
 */
export class TerminalInput implements ByteSource {
  private readonly fd: number
  private readonly scratch = new Uint8Array(1)

  constructor(options: TerminalOptions = {}) {
    this.fd = options.fd ?? 0
  }

  readByte(): Safe<number | null, TransportError> {
    for (;;) {
      try {
        const count = readSync(this.fd, this.scratch, 0, 1, null)
        if (count === 0) {
          return safeResult(null)
        }
        return safeResult(this.scratch[0])
      } catch (error) {
        if (!isRetryable(error)) {
          return safeError(
            new TransportError(`Failed to read from fd ${this.fd}`, error),
          )
        }
      }
    }
  }
}

/**
 * Writes each byte as it is produced
 */
export class TerminalOutput implements ByteSink {
  private readonly fd: number
  private readonly scratch = new Uint8Array(1)

  constructor(options: TerminalOptions = {}) {
    this.fd = options.fd ?? 1
  }

  writeByte(byte: number): Safe<void, TransportError> {
    this.scratch[0] = byte
    for (;;) {
      try {
        writeSync(this.fd, this.scratch, 0, 1)
        return safeResult(undefined)
      } catch (error) {
        if (!isRetryable(error)) {
          return safeError(
            new TransportError(`Failed to write to fd ${this.fd}`, error),
          )
        }
      }
    }
  }
}
