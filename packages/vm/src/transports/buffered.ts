/**
 * In-memory transports
 *
 * Scripted input and captured output for drivers that feed commands and
 * read responses, and for tests.
 */

import { ByteBuffer, decodeText, encodeText } from '@wordvm/core'
import type { ByteSink, ByteSource, Safe, TransportError } from '@wordvm/types'
import { safeResult } from '@wordvm/types'

/**
 * Byte queue read front to back. More input can be appended at any time,
 * including after the machine halted on exhausted input.
 */
export class BufferedInput implements ByteSource {
  private readonly buffer: ByteBuffer
  private cursor: number

  constructor(initial: Uint8Array | string = new Uint8Array(0), position = 0) {
    this.buffer = ByteBuffer.from(
      typeof initial === 'string' ? encodeText(initial) : initial,
    )
    this.cursor = Math.min(position, this.buffer.length)
  }

  /** Bytes consumed so far */
  get position(): number {
    return this.cursor
  }

  /** Bytes appended but not yet read */
  get pending(): number {
    return this.buffer.length - this.cursor
  }

  append(data: Uint8Array | string): void {
    this.buffer.append(typeof data === 'string' ? encodeText(data) : data)
  }

  readByte(): Safe<number | null, TransportError> {
    const byte = this.buffer.at(this.cursor)
    if (byte === undefined) {
      return safeResult(null)
    }
    this.cursor++
    return safeResult(byte)
  }

  clone(): BufferedInput {
    return new BufferedInput(this.buffer.slice(), this.cursor)
  }
}

/**
 * Growable byte log with a read cursor for incremental consumers
 */
export class BufferedOutput implements ByteSink {
  private readonly buffer: ByteBuffer
  private readCursor: number

  constructor(initial: Uint8Array = new Uint8Array(0), cursor = 0) {
    this.buffer = ByteBuffer.from(initial)
    this.readCursor = Math.min(cursor, this.buffer.length)
  }

  writeByte(byte: number): Safe<void, TransportError> {
    this.buffer.push(byte)
    return safeResult(undefined)
  }

  get length(): number {
    return this.buffer.length
  }

  /** Offset of the first byte not yet returned by `readNew` or `consume` */
  get cursor(): number {
    return this.readCursor
  }

  bytes(): Uint8Array {
    return this.buffer.slice()
  }

  text(): string {
    return decodeText(this.buffer.slice())
  }

  /** Text after the cursor, without moving it */
  unread(): string {
    return decodeText(this.buffer.slice(this.readCursor))
  }

  /** Move the cursor forward by `count` bytes */
  consume(count: number): void {
    this.readCursor = Math.min(this.buffer.length, this.readCursor + count)
  }

  /** Text after the cursor; the cursor moves to the end */
  readNew(): string {
    const text = this.unread()
    this.readCursor = this.buffer.length
    return text
  }

  clone(): BufferedOutput {
    return new BufferedOutput(this.buffer.slice(), this.readCursor)
  }
}

/**
 * Sink that drops everything; counts what it was given
 */
export class DiscardOutput implements ByteSink {
  private written = 0

  get byteCount(): number {
    return this.written
  }

  writeByte(_byte: number): Safe<void, TransportError> {
    this.written++
    return safeResult(undefined)
  }
}
