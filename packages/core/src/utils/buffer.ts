/**
 * Buffer utilities
 *
 * Growable byte storage used by the in-memory transports, plus text helpers.
 */

const textEncoder = new TextEncoder()

/**
 * Encode a string one byte per character.
 * Guest programs speak 8-bit text; a code point above 0xFF becomes its own
 * UTF-8 sequence and leaves the characters around it single-byte.
 */
export function encodeText(text: string): Uint8Array {
  const bytes = new ByteBuffer(text.length)
  for (const char of text) {
    const code = char.codePointAt(0) ?? 0
    if (code <= 0xff) {
      bytes.push(code)
    } else {
      bytes.append(textEncoder.encode(char))
    }
  }
  return bytes.slice()
}

/**
 * Decode bytes one character per byte
 */
export function decodeText(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString(
    'latin1',
  )
}

/**
 * Append-only byte buffer with amortized growth
 */
export class ByteBuffer {
  private data: Uint8Array
  private used = 0

  constructor(initialCapacity = 256) {
    this.data = new Uint8Array(Math.max(1, initialCapacity))
  }

  static from(bytes: Uint8Array): ByteBuffer {
    const buffer = new ByteBuffer(bytes.length)
    buffer.append(bytes)
    return buffer
  }

  get length(): number {
    return this.used
  }

  at(index: number): number | undefined {
    return index >= 0 && index < this.used ? this.data[index] : undefined
  }

  push(byte: number): void {
    this.ensureCapacity(this.used + 1)
    this.data[this.used++] = byte & 0xff
  }

  append(bytes: Uint8Array): void {
    this.ensureCapacity(this.used + bytes.length)
    this.data.set(bytes, this.used)
    this.used += bytes.length
  }

  /**
   * Copy of bytes in [start, end)
   */
  slice(start = 0, end = this.used): Uint8Array {
    return this.data.slice(
      Math.max(0, start),
      Math.min(this.used, Math.max(0, end)),
    )
  }

  clone(): ByteBuffer {
    return ByteBuffer.from(this.slice())
  }

  private ensureCapacity(required: number): void {
    if (required <= this.data.length) {
      return
    }
    let capacity = this.data.length * 2
    while (capacity < required) {
      capacity *= 2
    }
    const next = new Uint8Array(capacity)
    next.set(this.data.subarray(0, this.used))
    this.data = next
  }
}
