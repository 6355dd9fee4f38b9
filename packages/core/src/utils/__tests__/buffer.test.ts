/**
 * Unit tests for byte buffer and text helpers
 */

import { describe, expect, it } from 'vitest'
import { ByteBuffer, decodeText, encodeText } from '../buffer'

describe('ByteBuffer', () => {
  it('should grow past its initial capacity', () => {
    const buffer = new ByteBuffer(2)
    for (let i = 0; i < 10; i++) {
      buffer.push(i)
    }
    expect(buffer.length).toBe(10)
    expect(Array.from(buffer.slice())).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9])
  })

  it('should keep only the low byte of pushed values', () => {
    const buffer = new ByteBuffer()
    buffer.push(0x141)
    expect(buffer.at(0)).toBe(0x41)
  })

  it('should return undefined outside the written range', () => {
    const buffer = ByteBuffer.from(new Uint8Array([7]))
    expect(buffer.at(1)).toBeUndefined()
    expect(buffer.at(-1)).toBeUndefined()
  })

  it('should slice with clamped bounds', () => {
    const buffer = ByteBuffer.from(new Uint8Array([1, 2, 3, 4]))
    expect(Array.from(buffer.slice(1, 3))).toEqual([2, 3])
    expect(Array.from(buffer.slice(2, 99))).toEqual([3, 4])
  })

  it('should clone independently', () => {
    const buffer = ByteBuffer.from(new Uint8Array([1]))
    const copy = buffer.clone()
    copy.push(2)
    expect(buffer.length).toBe(1)
    expect(copy.length).toBe(2)
  })
})

describe('Text helpers', () => {
  it('should encode one byte per character', () => {
    expect(Array.from(encodeText('Hi\n'))).toEqual([72, 105, 10])
    expect(Array.from(encodeText('é'))).toEqual([0xe9])
  })

  it('should fall back to UTF-8 for wide characters', () => {
    expect(Array.from(encodeText('€'))).toEqual([0xe2, 0x82, 0xac])
  })

  it('should keep latin1 characters single-byte beside wide ones', () => {
    const bytes = encodeText('é€ÿ')
    expect(Array.from(bytes)).toEqual([0xe9, 0xe2, 0x82, 0xac, 0xff])
    expect(decodeText(bytes.subarray(0, 1))).toBe('é')
    expect(decodeText(bytes.subarray(4))).toBe('ÿ')
  })

  it('should decode bytes as latin1', () => {
    expect(decodeText(new Uint8Array([72, 0x80, 0xff]))).toBe('H\u0080ÿ')
  })
})
