import { logger } from '@wordvm/core'
import { SnapshotError } from '@wordvm/types'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { SNAPSHOT_CONFIG } from '../config'
import { decodeSnapshot, encodeSnapshot, type SnapshotState } from '../snapshot'

function sampleState(): SnapshotState {
  const memory = new Uint16Array(32768)
  memory[0] = 19
  memory[1] = 65
  memory[32767] = 0xffff
  const registers = new Uint16Array(8)
  registers[0] = 0x1234
  registers[7] = 32767
  return { memory, registers, stack: [1, 2, 3], pc: 5 }
}

describe('Snapshot codec', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should lay out memory, registers, pc and stack little-endian', () => {
    const bytes = encodeSnapshot(sampleState())

    expect(bytes.length).toBe(131112 + 3 * 4)
    expect(Array.from(bytes.subarray(0, 8))).toEqual([19, 0, 0, 0, 65, 0, 0, 0])
    expect(Array.from(bytes.subarray(131068, 131072))).toEqual([255, 255, 0, 0])
    expect(Array.from(bytes.subarray(131072, 131076))).toEqual([0x34, 0x12, 0, 0])
    expect(Array.from(bytes.subarray(131104, 131112))).toEqual([
      5, 0, 0, 0, 0, 0, 0, 0,
    ])
    expect(Array.from(bytes.subarray(131112))).toEqual([
      1, 0, 0, 0, 2, 0, 0, 0, 3, 0, 0, 0,
    ])
  })

  it('should decode what it encodes', () => {
    const state = sampleState()
    const [error, decoded] = decodeSnapshot(encodeSnapshot(state))

    expect(error).toBeUndefined()
    expect(decoded?.pc).toBe(5)
    expect(decoded?.stack).toEqual([1, 2, 3])
    expect(decoded?.registers).toEqual(state.registers)
    expect(decoded?.memory).toEqual(state.memory)
  })

  it('should reject a buffer shorter than the header', () => {
    const [error] = decodeSnapshot(new Uint8Array(SNAPSHOT_CONFIG.HEADER_SIZE - 1))
    expect(error).toBeInstanceOf(SnapshotError)
    expect(error?.code).toBe('snapshot')
  })

  it('should reject memory cells wider than 16 bits', () => {
    const bytes = encodeSnapshot(sampleState())
    new DataView(bytes.buffer).setUint32(8, 0x10000, true)
    const [error] = decodeSnapshot(bytes)
    expect(error?.message).toBe('Memory cell 2 holds 65536')
  })

  it('should reject register values above 15 bits', () => {
    const bytes = encodeSnapshot(sampleState())
    new DataView(bytes.buffer).setUint32(
      SNAPSHOT_CONFIG.REGISTERS_OFFSET + 4,
      32768,
      true,
    )
    const [error] = decodeSnapshot(bytes)
    expect(error?.message).toBe('Register 1 holds 32768')
  })

  it('should reject stack values above 15 bits', () => {
    const bytes = encodeSnapshot(sampleState())
    new DataView(bytes.buffer).setUint32(SNAPSHOT_CONFIG.STACK_OFFSET, 40000, true)
    const [error] = decodeSnapshot(bytes)
    expect(error?.message).toBe('Stack entry 0 holds 40000')
  })

  it('should reject a pc that does not fit in 32 bits', () => {
    const bytes = encodeSnapshot(sampleState())
    new DataView(bytes.buffer).setBigUint64(SNAPSHOT_CONFIG.PC_OFFSET, 1n << 32n, true)
    const [error] = decodeSnapshot(bytes)
    expect(error).toBeInstanceOf(SnapshotError)
    expect(error?.offset).toBe(SNAPSHOT_CONFIG.PC_OFFSET)
  })

  it('should accept a pc past the end of memory', () => {
    const state = { ...sampleState(), pc: 40000 }
    const [, decoded] = decodeSnapshot(encodeSnapshot(state))
    expect(decoded?.pc).toBe(40000)
  })

  it('should ignore a trailing partial stack word', () => {
    const spy = vi.spyOn(logger, 'warn').mockImplementation(() => {})
    const full = encodeSnapshot(sampleState())
    const bytes = new Uint8Array(full.length + 2)
    bytes.set(full)

    const [error, decoded] = decodeSnapshot(bytes)
    expect(error).toBeUndefined()
    expect(decoded?.stack).toEqual([1, 2, 3])
    expect(spy).toHaveBeenCalledWith(
      'Ignoring trailing partial stack word in snapshot',
      { trailingBytes: 2 },
    )
  })
})
