/**
 * Snapshot Codec
 *
 * Binary machine state, little-endian, fixed widths:
 *
 *   [memory: u32 x 32768][registers: u32 x 8][pc: u64][stack: u32 x *]
 *
 * The stack runs bottom first and takes up the rest of the buffer.
 */

import { logger } from '@wordvm/core'
import type { Address, Safe, Word } from '@wordvm/types'
import { SnapshotError, safeError, safeResult } from '@wordvm/types'
import {
  MEMORY_CONFIG,
  REGISTER_CONFIG,
  SNAPSHOT_CONFIG,
  WORD_CONFIG,
} from './config'

export interface SnapshotState {
  memory: Uint16Array
  registers: Uint16Array
  stack: readonly Word[]
  pc: Address
}

/**
 * Encode machine state
 */
export function encodeSnapshot(state: SnapshotState): Uint8Array {
  const bytes = new Uint8Array(
    SNAPSHOT_CONFIG.HEADER_SIZE + state.stack.length * SNAPSHOT_CONFIG.CELL_SIZE,
  )
  const view = new DataView(bytes.buffer)

  for (let i = 0; i < MEMORY_CONFIG.SIZE; i++) {
    view.setUint32(
      SNAPSHOT_CONFIG.MEMORY_OFFSET + i * SNAPSHOT_CONFIG.CELL_SIZE,
      state.memory[i] ?? 0,
      true,
    )
  }
  for (let i = 0; i < REGISTER_CONFIG.COUNT; i++) {
    view.setUint32(
      SNAPSHOT_CONFIG.REGISTERS_OFFSET + i * SNAPSHOT_CONFIG.CELL_SIZE,
      state.registers[i] ?? 0,
      true,
    )
  }
  view.setBigUint64(SNAPSHOT_CONFIG.PC_OFFSET, BigInt(state.pc), true)
  state.stack.forEach((word, i) => {
    view.setUint32(
      SNAPSHOT_CONFIG.STACK_OFFSET + i * SNAPSHOT_CONFIG.CELL_SIZE,
      word,
      true,
    )
  })

  return bytes
}

/**
 * Decode machine state, rejecting values that no running machine can hold
 */
export function decodeSnapshot(
  bytes: Uint8Array,
): Safe<SnapshotState, SnapshotError> {
  if (bytes.length < SNAPSHOT_CONFIG.HEADER_SIZE) {
    return safeError(
      new SnapshotError(
        `Snapshot of ${bytes.length} bytes is shorter than the ${SNAPSHOT_CONFIG.HEADER_SIZE}-byte header`,
        bytes.length,
      ),
    )
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)

  const memory = new Uint16Array(MEMORY_CONFIG.SIZE)
  for (let i = 0; i < MEMORY_CONFIG.SIZE; i++) {
    const offset = SNAPSHOT_CONFIG.MEMORY_OFFSET + i * SNAPSHOT_CONFIG.CELL_SIZE
    const cell = view.getUint32(offset, true)
    if (cell > WORD_CONFIG.MAX_RAW) {
      return safeError(
        new SnapshotError(`Memory cell ${i} holds ${cell}`, offset),
      )
    }
    memory[i] = cell
  }

  const registers = new Uint16Array(REGISTER_CONFIG.COUNT)
  for (let i = 0; i < REGISTER_CONFIG.COUNT; i++) {
    const offset =
      SNAPSHOT_CONFIG.REGISTERS_OFFSET + i * SNAPSHOT_CONFIG.CELL_SIZE
    const value = view.getUint32(offset, true)
    if (value > WORD_CONFIG.MAX_LITERAL) {
      return safeError(
        new SnapshotError(`Register ${i} holds ${value}`, offset),
      )
    }
    registers[i] = value
  }

  const pc = view.getBigUint64(SNAPSHOT_CONFIG.PC_OFFSET, true)
  if (pc > BigInt(SNAPSHOT_CONFIG.MAX_PC)) {
    return safeError(
      new SnapshotError(
        `Program counter ${pc} is out of range`,
        SNAPSHOT_CONFIG.PC_OFFSET,
      ),
    )
  }

  const tail = bytes.length - SNAPSHOT_CONFIG.STACK_OFFSET
  if (tail % SNAPSHOT_CONFIG.CELL_SIZE !== 0) {
    logger.warn('Ignoring trailing partial stack word in snapshot', {
      trailingBytes: tail % SNAPSHOT_CONFIG.CELL_SIZE,
    })
  }

  const stack: Word[] = []
  const depth = Math.floor(tail / SNAPSHOT_CONFIG.CELL_SIZE)
  for (let i = 0; i < depth; i++) {
    const offset = SNAPSHOT_CONFIG.STACK_OFFSET + i * SNAPSHOT_CONFIG.CELL_SIZE
    const value = view.getUint32(offset, true)
    if (value > WORD_CONFIG.MAX_LITERAL) {
      return safeError(
        new SnapshotError(`Stack entry ${i} holds ${value}`, offset),
      )
    }
    stack.push(value)
  }

  return safeResult({ memory, registers, stack, pc: Number(pc) })
}
