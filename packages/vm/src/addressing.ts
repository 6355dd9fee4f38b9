/**
 * Addressing Resolver
 *
 * Operand encoding:
 * - 0..32767      literal value
 * - 32768..32775  registers r0..r7
 * - 32776..       invalid
 *
 * Every instruction resolves its operands through `load` and writes its
 * destination through `set`, so malformed programs and corrupted snapshots
 * are caught here.
 */

import type { RegisterIndex, Safe, Word } from '@wordvm/types'
import {
  InvalidLoadError,
  InvalidStoreError,
  safeError,
  safeResult,
} from '@wordvm/types'
import { REGISTER_CONFIG, WORD_CONFIG } from './config'

/**
 * Map a register operand (32768..32775) to its index
 */
export function registerIndexOf(operand: Word): RegisterIndex | null {
  switch (operand - REGISTER_CONFIG.FIRST_OPERAND) {
    case 0:
      return 0
    case 1:
      return 1
    case 2:
      return 2
    case 3:
      return 3
    case 4:
      return 4
    case 5:
      return 5
    case 6:
      return 6
    case 7:
      return 7
    default:
      return null
  }
}

/**
 * Resolve an operand to its value
 */
export function load(
  registers: Uint16Array,
  operand: Word,
): Safe<Word, InvalidLoadError> {
  if (operand >= 0 && operand <= WORD_CONFIG.MAX_LITERAL) {
    return safeResult(operand)
  }

  const index = registerIndexOf(operand)
  if (index === null) {
    return safeError(new InvalidLoadError(operand))
  }
  return safeResult(registers[index])
}

/**
 * Resolve `source` and write it into the register encoded by `destination`
 */
export function set(
  registers: Uint16Array,
  destination: Word,
  source: Word,
): Safe<void, InvalidLoadError | InvalidStoreError> {
  const [loadError, value] = load(registers, source)
  if (loadError) {
    return safeError(loadError)
  }

  const index = registerIndexOf(destination)
  if (index === null) {
    return safeError(new InvalidStoreError(destination))
  }

  registers[index] = value
  return safeResult(undefined)
}

/**
 * Check a destination operand without writing to it
 */
export function validateDestination(
  destination: Word,
): Safe<RegisterIndex, InvalidStoreError> {
  const index = registerIndexOf(destination)
  if (index === null) {
    return safeError(new InvalidStoreError(destination))
  }
  return safeResult(index)
}
