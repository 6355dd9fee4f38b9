/**
 * VM Configuration Constants
 *
 * Centralized configuration for the 15-bit word machine
 */

export { HALT_REASONS, RESULT_CODES } from '@wordvm/types'

// Word configuration
export const WORD_CONFIG = {
  BITS: 15,
  MODULUS: 32_768, // 2^15, arithmetic wraps here
  MAX_LITERAL: 32_767,
  MASK: 0x7fff,
  MAX_RAW: 0xffff, // memory cells hold raw 16-bit words
} as const

// Memory configuration
export const MEMORY_CONFIG = {
  SIZE: 32_768, // addressable cells
} as const

// Register configuration
export const REGISTER_CONFIG = {
  COUNT: 8,
  FIRST_OPERAND: 32_768, // operand encoding of r0
  LAST_OPERAND: 32_775, // operand encoding of r7
} as const

// Byte transport configuration
export const TRANSPORT_CONFIG = {
  CARRIAGE_RETURN: 0x0d, // skipped by `in`
  BYTE_MASK: 0xff, // `out` writes the low byte
} as const

/**
 * Snapshot layout (little-endian, fixed width):
 * memory u32 x 32768 ++ registers u32 x 8 ++ pc u64 ++ stack u32 x *
 */
export const SNAPSHOT_CONFIG = {
  CELL_SIZE: 4,
  PC_SIZE: 8,
  MAX_PC: 0xffff_ffff,
  MEMORY_OFFSET: 0,
  REGISTERS_OFFSET: 32_768 * 4,
  PC_OFFSET: 32_768 * 4 + 8 * 4,
  STACK_OFFSET: 32_768 * 4 + 8 * 4 + 8,
  HEADER_SIZE: 32_768 * 4 + 8 * 4 + 8, // 131112
} as const

// Program image configuration
export const PROGRAM_CONFIG = {
  WORD_SIZE: 2, // 16-bit little-endian words
  MAX_BYTES: 32_768 * 2,
} as const

// Opcode definitions
export const OPCODES = {
  HALT: 0, // stop execution
  SET: 1, // set a b: register a = b
  PUSH: 2, // push a
  POP: 3, // pop a
  EQ: 4, // eq a b c: a = b == c
  GT: 5, // gt a b c: a = b > c
  JMP: 6, // jmp a
  JT: 7, // jt a b: jump to b if a != 0
  JF: 8, // jf a b: jump to b if a == 0
  ADD: 9, // add a b c
  MULT: 10, // mult a b c
  MOD: 11, // mod a b c
  AND: 12, // and a b c
  OR: 13, // or a b c
  NOT: 14, // not a b: 15-bit inverse
  RMEM: 15, // rmem a b: a = memory[b]
  WMEM: 16, // wmem a b: memory[a] = b
  CALL: 17, // call a
  RET: 18, // ret
  OUT: 19, // out a: write byte
  IN: 20, // in a: read byte
  NOOP: 21, // no operation
} as const

export type Opcode = (typeof OPCODES)[keyof typeof OPCODES]

// Number of operand words following each opcode
export const INSTRUCTION_LENGTHS: Record<Opcode, number> = {
  [OPCODES.HALT]: 0,
  [OPCODES.SET]: 2,
  [OPCODES.PUSH]: 1,
  [OPCODES.POP]: 1,
  [OPCODES.EQ]: 3,
  [OPCODES.GT]: 3,
  [OPCODES.JMP]: 1,
  [OPCODES.JT]: 2,
  [OPCODES.JF]: 2,
  [OPCODES.ADD]: 3,
  [OPCODES.MULT]: 3,
  [OPCODES.MOD]: 3,
  [OPCODES.AND]: 3,
  [OPCODES.OR]: 3,
  [OPCODES.NOT]: 2,
  [OPCODES.RMEM]: 2,
  [OPCODES.WMEM]: 2,
  [OPCODES.CALL]: 1,
  [OPCODES.RET]: 0,
  [OPCODES.OUT]: 1,
  [OPCODES.IN]: 1,
  [OPCODES.NOOP]: 0,
}

/**
 * Check whether an operand encodes a register reference
 */
export function isRegisterOperand(operand: number): boolean {
  return (
    operand >= REGISTER_CONFIG.FIRST_OPERAND &&
    operand <= REGISTER_CONFIG.LAST_OPERAND
  )
}
