// 15-bit Word Virtual Machine Types

import type { TransportError, VMError, InvalidAddressError } from './errors'
import type { Safe } from './safe'

/**
 * Unsigned value in [0, 65535].
 * As an operand: literal (0..32767), register reference (32768..32775),
 * invalid above. As stored data (registers, stack): always 0..32767.
 */
export type Word = number

export type Address = number

export type RegisterIndex = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7

/**
 * Readable byte endpoint.
 * `null` means the source is exhausted; the `in` instruction treats that as
 * normal termination.
 */
export interface ByteSource {
  readByte(): Safe<number | null, TransportError>
}

/** Writable byte endpoint */
export interface ByteSink {
  writeByte(byte: number): Safe<void, TransportError>
}

// Word-addressed memory bank
export interface WordMemory {
  readonly size: number
  readonly cells: Uint16Array

  read(address: Address): Safe<Word, InvalidAddressError>
  write(address: Address, value: Word): Safe<void, InvalidAddressError>
  load(address: Address, words: ArrayLike<number>): void
}

// Operand stack of resolved literals
export interface WordStack {
  readonly words: Word[]

  push(value: Word): void
  pop(): Word | undefined
  peek(): Word | undefined
  isEmpty(): boolean
  getDepth(): number
}

// Machine state tuple: (memory, registers, stack, pc)
export interface MachineState {
  memory: WordMemory
  registers: Uint16Array // 8 registers
  stack: WordStack
  pc: Address
}

export const HALT_REASONS = {
  HALT_OPCODE: 'halt_opcode', // `halt` instruction
  EMPTY_RETURN: 'empty_return', // `ret` with an empty stack
  INPUT_EXHAUSTED: 'input_exhausted', // `in` found no more input
} as const

export type HaltReason = (typeof HALT_REASONS)[keyof typeof HALT_REASONS]

export const RESULT_CODES = {
  HALT: 0, // Terminated normally, pc rolled back to the halting instruction
  FAULT: 1, // Failed, pc rolled back to the faulting instruction
} as const

export type ResultCode = (typeof RESULT_CODES)[keyof typeof RESULT_CODES]

export interface DecodedInstruction {
  opcode: number
  operands: Word[] // raw operand words, unresolved
  address: Address // where the opcode was fetched
}

/**
 * Execution context handed to an instruction handler.
 * `pc` already points past the operands; jumps overwrite it.
 */
export interface InstructionContext {
  instruction: DecodedInstruction
  state: MachineState
  pc: Address
  input: ByteSource
  output: ByteSink
}

/**
 * Instruction result
 * Only returns result code - context is mutated in place
 */
export type InstructionResult =
  | { resultCode: null } // continue execution
  | { resultCode: typeof RESULT_CODES.HALT; haltReason: HaltReason }
  | { resultCode: typeof RESULT_CODES.FAULT; error: VMError }

export interface VMOptions {
  /** Log every executed instruction at debug level */
  trace?: boolean
}

export interface RunOptions {
  /** Stop (without error) after this many steps */
  maxSteps?: number
}

export interface RunResult {
  /** null when the step limit was reached first */
  haltReason: HaltReason | null
  steps: number
}
