/**
 * VM Error Definitions
 *
 * Every failure the engine, its transports and its codecs can report.
 * `code` is one of the string constants below so drivers can switch on it
 * without instanceof chains.
 *
 * Halting is not in this list: a halt is a successful step result.
 */

export const VM_ERRORS = {
  INVALID_LOAD: 'invalid_load',
  INVALID_STORE: 'invalid_store',
  POP_FROM_EMPTY_STACK: 'pop_from_empty_stack',
  UNKNOWN_OPCODE: 'unknown_opcode',
  INVALID_ADDRESS: 'invalid_address',
  DIVISION_BY_ZERO: 'division_by_zero',
  TRANSPORT: 'transport',
  PROGRAM_IMAGE: 'program_image',
  SNAPSHOT: 'snapshot',
  ROOM_PARSE: 'room_parse',
} as const

export type VMErrorCode = (typeof VM_ERRORS)[keyof typeof VM_ERRORS]

function hex(value: number): string {
  return `0x${value.toString(16)}`
}

export class VMError extends Error {
  constructor(
    message: string,
    public code: VMErrorCode,
    public context?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'VMError'
  }
}

/** Operand above the register range (> 32775) */
export class InvalidLoadError extends VMError {
  constructor(public operand: number) {
    super(`Tried to load invalid address ${hex(operand)}`, VM_ERRORS.INVALID_LOAD, {
      operand,
    })
    this.name = 'InvalidLoadError'
  }
}

/** Destination operand that is not a register reference */
export class InvalidStoreError extends VMError {
  constructor(public destination: number) {
    super(
      `Tried to store at invalid address ${hex(destination)}`,
      VM_ERRORS.INVALID_STORE,
      { destination },
    )
    this.name = 'InvalidStoreError'
  }
}

export class PopFromEmptyStackError extends VMError {
  constructor() {
    super('Tried to pop from an empty stack', VM_ERRORS.POP_FROM_EMPTY_STACK)
    this.name = 'PopFromEmptyStackError'
  }
}

export class UnknownOpcodeError extends VMError {
  constructor(public opcode: number) {
    super(`Unknown opcode ${opcode}`, VM_ERRORS.UNKNOWN_OPCODE, { opcode })
    this.name = 'UnknownOpcodeError'
  }
}

/** Memory access outside the address space (instruction fetch past the end) */
export class InvalidAddressError extends VMError {
  constructor(public address: number) {
    super(
      `Memory access out of range at ${hex(address)}`,
      VM_ERRORS.INVALID_ADDRESS,
      { address },
    )
    this.name = 'InvalidAddressError'
  }
}

export class DivisionByZeroError extends VMError {
  constructor(public dividend: number) {
    super(`Remainder of ${dividend} by zero`, VM_ERRORS.DIVISION_BY_ZERO, {
      dividend,
    })
    this.name = 'DivisionByZeroError'
  }
}

export class TransportError extends VMError {
  constructor(
    message: string,
    public override cause?: unknown,
  ) {
    super(message, VM_ERRORS.TRANSPORT, {
      cause: cause instanceof Error ? cause.message : cause,
    })
    this.name = 'TransportError'
  }
}

export class ProgramImageError extends VMError {
  constructor(
    message: string,
    public byteLength: number,
  ) {
    super(message, VM_ERRORS.PROGRAM_IMAGE, { byteLength })
    this.name = 'ProgramImageError'
  }
}

export class SnapshotError extends VMError {
  constructor(
    message: string,
    public offset?: number,
  ) {
    super(message, VM_ERRORS.SNAPSHOT, { offset })
    this.name = 'SnapshotError'
  }
}

export class RoomParseError extends VMError {
  constructor(
    message: string,
    public line?: string,
  ) {
    super(message, VM_ERRORS.ROOM_PARSE, { line })
    this.name = 'RoomParseError'
  }
}
