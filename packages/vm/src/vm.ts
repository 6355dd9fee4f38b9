/**
 * Word VM Implementation
 *
 * Fetch, decode and execute loop over a 32768-cell word memory, eight
 * registers and an unbounded operand stack.
 *
 * Each step either commits (pc advances or jumps) or leaves pc on the
 * instruction that halted or faulted. A machine that halted because its
 * input ran out can therefore be given more input and stepped again.
 */

import { logger } from '@wordvm/core'
import type {
  Address,
  ByteSink,
  ByteSource,
  DecodedInstruction,
  HaltReason,
  InstructionContext,
  MachineState,
  RunOptions,
  RunResult,
  Safe,
  SnapshotError,
  ProgramImageError,
  VMError,
  VMOptions,
  Word,
} from '@wordvm/types'
import {
  InvalidLoadError,
  UnknownOpcodeError,
  safeError,
  safeResult,
} from '@wordvm/types'
import { set } from './addressing'
import { REGISTER_CONFIG, RESULT_CODES, WORD_CONFIG } from './config'
import type { VMInstructionHandler } from './instructions/base'
import { InstructionRegistry } from './instructions/registry'
import { VMMemory } from './memory'
import { OperandStack } from './operand-stack'
import { decodeProgramImage } from './program-loader'
import { type SnapshotState, decodeSnapshot, encodeSnapshot } from './snapshot'

export interface VMState extends MachineState {
  memory: VMMemory
  stack: OperandStack
}

export interface VMInitialState {
  memory?: Uint16Array
  registers?: Uint16Array
  stack?: readonly Word[]
  pc?: Address
}

interface FetchedInstruction {
  instruction: DecodedInstruction
  handler: VMInstructionHandler
}

export class VM<I extends ByteSource = ByteSource, O extends ByteSink = ByteSink> {
  public readonly state: VMState
  public readonly input: I
  public readonly output: O
  protected readonly registry: InstructionRegistry
  protected readonly options: VMOptions
  private executedSteps = 0
  private haltReason: HaltReason | null = null

  constructor(
    input: I,
    output: O,
    options: VMOptions = {},
    initial: VMInitialState = {},
  ) {
    this.input = input
    this.output = output
    this.options = options
    this.registry = InstructionRegistry.getInstance()

    const registers = new Uint16Array(REGISTER_CONFIG.COUNT)
    if (initial.registers) {
      registers.set(initial.registers.subarray(0, REGISTER_CONFIG.COUNT))
    }

    this.state = {
      memory: new VMMemory(initial.memory),
      registers,
      stack: new OperandStack(initial.stack),
      pc: initial.pc ?? 0,
    }
  }

  /**
   * Build a machine with a program image loaded at address 0
   */
  static fromProgram<I extends ByteSource, O extends ByteSink>(
    image: Uint8Array,
    input: I,
    output: O,
    options: VMOptions = {},
  ): Safe<VM<I, O>, ProgramImageError> {
    const [error, words] = decodeProgramImage(image)
    if (error) {
      return safeError(error)
    }
    return safeResult(new VM(input, output, options, { memory: words }))
  }

  /**
   * Build a machine from a saved snapshot
   */
  static fromSnapshot<I extends ByteSource, O extends ByteSink>(
    bytes: Uint8Array,
    input: I,
    output: O,
    options: VMOptions = {},
  ): Safe<VM<I, O>, SnapshotError> {
    const [error, snapshot] = decodeSnapshot(bytes)
    if (error) {
      return safeError(error)
    }
    return safeResult(new VM(input, output, options, snapshot))
  }

  /** Instructions executed to completion */
  get stepCount(): number {
    return this.executedSteps
  }

  /** Reason of the most recent halt; cleared by the next committed step */
  get lastHaltReason(): HaltReason | null {
    return this.haltReason
  }

  /**
   * Execute one instruction.
   * @returns null to keep going, or the reason the machine halted
   */
  step(): Safe<HaltReason | null, VMError> {
    const pcBefore = this.state.pc

    const [fetchError, fetched] = this.fetch(pcBefore)
    if (fetchError) {
      return safeError(fetchError)
    }
    const { instruction, handler } = fetched

    if (this.options.trace) {
      logger.debug('Executing instruction', {
        pc: pcBefore,
        instruction: handler.disassemble(instruction.operands),
      })
    }

    const context: InstructionContext = {
      instruction,
      state: this.state,
      pc: pcBefore + 1 + handler.operandCount,
      input: this.input,
      output: this.output,
    }

    const result = handler.execute(context)
    switch (result.resultCode) {
      case null:
        this.state.pc = context.pc
        this.executedSteps++
        this.haltReason = null
        return safeResult(null)
      case RESULT_CODES.HALT:
        this.state.pc = pcBefore
        this.haltReason = result.haltReason
        return safeResult(result.haltReason)
      case RESULT_CODES.FAULT:
        this.state.pc = pcBefore
        return safeError(result.error)
    }
  }

  /**
   * Step until the machine halts, faults, or `maxSteps` instructions ran
   */
  run(options: RunOptions = {}): Safe<RunResult, VMError> {
    const limit = options.maxSteps ?? Number.POSITIVE_INFINITY
    let steps = 0

    while (steps < limit) {
      const [error, haltReason] = this.step()
      if (error) {
        logger.error('Execution fault', error, {
          pc: this.state.pc,
          code: error.code,
        })
        return safeError(error)
      }
      if (haltReason !== null) {
        return safeResult({ haltReason, steps })
      }
      steps++
    }

    return safeResult({ haltReason: null, steps })
  }

  /**
   * Set a register to a 15-bit value
   */
  setRegister(index: number, value: Word): Safe<void, VMError> {
    if (!Number.isInteger(value) || value < 0 || value > WORD_CONFIG.MAX_LITERAL) {
      return safeError(new InvalidLoadError(value))
    }
    return set(this.state.registers, REGISTER_CONFIG.FIRST_OPERAND + index, value)
  }

  saveSnapshot(): Uint8Array {
    return encodeSnapshot(this.toSnapshotState())
  }

  /**
   * Independent copy of the machine state wired to new transports
   */
  clone<I2 extends ByteSource, O2 extends ByteSink>(
    input: I2,
    output: O2,
  ): VM<I2, O2> {
    const copy = new VM(input, output, this.options, this.toSnapshotState())
    copy.executedSteps = this.executedSteps
    copy.haltReason = this.haltReason
    return copy
  }

  private toSnapshotState(): SnapshotState {
    return {
      memory: this.state.memory.cells,
      registers: this.state.registers,
      stack: this.state.stack.words,
      pc: this.state.pc,
    }
  }

  /**
   * Decode the instruction at `pc`; operands stay unresolved
   */
  private fetch(pc: Address): Safe<FetchedInstruction, VMError> {
    const [opcodeError, opcode] = this.state.memory.read(pc)
    if (opcodeError) {
      return safeError(opcodeError)
    }

    const handler = this.registry.getHandler(opcode)
    if (!handler) {
      return safeError(new UnknownOpcodeError(opcode))
    }

    const operands: Word[] = []
    for (let i = 0; i < handler.operandCount; i++) {
      const [operandError, operand] = this.state.memory.read(pc + 1 + i)
      if (operandError) {
        return safeError(operandError)
      }
      operands.push(operand)
    }

    return safeResult({
      instruction: { opcode, operands, address: pc },
      handler,
    })
  }
}
