/**
 * Base VM Instruction System
 *
 * Defines the base interface and abstract class for all instructions.
 */

import type {
  HaltReason,
  InstructionContext,
  InstructionResult,
  Safe,
  VMError,
  Word,
} from '@wordvm/types'
import { safeError, safeResult } from '@wordvm/types'
import { load, registerIndexOf, set } from '../addressing'
import { INSTRUCTION_LENGTHS, type Opcode, RESULT_CODES } from '../config'

/**
 * Base interface for all instruction handlers
 */
export interface VMInstructionHandler {
  readonly opcode: Opcode
  readonly name: string
  /** Operand words following the opcode */
  readonly operandCount: number

  /**
   * Execute the instruction (mutates context in place)
   * @returns resultCode (null = continue, otherwise halt/fault)
   */
  execute(context: InstructionContext): InstructionResult

  /**
   * Disassemble instruction to string representation
   */
  disassemble(operands: readonly Word[]): string
}

/**
 * Render an operand the way the assembler listing shows it:
 * literals in decimal, registers as r0..r7, invalid encodings in hex
 */
export function formatOperand(operand: Word): string {
  const index = registerIndexOf(operand)
  if (index !== null) {
    return `r${index}`
  }
  if (operand > 0x7fff) {
    return `0x${operand.toString(16)}`
  }
  return operand.toString()
}

/**
 * Abstract base class for instructions
 */
export abstract class BaseInstruction implements VMInstructionHandler {
  abstract readonly opcode: Opcode
  abstract readonly name: string

  get operandCount(): number {
    return INSTRUCTION_LENGTHS[this.opcode]
  }

  /**
   * Resolve operand `index` of the current instruction
   */
  protected load(context: InstructionContext, index: number): Safe<Word, VMError> {
    return load(context.state.registers, context.instruction.operands[index])
  }

  /**
   * Resolve the second and third operands (`b` and `c` of `op a b c`)
   */
  protected loadPair(context: InstructionContext): Safe<[Word, Word], VMError> {
    const [errorB, b] = this.load(context, 1)
    if (errorB) {
      return safeError(errorB)
    }
    const [errorC, c] = this.load(context, 2)
    if (errorC) {
      return safeError(errorC)
    }
    return safeResult([b, c])
  }

  /**
   * Write a value into the destination register named by the first operand
   */
  protected store(context: InstructionContext, value: Word): InstructionResult {
    const [error] = set(
      context.state.registers,
      context.instruction.operands[0],
      value,
    )
    if (error) {
      return this.fault(error)
    }
    return this.next()
  }

  /**
   * Resolve operand `index` and make it the next pc
   */
  protected jump(context: InstructionContext, index: number): InstructionResult {
    const [error, target] = this.load(context, index)
    if (error) {
      return this.fault(error)
    }
    context.pc = target
    return this.next()
  }

  protected next(): InstructionResult {
    return { resultCode: null }
  }

  protected halt(haltReason: HaltReason): InstructionResult {
    return { resultCode: RESULT_CODES.HALT, haltReason }
  }

  protected fault(error: VMError): InstructionResult {
    return { resultCode: RESULT_CODES.FAULT, error }
  }

  /**
   * Default disassembly - show mnemonic and operands
   */
  disassemble(operands: readonly Word[]): string {
    if (operands.length === 0) {
      return this.name
    }
    return `${this.name} ${operands.map(formatOperand).join(' ')}`
  }

  /**
   * Abstract execute method
   */
  abstract execute(context: InstructionContext): InstructionResult
}
