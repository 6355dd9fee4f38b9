/**
 * Arithmetic Instructions
 *
 * ADD, MULT, MOD - all results are reduced modulo 32768
 */

import type { InstructionContext, InstructionResult } from '@wordvm/types'
import { DivisionByZeroError } from '@wordvm/types'
import { OPCODES, WORD_CONFIG } from '../config'
import { BaseInstruction } from './base'

/**
 * ADD instruction (opcode 9)
 */
export class ADDInstruction extends BaseInstruction {
  readonly opcode = OPCODES.ADD
  readonly name = 'add'

  execute(context: InstructionContext): InstructionResult {
    const [error, operands] = this.loadPair(context)
    if (error) {
      return this.fault(error)
    }
    const [b, c] = operands
    return this.store(context, (b + c) % WORD_CONFIG.MODULUS)
  }
}

/**
 * MULT instruction (opcode 10)
 * Operands are below 2^15, so the product stays exact in a double.
 */
export class MULTInstruction extends BaseInstruction {
  readonly opcode = OPCODES.MULT
  readonly name = 'mult'

  execute(context: InstructionContext): InstructionResult {
    const [error, operands] = this.loadPair(context)
    if (error) {
      return this.fault(error)
    }
    const [b, c] = operands
    return this.store(context, (b * c) % WORD_CONFIG.MODULUS)
  }
}

/**
 * MOD instruction (opcode 11)
 * Unsigned remainder; a zero divisor faults
 */
export class MODInstruction extends BaseInstruction {
  readonly opcode = OPCODES.MOD
  readonly name = 'mod'

  execute(context: InstructionContext): InstructionResult {
    const [error, operands] = this.loadPair(context)
    if (error) {
      return this.fault(error)
    }
    const [b, c] = operands
    if (c === 0) {
      return this.fault(new DivisionByZeroError(b))
    }
    return this.store(context, b % c)
  }
}
