/**
 * Comparison Instructions
 *
 * EQ, GT
 */

import type { InstructionContext, InstructionResult } from '@wordvm/types'
import { OPCODES } from '../config'
import { BaseInstruction } from './base'

/**
 * EQ instruction (opcode 4)
 * eq a b c: a = 1 if b == c, else 0
 */
export class EQInstruction extends BaseInstruction {
  readonly opcode = OPCODES.EQ
  readonly name = 'eq'

  execute(context: InstructionContext): InstructionResult {
    const [error, operands] = this.loadPair(context)
    if (error) {
      return this.fault(error)
    }
    const [b, c] = operands
    return this.store(context, b === c ? 1 : 0)
  }
}

/**
 * GT instruction (opcode 5)
 * gt a b c: a = 1 if b > c, else 0
 */
export class GTInstruction extends BaseInstruction {
  readonly opcode = OPCODES.GT
  readonly name = 'gt'

  execute(context: InstructionContext): InstructionResult {
    const [error, operands] = this.loadPair(context)
    if (error) {
      return this.fault(error)
    }
    const [b, c] = operands
    return this.store(context, b > c ? 1 : 0)
  }
}
