/**
 * Bitwise Instructions
 *
 * AND, OR, NOT
 */

import type { InstructionContext, InstructionResult } from '@wordvm/types'
import { OPCODES, WORD_CONFIG } from '../config'
import { BaseInstruction } from './base'

/**
 * AND instruction (opcode 12)
 */
export class ANDInstruction extends BaseInstruction {
  readonly opcode = OPCODES.AND
  readonly name = 'and'

  execute(context: InstructionContext): InstructionResult {
    const [error, operands] = this.loadPair(context)
    if (error) {
      return this.fault(error)
    }
    const [b, c] = operands
    return this.store(context, b & c)
  }
}

/**
 * OR instruction (opcode 13)
 */
export class ORInstruction extends BaseInstruction {
  readonly opcode = OPCODES.OR
  readonly name = 'or'

  execute(context: InstructionContext): InstructionResult {
    const [error, operands] = this.loadPair(context)
    if (error) {
      return this.fault(error)
    }
    const [b, c] = operands
    return this.store(context, b | c)
  }
}

/**
 * NOT instruction (opcode 14)
 * 15-bit inverse: bit 15 is never set
 */
export class NOTInstruction extends BaseInstruction {
  readonly opcode = OPCODES.NOT
  readonly name = 'not'

  execute(context: InstructionContext): InstructionResult {
    const [error, value] = this.load(context, 1)
    if (error) {
      return this.fault(error)
    }
    return this.store(context, ~value & WORD_CONFIG.MASK)
  }
}
