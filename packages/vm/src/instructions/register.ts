/**
 * Register Instructions
 */

import type { InstructionContext, InstructionResult } from '@wordvm/types'
import { OPCODES } from '../config'
import { BaseInstruction } from './base'

/**
 * SET instruction (opcode 1)
 * set a b: register a receives the value of b
 */
export class SETInstruction extends BaseInstruction {
  readonly opcode = OPCODES.SET
  readonly name = 'set'

  execute(context: InstructionContext): InstructionResult {
    const [error, value] = this.load(context, 1)
    if (error) {
      return this.fault(error)
    }
    return this.store(context, value)
  }
}
