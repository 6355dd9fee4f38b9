/**
 * Stack Instructions
 *
 * PUSH, POP
 */

import type { InstructionContext, InstructionResult } from '@wordvm/types'
import { PopFromEmptyStackError } from '@wordvm/types'
import { validateDestination } from '../addressing'
import { OPCODES } from '../config'
import { BaseInstruction } from './base'

/**
 * PUSH instruction (opcode 2)
 */
export class PUSHInstruction extends BaseInstruction {
  readonly opcode = OPCODES.PUSH
  readonly name = 'push'

  execute(context: InstructionContext): InstructionResult {
    const [error, value] = this.load(context, 0)
    if (error) {
      return this.fault(error)
    }
    context.state.stack.push(value)
    return this.next()
  }
}

/**
 * POP instruction (opcode 3)
 * The destination is checked before the stack is touched, so a fault
 * leaves the stack intact.
 */
export class POPInstruction extends BaseInstruction {
  readonly opcode = OPCODES.POP
  readonly name = 'pop'

  execute(context: InstructionContext): InstructionResult {
    const [destinationError] = validateDestination(
      context.instruction.operands[0],
    )
    if (destinationError) {
      return this.fault(destinationError)
    }
    const value = context.state.stack.pop()
    if (value === undefined) {
      return this.fault(new PopFromEmptyStackError())
    }
    return this.store(context, value)
  }
}
