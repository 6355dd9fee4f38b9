/**
 * Control Flow Instructions
 *
 * HALT, JMP, JT, JF, CALL, RET, NOOP
 */

import type { InstructionContext, InstructionResult } from '@wordvm/types'
import { HALT_REASONS, OPCODES } from '../config'
import { BaseInstruction } from './base'

/**
 * HALT instruction (opcode 0)
 * Stops execution normally
 */
export class HALTInstruction extends BaseInstruction {
  readonly opcode = OPCODES.HALT
  readonly name = 'halt'

  execute(_context: InstructionContext): InstructionResult {
    return this.halt(HALT_REASONS.HALT_OPCODE)
  }
}

/**
 * JMP instruction (opcode 6)
 * Unconditional jump to the resolved address
 */
export class JMPInstruction extends BaseInstruction {
  readonly opcode = OPCODES.JMP
  readonly name = 'jmp'

  execute(context: InstructionContext): InstructionResult {
    return this.jump(context, 0)
  }
}

/**
 * JT instruction (opcode 7)
 * Jump to `b` when `a` is nonzero
 */
export class JTInstruction extends BaseInstruction {
  readonly opcode = OPCODES.JT
  readonly name = 'jt'

  execute(context: InstructionContext): InstructionResult {
    const [error, condition] = this.load(context, 0)
    if (error) {
      return this.fault(error)
    }
    if (condition === 0) {
      return this.next()
    }
    return this.jump(context, 1)
  }
}

/**
 * JF instruction (opcode 8)
 * Jump to `b` when `a` is zero
 */
export class JFInstruction extends BaseInstruction {
  readonly opcode = OPCODES.JF
  readonly name = 'jf'

  execute(context: InstructionContext): InstructionResult {
    const [error, condition] = this.load(context, 0)
    if (error) {
      return this.fault(error)
    }
    if (condition !== 0) {
      return this.next()
    }
    return this.jump(context, 1)
  }
}

/**
 * CALL instruction (opcode 17)
 * Pushes the address of the next instruction, then jumps
 */
export class CALLInstruction extends BaseInstruction {
  readonly opcode = OPCODES.CALL
  readonly name = 'call'

  execute(context: InstructionContext): InstructionResult {
    const [error, target] = this.load(context, 0)
    if (error) {
      return this.fault(error)
    }
    context.state.stack.push(context.pc)
    context.pc = target
    return this.next()
  }
}

/**
 * RET instruction (opcode 18)
 * Pops the return address; an empty stack halts
 */
export class RETInstruction extends BaseInstruction {
  readonly opcode = OPCODES.RET
  readonly name = 'ret'

  execute(context: InstructionContext): InstructionResult {
    const target = context.state.stack.pop()
    if (target === undefined) {
      return this.halt(HALT_REASONS.EMPTY_RETURN)
    }
    context.pc = target
    return this.next()
  }
}

/**
 * NOOP instruction (opcode 21)
 */
export class NOOPInstruction extends BaseInstruction {
  readonly opcode = OPCODES.NOOP
  readonly name = 'noop'

  execute(_context: InstructionContext): InstructionResult {
    return this.next()
  }
}
