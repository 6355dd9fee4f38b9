/**
 * I/O Instructions
 *
 * OUT, IN - byte exchange with the machine's transports
 */

import type { InstructionContext, InstructionResult } from '@wordvm/types'
import { validateDestination } from '../addressing'
import { HALT_REASONS, OPCODES, TRANSPORT_CONFIG } from '../config'
import { BaseInstruction } from './base'

/**
 * OUT instruction (opcode 19)
 * Writes the low byte of the resolved operand
 */
export class OUTInstruction extends BaseInstruction {
  readonly opcode = OPCODES.OUT
  readonly name = 'out'

  execute(context: InstructionContext): InstructionResult {
    const [loadError, value] = this.load(context, 0)
    if (loadError) {
      return this.fault(loadError)
    }
    const [writeError] = context.output.writeByte(
      value & TRANSPORT_CONFIG.BYTE_MASK,
    )
    if (writeError) {
      return this.fault(writeError)
    }
    return this.next()
  }

  override disassemble(operands: readonly number[]): string {
    const base = super.disassemble(operands)
    const [operand] = operands
    if (operand === undefined || operand < 0x20 || operand > 0x7e) {
      return base
    }
    return `${base} ; '${String.fromCharCode(operand)}'`
  }
}

/**
 * IN instruction (opcode 20)
 * Reads one byte into a register, skipping carriage returns.
 *
 * The destination is checked first so that a bad operand never
 * consumes input. An exhausted source halts with `input_exhausted`.
 */
export class INInstruction extends BaseInstruction {
  readonly opcode = OPCODES.IN
  readonly name = 'in'

  execute(context: InstructionContext): InstructionResult {
    const [destinationError] = validateDestination(
      context.instruction.operands[0],
    )
    if (destinationError) {
      return this.fault(destinationError)
    }

    for (;;) {
      const [readError, byte] = context.input.readByte()
      if (readError) {
        return this.fault(readError)
      }
      if (byte === null) {
        return this.halt(HALT_REASONS.INPUT_EXHAUSTED)
      }
      if (byte !== TRANSPORT_CONFIG.CARRIAGE_RETURN) {
        return this.store(context, byte)
      }
    }
  }
}
