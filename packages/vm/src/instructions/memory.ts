/**
 * Memory Instructions
 *
 * RMEM, WMEM
 */

import type { InstructionContext, InstructionResult } from '@wordvm/types'
import { OPCODES } from '../config'
import { BaseInstruction } from './base'

/**
 * RMEM instruction (opcode 15)
 * rmem a b: register a receives memory[b]
 *
 * The cell is stored through `set`, so a cell holding a register
 * reference copies that register, and a cell above 32775 faults.
 */
export class RMEMInstruction extends BaseInstruction {
  readonly opcode = OPCODES.RMEM
  readonly name = 'rmem'

  execute(context: InstructionContext): InstructionResult {
    const [loadError, address] = this.load(context, 1)
    if (loadError) {
      return this.fault(loadError)
    }
    const [readError, cell] = context.state.memory.read(address)
    if (readError) {
      return this.fault(readError)
    }
    return this.store(context, cell)
  }
}

/**
 * WMEM instruction (opcode 16)
 * wmem a b: memory[a] receives b
 */
export class WMEMInstruction extends BaseInstruction {
  readonly opcode = OPCODES.WMEM
  readonly name = 'wmem'

  execute(context: InstructionContext): InstructionResult {
    const [addressError, address] = this.load(context, 0)
    if (addressError) {
      return this.fault(addressError)
    }
    const [valueError, value] = this.load(context, 1)
    if (valueError) {
      return this.fault(valueError)
    }
    const [writeError] = context.state.memory.write(address, value)
    if (writeError) {
      return this.fault(writeError)
    }
    return this.next()
  }
}
