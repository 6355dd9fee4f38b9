import type { Address } from '@wordvm/types'
import { InstructionRegistry } from './instructions/registry'

export interface DisassembledInstruction {
  address: Address
  text: string
  /** Words covered, opcode included */
  length: number
}

/**
 * Disassemble the instruction at `address`.
 * Words that do not decode as an opcode are shown as data, one word each.
 */
export function disassemble(
  memory: ArrayLike<number>,
  address: Address,
  registry: InstructionRegistry = InstructionRegistry.getInstance(),
): DisassembledInstruction {
  const word = memory[address]
  const handler = registry.getHandler(word)
  if (!handler) {
    return { address, text: `.word ${word}`, length: 1 }
  }

  const end = address + 1 + handler.operandCount
  if (end > memory.length) {
    return { address, text: `.word ${word}`, length: 1 }
  }

  const operands = Array.from({ length: handler.operandCount }, (_, i) => {
    return memory[address + 1 + i]
  })
  return {
    address,
    text: handler.disassemble(operands),
    length: 1 + handler.operandCount,
  }
}

/**
 * Disassemble up to `count` consecutive instructions starting at `from`
 */
export function disassembleRange(
  memory: ArrayLike<number>,
  from: Address,
  count: number,
): DisassembledInstruction[] {
  const lines: DisassembledInstruction[] = []
  let address = from
  while (lines.length < count && address < memory.length) {
    const line = disassemble(memory, address)
    lines.push(line)
    address += line.length
  }
  return lines
}

/**
 * Render lines as `address: text`, addresses padded to five digits
 */
export function formatListing(lines: readonly DisassembledInstruction[]): string {
  return lines
    .map((line) => `${line.address.toString().padStart(5, '0')}: ${line.text}`)
    .join('\n')
}
