/**
 * Program Builder
 *
 * Small assembler for writing guest programs in code. Operands are literals,
 * register names (`r0`..`r7`) or label references resolved at build time.
 *
 * ```ts
 * const [error, image] = new ProgramBuilder()
 *   .label('loop')
 *   .in('r0')
 *   .out('r0')
 *   .jmp({ label: 'loop' })
 *   .buildImage()
 * ```
 */

import type { RegisterIndex, Safe, Word } from '@wordvm/types'
import { safeError, safeResult } from '@wordvm/types'
import {
  INSTRUCTION_LENGTHS,
  OPCODES,
  type Opcode,
  REGISTER_CONFIG,
} from './config'
import { encodeProgramImage } from './program-loader'

export type RegisterName = `r${RegisterIndex}`

export interface LabelReference {
  label: string
}

export type AsmOperand = Word | RegisterName | LabelReference

type Cell = Word | LabelReference

export function registerOperand(name: RegisterName): Word {
  return REGISTER_CONFIG.FIRST_OPERAND + Number(name.slice(1))
}

export class ProgramBuilder {
  private readonly cells: Cell[] = []
  private readonly labels = new Map<string, number>()
  private readonly problems: string[] = []

  /** Address of the next emitted word */
  get address(): number {
    return this.cells.length
  }

  label(name: string): this {
    if (this.labels.has(name)) {
      this.problems.push(`Label ${name} is defined twice`)
    }
    this.labels.set(name, this.cells.length)
    return this
  }

  instruction(opcode: Opcode, ...operands: AsmOperand[]): this {
    if (operands.length !== INSTRUCTION_LENGTHS[opcode]) {
      this.problems.push(
        `Opcode ${opcode} at ${this.cells.length} takes ${INSTRUCTION_LENGTHS[opcode]} operands, got ${operands.length}`,
      )
    }
    this.cells.push(opcode)
    for (const operand of operands) {
      this.cells.push(
        typeof operand === 'string' ? registerOperand(operand) : operand,
      )
    }
    return this
  }

  /** Raw words, emitted as-is */
  data(...words: Word[]): this {
    this.cells.push(...words)
    return this
  }

  halt(): this {
    return this.instruction(OPCODES.HALT)
  }

  set(a: RegisterName, b: AsmOperand): this {
    return this.instruction(OPCODES.SET, a, b)
  }

  push(a: AsmOperand): this {
    return this.instruction(OPCODES.PUSH, a)
  }

  pop(a: RegisterName): this {
    return this.instruction(OPCODES.POP, a)
  }

  eq(a: RegisterName, b: AsmOperand, c: AsmOperand): this {
    return this.instruction(OPCODES.EQ, a, b, c)
  }

  gt(a: RegisterName, b: AsmOperand, c: AsmOperand): this {
    return this.instruction(OPCODES.GT, a, b, c)
  }

  jmp(a: AsmOperand): this {
    return this.instruction(OPCODES.JMP, a)
  }

  jt(a: AsmOperand, b: AsmOperand): this {
    return this.instruction(OPCODES.JT, a, b)
  }

  jf(a: AsmOperand, b: AsmOperand): this {
    return this.instruction(OPCODES.JF, a, b)
  }

  add(a: RegisterName, b: AsmOperand, c: AsmOperand): this {
    return this.instruction(OPCODES.ADD, a, b, c)
  }

  mult(a: RegisterName, b: AsmOperand, c: AsmOperand): this {
    return this.instruction(OPCODES.MULT, a, b, c)
  }

  mod(a: RegisterName, b: AsmOperand, c: AsmOperand): this {
    return this.instruction(OPCODES.MOD, a, b, c)
  }

  and(a: RegisterName, b: AsmOperand, c: AsmOperand): this {
    return this.instruction(OPCODES.AND, a, b, c)
  }

  or(a: RegisterName, b: AsmOperand, c: AsmOperand): this {
    return this.instruction(OPCODES.OR, a, b, c)
  }

  not(a: RegisterName, b: AsmOperand): this {
    return this.instruction(OPCODES.NOT, a, b)
  }

  rmem(a: RegisterName, b: AsmOperand): this {
    return this.instruction(OPCODES.RMEM, a, b)
  }

  wmem(a: AsmOperand, b: AsmOperand): this {
    return this.instruction(OPCODES.WMEM, a, b)
  }

  call(a: AsmOperand): this {
    return this.instruction(OPCODES.CALL, a)
  }

  ret(): this {
    return this.instruction(OPCODES.RET)
  }

  out(a: AsmOperand): this {
    return this.instruction(OPCODES.OUT, a)
  }

  in(a: RegisterName): this {
    return this.instruction(OPCODES.IN, a)
  }

  noop(): this {
    return this.instruction(OPCODES.NOOP)
  }

  /**
   * Emit one `out` per character
   */
  print(text: string): this {
    for (let i = 0; i < text.length; i++) {
      this.out(text.charCodeAt(i))
    }
    return this
  }

  /**
   * Consume input up to and including the next newline.
   * The first byte of the line is left in `first`.
   */
  readLine(
    first: RegisterName,
    scratch: RegisterName,
    flag: RegisterName,
  ): this {
    const loop = `__readline_${this.cells.length}`
    const done = `${loop}_done`
    return this.in(first)
      .set(scratch, first)
      .label(loop)
      .eq(flag, scratch, 10)
      .jt(flag, { label: done })
      .in(scratch)
      .jmp({ label: loop })
      .label(done)
  }

  /**
   * Resolve labels and return the memory words
   */
  build(): Safe<Uint16Array> {
    if (this.problems.length > 0) {
      return safeError(new Error(this.problems.join('; ')))
    }

    const words = new Uint16Array(this.cells.length)
    for (let i = 0; i < this.cells.length; i++) {
      const cell = this.cells[i]
      if (typeof cell === 'number') {
        words[i] = cell
        continue
      }
      const address = this.labels.get(cell.label)
      if (address === undefined) {
        return safeError(new Error(`Undefined label ${cell.label}`))
      }
      words[i] = address
    }
    return safeResult(words)
  }

  /**
   * Resolve labels and return a loadable program image
   */
  buildImage(): Safe<Uint8Array> {
    const [error, words] = this.build()
    if (error) {
      return safeError(error)
    }
    return safeResult(encodeProgramImage(words))
  }
}
