import type { Word, WordStack } from '@wordvm/types'

/**
 * Operand Stack Implementation
 *
 * Unbounded stack of resolved literals shared by push/pop and call/ret.
 */
export class OperandStack implements WordStack {
  public readonly words: Word[]

  constructor(words: readonly Word[] = []) {
    this.words = [...words]
  }

  push(value: Word): void {
    this.words.push(value)
  }

  pop(): Word | undefined {
    return this.words.pop()
  }

  peek(): Word | undefined {
    return this.words[this.words.length - 1]
  }

  isEmpty(): boolean {
    return this.words.length === 0
  }

  getDepth(): number {
    return this.words.length
  }

  clone(): OperandStack {
    return new OperandStack(this.words)
  }
}
