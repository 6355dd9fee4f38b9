import type { Address, Safe, Word, WordMemory } from '@wordvm/types'
import { InvalidAddressError, safeError, safeResult } from '@wordvm/types'
import { MEMORY_CONFIG, WORD_CONFIG } from './config'

/**
 * VM Memory Implementation
 *
 * Flat array of 32768 cells. Cells hold raw 16-bit words because the program
 * image stores operand encodings (register references) alongside code.
 * Every access outside the address space is reported, never wrapped.
 */
export class VMMemory implements WordMemory {
  public readonly cells: Uint16Array

  constructor(cells?: Uint16Array) {
    this.cells = new Uint16Array(MEMORY_CONFIG.SIZE)
    if (cells) {
      this.cells.set(cells.subarray(0, MEMORY_CONFIG.SIZE))
    }
  }

  get size(): number {
    return this.cells.length
  }

  isValidAddress(address: Address): boolean {
    return Number.isInteger(address) && address >= 0 && address < this.size
  }

  read(address: Address): Safe<Word, InvalidAddressError> {
    if (!this.isValidAddress(address)) {
      return safeError(new InvalidAddressError(address))
    }
    return safeResult(this.cells[address])
  }

  write(address: Address, value: Word): Safe<void, InvalidAddressError> {
    if (!this.isValidAddress(address)) {
      return safeError(new InvalidAddressError(address))
    }
    this.cells[address] = value & WORD_CONFIG.MAX_RAW
    return safeResult(undefined)
  }

  /**
   * Copy words into memory starting at `address`; words past the end are dropped
   */
  load(address: Address, words: ArrayLike<number>): void {
    const end = Math.min(this.size, address + words.length)
    for (let i = address; i < end; i++) {
      this.cells[i] = words[i - address] & WORD_CONFIG.MAX_RAW
    }
  }

  clone(): VMMemory {
    return new VMMemory(this.cells)
  }
}
