import { InvalidLoadError, InvalidStoreError } from '@wordvm/types'
import { describe, expect, it } from 'vitest'
import { load, registerIndexOf, set, validateDestination } from '../addressing'

describe('Addressing resolver', () => {
  describe('registerIndexOf', () => {
    it('should map register operands to indices', () => {
      expect(registerIndexOf(32768)).toBe(0)
      expect(registerIndexOf(32775)).toBe(7)
    })

    it('should return null for literals and invalid operands', () => {
      expect(registerIndexOf(0)).toBeNull()
      expect(registerIndexOf(32767)).toBeNull()
      expect(registerIndexOf(32776)).toBeNull()
    })
  })

  describe('load', () => {
    it('should return literals unchanged', () => {
      const registers = new Uint16Array(8)
      expect(load(registers, 0)).toEqual([undefined, 0])
      expect(load(registers, 32767)).toEqual([undefined, 32767])
    })

    it('should read register contents', () => {
      const registers = new Uint16Array(8)
      registers[3] = 42
      expect(load(registers, 32771)).toEqual([undefined, 42])
    })

    it('should reject operands above the register range', () => {
      const [error] = load(new Uint16Array(8), 32776)
      expect(error).toBeInstanceOf(InvalidLoadError)
      expect(error?.message).toBe('Tried to load invalid address 0x8008')
      expect(error?.code).toBe('invalid_load')
    })
  })

  describe('set', () => {
    it('should store a literal into a register', () => {
      const registers = new Uint16Array(8)
      const [error] = set(registers, 32768, 5)
      expect(error).toBeUndefined()
      expect(registers[0]).toBe(5)
    })

    it('should copy one register into another', () => {
      const registers = new Uint16Array(8)
      registers[1] = 1234
      set(registers, 32774, 32769)
      expect(registers[6]).toBe(1234)
    })

    it('should reject a literal destination', () => {
      const registers = new Uint16Array(8)
      const [error] = set(registers, 5, 1)
      expect(error).toBeInstanceOf(InvalidStoreError)
      expect(Array.from(registers)).toEqual([0, 0, 0, 0, 0, 0, 0, 0])
    })

    it('should resolve the source before checking the destination', () => {
      const [error] = set(new Uint16Array(8), 5, 40000)
      expect(error).toBeInstanceOf(InvalidLoadError)
    })
  })

  describe('validateDestination', () => {
    it('should accept registers only', () => {
      expect(validateDestination(32770)).toEqual([undefined, 2])
      const [error] = validateDestination(100)
      expect(error).toBeInstanceOf(InvalidStoreError)
    })
  })
})
