import { logger } from '@wordvm/core'
import {
  InvalidAddressError,
  InvalidLoadError,
  InvalidStoreError,
  UnknownOpcodeError,
} from '@wordvm/types'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { ProgramBuilder } from '../program-builder'
import { encodeProgramImage } from '../program-loader'
import { BufferedInput, BufferedOutput, DiscardOutput } from '../transports'
import { VM } from '../vm'
import { createMachine, runToHalt } from './test-helpers'

function fromWords(words: number[], input = '') {
  const [error, vm] = VM.fromProgram(
    encodeProgramImage(words),
    new BufferedInput(input),
    new BufferedOutput(),
  )
  if (error) {
    throw error
  }
  return vm
}

describe('VM', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('execution', () => {
    it('should run a raw program to the halt opcode', () => {
      const vm = fromWords([19, 65, 19, 66, 0])
      const [error, result] = vm.run()

      expect(error).toBeUndefined()
      expect(result).toEqual({ haltReason: 'halt_opcode', steps: 2 })
      expect(vm.output.text()).toBe('AB')
      expect(vm.state.pc).toBe(4)
      expect(vm.stepCount).toBe(2)
    })

    it('should halt again when stepped after a halt', () => {
      const vm = fromWords([0])
      expect(vm.step()).toEqual([undefined, 'halt_opcode'])
      expect(vm.step()).toEqual([undefined, 'halt_opcode'])
      expect(vm.state.pc).toBe(0)
    })

    it('should return null while execution continues', () => {
      const vm = fromWords([21, 0])
      expect(vm.step()).toEqual([undefined, null])
      expect(vm.state.pc).toBe(1)
      expect(vm.lastHaltReason).toBeNull()
    })

    it('should fault on an unknown opcode', () => {
      const vm = fromWords([22])
      const [error] = vm.step()
      expect(error).toBeInstanceOf(UnknownOpcodeError)
      expect(error?.message).toBe('Unknown opcode 22')
      expect(vm.state.pc).toBe(0)
    })

    it('should fault when execution runs off the end of memory', () => {
      const vm = new VM(new BufferedInput(), new DiscardOutput(), {}, { pc: 32767 })
      vm.state.memory.write(32767, 21)

      expect(vm.step()).toEqual([undefined, null])
      const [error] = vm.step()
      expect(error).toBeInstanceOf(InvalidAddressError)
      expect(vm.state.pc).toBe(32768)
    })

    it('should fault when operands extend past memory', () => {
      const vm = new VM(new BufferedInput(), new DiscardOutput(), {}, { pc: 32767 })
      vm.state.memory.write(32767, 19)

      const [error] = vm.step()
      expect(error).toBeInstanceOf(InvalidAddressError)
      expect(vm.state.pc).toBe(32767)
    })

    it('should stop after maxSteps without an error', () => {
      const vm = createMachine(new ProgramBuilder().label('spin').jmp({ label: 'spin' }))
      const [error, result] = vm.run({ maxSteps: 10 })
      expect(error).toBeUndefined()
      expect(result).toEqual({ haltReason: null, steps: 10 })
      expect(vm.stepCount).toBe(10)
    })

    it('should log faults from run', () => {
      const spy = vi.spyOn(logger, 'error').mockImplementation(() => {})
      const vm = fromWords([22])
      const [error] = vm.run()

      expect(error).toBeInstanceOf(UnknownOpcodeError)
      expect(spy).toHaveBeenCalledWith('Execution fault', error, {
        pc: 0,
        code: 'unknown_opcode',
      })
    })

    it('should trace instructions at debug level when enabled', () => {
      const spy = vi.spyOn(logger, 'debug').mockImplementation(() => {})
      const [error, vm] = VM.fromProgram(
        encodeProgramImage([19, 65, 0]),
        new BufferedInput(),
        new DiscardOutput(),
        { trace: true },
      )
      if (error) {
        throw error
      }
      vm.step()
      expect(spy).toHaveBeenCalledWith('Executing instruction', {
        pc: 0,
        instruction: "out 65 ; 'A'",
      })
    })
  })

  describe('scripted input', () => {
    it('should echo input and resume after more is appended', () => {
      const vm = createMachine(
        new ProgramBuilder().label('loop').in('r0').out('r0').jmp({ label: 'loop' }),
        'hi\n',
      )

      expect(runToHalt(vm).haltReason).toBe('input_exhausted')
      expect(vm.output.text()).toBe('hi\n')
      expect(vm.state.pc).toBe(0)

      vm.input.append('yo\n')
      expect(runToHalt(vm).haltReason).toBe('input_exhausted')
      expect(vm.output.text()).toBe('hi\nyo\n')
    })
  })

  describe('setRegister', () => {
    it('should set a register to a 15-bit value', () => {
      const vm = fromWords([0])
      expect(vm.setRegister(7, 25734)).toEqual([undefined, undefined])
      expect(vm.state.registers[7]).toBe(25734)
    })

    it('should reject an invalid register index', () => {
      const [error] = fromWords([0]).setRegister(8, 1)
      expect(error).toBeInstanceOf(InvalidStoreError)
    })

    it('should reject values outside 15 bits', () => {
      const [error] = fromWords([0]).setRegister(0, 32768)
      expect(error).toBeInstanceOf(InvalidLoadError)
    })
  })

  describe('snapshots and cloning', () => {
    it('should restore an identical machine from a snapshot', () => {
      const vm = createMachine(
        new ProgramBuilder().push(5).push(6).set('r2', 300).in('r0').halt(),
      )
      runToHalt(vm)

      const [error, restored] = VM.fromSnapshot(
        vm.saveSnapshot(),
        new BufferedInput('z'),
        new BufferedOutput(),
      )
      if (error) {
        throw error
      }

      expect(restored.state.pc).toBe(vm.state.pc)
      expect(restored.state.stack.words).toEqual([5, 6])
      expect(Array.from(restored.state.registers)).toEqual(
        Array.from(vm.state.registers),
      )
      expect(restored.state.memory.cells).toEqual(vm.state.memory.cells)

      expect(runToHalt(restored).haltReason).toBe('halt_opcode')
      expect(restored.state.registers[0]).toBe(122)
    })

    it('should clone into an independent machine', () => {
      const vm = createMachine(
        new ProgramBuilder().label('loop').in('r0').push('r0').jmp({ label: 'loop' }),
        'a',
      )
      runToHalt(vm)

      const copy = vm.clone(vm.input.clone(), vm.output.clone())
      copy.input.append('b')
      runToHalt(copy)

      expect(copy.state.stack.words).toEqual([97, 98])
      expect(vm.state.stack.words).toEqual([97])
      expect(vm.input.pending).toBe(0)
      expect(copy.stepCount).toBe(vm.stepCount + 3)
    })
  })
})
