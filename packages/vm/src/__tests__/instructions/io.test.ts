import { InvalidStoreError } from '@wordvm/types'
import { describe, expect, it } from 'vitest'
import { OPCODES } from '../../config'
import { ProgramBuilder } from '../../program-builder'
import { createMachine, runToHalt } from '../test-helpers'

describe('I/O Instructions', () => {
  it('should write bytes to the output', () => {
    const vm = createMachine(new ProgramBuilder().out(72).out(105).halt())
    runToHalt(vm)
    expect(vm.output.text()).toBe('Hi')
  })

  it('should write only the low byte', () => {
    const vm = createMachine(new ProgramBuilder().set('r0', 321).out('r0').halt())
    runToHalt(vm)
    expect(Array.from(vm.output.bytes())).toEqual([65])
  })

  it('should skip carriage returns on input', () => {
    const vm = createMachine(
      new ProgramBuilder().in('r0').in('r1').halt(),
      '\r7\r\n',
    )
    runToHalt(vm)
    expect(vm.state.registers[0]).toBe(55)
    expect(vm.state.registers[1]).toBe(10)
  })

  it('should halt on exhausted input and resume once more arrives', () => {
    const vm = createMachine(new ProgramBuilder().noop().in('r0').halt())

    expect(runToHalt(vm)).toEqual({ haltReason: 'input_exhausted', steps: 1 })
    expect(vm.state.pc).toBe(1)

    vm.input.append('x')
    expect(runToHalt(vm)).toEqual({ haltReason: 'halt_opcode', steps: 1 })
    expect(vm.state.registers[0]).toBe(120)
  })

  it('should not consume input when the destination is invalid', () => {
    const vm = createMachine(
      new ProgramBuilder().instruction(OPCODES.IN, 5),
      'a',
    )
    const [error] = vm.step()
    expect(error).toBeInstanceOf(InvalidStoreError)
    expect(vm.input.position).toBe(0)
    expect(vm.input.pending).toBe(1)
  })
})
