/**
 * Instruction Registry
 *
 * Central registry that imports and manages all instruction handlers.
 * Acts as a dispatcher for the VM runtime.
 */

import { ADDInstruction, MODInstruction, MULTInstruction } from './arithmetic'
import type { VMInstructionHandler } from './base'
import { ANDInstruction, NOTInstruction, ORInstruction } from './bitwise'
import { EQInstruction, GTInstruction } from './comparison'
import {
  CALLInstruction,
  HALTInstruction,
  JFInstruction,
  JMPInstruction,
  JTInstruction,
  NOOPInstruction,
  RETInstruction,
} from './control-flow'
import { INInstruction, OUTInstruction } from './io'
import { RMEMInstruction, WMEMInstruction } from './memory'
import { SETInstruction } from './register'
import { POPInstruction, PUSHInstruction } from './stack'

/**
 * Maps opcodes to their instruction implementations.
 * Handlers are stateless, so one registry is shared by every machine.
 */
export class InstructionRegistry {
  private static instance: InstructionRegistry | null = null
  private handlers: Map<number, VMInstructionHandler> = new Map()

  constructor() {
    this.registerInstructions()
  }

  static getInstance(): InstructionRegistry {
    if (!InstructionRegistry.instance) {
      InstructionRegistry.instance = new InstructionRegistry()
    }
    return InstructionRegistry.instance
  }

  /**
   * Register all instruction handlers
   */
  private registerInstructions(): void {
    // Control flow
    this.register(new HALTInstruction())
    this.register(new JMPInstruction())
    this.register(new JTInstruction())
    this.register(new JFInstruction())
    this.register(new CALLInstruction())
    this.register(new RETInstruction())
    this.register(new NOOPInstruction())

    // Registers and stack
    this.register(new SETInstruction())
    this.register(new PUSHInstruction())
    this.register(new POPInstruction())

    // Comparison
    this.register(new EQInstruction())
    this.register(new GTInstruction())

    // Arithmetic
    this.register(new ADDInstruction())
    this.register(new MULTInstruction())
    this.register(new MODInstruction())

    // Bitwise
    this.register(new ANDInstruction())
    this.register(new ORInstruction())
    this.register(new NOTInstruction())

    // Memory
    this.register(new RMEMInstruction())
    this.register(new WMEMInstruction())

    // I/O
    this.register(new OUTInstruction())
    this.register(new INInstruction())
  }

  /**
   * Register an instruction handler
   */
  register(handler: VMInstructionHandler): void {
    this.handlers.set(handler.opcode, handler)
  }

  /**
   * Get instruction handler by opcode
   */
  getHandler(opcode: number): VMInstructionHandler | undefined {
    return this.handlers.get(opcode)
  }

  hasHandler(opcode: number): boolean {
    return this.handlers.has(opcode)
  }

  getRegisteredOpcodes(): number[] {
    return Array.from(this.handlers.keys())
  }
}
