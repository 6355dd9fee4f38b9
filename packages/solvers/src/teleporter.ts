/**
 * Teleporter calibration
 *
 * The guest verifies the eighth register by evaluating
 *
 *   f(0, n) = n + 1
 *   f(m, 0) = f(m - 1, r7)
 *   f(m, n) = f(m - 1, f(m, n - 1))
 *
 * modulo 32768 and comparing the result with a constant. Run directly this
 * takes far too long, so the check is skipped and the register value that
 * passes it is computed here instead.
 */

import type { AdventureVM } from '@wordvm/adventure'
import { sendCommand } from '@wordvm/adventure'
import { logger } from '@wordvm/core'
import type { Safe, VMError } from '@wordvm/types'
import { safeError, safeResult } from '@wordvm/types'
import { WORD_CONFIG } from '@wordvm/vm'

const MODULUS = WORD_CONFIG.MODULUS

/**
 * Sum of a^p for p in [0, n) and a^n, both modulo 32768
 */
function geometricSeries(a: number, n: number): [number, number] {
  if (n === 0) {
    return [0, 1]
  }
  if (n % 2 === 1) {
    const [sum, power] = geometricSeries(a, n - 1)
    return [(sum + power) % MODULUS, (power * a) % MODULUS]
  }
  const [sum, power] = geometricSeries(a, n / 2)
  return [(sum + sum * power) % MODULUS, (power * power) % MODULUS]
}

/**
 * Evaluates f for one value of r7.
 *
 * For m <= 3 closed forms apply, with a = f(1, 0) and b = f(2, 0):
 *   f(1, n) = a + n
 *   f(2, n) = n * a + b
 *   f(3, n) = f(3, 0) * a^n + b * (a^0 + ... + a^(n-1))
 * Higher rows are tabulated on demand.
 */
export class TeleporterFunction {
  private readonly rows = new Map<number, number[]>()
  private readonly a: number
  private readonly b: number
  private readonly c: number

  constructor(public readonly r7: number) {
    this.a = (r7 + 1) % MODULUS
    this.b = (this.a + r7) % MODULUS
    this.c = (r7 * this.a + this.b) % MODULUS
  }

  evaluate(m: number, n: number): number {
    switch (m) {
      case 0:
        return (n + 1) % MODULUS
      case 1:
        return (this.a + n) % MODULUS
      case 2:
        return (n * this.a + this.b) % MODULUS
      case 3: {
        const [sum, power] = geometricSeries(this.a, n)
        return (this.c * power + this.b * sum) % MODULUS
      }
      default:
        return this.row(m, n)[n]
    }
  }

  /**
   * f(m, 0..n), extended as needed
   */
  private row(m: number, n: number): number[] {
    let row = this.rows.get(m)
    if (!row) {
      row = [this.evaluate(m - 1, this.r7)]
      this.rows.set(m, row)
    }
    while (row.length <= n) {
      row.push(this.evaluate(m - 1, row[row.length - 1]))
    }
    return row
  }
}

export interface RegisterSearchOptions {
  from?: number
  to?: number
}

/**
 * Smallest r7 for which f(m, n) equals `target`
 */
export function findTeleporterRegister(
  m: number,
  n: number,
  target: number,
  options: RegisterSearchOptions = {},
): number | null {
  const from = options.from ?? 0
  const to = options.to ?? WORD_CONFIG.MAX_LITERAL
  for (let r7 = from; r7 <= to; r7++) {
    if (new TeleporterFunction(r7).evaluate(m, n) === target) {
      return r7
    }
  }
  return null
}

export interface TeleporterPatchOptions {
  /** pc of the instruction that loads the first parameter */
  checkPc?: number
  /** pc right after the call to the check function */
  resumePc?: number
  /** Command that triggers the check; null to send nothing */
  command?: string | null
  /** Nonzero value placed in r7 so the guest takes the calibrated path */
  bogusRegister?: number
  maxSteps?: number
}

export interface TeleporterPatch {
  m: number
  n: number
  target: number
  r7: number
}

export const TELEPORTER_DEFAULTS = {
  CHECK_PC: 5483,
  RESUME_PC: 5491,
  COMMAND: 'use teleporter',
  BOGUS_REGISTER: 0xca,
  MAX_STEPS: 10_000_000,
} as const

/**
 * Drive the machine to the register check, skip the call and leave the
 * registers as a successful check would.
 *
 * Parameters are read from `set r0 m` at checkPc and `set r1 n` right
 * after it; the expected value from `eq _ r0 target` at resumePc.
 */
export function patchTeleporter(
  vm: AdventureVM,
  options: TeleporterPatchOptions = {},
): Safe<TeleporterPatch, VMError | Error> {
  const checkPc = options.checkPc ?? TELEPORTER_DEFAULTS.CHECK_PC
  const resumePc = options.resumePc ?? TELEPORTER_DEFAULTS.RESUME_PC
  const command =
    options.command === undefined ? TELEPORTER_DEFAULTS.COMMAND : options.command
  const maxSteps = options.maxSteps ?? TELEPORTER_DEFAULTS.MAX_STEPS

  const [registerError] = vm.setRegister(
    7,
    options.bogusRegister ?? TELEPORTER_DEFAULTS.BOGUS_REGISTER,
  )
  if (registerError) {
    return safeError(registerError)
  }
  if (command !== null) {
    sendCommand(vm, command)
  }

  let steps = 0
  while (vm.state.pc !== checkPc) {
    if (steps >= maxSteps) {
      return safeError(new Error(`Check at ${checkPc} not reached in ${maxSteps} steps`))
    }
    const [error, haltReason] = vm.step()
    if (error) {
      return safeError(error)
    }
    if (haltReason !== null) {
      return safeError(
        new Error(`Machine halted (${haltReason}) before reaching ${checkPc}`),
      )
    }
    steps++
  }

  const cells = vm.state.memory.cells
  const m = cells[checkPc + 2]
  const n = cells[checkPc + 5]
  const target = cells[resumePc + 3]
  logger.info('Reached teleporter check', { pc: checkPc, m, n, target })

  const r7 = findTeleporterRegister(m, n, target)
  if (r7 === null) {
    return safeError(new Error(`No register value gives f(${m}, ${n}) = ${target}`))
  }

  vm.state.pc = resumePc
  const [targetError] = vm.setRegister(0, target)
  if (targetError) {
    return safeError(targetError)
  }
  const [r7Error] = vm.setRegister(7, r7)
  if (r7Error) {
    return safeError(r7Error)
  }

  logger.info('Calibrated teleporter', { r7 })
  return safeResult({ m, n, target, r7 })
}
