/**
 * Vault grid
 *
 * The vault is a square grid of rooms, each holding a number or an
 * operator. Walking from the antechamber corner to the door corner folds
 * the visited cells into a running weight: `number op number op ...`.
 * The door opens when the weight on arrival matches the target.
 */

import type { AdventureVM } from '@wordvm/adventure'
import { tryCommand } from '@wordvm/adventure'
import { logger } from '@wordvm/core'
import type { Room, Safe, VMError } from '@wordvm/types'
import { RoomParseError, safeError, safeResult } from '@wordvm/types'
import { WORD_CONFIG } from '@wordvm/vm'

export type VaultOperator = '+' | '-' | '*'

export type VaultCell =
  | { kind: 'number'; value: number }
  | { kind: 'operator'; operator: VaultOperator }

export type VaultGrid = Map<string, VaultCell>

export type VaultDirection = 'north' | 'south' | 'east' | 'west'

export const VAULT_DEFAULTS = {
  SIDE: 4,
  START_WEIGHT: 22,
  TARGET_WEIGHT: 30,
  ENTRANCE: 'Vault Antechamber',
  DOOR: 'Vault Door',
  /** The door only opens for a player carrying the orb */
  TAKE_ORB: 'take orb',
} as const

const CELL_PATTERN = /'([+\-*]|\d+)'/

const MOVES: ReadonlyArray<[VaultDirection, number, number]> = [
  ['east', 1, 0],
  ['west', -1, 0],
  ['north', 0, 1],
  ['south', 0, -1],
]

export function vaultKey(x: number, y: number): string {
  return `${x},${y}`
}

/**
 * Read the quoted number or operator out of a room description
 */
export function parseVaultCell(description: string): Safe<VaultCell, RoomParseError> {
  const match = CELL_PATTERN.exec(description)
  if (!match) {
    return safeError(new RoomParseError('No vault cell in description', description))
  }
  const token = match[1]
  if (token === '+' || token === '-' || token === '*') {
    return safeResult({ kind: 'operator', operator: token })
  }
  return safeResult({ kind: 'number', value: Number.parseInt(token, 10) })
}

function applyOperator(operator: VaultOperator, left: number, right: number): number {
  switch (operator) {
    case '+':
      return left + right
    case '-':
      return left - right
    case '*':
      return left * right
  }
}

export interface VaultPathOptions {
  side?: number
  startWeight?: number
  targetWeight?: number
}

interface SearchState {
  x: number
  y: number
  weight: number
  /** Operator waiting for the next number, if the last cell was one */
  pending: VaultOperator | null
  path: VaultDirection[]
}

/**
 * Shortest walk from (0, 0) to (side - 1, side - 1) that arrives with the
 * target weight. The entrance cannot be re-entered and the door ends the
 * walk, so neither is passed through. Weights leaving the word range are
 * dropped.
 * @returns directions to take, or null when no walk works
 */
export function findVaultPath(
  grid: VaultGrid,
  options: VaultPathOptions = {},
): VaultDirection[] | null {
  const side = options.side ?? VAULT_DEFAULTS.SIDE
  const startWeight = options.startWeight ?? VAULT_DEFAULTS.START_WEIGHT
  const targetWeight = options.targetWeight ?? VAULT_DEFAULTS.TARGET_WEIGHT
  const goal = vaultKey(side - 1, side - 1)

  const queue: SearchState[] = [
    { x: 0, y: 0, weight: startWeight, pending: null, path: [] },
  ]
  const seen = new Set<string>([`0,0,${startWeight},`])

  for (let head = 0; head < queue.length; head++) {
    const state = queue[head]

    for (const [direction, dx, dy] of MOVES) {
      const x = state.x + dx
      const y = state.y + dy
      if (x < 0 || y < 0 || x >= side || y >= side || (x === 0 && y === 0)) {
        continue
      }
      const cell = grid.get(vaultKey(x, y))
      if (!cell) {
        continue
      }

      let weight = state.weight
      let pending: VaultOperator | null = null
      if (cell.kind === 'operator') {
        if (state.pending !== null) {
          continue
        }
        pending = cell.operator
      } else if (state.pending !== null) {
        weight = applyOperator(state.pending, weight, cell.value)
      }
      if (weight < 0 || weight > WORD_CONFIG.MAX_LITERAL) {
        continue
      }

      const path = [...state.path, direction]
      const key = vaultKey(x, y)
      if (key === goal) {
        if (pending === null && weight === targetWeight) {
          return path
        }
        continue
      }

      const stateKey = `${key},${weight},${pending ?? ''}`
      if (seen.has(stateKey)) {
        continue
      }
      seen.add(stateKey)
      queue.push({ x, y, weight, pending, path })
    }
  }

  return null
}

/**
 * Map the vault by walking it from the antechamber.
 *
 * Each exit is tried on a fork. Moves that shatter the orb or lead out of
 * the vault are not followed, and the door is recorded but not left.
 */
export function exploreVault(
  vm: AdventureVM,
  start: Room,
  options: { side?: number; maxSteps?: number } = {},
): Safe<VaultGrid, VMError> {
  const side = options.side ?? VAULT_DEFAULTS.SIDE
  const grid: VaultGrid = new Map()

  const visit = (
    current: AdventureVM,
    room: Room,
    x: number,
    y: number,
  ): Safe<void, VMError> => {
    const key = vaultKey(x, y)
    if (grid.has(key)) {
      return safeResult(undefined)
    }
    const [cellError, cell] = parseVaultCell(room.description)
    if (cellError) {
      return safeError(cellError)
    }
    grid.set(key, cell)
    logger.debug('Mapped vault cell', { x, y, cell })

    if (room.title === VAULT_DEFAULTS.DOOR) {
      return safeResult(undefined)
    }

    for (const exit of room.exits) {
      const move = MOVES.find(([direction]) => direction === exit)
      if (!move) {
        continue
      }
      const nx = x + move[1]
      const ny = y + move[2]
      if (nx < 0 || ny < 0 || nx >= side || ny >= side || grid.has(vaultKey(nx, ny))) {
        continue
      }

      const [moveError, attempt] = tryCommand(current, exit, {
        maxSteps: options.maxSteps,
      })
      if (moveError) {
        return safeError(moveError)
      }
      const next = attempt.event.room
      if (
        attempt.event.prelude.includes('shatter') ||
        next === null ||
        !next.title.startsWith('Vault') ||
        next.title === VAULT_DEFAULTS.ENTRANCE
      ) {
        continue
      }

      const [visitError] = visit(attempt.vm, next, nx, ny)
      if (visitError) {
        return safeError(visitError)
      }
    }
    return safeResult(undefined)
  }

  const [error] = visit(vm, start, 0, 0)
  if (error) {
    return safeError(error)
  }
  logger.info('Mapped vault', { cells: grid.size })
  return safeResult(grid)
}
