import {
  type AdventureVM,
  type ScriptedWorld,
  adventureFromProgram,
  buildScriptedWorld,
  cycleUntilNextRoom,
} from '@wordvm/adventure'
import { RoomParseError, type Room } from '@wordvm/types'
import { describe, expect, it } from 'vitest'
import {
  type VaultCell,
  type VaultGrid,
  exploreVault,
  findVaultPath,
  parseVaultCell,
  vaultKey,
} from '../vault'

const num = (value: number): VaultCell => ({ kind: 'number', value })
const op = (operator: '+' | '-' | '*'): VaultCell => ({ kind: 'operator', operator })

// Rows listed from y = 3 down to y = 0; x grows to the right
const ROWS: VaultCell[][] = [
  [op('*'), num(9), op('*'), num(1)],
  [num(3), op('*'), num(1), op('+')],
  [op('*'), num(5), op('-'), num(2)],
  [num(22), op('+'), num(8), op('*')],
]

function gridFromRows(rows: VaultCell[][]): VaultGrid {
  const grid: VaultGrid = new Map()
  rows.forEach((row, i) => {
    const y = rows.length - 1 - i
    row.forEach((cell, x) => grid.set(vaultKey(x, y), cell))
  })
  return grid
}

const VAULT: ScriptedWorld = {
  start: 'a00',
  rooms: [
    {
      id: 'a00',
      title: 'Vault Antechamber',
      description: "A pedestal holds the number '22'.",
      exits: [
        { name: 'north', to: 'a01' },
        { name: 'east', to: 'a10' },
        { name: 'down', to: 'outside' },
      ],
    },
    {
      id: 'a10',
      title: 'Vault Lock',
      description: "The floor is marked with '-'.",
      exits: [
        { name: 'west', to: 'a00' },
        { name: 'north', to: 'a11' },
      ],
    },
    {
      id: 'a01',
      title: 'Vault Lock',
      description: "The floor is marked with '*'.",
      exits: [
        { name: 'south', to: 'a00' },
        { name: 'east', to: 'a11', message: 'The orb shatters!\n\n' },
      ],
    },
    {
      id: 'a11',
      title: 'Vault Door',
      description: "The door is engraved with '8'.",
      exits: [
        { name: 'south', to: 'a10' },
        { name: 'west', to: 'a01' },
        { name: 'vault', to: 'a11' },
      ],
    },
    {
      id: 'outside',
      title: 'Hallway',
      description: 'Stairs lead up.',
      exits: [{ name: 'up', to: 'a00' }],
    },
  ],
}

function enterVault(): { vm: AdventureVM; room: Room } {
  const [buildError, image] = buildScriptedWorld(VAULT)
  if (buildError) {
    throw buildError
  }
  const [loadError, vm] = adventureFromProgram(image)
  if (loadError) {
    throw loadError
  }
  const [error, event] = cycleUntilNextRoom(vm)
  if (error) {
    throw error
  }
  if (!event.room) {
    throw new Error('No room in first response')
  }
  return { vm, room: event.room }
}

describe('parseVaultCell', () => {
  it('should read quoted numbers and operators', () => {
    expect(parseVaultCell("Marked '12' on the wall.")).toEqual([undefined, num(12)])
    expect(parseVaultCell("A '+' symbol.")).toEqual([undefined, op('+')])
  })

  it('should reject descriptions without a quoted token', () => {
    const [error] = parseVaultCell('Nothing here.')
    expect(error).toBeInstanceOf(RoomParseError)
    expect(error?.message).toBe('No vault cell in description')
  })
})

describe('findVaultPath', () => {
  it('should find the shortest walk reaching the target weight', () => {
    expect(findVaultPath(gridFromRows(ROWS))).toEqual([
      'east',
      'east',
      'north',
      'north',
      'east',
      'north',
    ])
  })

  it('should return null when the door cannot be reached', () => {
    const grid: VaultGrid = new Map([[vaultKey(0, 0), num(22)]])
    expect(findVaultPath(grid)).toBeNull()
  })
})

describe('exploreVault', () => {
  it('should map every reachable cell without leaving the vault', () => {
    const { vm, room } = enterVault()

    const [error, grid] = exploreVault(vm, room, { side: 2 })

    expect(error).toBeUndefined()
    expect(grid?.size).toBe(4)
    expect(grid?.get('0,0')).toEqual(num(22))
    expect(grid?.get('1,0')).toEqual(op('-'))
    expect(grid?.get('0,1')).toEqual(op('*'))
    expect(grid?.get('1,1')).toEqual(num(8))
  })

  it('should leave the original machine in the antechamber', () => {
    const { vm, room } = enterVault()
    const cursor = vm.output.cursor

    exploreVault(vm, room, { side: 2 })

    expect(vm.output.cursor).toBe(cursor)
    expect(vm.input.pending).toBe(0)
  })

  it('should plan a walk over the explored grid', () => {
    const { vm, room } = enterVault()
    const [, grid] = exploreVault(vm, room, { side: 2 })
    const explored: VaultGrid = grid ?? new Map()

    expect(findVaultPath(explored, { side: 2, targetWeight: 14 })).toEqual([
      'east',
      'north',
    ])
    expect(findVaultPath(explored, { side: 2, targetWeight: 176 })).toEqual([
      'north',
      'east',
    ])
  })
})
