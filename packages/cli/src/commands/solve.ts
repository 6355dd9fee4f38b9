import type { AdventureVM } from '@wordvm/adventure'
import {
  adventureFromSnapshot,
  cycleUntilNextRoom,
  runCommands,
  sendCommand,
} from '@wordvm/adventure'
import { logger } from '@wordvm/core'
import {
  PASSAGE_DEFAULTS,
  VAULT_DEFAULTS,
  exploreVault,
  findItemRoom,
  findPrelude,
  findVaultPath,
  patchTeleporter,
  solveCoinEquation,
} from '@wordvm/solvers'
import type { Room, Safe, SafePromise } from '@wordvm/types'
import { safeError, safeResult } from '@wordvm/types'
import { Argument, Command } from 'commander'
import type { CliEnv } from '../env'
import { readBinaryFile, resolveSnapshotPath, writeBinaryFile } from '../utils/files'

export const PUZZLES = ['coins', 'teleporter', 'vault', 'passages'] as const

export type Puzzle = (typeof PUZZLES)[number]

export interface SolveCommandOptions {
  snapshot?: string
  out?: string
  command?: string
  item: string
}

interface Solution {
  /** Lines printed for the player */
  lines: string[]
  /** Machine to save with --out, when the solver drove one */
  vm: AdventureVM | null
}

interface SolveContext {
  options: SolveCommandOptions
  env: CliEnv
}

export function createSolveCommand(env: CliEnv): Command {
  const command = new Command('solve')
    .description('Work out a puzzle, optionally from a saved game')
    .addArgument(new Argument('<puzzle>', 'Puzzle to solve').choices(PUZZLES))
    .option('--snapshot <file>', 'Saved game standing at the puzzle')
    .option('--out <file>', 'Save the game after applying the solution')
    .option(
      '--command <text>',
      'Command sent first: the teleporter trigger, or the look command for map puzzles',
    )
    .option('--item <name>', 'Item to look for in the passages', PASSAGE_DEFAULTS.ITEM)
    .action(async (puzzle: Puzzle, options: SolveCommandOptions) => {
      process.exitCode = await executeSolve(puzzle, options, env)
    })

  return command
}

/**
 * @returns the process exit code
 */
export async function executeSolve(
  puzzle: Puzzle,
  options: SolveCommandOptions,
  env: CliEnv,
  write: (text: string) => void = (text) => process.stdout.write(text),
): Promise<number> {
  const [error, solution] = await SOLVERS[puzzle]({ options, env })
  if (error) {
    logger.error(`Failed to solve ${puzzle}`, error)
    return 1
  }

  write(solution.lines.map((line) => `${line}\n`).join(''))

  if (options.out && solution.vm) {
    const path = resolveSnapshotPath(options.out, env.VM_SNAPSHOT_DIR)
    const [saveError] = await writeBinaryFile(path, solution.vm.saveSnapshot())
    if (saveError) {
      logger.error('Failed to save snapshot', saveError)
      return 1
    }
  }
  return 0
}

const SOLVERS: Record<Puzzle, (context: SolveContext) => SafePromise<Solution>> = {
  coins: async () => {
    const coins = solveCoinEquation()
    if (!coins) {
      return safeError(new Error('No coin order satisfies the equation'))
    }
    return safeResult({ lines: coins.map((coin) => `use ${coin.name}`), vm: null })
  },

  teleporter: async ({ options, env }) => {
    const [loadError, vm] = await loadAdventure(options, env)
    if (loadError) {
      return safeError(loadError)
    }
    const [patchError, patch] = patchTeleporter(vm, {
      command: options.command,
      maxSteps: env.VM_STEP_LIMIT,
    })
    if (patchError) {
      return safeError(patchError)
    }
    const [runError, event] = cycleUntilNextRoom(vm, { maxSteps: env.VM_STEP_LIMIT })
    if (runError) {
      return safeError(runError)
    }
    return safeResult({
      lines: [
        `r7 = ${patch.r7} (f(${patch.m}, ${patch.n}) = ${patch.target})`,
        `arrived at: ${event.room?.title ?? 'unknown'}`,
      ],
      vm,
    })
  },

  vault: async ({ options, env }) => {
    const [loadError, vm] = await loadAdventure(options, env)
    if (loadError) {
      return safeError(loadError)
    }
    const [orbError] = runCommands(vm, [VAULT_DEFAULTS.TAKE_ORB], {
      maxSteps: env.VM_STEP_LIMIT,
    })
    if (orbError) {
      return safeError(orbError)
    }
    const [roomError, room] = currentRoom(vm, options.command, env)
    if (roomError) {
      return safeError(roomError)
    }
    const [exploreError, grid] = exploreVault(vm, room, {
      maxSteps: env.VM_STEP_LIMIT,
    })
    if (exploreError) {
      return safeError(exploreError)
    }
    const path = findVaultPath(grid)
    if (!path) {
      return safeError(new Error('No walk through the vault opens the door'))
    }

    for (const direction of path) {
      sendCommand(vm, direction)
    }
    const [runError] = vm.run({ maxSteps: env.VM_STEP_LIMIT })
    if (runError) {
      return safeError(runError)
    }
    return safeResult({ lines: path, vm })
  },

  passages: async ({ options, env }) => {
    const [loadError, vm] = await loadAdventure(options, env)
    if (loadError) {
      return safeError(loadError)
    }
    const [roomError, room] = currentRoom(vm, options.command, env)
    if (roomError) {
      return safeError(roomError)
    }
    const [searchError, match] = findItemRoom(vm, room, options.item, {
      maxSteps: env.VM_STEP_LIMIT,
    })
    if (searchError) {
      return safeError(searchError)
    }
    if (!match) {
      return safeError(new Error(`No reachable room holds ${options.item}`))
    }

    const lightCommands = [
      `take ${options.item}`,
      `use ${options.item}`,
      PASSAGE_DEFAULTS.LIGHT_COMMAND,
    ]
    const [lightError, lit] = runCommands(match.vm, lightCommands, {
      maxSteps: env.VM_STEP_LIMIT,
    })
    if (lightError) {
      return safeError(lightError)
    }
    let litRoom = lit.room
    if (!litRoom) {
      const [lookError, looked] = currentRoom(match.vm, options.command, env)
      if (lookError) {
        return safeError(lookError)
      }
      litRoom = looked
    }

    const [codeError, code] = findPrelude(
      match.vm,
      litRoom,
      PASSAGE_DEFAULTS.CODE_PRELUDE,
      { maxSteps: env.VM_STEP_LIMIT },
    )
    if (codeError) {
      return safeError(codeError)
    }
    if (!code) {
      return safeError(
        new Error(`No lit passage shows ${PASSAGE_DEFAULTS.CODE_PRELUDE}`),
      )
    }
    return safeResult({
      lines: [...match.path, ...lightCommands, ...code.path, code.prelude.trim()],
      vm: code.vm,
    })
  },
}

async function loadAdventure(
  options: SolveCommandOptions,
  env: CliEnv,
): SafePromise<AdventureVM> {
  if (!options.snapshot) {
    return safeError(new Error('This puzzle needs --snapshot'))
  }
  const path = resolveSnapshotPath(options.snapshot, env.VM_SNAPSHOT_DIR)
  const [readError, bytes] = await readBinaryFile(path)
  if (readError) {
    return safeError(readError)
  }
  return adventureFromSnapshot(bytes)
}

/**
 * Ask the guest to describe the room the saved game stands in
 */
function currentRoom(
  vm: AdventureVM,
  command: string | undefined,
  env: CliEnv,
): Safe<Room> {
  sendCommand(vm, command ?? 'look')
  const [error, event] = cycleUntilNextRoom(vm, { maxSteps: env.VM_STEP_LIMIT })
  if (error) {
    return safeError(error)
  }
  if (!event.room) {
    return safeError(new Error('The game did not describe a room'))
  }
  return safeResult(event.room)
}
