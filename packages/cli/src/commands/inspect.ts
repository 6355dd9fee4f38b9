import { logger } from '@wordvm/core'
import type { SnapshotState } from '@wordvm/vm'
import { decodeSnapshot, disassemble } from '@wordvm/vm'
import { Command } from 'commander'
import type { CliEnv } from '../env'
import { readBinaryFile, resolveSnapshotPath } from '../utils/files'

/**
 * Human-readable summary of a saved machine
 */
export function formatSnapshotSummary(state: SnapshotState): string {
  const registers = Array.from(state.registers, (value, i) => `r${i}=${value}`)
  const lines = [
    `pc: ${state.pc}`,
    `registers: ${registers.join(' ')}`,
    `stack (${state.stack.length}): ${state.stack.join(' ')}`.trimEnd(),
  ]
  if (state.pc < state.memory.length) {
    lines.push(`next: ${disassemble(state.memory, state.pc).text}`)
  }
  return lines.join('\n')
}

export function createInspectCommand(env: CliEnv): Command {
  const command = new Command('inspect')
    .description('Print the pc, registers and stack of a snapshot')
    .argument('<snapshot>', 'Snapshot file')
    .action(async (snapshot: string) => {
      const path = resolveSnapshotPath(snapshot, env.VM_SNAPSHOT_DIR)
      const [readError, bytes] = await readBinaryFile(path)
      if (readError) {
        logger.error('Failed to read snapshot', readError)
        process.exitCode = 1
        return
      }
      const [decodeError, state] = decodeSnapshot(bytes)
      if (decodeError) {
        logger.error('Failed to decode snapshot', decodeError)
        process.exitCode = 1
        return
      }
      process.stdout.write(`${formatSnapshotSummary(state)}\n`)
    })

  return command
}
