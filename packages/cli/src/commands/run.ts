import { logger } from '@wordvm/core'
import type { ByteSink, ByteSource, Safe, VMError } from '@wordvm/types'
import { safeError } from '@wordvm/types'
import { BufferedInput, TerminalInput, TerminalOutput, VM } from '@wordvm/vm'
import { Command } from 'commander'
import type { CliEnv } from '../env'
import {
  readBinaryFile,
  readTextFile,
  resolveSnapshotPath,
  writeBinaryFile,
} from '../utils/files'
import { parseIntegerOption } from '../utils/validation'

export interface RunCommandOptions {
  snapshot?: string
  script?: string
  save?: string
  trace?: boolean
  maxSteps?: number
}

export function createRunCommand(env: CliEnv): Command {
  const command = new Command('run')
    .description('Run a program image or resume a snapshot on the terminal')
    .argument('[program]', 'Program image', env.VM_PROGRAM)
    .option('--snapshot <file>', 'Resume from a snapshot instead of the program')
    .option('--script <file>', 'Feed input from a file instead of the terminal')
    .option('--save <file>', 'Write a snapshot when the run stops')
    .option('--trace', 'Log every executed instruction at debug level')
    .option('--max-steps <n>', 'Stop after this many instructions', parseIntegerOption)
    .action(async (program: string, options: RunCommandOptions) => {
      process.exitCode = await executeRun(program, options, env)
    })

  return command
}

async function loadMachine(
  program: string,
  options: RunCommandOptions,
  env: CliEnv,
  input: ByteSource,
  output: ByteSink,
): Promise<Safe<VM, VMError | Error>> {
  const vmOptions = { trace: options.trace ?? false }

  if (options.snapshot) {
    const path = resolveSnapshotPath(options.snapshot, env.VM_SNAPSHOT_DIR)
    const [readError, bytes] = await readBinaryFile(path)
    if (readError) {
      return safeError(readError)
    }
    logger.info('Resuming snapshot', { path })
    return VM.fromSnapshot(bytes, input, output, vmOptions)
  }

  const [readError, image] = await readBinaryFile(program)
  if (readError) {
    return safeError(readError)
  }
  logger.info('Loading program', { path: program, bytes: image.length })
  return VM.fromProgram(image, input, output, vmOptions)
}

/**
 * Run to a halt, a fault or the step limit.
 * @returns the process exit code: 0 unless the machine faulted or could not start
 */
export async function executeRun(
  program: string,
  options: RunCommandOptions,
  env: CliEnv,
  output: ByteSink = new TerminalOutput(),
): Promise<number> {
  let input: ByteSource = new TerminalInput()
  if (options.script) {
    const [scriptError, script] = await readTextFile(options.script)
    if (scriptError) {
      logger.error('Failed to load input script', scriptError)
      return 1
    }
    input = new BufferedInput(script)
  }

  const [loadError, vm] = await loadMachine(program, options, env, input, output)
  if (loadError) {
    logger.error('Failed to start machine', loadError)
    return 1
  }

  const [runError, result] = vm.run({
    maxSteps: options.maxSteps ?? env.VM_STEP_LIMIT,
  })
  if (result) {
    logger.info('Machine stopped', {
      haltReason: result.haltReason,
      steps: result.steps,
      pc: vm.state.pc,
    })
  }

  if (options.save) {
    const path = resolveSnapshotPath(options.save, env.VM_SNAPSHOT_DIR)
    const [saveError] = await writeBinaryFile(path, vm.saveSnapshot())
    if (saveError) {
      logger.error('Failed to save snapshot', saveError)
      return 1
    }
  }

  return runError ? 1 : 0
}
