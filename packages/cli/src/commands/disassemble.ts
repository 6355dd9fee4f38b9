import { logger } from '@wordvm/core'
import { decodeProgramImage, disassembleRange, formatListing } from '@wordvm/vm'
import { Command } from 'commander'
import type { CliEnv } from '../env'
import { readBinaryFile } from '../utils/files'
import { parseIntegerOption } from '../utils/validation'

export interface DisassembleCommandOptions {
  from: number
  count: number
}

export function createDisassembleCommand(env: CliEnv): Command {
  const command = new Command('disassemble')
    .description('Print a listing of a program image')
    .argument('[program]', 'Program image', env.VM_PROGRAM)
    .option('--from <addr>', 'First address to list', parseIntegerOption, 0)
    .option('--count <n>', 'Instructions to list', parseIntegerOption, 64)
    .action(async (program: string, options: DisassembleCommandOptions) => {
      const [readError, image] = await readBinaryFile(program)
      if (readError) {
        logger.error('Failed to read program', readError)
        process.exitCode = 1
        return
      }
      const [decodeError, words] = decodeProgramImage(image)
      if (decodeError) {
        logger.error('Failed to decode program', decodeError)
        process.exitCode = 1
        return
      }

      const lines = disassembleRange(words, options.from, options.count)
      process.stdout.write(`${formatListing(lines)}\n`)
    })

  return command
}
