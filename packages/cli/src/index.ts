#!/usr/bin/env tsx

import { logger } from '@wordvm/core'
import { Command } from 'commander'
import { createDisassembleCommand } from './commands/disassemble'
import { createInspectCommand } from './commands/inspect'
import { createRunCommand } from './commands/run'
import { createSolveCommand } from './commands/solve'
import { loadCliEnv } from './env'

// Load and validate environment variables before the logger reads LOG_LEVEL
const env = loadCliEnv()

logger.init()

const program = new Command('wordvm')
  .description('Run, inspect and solve programs for the 15-bit word machine')
  .version('0.1.0')
  .addCommand(createRunCommand(env))
  .addCommand(createDisassembleCommand(env))
  .addCommand(createInspectCommand(env))
  .addCommand(createSolveCommand(env))

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error('Unhandled error', error)
  process.exit(1)
})
