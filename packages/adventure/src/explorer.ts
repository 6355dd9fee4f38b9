/**
 * Adventure driver helpers
 *
 * Feed commands to a machine wired to in-memory transports and read back
 * one parsed response at a time.
 */

import type {
  ProgramImageError,
  RoomEvent,
  RunOptions,
  Safe,
  SnapshotError,
  VMError,
  VMOptions,
} from '@wordvm/types'
import { safeError, safeResult } from '@wordvm/types'
import { BufferedInput, BufferedOutput, VM } from '@wordvm/vm'
import { PROMPT, parseRoom } from './room-parser'

export type AdventureVM = VM<BufferedInput, BufferedOutput>

/**
 * Load a program image with scripted input and captured output
 */
export function adventureFromProgram(
  image: Uint8Array,
  input = '',
  options: VMOptions = {},
): Safe<AdventureVM, ProgramImageError> {
  return VM.fromProgram(
    image,
    new BufferedInput(input),
    new BufferedOutput(),
    options,
  )
}

/**
 * Resume a saved game with scripted input and captured output
 */
export function adventureFromSnapshot(
  snapshot: Uint8Array,
  input = '',
  options: VMOptions = {},
): Safe<AdventureVM, SnapshotError> {
  return VM.fromSnapshot(
    snapshot,
    new BufferedInput(input),
    new BufferedOutput(),
    options,
  )
}

/**
 * Queue a command line for the guest
 */
export function sendCommand(vm: AdventureVM, command: string): void {
  vm.input.append(`${command}\n`)
}

/**
 * Independent copy of the machine and both transports
 */
export function forkAdventure(vm: AdventureVM): AdventureVM {
  return vm.clone(vm.input.clone(), vm.output.clone())
}

/**
 * Take the next prompt-terminated response from the output cursor.
 * Without a prompt, everything unread is taken.
 */
export function takeResponse(output: BufferedOutput): string {
  const unread = output.unread()
  const promptIndex = unread.indexOf(PROMPT)
  if (promptIndex < 0) {
    return output.readNew()
  }
  const length = promptIndex + PROMPT.length
  output.consume(length)
  return unread.slice(0, length)
}

/**
 * Run until the machine halts (normally on exhausted input), then parse
 * the next response after the output cursor.
 */
export function cycleUntilNextRoom(
  vm: AdventureVM,
  options: RunOptions = {},
): Safe<RoomEvent, VMError> {
  const [runError, result] = vm.run(options)
  if (runError) {
    return safeError(runError)
  }

  const [parseError, parsed] = parseRoom(takeResponse(vm.output))
  if (parseError) {
    return safeError(parseError)
  }
  return safeResult({ ...parsed, haltReason: result.haltReason })
}

/**
 * Fork the machine, send `command` to the fork and read its response
 */
export function tryCommand(
  vm: AdventureVM,
  command: string,
  options: RunOptions = {},
): Safe<{ vm: AdventureVM; event: RoomEvent }, VMError> {
  const fork = forkAdventure(vm)
  sendCommand(fork, command)
  const [error, event] = cycleUntilNextRoom(fork, options)
  if (error) {
    return safeError(error)
  }
  return safeResult({ vm: fork, event })
}

/**
 * Send each command in turn and read its response.
 * @returns the response to the last command
 */
export function runCommands(
  vm: AdventureVM,
  commands: readonly string[],
  options: RunOptions = {},
): Safe<RoomEvent, VMError> {
  let last: RoomEvent = { prelude: '', room: null, haltReason: null }
  for (const command of commands) {
    sendCommand(vm, command)
    const [error, event] = cycleUntilNextRoom(vm, options)
    if (error) {
      return safeError(error)
    }
    last = event
  }
  return safeResult(last)
}
