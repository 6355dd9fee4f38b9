/**
 * Scripted worlds
 *
 * Compiles a room graph into a guest program that speaks the same text
 * protocol as the game: it prints a room, reads a command line and follows
 * the exit whose name starts with the command's first letter. Actions match
 * the whole line instead. Any other command prints the room again. Useful
 * for exercising drivers and solvers without the real program image.
 */

import type { Safe } from '@wordvm/types'
import { safeError } from '@wordvm/types'
import { ProgramBuilder } from '@wordvm/vm'
import { PROMPT } from './room-parser'

export interface ScriptedExit {
  name: string
  to: string
  /** Printed before the destination room */
  message?: string
}

/**
 * A command matched on the whole line, such as `take orb`
 */
export interface ScriptedAction {
  command: string
  reply: string
  /** Room the player is in afterwards; defaults to the current one */
  to?: string
  /** Describe the room after the reply instead of prompting right away */
  showRoom?: boolean
}

export interface ScriptedRoom {
  id: string
  title: string
  description: string
  items?: string[]
  exits: ScriptedExit[]
  actions?: ScriptedAction[]
}

export interface ScriptedWorld {
  start: string
  rooms: ScriptedRoom[]
  /** Printed once before the first room */
  intro?: string
}

/**
 * Text printed for a room, prompt included
 */
export function renderRoom(room: ScriptedRoom): string {
  let text = `== ${room.title} ==\n${room.description}\n\n`
  const items = room.items ?? []
  if (items.length > 0) {
    const entries = items.map((item) => `- ${item}\n`).join('')
    text += `Things of interest here:\n${entries}\n`
  }
  if (room.exits.length > 0) {
    const header =
      room.exits.length === 1
        ? 'There is 1 exit:'
        : `There are ${room.exits.length} exits:`
    const entries = room.exits.map((exit) => `- ${exit.name}\n`).join('')
    text += `${header}\n${entries}\n`
  }
  return `${text}${PROMPT}`
}

const NEWLINE = 10

/**
 * Consume input up to the newline, starting from the byte already in r1
 */
function drainLine(program: ProgramBuilder, name: string, then: string): void {
  program
    .label(name)
    .eq('r2', 'r1', NEWLINE)
    .jt('r2', { label: then })
    .in('r1')
    .jmp({ label: name })
}

function checkRoom(room: ScriptedRoom, ids: Set<string>): Error | null {
  const initials = new Set<string>()
  for (const exit of room.exits) {
    if (!ids.has(exit.to)) {
      return new Error(`Exit ${exit.name} of ${room.id} leads to unknown room ${exit.to}`)
    }
    const initial = exit.name.charAt(0)
    if (initials.has(initial)) {
      return new Error(`Exits of ${room.id} share the initial ${initial}`)
    }
    initials.add(initial)
  }

  const commands = new Set<string>()
  for (const action of room.actions ?? []) {
    if (action.command === '' || action.command.includes('\n')) {
      return new Error(`Action of ${room.id} needs a single-line command`)
    }
    if (commands.has(action.command)) {
      return new Error(`Action ${action.command} of ${room.id} is defined twice`)
    }
    commands.add(action.command)
    if (initials.has(action.command.charAt(0))) {
      return new Error(`Action ${action.command} of ${room.id} clashes with an exit initial`)
    }
    if (action.to !== undefined && !ids.has(action.to)) {
      return new Error(`Action ${action.command} of ${room.id} leads to unknown room ${action.to}`)
    }
  }
  return null
}

/**
 * Emit the command matcher for one room. The first byte picks an exit or
 * starts walking a prefix tree of action commands; a mismatch anywhere
 * drains the line and describes the room again.
 */
function emitDispatch(program: ProgramBuilder, room: ScriptedRoom): void {
  const actions = room.actions ?? []
  const unknown = `unknown:${room.id}`

  const emitNode = (prefix: string): void => {
    program.label(`node:${room.id}:${prefix}`).in('r1')
    if (prefix === '') {
      room.exits.forEach((exit, index) => {
        program
          .eq('r2', 'r1', exit.name.charCodeAt(0))
          .jt('r2', { label: `exit:${room.id}:${index}` })
      })
    }
    actions.forEach((action, index) => {
      if (prefix !== '' && action.command === prefix) {
        program
          .eq('r2', 'r1', NEWLINE)
          .jt('r2', { label: `action:${room.id}:${index}` })
      }
    })

    const children = new Set<string>()
    for (const action of actions) {
      if (action.command.length > prefix.length && action.command.startsWith(prefix)) {
        children.add(action.command.charAt(prefix.length))
      }
    }
    for (const next of children) {
      program
        .eq('r2', 'r1', next.charCodeAt(0))
        .jt('r2', { label: `node:${room.id}:${prefix}${next}` })
    }
    program.jmp({ label: unknown })

    for (const next of children) {
      emitNode(`${prefix}${next}`)
    }
  }

  emitNode('')
  drainLine(program, unknown, `room:${room.id}`)
}

export function buildScriptedWorld(world: ScriptedWorld): Safe<Uint8Array> {
  const ids = new Set(world.rooms.map((room) => room.id))
  if (!ids.has(world.start)) {
    return safeError(new Error(`Unknown start room ${world.start}`))
  }
  for (const room of world.rooms) {
    const problem = checkRoom(room, ids)
    if (problem) {
      return safeError(problem)
    }
  }

  const program = new ProgramBuilder()
  if (world.intro) {
    program.print(world.intro)
  }
  program.jmp({ label: `room:${world.start}` })

  for (const room of world.rooms) {
    program.label(`room:${room.id}`).print(renderRoom(room))
    emitDispatch(program, room)

    room.exits.forEach((exit, index) => {
      const after = `exit:${room.id}:${index}:go`
      drainLine(program, `exit:${room.id}:${index}`, after)
      program.label(after)
      if (exit.message) {
        program.print(exit.message)
      }
      program.jmp({ label: `room:${exit.to}` })
    })

    const actions = room.actions ?? []
    actions.forEach((action, index) => {
      const to = action.to ?? room.id
      program.label(`action:${room.id}:${index}`)
      if (action.showRoom) {
        program.print(`${action.reply}\n\n`).jmp({ label: `room:${to}` })
      } else {
        program.print(`${action.reply}\n\n${PROMPT}`).jmp({ label: `node:${to}:` })
      }
    })
  }

  return program.buildImage()
}
