/**
 * Depth-first room search
 *
 * Walks the map on forked machines until a response satisfies a predicate.
 * Rooms are identified by title and description, so mazes of identically
 * titled rooms are still told apart.
 */

import type { AdventureVM } from '@wordvm/adventure'
import { forkAdventure, roomKey, tryCommand } from '@wordvm/adventure'
import { logger } from '@wordvm/core'
import type { ParsedResponse, Room, Safe, VMError } from '@wordvm/types'
import { safeError, safeResult } from '@wordvm/types'

export interface RoomMatch {
  /** Machine positioned right after the matching response */
  vm: AdventureVM
  room: Room | null
  prelude: string
  /** Commands that lead from the start room to the match */
  path: string[]
}

export interface RoomSearchOptions {
  /** Exits never taken */
  skipExits?: readonly string[]
  maxSteps?: number
}

export const ROOM_SEARCH_DEFAULTS = {
  SKIP_EXITS: ['ladder'],
} as const

/** Twisty passages: fetch the item, light the lantern, look for the code */
export const PASSAGE_DEFAULTS = {
  ITEM: 'can',
  LIGHT_COMMAND: 'use lantern',
  CODE_PRELUDE: 'Chiseled',
} as const

export function searchRooms(
  vm: AdventureVM,
  start: Room,
  matches: (event: ParsedResponse) => boolean,
  options: RoomSearchOptions = {},
): Safe<RoomMatch | null, VMError> {
  const skipExits = new Set<string>(options.skipExits ?? ROOM_SEARCH_DEFAULTS.SKIP_EXITS)
  const visited = new Set<string>([roomKey(start)])

  if (matches({ prelude: '', room: start })) {
    return safeResult({ vm: forkAdventure(vm), room: start, prelude: '', path: [] })
  }

  const visit = (
    current: AdventureVM,
    room: Room,
    path: string[],
  ): Safe<RoomMatch | null, VMError> => {
    for (const exit of room.exits) {
      if (skipExits.has(exit)) {
        continue
      }
      const [error, attempt] = tryCommand(current, exit, {
        maxSteps: options.maxSteps,
      })
      if (error) {
        return safeError(error)
      }

      const { event } = attempt
      const nextPath = [...path, exit]
      if (matches(event)) {
        logger.debug('Room search matched', { path: nextPath })
        return safeResult({
          vm: attempt.vm,
          room: event.room,
          prelude: event.prelude,
          path: nextPath,
        })
      }

      const next = event.room
      if (next === null || visited.has(roomKey(next))) {
        continue
      }
      visited.add(roomKey(next))

      const [visitError, found] = visit(attempt.vm, next, nextPath)
      if (visitError) {
        return safeError(visitError)
      }
      if (found) {
        return safeResult(found)
      }
    }
    return safeResult(null)
  }

  const [error, found] = visit(vm, start, [])
  if (error) {
    return safeError(error)
  }
  logger.info('Room search finished', {
    rooms: visited.size,
    found: found !== null,
  })
  return safeResult(found)
}

/**
 * First room that lists `item`
 */
export function findItemRoom(
  vm: AdventureVM,
  start: Room,
  item: string,
  options: RoomSearchOptions = {},
): Safe<RoomMatch | null, VMError> {
  return searchRooms(
    vm,
    start,
    (event) => event.room?.items.includes(item) ?? false,
    options,
  )
}

/**
 * First move whose response prints `text` before the room
 */
export function findPrelude(
  vm: AdventureVM,
  start: Room,
  text: string,
  options: RoomSearchOptions = {},
): Safe<RoomMatch | null, VMError> {
  return searchRooms(vm, start, (event) => event.prelude.includes(text), options)
}
