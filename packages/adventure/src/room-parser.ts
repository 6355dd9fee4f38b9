/**
 * Room Parser
 *
 * Scrapes room records from game output. A response looks like:
 *
 *   == Foothills ==
 *   You find yourself standing at the base of an enormous mountain.
 *
 *   Things of interest here:
 *   - tablet
 *
 *   There are 2 exits:
 *   - doorway
 *   - south
 *
 *   What do you do?
 *
 * Anything printed before the `== Title ==` line is the prelude.
 */

import type { ParsedResponse, Room, Safe } from '@wordvm/types'
import { RoomParseError, safeError, safeResult } from '@wordvm/types'

export const PROMPT = 'What do you do?'

const TITLE_PATTERN = /^== (.*) ==$/m
const ITEMS_HEADER = 'Things of interest here:'

type SectionKind = 'items' | 'exits'

function sectionKind(line: string): SectionKind | null {
  if (line === ITEMS_HEADER) {
    return 'items'
  }
  if (line.startsWith('There') && line.endsWith(':')) {
    return 'exits'
  }
  return null
}

/**
 * Parse one response; text after the first prompt is ignored
 */
export function parseRoom(text: string): Safe<ParsedResponse, RoomParseError> {
  const promptIndex = text.indexOf(PROMPT)
  const body = promptIndex >= 0 ? text.slice(0, promptIndex) : text

  const header = TITLE_PATTERN.exec(body)
  if (!header) {
    return safeResult({ prelude: body, room: null })
  }

  const room: Room = {
    title: header[1],
    description: '',
    items: [],
    exits: [],
  }
  const prelude = body.slice(0, header.index)
  const lines = body.slice(header.index + header[0].length + 1).split('\n')

  let i = 0
  const description: string[] = []
  while (i < lines.length && !lines[i].endsWith(':')) {
    description.push(lines[i])
    i++
  }
  room.description = description.join('\n').replace(/\n+$/, '')

  while (i < lines.length) {
    const line = lines[i]
    i++
    if (line === '') {
      continue
    }

    const kind = sectionKind(line)
    if (kind === null) {
      return safeError(new RoomParseError('Unknown section header', line))
    }

    const list = kind === 'items' ? room.items : room.exits
    while (i < lines.length && lines[i] !== '') {
      const entry = lines[i]
      if (!entry.startsWith('- ')) {
        return safeError(new RoomParseError('Malformed list entry', entry))
      }
      list.push(entry.slice(2))
      i++
    }
  }

  return safeResult({ prelude, room })
}

/**
 * Stable identity for a room; titles repeat across distinct rooms
 */
export function roomKey(room: Room): string {
  return `${room.title}\n${room.description}`
}
