import { RoomParseError } from '@wordvm/types'
import { describe, expect, it } from 'vitest'
import { parseRoom, roomKey } from '../room-parser'

const CELLAR = [
  'You hear a distant drip.',
  '',
  '== Quiet Cellar ==',
  'Damp stone walls surround you.',
  'A faint draft comes from above.',
  '',
  'Things of interest here:',
  '- lamp',
  '- rope',
  '',
  'There are 2 exits:',
  '- up',
  '- west',
  '',
  'What do you do?',
].join('\n')

describe('parseRoom', () => {
  it('should split prelude, header, description and lists', () => {
    const [error, parsed] = parseRoom(CELLAR)

    expect(error).toBeUndefined()
    expect(parsed).toEqual({
      prelude: 'You hear a distant drip.\n\n',
      room: {
        title: 'Quiet Cellar',
        description:
          'Damp stone walls surround you.\nA faint draft comes from above.',
        items: ['lamp', 'rope'],
        exits: ['up', 'west'],
      },
    })
  })

  it('should return only a prelude when there is no header', () => {
    const [, parsed] = parseRoom('That door is locked.\n\nWhat do you do?')
    expect(parsed).toEqual({ prelude: 'That door is locked.\n\n', room: null })
  })

  it('should parse a single exit and no items', () => {
    const [, parsed] = parseRoom(
      '== Ledge ==\nWind howls.\n\nThere is 1 exit:\n- down\n\nWhat do you do?',
    )
    expect(parsed?.room).toEqual({
      title: 'Ledge',
      description: 'Wind howls.',
      items: [],
      exits: ['down'],
    })
    expect(parsed?.prelude).toBe('')
  })

  it('should ignore everything after the prompt', () => {
    const [, parsed] = parseRoom(
      '== A ==\nFirst.\n\nWhat do you do?\n\n== B ==\nSecond.\n\nWhat do you do?',
    )
    expect(parsed?.room?.title).toBe('A')
  })

  it('should accept a response without a prompt', () => {
    const [, parsed] = parseRoom('== End ==\nIt is over.\n')
    expect(parsed?.room?.description).toBe('It is over.')
  })

  it('should reject an unknown section header', () => {
    const [error] = parseRoom(
      '== A ==\nText.\n\nStrange things:\n- x\n\nWhat do you do?',
    )
    expect(error).toBeInstanceOf(RoomParseError)
    expect(error?.message).toBe('Unknown section header')
    expect(error?.line).toBe('Strange things:')
  })

  it('should reject list entries without a dash', () => {
    const [error] = parseRoom(
      '== A ==\nText.\n\nThere are 2 exits:\n* up\n\nWhat do you do?',
    )
    expect(error?.message).toBe('Malformed list entry')
    expect(error?.line).toBe('* up')
  })
})

describe('roomKey', () => {
  it('should tell rooms with the same title apart', () => {
    const base = { title: 'Maze', items: [], exits: [] }
    expect(roomKey({ ...base, description: 'Twisty.' })).not.toBe(
      roomKey({ ...base, description: 'Twisted.' }),
    )
    expect(roomKey({ ...base, description: 'Twisty.' })).toBe('Maze\nTwisty.')
  })
})
