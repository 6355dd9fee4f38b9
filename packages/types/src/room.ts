// Text adventure room record, scraped from guest output

import type { HaltReason } from './vm'

export interface Room {
  title: string
  description: string
  items: string[]
  exits: string[]
}

export interface ParsedResponse {
  /** Raw text printed before the room header (or the whole response) */
  prelude: string
  room: Room | null
}

export interface RoomEvent extends ParsedResponse {
  /** Why the VM stopped before this response was parsed */
  haltReason: HaltReason | null
}
