import { logger } from '@wordvm/core'
import type { Safe } from '@wordvm/types'
import { ProgramImageError, safeError, safeResult } from '@wordvm/types'
import { PROGRAM_CONFIG } from './config'

/**
 * Decode a program image into memory words.
 *
 * The image is a sequence of 16-bit little-endian words loaded from
 * address 0. A trailing odd byte is dropped.
 */
export function decodeProgramImage(
  image: Uint8Array,
): Safe<Uint16Array, ProgramImageError> {
  if (image.length > PROGRAM_CONFIG.MAX_BYTES) {
    return safeError(
      new ProgramImageError(
        `Program image of ${image.length} bytes does not fit in memory`,
        image.length,
      ),
    )
  }

  if (image.length % PROGRAM_CONFIG.WORD_SIZE !== 0) {
    logger.warn('Ignoring trailing odd byte in program image', {
      byteLength: image.length,
    })
  }

  const view = new DataView(image.buffer, image.byteOffset, image.byteLength)
  const words = new Uint16Array(
    Math.floor(image.length / PROGRAM_CONFIG.WORD_SIZE),
  )
  for (let i = 0; i < words.length; i++) {
    words[i] = view.getUint16(i * PROGRAM_CONFIG.WORD_SIZE, true)
  }
  return safeResult(words)
}

/**
 * Encode words as a program image (inverse of `decodeProgramImage`)
 */
export function encodeProgramImage(words: ArrayLike<number>): Uint8Array {
  const image = new Uint8Array(words.length * PROGRAM_CONFIG.WORD_SIZE)
  const view = new DataView(image.buffer)
  for (let i = 0; i < words.length; i++) {
    view.setUint16(i * PROGRAM_CONFIG.WORD_SIZE, words[i] & 0xffff, true)
  }
  return image
}
