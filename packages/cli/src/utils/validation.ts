/**
 * Validation utilities for CLI arguments
 */

import { InvalidArgumentError } from 'commander'

const DECIMAL = /^\d+$/
const HEX = /^0x[0-9a-f]+$/i

/**
 * commander parser for non-negative integer options, decimal or 0x-prefixed hex
 */
export function parseIntegerOption(value: string): number {
  let parsed = Number.NaN
  if (DECIMAL.test(value)) {
    parsed = Number.parseInt(value, 10)
  } else if (HEX.test(value)) {
    parsed = Number.parseInt(value.slice(2), 16)
  }
  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Not a non-negative integer.')
  }
  return parsed
}
