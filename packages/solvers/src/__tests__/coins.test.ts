import { describe, expect, it } from 'vitest'
import {
  type Coin,
  DEFAULT_COINS,
  DEFAULT_COIN_TARGET,
  coinEquation,
  findPermutation,
  solveCoinEquation,
} from '../coins'

describe('findPermutation', () => {
  it('should visit every ordering exactly once', () => {
    const seen = new Set<string>()
    let calls = 0
    const result = findPermutation([1, 2, 3, 4], (ordering) => {
      calls++
      seen.add(ordering.join(','))
      return false
    })

    expect(result).toBeNull()
    expect(calls).toBe(24)
    expect(seen.size).toBe(24)
  })

  it('should return the first matching ordering', () => {
    const result = findPermutation(['a', 'b', 'c'], (ordering) => ordering[0] === 'c')
    expect(result?.[0]).toBe('c')
    expect([...(result ?? [])].sort()).toEqual(['a', 'b', 'c'])
  })

  it('should try the original order first', () => {
    let calls = 0
    const result = findPermutation([5, 6], () => {
      calls++
      return true
    })
    expect(result).toEqual([5, 6])
    expect(calls).toBe(1)
  })
})

describe('coinEquation', () => {
  it('should evaluate a + b * c^2 + d^3 - e', () => {
    expect(coinEquation([4, 1, 3, 2, 5])).toBe(16)
    expect(coinEquation([1, 2, 3, 4, 5])).toBe(78)
  })
})

describe('solveCoinEquation', () => {
  it('should order the default coins to reach the default target', () => {
    const solution = solveCoinEquation()

    expect(solution).not.toBeNull()
    const values = (solution ?? []).map((coin) => coin.value)
    expect(coinEquation(values)).toBe(DEFAULT_COIN_TARGET)
    expect([...values].sort((a, b) => a - b)).toEqual([2, 3, 5, 7, 9])
  })

  it('should solve a custom coin set', () => {
    const coins: Coin[] = [
      { name: 'one', value: 1 },
      { name: 'two', value: 2 },
      { name: 'three', value: 3 },
      { name: 'four', value: 4 },
      { name: 'five', value: 5 },
    ]
    const solution = solveCoinEquation(coins, 16)

    const values = (solution ?? []).map((coin) => coin.value)
    expect(coinEquation(values)).toBe(16)
    expect(new Set(solution?.map((coin) => coin.name)).size).toBe(5)
  })

  it('should return null when no ordering works', () => {
    expect(solveCoinEquation(DEFAULT_COINS, 1_000_000)).toBeNull()
  })

  it('should require exactly five coins', () => {
    expect(solveCoinEquation(DEFAULT_COINS.slice(0, 4))).toBeNull()
  })
})
