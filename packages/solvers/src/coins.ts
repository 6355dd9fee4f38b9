/**
 * Coin equation
 *
 * Five coins go into the slots of `_ + _ * _^2 + _^3 - _`; the order that
 * makes the expression equal the target opens the door.
 */

export interface Coin {
  name: string
  value: number
}

export const DEFAULT_COINS: readonly Coin[] = [
  { name: 'red coin', value: 2 },
  { name: 'corroded coin', value: 3 },
  { name: 'shiny coin', value: 5 },
  { name: 'concave coin', value: 7 },
  { name: 'blue coin', value: 9 },
]

export const DEFAULT_COIN_TARGET = 399

/**
 * Visit orderings of `items` (Heap's algorithm, iterative) until one
 * satisfies `predicate`. Every ordering is visited at most once.
 * @returns the matching ordering, or null when none matches
 */
export function findPermutation<T>(
  items: readonly T[],
  predicate: (ordering: readonly T[]) => boolean,
): T[] | null {
  const ordering = [...items]
  const counters = new Array<number>(ordering.length).fill(0)

  if (predicate(ordering)) {
    return ordering
  }

  let i = 1
  while (i < ordering.length) {
    if (counters[i] < i) {
      const j = i % 2 === 0 ? 0 : counters[i]
      const swap = ordering[j]
      ordering[j] = ordering[i]
      ordering[i] = swap

      if (predicate(ordering)) {
        return ordering
      }
      counters[i]++
      i = 1
    } else {
      counters[i] = 0
      i++
    }
  }

  return null
}

export function coinEquation(values: readonly number[]): number {
  const [a, b, c, d, e] = values
  return a + b * c ** 2 + d ** 3 - e
}

/**
 * Order the coins so the equation hits `target`
 */
export function solveCoinEquation(
  coins: readonly Coin[] = DEFAULT_COINS,
  target: number = DEFAULT_COIN_TARGET,
): Coin[] | null {
  if (coins.length !== 5) {
    return null
  }
  return findPermutation(
    coins,
    (ordering) => coinEquation(ordering.map((coin) => coin.value)) === target,
  )
}
