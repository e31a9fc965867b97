import registerDebug from 'debug'
import {createInterface} from 'node:readline'
import type {Readable} from 'node:stream'

/** Returns a negative number if a < b, a positive number if a > b, or 0 if a == b */
export type Comparator<K> = (a: K, b: K) => number

/** Keys with a built-in ordering */
export type NaturalKey = string | number | bigint

/** @internal */
export const debugCheck = registerDebug('symbol-table:check')
/** @internal */
export const debugCli = registerDebug('symbol-table:cli')

function isNaturalKey(val: unknown): val is NaturalKey {
  return typeof val == 'string' || typeof val == 'number' || typeof val == 'bigint'
}

/**
 * Default comparator. Orders strings by UTF-16 code unit, numbers and
 * bigints numerically. Anything else needs an explicit comparator.
 */
export function naturalOrder(a: unknown, b: unknown): number {
  if (!isNaturalKey(a) || !isNaturalKey(b) || typeof a != typeof b)
    throw new TypeError(`cannot compare ${typeof a} with ${typeof b}; expected a comparator`)
  if (Number.isNaN(a) || Number.isNaN(b))
    throw new TypeError('NaN is not an ordered key')
  return a === b ? 0 : a < b ? -1 : 1
}

export function reverseOrder<K>(compare: Comparator<K>): Comparator<K> {
  return (a, b) => compare(b, a)
}

/** is a < b ? */
export function less<K>(a: K, b: K, compare: Comparator<K>): boolean {
  return compare(a, b) < 0
}

/** is a == b ? */
export function eq<K>(a: K, b: K, compare: Comparator<K>): boolean {
  return compare(a, b) === 0
}

/**
 * Split a text stream into whitespace-delimited tokens.
 * @example
 * for await (const word of readTokens(process.stdin)) ...
 */
export async function* readTokens(input: Readable): AsyncGenerator<string, void, undefined> {
  const lines = createInterface({input, crlfDelay: Infinity})
  for await (const line of lines) {
    for (const token of line.split(/\s+/)) {
      if (token) yield token
    }
  }
}
