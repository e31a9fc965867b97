import {SymbolTable, SymbolTableOptions} from '../src'

/** Mulberry32. Seeded so a failing run can be replayed. */
function createRandom(seed: number): () => number {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/** Space separated keys, each valued by its position */
function toTable(keys: string, opt?: SymbolTableOptions<string>): SymbolTable<string, number> {
  return new SymbolTable(keys.split(' ').map((key, i) => [key, i] as const), opt)
}

function toString<K>(keys: Iterable<K>): string {
  return Array.from(keys).join()
}

/** The usual textbook input: 10 distinct keys, 3 of them repeated */
const TINY = 'S E A R C H E X A M P L E'

export {createRandom, toTable, toString, TINY}
