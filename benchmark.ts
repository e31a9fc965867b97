// npm run bench
/* eslint no-console: off */
import {Bench} from 'tinybench'

import {SymbolTable} from './src'

declare global {
  namespace NodeJS {
    export interface ProcessEnv {
      /** Number of keys in each table (default 2000) */
      BENCH_KEYS?: string
    }
  }
}

const N = parseInt(process.env.BENCH_KEYS || '2000')
if (isNaN(N) || N < 1)
  throw new TypeError('BENCH_KEYS must be a positive integer')

// random insertion order keeps the expected height near 2 ln(N); sorted
// input would degrade the tree into a list
const KEYS = Array.from({length: N}, (_, i) => i)
for (let i = KEYS.length - 1; i > 0; i--) {
  const j = Math.floor(Math.random() * (i + 1))
  const tmp = KEYS[i]
  KEYS[i] = KEYS[j]
  KEYS[j] = tmp
}

console.log(`
BENCH_KEYS=${N}
`)

async function main() {
  const bench = new Bench()

  const st = new SymbolTable<number, number>(KEYS.map(k => [k, k]))
  const sorted = KEYS.slice().sort((a, b) => a - b)
  let i = 0

  bench.add('SymbolTable put (build)', () => {
    const tmp = new SymbolTable<number, number>()
    for (const key of KEYS) tmp.put(key, key)
  })
  bench.add('Map set (build)', () => {
    const tmp = new Map<number, number>()
    for (const key of KEYS) tmp.set(key, key)
  })
  bench.add('SymbolTable get', () => {
    st.get(KEYS[i++ % N])
  })
  bench.add('SymbolTable rank', () => {
    st.rank(KEYS[i++ % N])
  })
  bench.add('SymbolTable select', () => {
    st.select(i++ % N)
  })
  bench.add('sorted array select', () => {
    return sorted[i++ % N]
  })
  bench.add('SymbolTable keysInRange (10%)', () => {
    const lo = i++ % N
    st.keysInRange(lo, lo + Math.floor(N / 10))
  })
  bench.add('SymbolTable delete + put', () => {
    const key = KEYS[i++ % N]
    st.delete(key)
    st.put(key, key)
  })

  await bench.run()

  console.log(`height=${st.height()} size=${st.size}`)
  console.table(bench.table())
}

main().catch(err => {
  console.error(err)
  process.exitCode = 1
})
