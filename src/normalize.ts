import {Comparator, naturalOrder} from './util'

export interface SymbolTableOptions<K> {
  /** (default=naturalOrder) Sorting criterion for keys. Should run in O(1)
   * time and describe a strict total order: the table never calls equality or
   * hashing on keys. */
  compare?: Comparator<K>,
  /** (default=false, or true when SYMBOL_TABLE_CHECK=true) Verify symmetric
   * order, subtree sizes and rank consistency after every put/delete. Each
   * check walks the whole tree, so only enable this in tests or while
   * debugging. */
  check?: boolean,
}

/** @internal */
export type ValidatedOptions<K> = Required<SymbolTableOptions<K>>

/** @internal */
export default function normalizeOptions<K>(raw?: Comparator<K>|SymbolTableOptions<K>|null): ValidatedOptions<K> {
  if (typeof raw == 'function') {
    raw = {compare: raw}
  }
  const compare = raw?.compare ?? naturalOrder
  const check = raw?.check ?? process.env.SYMBOL_TABLE_CHECK === 'true'

  if (typeof compare != 'function')
    throw new TypeError('compare must be a function (a, b) => number')
  if (typeof check != 'boolean')
    throw new TypeError('check must be a boolean')

  return {compare, check}
}
