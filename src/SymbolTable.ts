import {InvariantError, SymbolTableError} from './exception'
import normalizeOptions, {SymbolTableOptions} from './normalize'
import Queue from './Queue'
import {Comparator, debugCheck} from './util'

/** Handle of the nil node (see the Null Object Pattern), used for empty
 * links. Its size is 0 and both of its links point back at itself, so
 * `count[left[x]]` works without a branch. Never written to. */
const NIL = 0

/**
 * Node storage. Nodes are integer handles into parallel arrays; a child link
 * is the handle of the child. Freed handles are reused.
 */
class NodeArena<K, V> {
  readonly left: number[] = [NIL]
  readonly right: number[] = [NIL]
  /** Number of nodes in the subtree rooted at each handle */
  readonly count: number[] = [0]
  private _keys: Array<K|undefined> = [undefined]
  private _values: Array<V|undefined> = [undefined]
  private _free: number[] = []

  alloc(key: K, value: V): number {
    const x = this._free.pop() ?? this.count.length
    this._keys[x] = key
    this._values[x] = value
    this.left[x] = NIL
    this.right[x] = NIL
    this.count[x] = 1
    return x
  }

  free(x: number): void {
    // a free slot holds no key or value
    this._keys[x] = undefined
    this._values[x] = undefined
    this.left[x] = NIL
    this.right[x] = NIL
    this.count[x] = 0
    this._free.push(x)
  }

  reset(): void {
    this.left.length = this.right.length = this.count.length = 1
    this._keys.length = this._values.length = 1
    this._free.length = 0
  }

  key(x: number): K {
    const key = this._keys[x]
    if (key === undefined)
      throw new InvariantError(`node ${x} has no key; is it allocated?`)
    return key
  }

  value(x: number): V|undefined {
    return this._values[x]
  }

  setValue(x: number, value: V): void {
    this._values[x] = value
  }

  /** Recompute the cached subtree size from the children */
  resize(x: number): void {
    this.count[x] = 1 + this.count[this.left[x]] + this.count[this.right[x]]
  }
}

function assertKey(key: unknown, name = 'key'): void {
  if (key == null)
    throw new TypeError(`${name} is ${key}; expected a key`)
}

/**
 * Ordered symbol table: an (unbalanced) binary search tree where every node
 * caches the size of its subtree. Keys are unique; putting an existing key
 * replaces its value.
 *
 * get, put, delete, min, max, floor, ceiling, rank and select take time
 * proportional to the height of the tree, which is O(n) in the worst case
 * (e.g. keys inserted in sorted order). size and isEmpty take constant time.
 *
 * Values may not be undefined or null: `put(key, undefined)` deletes the key.
 *
 * Mutating the table while iterating over it gives undefined results.
 */
export default class SymbolTable<K, V> implements Iterable<[K, V]> {
  private _root: number
  private _nodes: NodeArena<K, V>
  private _compare: Comparator<K>
  private _check: boolean

  /**
   * @param source An initial list of entries, inserted in order
   * @param options A comparator, or {@link SymbolTableOptions}
   */
  constructor(source?: Iterable<readonly [K, V]>|null, options?: Comparator<K>|SymbolTableOptions<K>) {
    const opt = normalizeOptions(options)
    this._compare = opt.compare
    this._check = opt.check
    this._nodes = new NodeArena<K, V>()
    this._root = NIL
    if (source) for (const [key, val] of source)
      this.put(key, val)
  }

  /** Number of key-value pairs */
  get size(): number { return this._nodes.count[this._root] }

  get [Symbol.toStringTag]() { return 'SymbolTable' }

  toString(): string {
    return `[${this[Symbol.toStringTag]} size:${this.size}]`
  }

  isEmpty(): boolean {
    return this._root === NIL
  }

  /** @throws TypeError if key is null or undefined */
  contains(key: K): boolean {
    return this.get(key) !== undefined
  }

  /** Alias of {@link contains} */
  has(key: K): boolean {
    return this.contains(key)
  }

  /** Returns the value associated with key, or undefined when absent. */
  get(key: K): V | undefined {
    assertKey(key)
    const x = this._findNode(key)
    return x === NIL ? undefined : this._nodes.value(x)
  }

  /**
   * Insert a key-value pair, overwriting the old value when the key is
   * already present. A null or undefined value deletes the key instead.
   */
  put(key: K, value: V|null|undefined): this {
    assertKey(key)
    if (value == null) {
      this.delete(key)
      return this
    }
    this._root = this._put(this._root, key, value)
    this._assertCheck('put')
    return this
  }

  /** Alias of {@link put} */
  set(key: K, value: V|null|undefined): this {
    return this.put(key, value)
  }

  /**
   * Remove a key and its value. Removing a key that is not present does
   * nothing.
   * @returns true when a key was removed
   */
  delete(key: K): boolean {
    assertKey(key)
    if (this._root === NIL) return false
    const nodes = this._nodes
    if (this.size === 1) {
      // one-node table: detach the root
      if (this._compare(key, nodes.key(this._root)) !== 0) return false
      nodes.free(this._root)
      this._root = NIL
      return true
    }
    const before = this.size
    this._root = this._delete(this._root, key)
    this._assertCheck('delete')
    return this.size < before
  }

  /** @throws SymbolTableError EMPTY_TABLE */
  deleteMin(): void {
    if (this._root === NIL)
      throw new SymbolTableError('EMPTY_TABLE', 'called deleteMin() with empty symbol table')
    const min = this._min(this._root)
    this._root = this._deleteMin(this._root)
    this._nodes.free(min)
    this._assertCheck('deleteMin')
  }

  /** @throws SymbolTableError EMPTY_TABLE */
  deleteMax(): void {
    if (this._root === NIL)
      throw new SymbolTableError('EMPTY_TABLE', 'called deleteMax() with empty symbol table')
    const max = this._max(this._root)
    this._root = this._deleteMax(this._root)
    this._nodes.free(max)
    this._assertCheck('deleteMax')
  }

  /** Remove every key, smallest first */
  clear(): void {
    while (this._root !== NIL) this.deleteMin()
    this._nodes.reset()
  }

  /** @throws SymbolTableError EMPTY_TABLE */
  min(): K {
    if (this._root === NIL)
      throw new SymbolTableError('EMPTY_TABLE', 'called min() with empty symbol table')
    return this._nodes.key(this._min(this._root))
  }

  /** @throws SymbolTableError EMPTY_TABLE */
  max(): K {
    if (this._root === NIL)
      throw new SymbolTableError('EMPTY_TABLE', 'called max() with empty symbol table')
    return this._nodes.key(this._max(this._root))
  }

  /**
   * Largest key less than or equal to key.
   * @throws SymbolTableError EMPTY_TABLE, or NOT_FOUND if every key is greater
   */
  floor(key: K): K {
    assertKey(key)
    if (this._root === NIL)
      throw new SymbolTableError('EMPTY_TABLE', 'called floor() with empty symbol table')
    const x = this._floor(this._root, key)
    if (x === NIL)
      throw new SymbolTableError('NOT_FOUND', 'floor key does not exist')
    return this._nodes.key(x)
  }

  /**
   * Smallest key greater than or equal to key.
   * @throws SymbolTableError EMPTY_TABLE, or NOT_FOUND if every key is smaller
   */
  ceiling(key: K): K {
    assertKey(key)
    if (this._root === NIL)
      throw new SymbolTableError('EMPTY_TABLE', 'called ceiling() with empty symbol table')
    const x = this._ceiling(this._root, key)
    if (x === NIL)
      throw new SymbolTableError('NOT_FOUND', 'ceiling key does not exist')
    return this._nodes.key(x)
  }

  /** Number of keys strictly less than key. The key need not be present. */
  rank(key: K): number {
    assertKey(key)
    return this._rank(key, this._root)
  }

  /**
   * The key with the given rank, i.e. the k-th smallest key (0-based).
   * @throws SymbolTableError OUT_OF_RANGE unless 0 <= k < size
   */
  select(k: number): K {
    if (!Number.isInteger(k) || k < 0 || k >= this.size)
      throw new SymbolTableError('OUT_OF_RANGE', `select(${k}) is out of range [0, ${this.size})`)
    return this._nodes.key(this._select(this._root, k))
  }

  /** Number of keys in [lo, hi] (inclusive). Zero when lo > hi. */
  rangeSize(lo: K, hi: K): number {
    assertKey(lo, 'lo')
    assertKey(hi, 'hi')
    if (this._compare(lo, hi) > 0) return 0
    if (this.contains(hi)) return this.rank(hi) - this.rank(lo) + 1
    return this.rank(hi) - this.rank(lo)
  }

  /** Keys in [lo, hi] (inclusive), ascending */
  keysInRange(lo: K, hi: K): Queue<K> {
    assertKey(lo, 'lo')
    assertKey(hi, 'hi')
    const queue = new Queue<K>()
    this._keys(this._root, queue, lo, hi)
    return queue
  }

  /** All keys, ascending; or the keys in [lo, hi] when both bounds are given. */
  keys(): Queue<K>
  keys(lo: K, hi: K): Queue<K>
  keys(lo?: K, hi?: K): Queue<K> {
    if (lo !== undefined && hi !== undefined)
      return this.keysInRange(lo, hi)
    if (lo !== undefined || hi !== undefined)
      throw new TypeError('keys() expects both lo and hi, or neither')
    if (this._root === NIL)
      return new Queue()
    return this.keysInRange(this.min(), this.max())
  }

  /** Keys in breadth-first order, for debugging and visualization */
  levelOrder(): Queue<K> {
    const nodes = this._nodes
    const keys = new Queue<K>()
    const queue = new Queue<number>([this._root])
    while (!queue.isEmpty()) {
      const x = queue.dequeue()
      if (x === undefined || x === NIL) continue
      keys.enqueue(nodes.key(x))
      queue.enqueue(nodes.left[x])
      queue.enqueue(nodes.right[x])
    }
    return keys
  }

  /** Longest root-to-leaf path, counted in links. A 1-node tree has height 0
   * and an empty one -1. */
  height(): number {
    return this._height(this._root)
  }

  forEach(cb: (value: V, key: K, table: this) => void, self?: unknown): void {
    for (const [key, val] of this.entries())
      cb.call(self, val, key, this)
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries()
  }

  /** In-order traversal */
  *entries(): IterableIterator<[K, V]> {
    const nodes = this._nodes
    const stack: number[] = []
    let x = this._root
    while (x !== NIL || stack.length > 0) {
      while (x !== NIL) {
        stack.push(x)
        x = nodes.left[x]
      }
      const top = stack.pop()
      if (top === undefined) return
      const val = nodes.value(top)
      if (val !== undefined) yield [nodes.key(top), val]
      x = nodes.right[top]
    }
  }

  /**
   * Check the integrity of the tree: symmetric order, subtree sizes and rank
   * consistency. Walks the whole tree several times. Failures are logged
   * under DEBUG=symbol-table:check
   */
  check(): boolean {
    const ordered = this._isBST(this._root, NIL, NIL)
    if (!ordered) debugCheck('not in symmetric order')
    const sized = this._isSizeConsistent(this._root)
    if (!sized) debugCheck('subtree counts not consistent')
    const ranked = this._isRankConsistent()
    if (!ranked) debugCheck('ranks not consistent')
    return ordered && sized && ranked
  }

  private _assertCheck(op: string): void {
    if (this._check && !this.check())
      throw new InvariantError(`${op}() left the symbol table inconsistent`)
  }

  private _findNode(key: K): number {
    const nodes = this._nodes
    let x = this._root
    let dir: number
    while (x !== NIL && (dir = this._compare(key, nodes.key(x)))) {
      x = dir < 0 ? nodes.left[x] : nodes.right[x]
    }
    return x
  }

  private _put(x: number, key: K, value: V): number {
    const nodes = this._nodes
    if (x === NIL) return nodes.alloc(key, value)
    const cmp = this._compare(key, nodes.key(x))
    if (cmp < 0) nodes.left[x] = this._put(nodes.left[x], key, value)
    else if (cmp > 0) nodes.right[x] = this._put(nodes.right[x], key, value)
    else nodes.setValue(x, value)
    nodes.resize(x)
    return x
  }

  /** Detach the smallest node of the subtree (without freeing it) and return
   * the new subtree root. */
  private _deleteMin(x: number): number {
    const nodes = this._nodes
    if (nodes.left[x] === NIL) return nodes.right[x]
    nodes.left[x] = this._deleteMin(nodes.left[x])
    nodes.resize(x)
    return x
  }

  private _deleteMax(x: number): number {
    const nodes = this._nodes
    if (nodes.right[x] === NIL) return nodes.left[x]
    nodes.right[x] = this._deleteMax(nodes.right[x])
    nodes.resize(x)
    return x
  }

  /** Hibbard deletion: a node with two children is replaced by the smallest
   * node of its right subtree. */
  private _delete(x: number, key: K): number {
    const nodes = this._nodes
    if (x === NIL) return NIL
    const cmp = this._compare(key, nodes.key(x))
    if (cmp < 0) {
      nodes.left[x] = this._delete(nodes.left[x], key)
    } else if (cmp > 0) {
      nodes.right[x] = this._delete(nodes.right[x], key)
    } else {
      const t = x
      if (nodes.right[t] === NIL || nodes.left[t] === NIL) {
        const child = nodes.right[t] === NIL ? nodes.left[t] : nodes.right[t]
        nodes.free(t)
        return child
      }
      x = this._min(nodes.right[t])
      nodes.right[x] = this._deleteMin(nodes.right[t])
      nodes.left[x] = nodes.left[t]
      nodes.free(t)
    }
    nodes.resize(x)
    return x
  }

  private _min(x: number): number {
    const left = this._nodes.left
    while (left[x] !== NIL) x = left[x]
    return x
  }

  private _max(x: number): number {
    const right = this._nodes.right
    while (right[x] !== NIL) x = right[x]
    return x
  }

  private _floor(x: number, key: K): number {
    const nodes = this._nodes
    if (x === NIL) return NIL
    const cmp = this._compare(key, nodes.key(x))
    if (cmp === 0) return x
    if (cmp < 0) return this._floor(nodes.left[x], key)
    const t = this._floor(nodes.right[x], key)
    return t === NIL ? x : t
  }

  private _ceiling(x: number, key: K): number {
    const nodes = this._nodes
    if (x === NIL) return NIL
    const cmp = this._compare(key, nodes.key(x))
    if (cmp === 0) return x
    if (cmp > 0) return this._ceiling(nodes.right[x], key)
    const t = this._ceiling(nodes.left[x], key)
    return t === NIL ? x : t
  }

  private _rank(key: K, x: number): number {
    const nodes = this._nodes
    if (x === NIL) return 0
    const cmp = this._compare(key, nodes.key(x))
    if (cmp < 0) return this._rank(key, nodes.left[x])
    if (cmp > 0) return 1 + nodes.count[nodes.left[x]] + this._rank(key, nodes.right[x])
    return nodes.count[nodes.left[x]]
  }

  private _select(x: number, k: number): number {
    const nodes = this._nodes
    if (x === NIL) return NIL
    const t = nodes.count[nodes.left[x]]
    if (t > k) return this._select(nodes.left[x], k)
    if (t < k) return this._select(nodes.right[x], k - t - 1)
    return x
  }

  private _keys(x: number, queue: Queue<K>, lo: K, hi: K): void {
    const nodes = this._nodes
    if (x === NIL) return
    const key = nodes.key(x)
    const cmplo = this._compare(lo, key)
    const cmphi = this._compare(hi, key)
    if (cmplo < 0) this._keys(nodes.left[x], queue, lo, hi)
    if (cmplo <= 0 && cmphi >= 0) queue.enqueue(key)
    if (cmphi > 0) this._keys(nodes.right[x], queue, lo, hi)
  }

  private _height(x: number): number {
    if (x === NIL) return -1
    return 1 + Math.max(this._height(this._nodes.left[x]), this._height(this._nodes.right[x]))
  }

  /** Is every key in the subtree strictly between the keys of lo and hi?
   * (NIL bounds are open) */
  private _isBST(x: number, lo: number, hi: number): boolean {
    const nodes = this._nodes
    if (x === NIL) return true
    const key = nodes.key(x)
    if (lo !== NIL && this._compare(key, nodes.key(lo)) <= 0) return false
    if (hi !== NIL && this._compare(key, nodes.key(hi)) >= 0) return false
    return this._isBST(nodes.left[x], lo, x) && this._isBST(nodes.right[x], x, hi)
  }

  private _isSizeConsistent(x: number): boolean {
    const nodes = this._nodes
    if (x === NIL) return true
    if (nodes.count[x] !== 1 + nodes.count[nodes.left[x]] + nodes.count[nodes.right[x]]) return false
    return this._isSizeConsistent(nodes.left[x]) && this._isSizeConsistent(nodes.right[x])
  }

  private _isRankConsistent(): boolean {
    const nodes = this._nodes
    for (let i = 0; i < this.size; i++) {
      const x = this._select(this._root, i)
      if (x === NIL || this._rank(nodes.key(x), this._root) !== i) return false
    }
    for (const key of this.keys()) {
      const x = this._select(this._root, this._rank(key, this._root))
      if (x === NIL || this._compare(key, nodes.key(x)) !== 0) return false
    }
    return true
  }
}

export {SymbolTable}
