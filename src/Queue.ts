interface Node<T> {
  val: T;
  _r: null|Node<T>;
}

/**
 * First-in first-out queue, backed by a singly linked list.
 * head...tail
 * Items leave from the head and join at the tail.
 */
export default class Queue<T> implements Iterable<T> {
  private head: null|Node<T>
  private tail: null|Node<T>
  private _size: number
  constructor(src?: Iterable<T>) {
    this.head = null
    this.tail = null
    this._size = 0
    if (src) for (const val of src) this.enqueue(val)
  }

  get size(): number { return this._size }

  get [Symbol.toStringTag]() { return 'Queue' }

  isEmpty(): boolean {
    return this.head == null
  }

  enqueue(value: T): void {
    const prev = this.tail
    this.tail = {val: value, _r: null}
    if (prev) prev._r = this.tail
    else this.head = this.tail
    this._size += 1
  }

  dequeue(): undefined|T {
    const node = this.head
    if (node == null) {
      return
    }
    this.head = node._r
    if (this.head == null) {
      this.tail = null
    }
    this._size -= 1
    return node.val
  }

  peek(): undefined|T {
    if (this.head)
      return this.head.val
  }

  /** Consume every item, in order */
  *drain(): Generator<T, void, undefined> {
    while (this.head) {
      const node = this.head
      this.dequeue()
      yield node.val
    }
  }

  /** Remove every item and return them as an array (head first) */
  clear(): T[] {
    const items = this.toArray()
    this.head = null
    this.tail = null
    this._size = 0
    return items
  }

  toArray(): T[] {
    const items = new Array<T>(this._size)
    let cur = this.head
    let index = 0
    while (cur) {
      items[index++] = cur.val
      cur = cur._r
    }
    return items
  }

  /** Iterate without consuming */
  *[Symbol.iterator](): Iterator<T> {
    let cur = this.head
    while (cur) {
      yield cur.val
      cur = cur._r
    }
  }

  toString(): string {
    return this.toArray().join(' ')
  }
}
