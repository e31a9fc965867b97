import test from 'node:test'
import assert from 'node:assert/strict'
import {Queue} from '../src'

test('Queue is first-in first-out', () => {
  const q = new Queue<string>()
  assert.equal(q.isEmpty(), true)
  q.enqueue('a')
  q.enqueue('b')
  q.enqueue('c')
  assert.equal(q.size, 3)
  assert.equal(q.peek(), 'a')
  assert.equal(q.dequeue(), 'a')
  assert.equal(q.dequeue(), 'b')
  q.enqueue('d')
  assert.equal(q.dequeue(), 'c')
  assert.equal(q.dequeue(), 'd')
  assert.equal(q.dequeue(), undefined)
  assert.equal(q.peek(), undefined)
  assert.equal(q.size, 0)
  assert.equal(q.isEmpty(), true)
})

test('Queue iteration does not consume', () => {
  const q = new Queue([1, 2, 3])
  assert.deepEqual(Array.from(q), [1, 2, 3])
  assert.deepEqual(Array.from(q), [1, 2, 3])
  assert.equal(q.size, 3)
  assert.equal(q.toString(), '1 2 3')
})

test('Queue drain consumes falsy items too', () => {
  const q = new Queue([0, '', 2])
  assert.deepEqual(Array.from(q.drain()), [0, '', 2])
  assert.equal(q.isEmpty(), true)
})

test('Queue clear returns the items', () => {
  const q = new Queue(['x', 'y'])
  assert.deepEqual(q.clear(), ['x', 'y'])
  assert.equal(q.size, 0)
  assert.deepEqual(q.toArray(), [])
  q.enqueue('z')
  assert.equal(q.peek(), 'z')
  assert.equal(q.size, 1)
})
