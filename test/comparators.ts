import test from 'node:test'
import assert from 'node:assert/strict'
import {Readable} from 'node:stream'
import {naturalOrder, reverseOrder, less, eq, readTokens} from '../src'

test('naturalOrder compares strings, numbers and bigints', () => {
  assert.equal(naturalOrder('a', 'b'), -1)
  assert.equal(naturalOrder('b', 'a'), 1)
  assert.equal(naturalOrder('B', 'a'), -1)
  assert.equal(naturalOrder(2, 2), 0)
  assert.equal(naturalOrder(10, 9), 1)
  assert.equal(naturalOrder(10n, 2n), 1)
})

test('naturalOrder rejects unordered keys', () => {
  assert.throws(() => naturalOrder('a', 1),
    {name: 'TypeError', message: 'cannot compare string with number; expected a comparator'})
  assert.throws(() => naturalOrder({}, {}), TypeError)
  assert.throws(() => naturalOrder(NaN, 1),
    {name: 'TypeError', message: 'NaN is not an ordered key'})
})

test('reverseOrder, less and eq', () => {
  const desc = reverseOrder(naturalOrder)
  assert.equal(desc(1, 2), 1)
  assert.equal(less(2, 1, desc), true)
  assert.equal(less(1, 1, desc), false)
  assert.equal(eq('x', 'x', naturalOrder), true)
  assert.equal(eq('x', 'y', naturalOrder), false)
})

test('readTokens splits on any whitespace', async () => {
  const input = Readable.from(['  S E\tA\n', 'R  C\r\n\nH'])
  const tokens: string[] = []
  for await (const token of readTokens(input))
    tokens.push(token)
  assert.deepEqual(tokens, ['S', 'E', 'A', 'R', 'C', 'H'])
})
