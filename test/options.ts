import test from 'node:test'
import assert from 'node:assert/strict'
import normalizeOptions from '../src/normalize'
import {naturalOrder} from '../src/util'

function withCheckEnv(value: string|undefined, fn: () => void) {
  const prev = process.env.SYMBOL_TABLE_CHECK
  if (value === undefined) delete process.env.SYMBOL_TABLE_CHECK
  else process.env.SYMBOL_TABLE_CHECK = value
  try {
    fn()
  } finally {
    if (prev === undefined) delete process.env.SYMBOL_TABLE_CHECK
    else process.env.SYMBOL_TABLE_CHECK = prev
  }
}

test('should default to natural order with checks off', () => {
  withCheckEnv(undefined, () => {
    const opt = normalizeOptions<string>()
    assert.equal(opt.compare, naturalOrder)
    assert.equal(opt.check, false)
  })
})

test('should enable checks from SYMBOL_TABLE_CHECK', () => {
  withCheckEnv('true', () => {
    assert.equal(normalizeOptions<string>().check, true)
    assert.equal(normalizeOptions<string>({check: false}).check, false)
  })
  withCheckEnv('1', () => {
    assert.equal(normalizeOptions<string>().check, false)
  })
})

test('should accept a bare comparator', () => {
  const compare = (a: number, b: number) => a - b
  const opt = normalizeOptions(compare)
  assert.equal(opt.compare, compare)
})

test('should reject invalid option types', () => {
  assert.throws(() => normalizeOptions(JSON.parse('{"compare": 1}')),
    {name: 'TypeError', message: 'compare must be a function (a, b) => number'})
  assert.throws(() => normalizeOptions(JSON.parse('{"check": "yes"}')),
    {name: 'TypeError', message: 'check must be a boolean'})
})
