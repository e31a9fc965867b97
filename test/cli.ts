import test from 'node:test'
import assert from 'node:assert/strict'
import {Readable} from 'node:stream'
import {buildTable, createProgram, formatTable, run} from '../src/cli'
import {TINY} from './util'

test('cli prints keys in order, then in level order', async () => {
  const chunks: string[] = []
  await run(Readable.from([TINY + '\n']), {write: (chunk: string) => chunks.push(chunk)}, {stats: true})
  assert.equal(chunks.join(''), [
    'A 8', 'C 4', 'E 12', 'H 5', 'L 11', 'M 9', 'P 10', 'R 3', 'S 0', 'X 7',
    '',
    'S 0', 'E 12', 'X 7', 'A 8', 'R 3', 'C 4', 'H 5', 'M 9', 'L 11', 'P 10',
    '',
    'size 10', 'height 5',
    ''].join('\n'))
})

test('cli numbers tokens across lines', async () => {
  const st = await buildTable(Readable.from(['b a\n', 'c\n', 'a\n']), true)
  assert.deepEqual(Array.from(st), [['a', 3], ['b', 0], ['c', 2]])
  assert.deepEqual(Array.from(formatTable(st)), ['a 3', 'b 0', 'c 2', '', 'b 0', 'a 3', 'c 2'])
})

test('cli empty input', async () => {
  const st = await buildTable(Readable.from(['   \n']))
  assert.equal(st.size, 0)
  assert.deepEqual(Array.from(formatTable(st, true)), ['', '', 'size 0', 'height -1'])
})

test('cli program options', () => {
  const program = createProgram()
  assert.equal(program.name(), 'symbol-table')
  const help = program.helpInformation()
  assert.ok(help.includes('--check'))
  assert.ok(help.includes('--stats'))
})
