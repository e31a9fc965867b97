#!/usr/bin/env node
import {createReadStream} from 'node:fs'
import type {Readable} from 'node:stream'
import {Command} from 'commander'
import {SymbolTable} from './SymbolTable'
import {debugCli, readTokens} from './util'

export interface DemoOptions {
  /** Verify tree invariants after every insert */
  check?: boolean,
  /** Append size and height after the listings */
  stats?: boolean,
}

interface TextSink {
  write(chunk: string): unknown
}

/** Each token becomes a key, valued by the position at which it was read.
 * Repeated tokens keep their last position. */
export async function buildTable(input: Readable, check?: boolean): Promise<SymbolTable<string, number>> {
  const st = new SymbolTable<string, number>(null, {check})
  let index = 0
  for await (const token of readTokens(input)) {
    st.put(token, index++)
  }
  debugCli('read %d tokens, %d distinct', index, st.size)
  return st
}

/** "key value" lines in key order, a blank line, then in level order */
export function* formatTable(st: SymbolTable<string, number>, stats = false): Generator<string, void, undefined> {
  for (const key of st.keys())
    yield `${key} ${st.get(key)}`
  yield ''
  for (const key of st.levelOrder())
    yield `${key} ${st.get(key)}`
  if (stats) {
    yield ''
    yield `size ${st.size}`
    yield `height ${st.height()}`
  }
}

export async function run(input: Readable, output: TextSink, opts: DemoOptions = {}): Promise<void> {
  const st = await buildTable(input, opts.check)
  for (const line of formatTable(st, opts.stats))
    output.write(line + '\n')
}

export function createProgram(): Command {
  return new Command()
    .name('symbol-table')
    .description('Read whitespace-delimited keys and print them in key order and in level order')
    .argument('[file]', 'text file to read (default: stdin)')
    .option('--check', 'verify tree invariants after every insert (or SYMBOL_TABLE_CHECK=true)')
    .option('--stats', 'print the size and height of the tree')
    .action(async (file: string|undefined, opts: DemoOptions) => {
      const input = file ? createReadStream(file, 'utf-8') : process.stdin
      await run(input, process.stdout, opts)
    })
}

if (require.main === module) {
  createProgram().parseAsync(process.argv).catch((err: unknown) => {
    console.error(err)
    process.exitCode = 1
  })
}
