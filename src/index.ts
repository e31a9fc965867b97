import {SymbolTable} from './SymbolTable'

export default SymbolTable
export {SymbolTable}
export {default as Queue} from './Queue'
export {SymbolTableError, InvariantError} from './exception'
export {naturalOrder, reverseOrder, less, eq, readTokens} from './util'

export type {SymbolTableErrorCode} from './exception'
export type {SymbolTableOptions} from './normalize'
export type {Comparator, NaturalKey} from './util'
