import { readFileSync } from "node:fs"
import { Schema } from "effect"
import { Dimension, prefixFromSymbol, type Prefix } from "../../Dimension.js"

export interface SymbolTable {
  readonly symbols: ReadonlyMap<string, Dimension>
  readonly prefixable: ReadonlySet<string>
}

export interface ResolvedSymbol {
  readonly dimension: Dimension
  readonly prefix: Prefix
}

const SymbolTableFile = Schema.Struct({
  prefixable: Schema.Array(Schema.String),
  symbols: Schema.Record({ key: Schema.String, value: Dimension }),
})

export const makeSymbolTable = (
  symbols: Readonly<Record<string, Dimension>>,
  prefixable: Iterable<string>,
): SymbolTable => ({
  symbols: new Map(Object.entries(symbols)),
  prefixable: new Set(prefixable),
})

const decodeSymbolTableFile = Schema.decodeUnknownSync(Schema.parseJson(SymbolTableFile))

export const loadSymbolTable = (url: URL): SymbolTable => {
  const file = decodeSymbolTableFile(readFileSync(url, "utf8"))
  return makeSymbolTable(file.symbols, file.prefixable)
}

export const DEFAULT_SYMBOL_TABLE: SymbolTable = loadSymbolTable(
  new URL("../../../data/symbols.json", import.meta.url),
)

// "da" is the only two-letter prefix, so it is tried before the one-letter ones.
const PREFIX_LENGTHS = [2, 1] as const

/**
 * Resolve a written symbol to its dimension, splitting off an SI prefix only
 * when the whole symbol is not itself known and the remainder accepts prefixes.
 */
export const resolveSymbol = (table: SymbolTable, symbol: string): ResolvedSymbol | undefined => {
  const direct = table.symbols.get(symbol)
  if (direct !== undefined) {
    return { dimension: direct, prefix: "none" }
  }
  for (const length of PREFIX_LENGTHS) {
    if (symbol.length <= length) {
      continue
    }
    const prefix = prefixFromSymbol(symbol.slice(0, length))
    const remainder = symbol.slice(length)
    const dimension = table.symbols.get(remainder)
    if (prefix && dimension !== undefined && table.prefixable.has(remainder)) {
      return { dimension, prefix: prefix.name }
    }
  }
  return undefined
}
