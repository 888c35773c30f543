import type { IToken, TokenType } from "chevrotain"
import { RECIPROCAL, UnitTerm, type UnitTerms } from "../../Dimension.js"
import { UnitParseError } from "../../Errors.js"
import { DEFAULT_SYMBOL_TABLE, resolveSymbol, type SymbolTable } from "./SymbolTable.js"
import { Caret, Integer, Minus, Plus, Slash, Star, UnitLexer, UnitSymbol } from "./tokens.js"

type Segment = "numerator" | "denominator"

const DIGITS_PROBLEM = "Numbers are only allowed as a lone 1 (as in 1/s) or as exponents (as in m^2)"

const snippet = (text: string, column: number): string => `${text}\n${" ".repeat(Math.max(0, column - 1))}^`

const parseError = (text: string, column: number, problem: string): UnitParseError =>
  new UnitParseError({ input: text, problem, column, snippet: snippet(text, column) })

class Stream {
  readonly #tokens: ReadonlyArray<IToken>
  readonly #source: string
  #index = 0

  constructor(tokens: ReadonlyArray<IToken>, source: string) {
    this.#tokens = tokens
    this.#source = source
  }

  peek(): IToken | undefined {
    return this.#tokens[this.#index]
  }

  is(tokenType: TokenType): boolean {
    return this.peek()?.tokenType === tokenType
  }

  match(tokenType: TokenType): boolean {
    if (this.is(tokenType)) {
      this.#index += 1
      return true
    }
    return false
  }

  expect(tokenType: TokenType, problem: string): IToken {
    const token = this.peek()
    if (!token || token.tokenType !== tokenType) {
      throw this.error(token, problem)
    }
    this.#index += 1
    return token
  }

  done(): boolean {
    return this.#index >= this.#tokens.length
  }

  error(token: IToken | undefined, problem: string): UnitParseError {
    const column = token?.startColumn ?? this.#source.length + 1
    return parseError(this.#source, column, problem)
  }
}

const parseExponent = (stream: Stream): number => {
  if (!stream.match(Caret)) {
    return 1
  }
  let sign = 1
  if (stream.match(Minus)) {
    sign = -1
  } else {
    stream.match(Plus)
  }
  const digits = stream.expect(Integer, "Expected an integer exponent after '^'")
  return sign * Number(digits.image)
}

const parseTerm = (stream: Stream, table: SymbolTable, segment: Segment): UnitTerm => {
  const token = stream.peek()
  if (token?.tokenType === Integer) {
    if (token.image !== "1") {
      throw stream.error(token, DIGITS_PROBLEM)
    }
    if (segment === "denominator") {
      throw stream.error(token, "A lone 1 may only appear in the numerator")
    }
    stream.match(Integer)
    if (stream.is(Caret)) {
      throw stream.error(stream.peek(), "A lone 1 cannot take an exponent")
    }
    return RECIPROCAL
  }
  const symbol = stream.expect(UnitSymbol, "Expected a unit symbol")
  const resolved = resolveSymbol(table, symbol.image)
  if (!resolved) {
    throw stream.error(symbol, `Unknown unit symbol "${symbol.image}"`)
  }
  const exponent = parseExponent(stream)
  return new UnitTerm({
    dimension: resolved.dimension,
    exponent: segment === "denominator" ? -exponent : exponent,
    prefix: resolved.prefix,
  })
}

const parseSegment = (stream: Stream, table: SymbolTable, segment: Segment): Array<UnitTerm> => {
  const terms = [parseTerm(stream, table, segment)]
  while (stream.match(Star)) {
    terms.push(parseTerm(stream, table, segment))
  }
  return terms
}

/**
 * Parse fractional (`kg*m/s^2`) or exponential (`kg*m*s^-2`) unit text into
 * the raw term list, in the order the terms are written. Terms are not merged
 * or rectified here.
 *
 * Throws {@link UnitParseError}.
 */
export const parseUnitTerms = (text: string, table: SymbolTable = DEFAULT_SYMBOL_TABLE): UnitTerms => {
  const lexing = UnitLexer.tokenize(text)
  const lexError = lexing.errors[0]
  if (lexError) {
    throw parseError(text, lexError.column ?? 1, `Unexpected character "${text.charAt(lexError.offset)}"`)
  }
  const stream = new Stream(lexing.tokens, text)
  const terms = parseSegment(stream, table, "numerator")
  if (stream.match(Slash)) {
    terms.push(...parseSegment(stream, table, "denominator"))
    if (stream.is(Slash)) {
      throw stream.error(stream.peek(), "Only one '/' is allowed")
    }
  }
  if (!stream.done()) {
    const token = stream.peek()
    throw stream.error(token, token?.tokenType === Integer ? DIGITS_PROBLEM : "Expected '*' or '/' between unit terms")
  }
  return terms
}
