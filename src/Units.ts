/**
 * Unit text and unit algebra.
 *
 * Parses unit expressions into {@link UnitTerms}, combines term sequences
 * under multiplication, division and exponentiation, and renders them back in
 * fractional (`kg*s/m^6`) or exponential (`kg*s*m^-6`) notation.
 *
 * @since 0.1.0
 */

import { Effect, Either, Schema } from "effect"
import type { UnitTerms } from "./Dimension.js"
import { UnitParseError } from "./Errors.js"
import { toExponentialString, toFractionalString } from "./internal/units/Render.js"
import { parseUnitTerms } from "./internal/units/UnitParser.js"
import { DEFAULT_SYMBOL_TABLE, type SymbolTable } from "./internal/units/SymbolTable.js"

export {
  dimensionsOf,
  merge,
  normalize,
  rectify,
  sameDimensions,
  scaleExponents,
  type Sign,
} from "./internal/units/Algebra.js"
export { toExponentialString, toFractionalString } from "./internal/units/Render.js"
export {
  DEFAULT_SYMBOL_TABLE,
  loadSymbolTable,
  makeSymbolTable,
  resolveSymbol,
  type ResolvedSymbol,
  type SymbolTable,
} from "./internal/units/SymbolTable.js"

/**
 * How a quantity's units are written out.
 *
 * @since 0.1.0
 * @category Schemas
 */
export const DisplayMode = Schema.Literal("fractional", "exponential")

/**
 * @since 0.1.0
 * @category Models
 */
export type DisplayMode = typeof DisplayMode.Type

const toParseError = (text: string, error: unknown): UnitParseError =>
  error instanceof UnitParseError
    ? error
    : new UnitParseError({
        input: text,
        problem: error instanceof Error ? error.message : String(error),
        column: 1,
        snippet: `${text}\n^`,
      })

/**
 * Parse unit text into its raw term list.
 *
 * @category Parsing
 * @since 0.1.0
 * @example
 * ```ts
 * const terms = yield* Units.parse("kg^3/m*s")
 * Units.toExponentialString(terms) // "kg^3*m^-1*s^-1"
 * ```
 */
export const parse = (
  text: string,
  table: SymbolTable = DEFAULT_SYMBOL_TABLE,
): Effect.Effect<UnitTerms, UnitParseError> =>
  Effect.try({
    try: () => parseUnitTerms(text, table),
    catch: (error) => toParseError(text, error),
  })

/**
 * @category Parsing
 * @since 0.1.0
 */
export const parseEither = (
  text: string,
  table: SymbolTable = DEFAULT_SYMBOL_TABLE,
): Either.Either<UnitTerms, UnitParseError> =>
  Either.try({
    try: () => parseUnitTerms(text, table),
    catch: (error) => toParseError(text, error),
  })

/**
 * Render terms in the given notation.
 *
 * @category Rendering
 * @since 0.1.0
 */
export const format = (terms: UnitTerms, mode: DisplayMode): string =>
  mode === "fractional" ? toFractionalString(terms) : toExponentialString(terms)
