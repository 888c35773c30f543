/**
 * Unit term model.
 *
 * A compound unit such as `kg*m^2/s^2` is represented as a sequence of
 * {@link UnitTerm}s, one per SI base dimension, each carrying an exponent and
 * the SI prefix it was written with. The synthetic `Reciprocal` dimension only
 * stands in for a bare `1` numerator (`1/s`).
 *
 * @since 0.1.0
 */

import { Schema } from "effect"

/**
 * The seven SI base dimensions plus the `Reciprocal` placeholder.
 *
 * @since 0.1.0
 * @category Schemas
 */
export const Dimension = Schema.Literal(
  "Time",
  "Length",
  "Mass",
  "Current",
  "Temperature",
  "AmountOfSubstance",
  "LuminousIntensity",
  "Reciprocal",
)

/**
 * @since 0.1.0
 * @category Models
 */
export type Dimension = typeof Dimension.Type

/**
 * SI prefix names, or `"none"` for an unprefixed term.
 *
 * @since 0.1.0
 * @category Schemas
 */
export const Prefix = Schema.Literal(
  "yocto",
  "zepto",
  "atto",
  "femto",
  "pico",
  "nano",
  "micro",
  "milli",
  "centi",
  "deci",
  "deca",
  "hecto",
  "kilo",
  "mega",
  "giga",
  "tera",
  "peta",
  "exa",
  "zetta",
  "yotta",
  "none",
)

/**
 * @since 0.1.0
 * @category Models
 */
export type Prefix = typeof Prefix.Type

/**
 * @since 0.1.0
 * @category Models
 */
export interface SiPrefix {
  readonly name: Exclude<Prefix, "none">
  readonly symbol: string
  readonly magnitude: number
}

/**
 * The 20 SI magnitude prefixes, smallest first.
 *
 * @since 0.1.0
 * @category Constants
 */
export const SI_PREFIXES: ReadonlyArray<SiPrefix> = [
  { name: "yocto", symbol: "y", magnitude: 1e-24 },
  { name: "zepto", symbol: "z", magnitude: 1e-21 },
  { name: "atto", symbol: "a", magnitude: 1e-18 },
  { name: "femto", symbol: "f", magnitude: 1e-15 },
  { name: "pico", symbol: "p", magnitude: 1e-12 },
  { name: "nano", symbol: "n", magnitude: 1e-9 },
  { name: "micro", symbol: "u", magnitude: 1e-6 },
  { name: "milli", symbol: "m", magnitude: 1e-3 },
  { name: "centi", symbol: "c", magnitude: 1e-2 },
  { name: "deci", symbol: "d", magnitude: 1e-1 },
  { name: "deca", symbol: "da", magnitude: 1e1 },
  { name: "hecto", symbol: "h", magnitude: 1e2 },
  { name: "kilo", symbol: "k", magnitude: 1e3 },
  { name: "mega", symbol: "M", magnitude: 1e6 },
  { name: "giga", symbol: "G", magnitude: 1e9 },
  { name: "tera", symbol: "T", magnitude: 1e12 },
  { name: "peta", symbol: "P", magnitude: 1e15 },
  { name: "exa", symbol: "E", magnitude: 1e18 },
  { name: "zetta", symbol: "Z", magnitude: 1e21 },
  { name: "yotta", symbol: "Y", magnitude: 1e24 },
]

const prefixesBySymbol: ReadonlyMap<string, SiPrefix> = new Map(
  SI_PREFIXES.map((prefix) => [prefix.symbol, prefix] as const),
)

const prefixesByName: ReadonlyMap<Prefix, SiPrefix> = new Map(
  SI_PREFIXES.map((prefix) => [prefix.name, prefix] as const),
)

/**
 * @since 0.1.0
 * @category Lookups
 */
export const prefixFromSymbol = (symbol: string): SiPrefix | undefined => prefixesBySymbol.get(symbol)

/**
 * Symbol written in front of a prefixed unit; empty for `"none"`.
 *
 * @since 0.1.0
 * @category Lookups
 */
export const prefixSymbol = (prefix: Prefix): string => prefixesByName.get(prefix)?.symbol ?? ""

/**
 * Symbol each dimension is rendered with, before any prefix.
 *
 * @since 0.1.0
 * @category Constants
 */
export const BASE_SYMBOLS: Readonly<Record<Dimension, string>> = {
  Time: "s",
  Length: "m",
  Mass: "g",
  Current: "A",
  Temperature: "K",
  AmountOfSubstance: "mol",
  LuminousIntensity: "cd",
  Reciprocal: "1",
}

/**
 * One dimensional factor of a compound unit.
 *
 * @since 0.1.0
 * @category Models
 * @example
 * ```ts
 * // the "kg^3" in "kg^3/m*s"
 * const term = new UnitTerm({ dimension: "Mass", exponent: 3, prefix: "kilo" })
 * ```
 */
export class UnitTerm extends Schema.Class<UnitTerm>("UnitTerm")({
  dimension: Dimension,
  exponent: Schema.Number.pipe(Schema.finite()),
  prefix: Prefix,
}) {
  /**
   * Copy of this term with a different exponent.
   */
  withExponent(exponent: number): UnitTerm {
    return new UnitTerm({ dimension: this.dimension, exponent, prefix: this.prefix })
  }

  get symbol(): string {
    return `${prefixSymbol(this.prefix)}${BASE_SYMBOLS[this.dimension]}`
  }
}

/**
 * Ordered term sequence. Order only matters for rendering.
 *
 * @since 0.1.0
 * @category Models
 */
export type UnitTerms = ReadonlyArray<UnitTerm>

/**
 * @since 0.1.0
 * @category Schemas
 */
export const UnitTerms = Schema.Array(UnitTerm)

/**
 * Placeholder numerator of units such as `1/s`.
 *
 * @since 0.1.0
 * @category Constants
 */
export const RECIPROCAL: UnitTerm = new UnitTerm({ dimension: "Reciprocal", exponent: 1, prefix: "none" })

/**
 * @since 0.1.0
 * @category Constructors
 */
export const term = (dimension: Dimension, exponent = 1, prefix: Prefix = "none"): UnitTerm =>
  new UnitTerm({ dimension, exponent, prefix })
