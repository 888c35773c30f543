/**
 * Literal unit conversion within one family (mass, distance, ...).
 *
 * A family lists multipliers of its named units relative to a standard unit,
 * plus aliases. Units marked as SI-prefixable gain all 20 prefixed variants
 * (`g` → `kg`, `mg`, ...) and their aliases gain the spelled-out forms
 * (`gram` → `kilogram`, `milligram`, ...). Conversions never cross families.
 *
 * @since 0.1.0
 */

import { readFileSync } from "node:fs"
import { Effect, Schema } from "effect"
import { SI_PREFIXES } from "./Dimension.js"
import { ConversionError } from "./Errors.js"

const Multiplier = Schema.Number.pipe(Schema.finite(), Schema.greaterThan(0))

/**
 * Declarative family table.
 *
 * `dimension` is the unit text of the standard unit (`"g"`, `"kg*m^2/s^2"`),
 * used when a family value becomes a quantity.
 *
 * @since 0.1.0
 * @category Models
 */
export class UnitFamily extends Schema.Class<UnitFamily>("UnitFamily")({
  name: Schema.NonEmptyTrimmedString,
  standardUnit: Schema.NonEmptyTrimmedString,
  dimension: Schema.NonEmptyTrimmedString,
  units: Schema.Record({ key: Schema.String, value: Multiplier }),
  aliases: Schema.Record({ key: Schema.String, value: Schema.String }),
  siUnits: Schema.Array(Schema.String),
}) {}

/**
 * @since 0.1.0
 * @category Models
 */
export type ConversionTable = ReadonlyMap<string, number>

/**
 * @since 0.1.0
 * @category Models
 */
export type AliasTable = ReadonlyMap<string, string>

/**
 * A family with its prefixed tables computed once.
 *
 * @since 0.1.0
 * @category Models
 */
export interface ResolvedFamily {
  readonly family: UnitFamily
  readonly units: ConversionTable
  readonly aliases: AliasTable
}

/**
 * Add `prefixSymbol + unit` for every SI-prefixable unit. Entries already
 * present in `units` keep their own multiplier.
 *
 * @category Tables
 * @since 0.1.0
 */
export const expandTable = (
  units: Readonly<Record<string, number>>,
  siUnits: Iterable<string>,
): ConversionTable => {
  const table = new Map(Object.entries(units))
  for (const unit of siUnits) {
    const multiplier = units[unit]
    if (multiplier === undefined) {
      continue
    }
    for (const prefix of SI_PREFIXES) {
      const name = `${prefix.symbol}${unit}`
      if (!table.has(name)) {
        table.set(name, multiplier * prefix.magnitude)
      }
    }
  }
  return table
}

/**
 * Add `prefixName + alias → prefixSymbol + unit` for aliases of SI-prefixable
 * units, e.g. `kilogram → kg`.
 *
 * @category Tables
 * @since 0.1.0
 */
export const expandAliases = (
  aliases: Readonly<Record<string, string>>,
  siUnits: Iterable<string>,
): AliasTable => {
  const prefixable = new Set(siUnits)
  const table = new Map(Object.entries(aliases))
  for (const [alias, unit] of Object.entries(aliases)) {
    if (!prefixable.has(unit)) {
      continue
    }
    for (const prefix of SI_PREFIXES) {
      table.set(`${prefix.name}${alias}`, `${prefix.symbol}${unit}`)
    }
  }
  return table
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const resolveFamily = (family: UnitFamily): ResolvedFamily => ({
  family,
  units: expandTable(family.units, family.siUnits),
  aliases: expandAliases(family.aliases, family.siUnits),
})

const lookupMultiplier = (
  resolved: ResolvedFamily,
  name: string,
): Effect.Effect<number, ConversionError> => {
  const canonical = resolved.aliases.get(name) ?? name
  const multiplier = resolved.units.get(canonical)
  return multiplier === undefined
    ? Effect.fail(new ConversionError({ family: resolved.family.name, unit: name }))
    : Effect.succeed(multiplier)
}

/**
 * Scale `value` by the multiplier ratio `to / from` of the two named units.
 * Identical names return the value untouched without consulting the tables.
 *
 * @category Conversions
 * @since 0.1.0
 * @example
 * ```ts
 * const scaled = yield* convert(2.5, "kilogram", "g", resolveFamily(mass)) // 0.0025
 * ```
 */
export const convert = (
  value: number,
  fromName: string,
  toName: string,
  resolved: ResolvedFamily,
): Effect.Effect<number, ConversionError> =>
  fromName === toName
    ? Effect.succeed(value)
    : Effect.gen(function* () {
        const from = yield* lookupMultiplier(resolved, fromName)
        const to = yield* lookupMultiplier(resolved, toName)
        return value * (to / from)
      })

const decodeFamily = Schema.decodeUnknownSync(Schema.parseJson(UnitFamily))

/**
 * Read and validate a family table from a JSON file.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const readFamily = (url: URL): UnitFamily => decodeFamily(readFileSync(url, "utf8"))

const BUNDLED_FAMILY_NAMES = ["mass", "distance", "current", "energy", "volume"] as const

/**
 * Families shipped in `data/families`.
 *
 * @category Constants
 * @since 0.1.0
 */
export const BUNDLED_FAMILIES: ReadonlyArray<UnitFamily> = BUNDLED_FAMILY_NAMES.map((name) =>
  readFamily(new URL(`../data/families/${name}.json`, import.meta.url)),
)
