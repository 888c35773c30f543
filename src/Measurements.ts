/**
 * Measurements service: a registry of unit families plus the quantity
 * settings in force, provided as a `Layer`.
 *
 * @since 0.1.0
 */

import { Context, Effect, Layer, Ref } from "effect"
import { QuantitySettings } from "./Config.js"
import { BUNDLED_FAMILIES, convert, resolveFamily, type ResolvedFamily, type UnitFamily } from "./Conversion.js"
import type { UnitTerms } from "./Dimension.js"
import { UnknownFamilyError, type ConversionError, type UnitParseError } from "./Errors.js"
import { Quantity } from "./Quantity.js"
import { parse } from "./Units.js"

type Registry = ReadonlyMap<string, ResolvedFamily>

const normalizeName = (name: string): string => name.trim().toLowerCase()

const extendRegistry = (registry: Registry, families: ReadonlyArray<UnitFamily>): Registry => {
  const next = new Map(registry)
  for (const family of families) {
    next.set(normalizeName(family.name), resolveFamily(family))
  }
  return next
}

const lookupFamily = (registry: Registry, name: string): Effect.Effect<ResolvedFamily, UnknownFamilyError> => {
  const resolved = registry.get(normalizeName(name))
  return resolved ? Effect.succeed(resolved) : Effect.fail(new UnknownFamilyError({ family: name }))
}

export interface MeasurementsService {
  readonly settings: QuantitySettings
  readonly register: (families: ReadonlyArray<UnitFamily>) => Effect.Effect<ReadonlyArray<string>>
  readonly families: Effect.Effect<ReadonlyArray<string>>
  readonly family: (name: string) => Effect.Effect<ResolvedFamily, UnknownFamilyError>
  readonly quantity: (value: number, units: string | UnitTerms) => Effect.Effect<Quantity, UnitParseError>
  readonly measure: (
    family: string,
    value: number,
    unit: string,
  ) => Effect.Effect<Quantity, UnknownFamilyError | ConversionError | UnitParseError>
  readonly convert: (
    family: string,
    value: number,
    fromUnit: string,
    toUnit: string,
  ) => Effect.Effect<number, UnknownFamilyError | ConversionError>
}

/**
 * Build the service around explicit settings.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeMeasurements = (
  settings: QuantitySettings,
  families: ReadonlyArray<UnitFamily> = BUNDLED_FAMILIES,
): Effect.Effect<MeasurementsService> =>
  Effect.gen(function* () {
    const registryRef = yield* Ref.make(extendRegistry(new Map(), families))
    const getRegistry = Ref.get(registryRef)
    const find = (name: string) => Effect.flatMap(getRegistry, (registry) => lookupFamily(registry, name))
    const quantity = (value: number, units: string | UnitTerms) => Quantity.make(value, units, settings)

    const service: MeasurementsService = {
      settings,
      register: (added) =>
        Ref.updateAndGet(registryRef, (current) => extendRegistry(current, added)).pipe(
          Effect.map((registry) => Array.from(registry.keys())),
          Effect.tap((names) =>
            Effect.logDebug("registered unit families").pipe(Effect.annotateLogs({ families: names.join(",") })),
          ),
        ),
      families: Effect.map(getRegistry, (registry) => Array.from(registry.keys())),
      family: find,
      quantity,
      measure: (familyName, value, unit) =>
        Effect.gen(function* () {
          const resolved = yield* find(familyName)
          const standardValue = yield* convert(value, unit, resolved.family.standardUnit, resolved)
          const terms = yield* parse(resolved.family.dimension)
          yield* Effect.logDebug(`measured ${value} ${unit} as ${standardValue} ${resolved.family.standardUnit}`)
          return yield* quantity(standardValue, terms)
        }).pipe(Effect.annotateLogs({ family: familyName })),
      convert: (familyName, value, fromUnit, toUnit) =>
        Effect.gen(function* () {
          const resolved = yield* find(familyName)
          const converted = yield* convert(value, fromUnit, toUnit, resolved)
          yield* Effect.logDebug(`converted ${value} ${fromUnit} to ${converted} ${toUnit}`)
          return converted
        }).pipe(Effect.annotateLogs({ family: familyName })),
    }

    return service
  })

export class Measurements extends Context.Tag("effect-quantities/Measurements")<
  Measurements,
  MeasurementsService
>() {
  /**
   * Settings come from {@link QuantitySettings}; families default to the
   * bundled mass, distance, current, energy and volume tables.
   */
  static layer(families: ReadonlyArray<UnitFamily> = BUNDLED_FAMILIES) {
    return Layer.effect(
      this,
      Effect.gen(function* () {
        const settings = yield* QuantitySettings
        return yield* makeMeasurements(settings, families)
      }),
    )
  }
}
