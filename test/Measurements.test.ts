import { describe, it, expect } from "@effect/vitest"
import { ConfigProvider, Effect, Exit } from "effect"
import { DEFAULT_SETTINGS } from "../src/Config.js"
import { UnitFamily } from "../src/Conversion.js"
import { ConversionError, UnknownFamilyError } from "../src/Errors.js"
import { makeMeasurements, Measurements } from "../src/Measurements.js"

const time = new UnitFamily({
  name: "Time",
  standardUnit: "s",
  dimension: "s",
  units: { s: 1, min: 60, hr: 3600 },
  aliases: { second: "s", minute: "min", hour: "hr" },
  siUnits: ["s"],
})

const withConfig = (entries: ReadonlyArray<readonly [string, string]>) =>
  Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries)))

describe("Measurements", () => {
  it.effect("measures family values as quantities in the standard unit", () =>
    Effect.gen(function* () {
      const measurements = yield* Measurements
      const mass = yield* measurements.measure("mass", 2.5, "kilogram")
      expect(mass.value).toBeCloseTo(0.0025, 12)
      expect(mass.unitString()).toBe("g/")

      const energy = yield* measurements.measure("energy", 1, "kJ")
      expect(energy.value).toBe(0.001)
      expect(energy.unitString("exponential")).toBe("kg*m^2*s^-2")

      const volume = yield* measurements.measure("volume", 2, "liter")
      expect(volume.value).toBeCloseTo(2000, 9)
      expect(volume.unitString()).toBe("m^3/")
    }).pipe(Effect.provide(Measurements.layer()), withConfig([])),
  )

  it.effect("converts within a family", () =>
    Effect.gen(function* () {
      const measurements = yield* Measurements
      expect(yield* measurements.convert("distance", 3, "ft", "inch")).toBeCloseTo(0.25, 9)
      expect(yield* measurements.convert(" Distance ", 1, "km", "m")).toBe(0.001)

      const error = yield* measurements.convert("distance", 1, "m", "furlong").pipe(Effect.flip)
      expect(error).toBeInstanceOf(ConversionError)
    }).pipe(Effect.provide(Measurements.layer()), withConfig([])),
  )

  it.effect("fails for unknown families", () =>
    Effect.gen(function* () {
      const measurements = yield* Measurements
      const error = yield* measurements.measure("time", 1, "s").pipe(Effect.flip)
      expect(error).toBeInstanceOf(UnknownFamilyError)
      if (error instanceof UnknownFamilyError) {
        expect(error.message).toBe('Unknown unit family "time"')
      }
    }).pipe(Effect.provide(Measurements.layer()), withConfig([])),
  )

  it.effect("registers additional families", () =>
    Effect.gen(function* () {
      const measurements = yield* Measurements
      const names = yield* measurements.register([time])
      expect(names).toEqual(["mass", "distance", "current", "energy", "volume", "time"])
      expect(yield* measurements.convert("time", 2, "hour", "minute")).toBeCloseTo(1 / 30, 12)
      expect(yield* measurements.convert("time", 1.5, "s", "ms")).toBeCloseTo(0.0015, 12)
      expect(yield* measurements.families).toEqual(names)
    }).pipe(Effect.provide(Measurements.layer()), withConfig([])),
  )

  it.effect("reads quantity settings from configuration", () =>
    Effect.gen(function* () {
      const measurements = yield* Measurements
      expect(measurements.settings).toEqual({ implicitDimensionless: true, displayMode: "exponential" })
      const length = yield* measurements.quantity(3, "m")
      const doubled = yield* length.multiply(2)
      expect(doubled.toString()).toBe("6 m")
    }).pipe(
      Effect.provide(Measurements.layer()),
      withConfig([
        ["UNITS.IMPLICIT_DIMENSIONLESS", "true"],
        ["UNITS.DISPLAY_MODE", "exponential"],
      ]),
    ),
  )

  it.effect("falls back to default settings", () =>
    Effect.gen(function* () {
      const measurements = yield* Measurements
      expect(measurements.settings).toEqual(DEFAULT_SETTINGS)
    }).pipe(Effect.provide(Measurements.layer()), withConfig([])),
  )

  it.effect("rejects invalid configuration", () =>
    Effect.gen(function* () {
      const exit = yield* Effect.exit(
        Effect.gen(function* () {
          return yield* Measurements
        }).pipe(Effect.provide(Measurements.layer())),
      )
      expect(Exit.isFailure(exit)).toBe(true)
    }).pipe(withConfig([["UNITS.DISPLAY_MODE", "sideways"]])),
  )

  it.effect("can be built around explicit settings and families", () =>
    Effect.gen(function* () {
      const measurements = yield* makeMeasurements(DEFAULT_SETTINGS, [time])
      expect(yield* measurements.families).toEqual(["time"])
      const duration = yield* measurements.measure("time", 120, "min")
      expect(duration.toString()).toBe("2 s/")
    }),
  )
})
