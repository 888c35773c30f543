import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import {
  ConversionError,
  NotSupportedError,
  UnitlessNumberError,
  UnitMismatchError,
  UnitParseError,
  UnknownFamilyError,
} from "../src/Errors.js"
import { Quantity } from "../src/Quantity.js"

describe("unit error hierarchy", () => {
  it("formats parse errors with their column", () => {
    const error = new UnitParseError({
      input: "m/s/s",
      problem: "Only one '/' is allowed",
      column: 4,
      snippet: "m/s/s\n   ^",
    })

    expect(error.message).toBe(`Invalid unit "m/s/s" at column 4: Only one '/' is allowed`)
  })

  it("formats arithmetic errors", () => {
    expect(new UnitMismatchError({ operation: "subtract", left: "kg", right: "g*m" }).message).toBe(
      "Cannot subtract kg and g*m: units do not match",
    )
    expect(new UnitlessNumberError({ operation: "divide" }).message).toBe(
      "Cannot divide a dimensionless number and a value with units",
    )
    expect(new NotSupportedError({ operation: "mod", reason: "modulo of quantities is not implemented" }).message).toBe(
      "mod is not supported: modulo of quantities is not implemented",
    )
  })

  it("formats lookup errors", () => {
    expect(new ConversionError({ family: "mass", unit: "furlong" }).message).toBe(`Unknown mass unit "furlong"`)
    expect(new UnknownFamilyError({ family: "time" }).message).toBe(`Unknown unit family "time"`)
  })

  it.effect("supports catchTag on parse failures", () =>
    Effect.gen(function* () {
      const handled = yield* Quantity.make(1, "m^").pipe(
        Effect.catchTag("UnitParseError", (error) => {
          expect(error.input).toBe("m^")
          expect(error.column).toBe(3)
          return Effect.succeed("handled")
        }),
      )

      expect(handled).toBe("handled")
    }),
  )

  it.effect("supports catchTags across arithmetic failures", () =>
    Effect.gen(function* () {
      const length = yield* Quantity.make(1, "m")
      const time = yield* Quantity.make(1, "s")

      const handled = yield* length.add(time).pipe(
        Effect.map(() => "added"),
        Effect.catchTags({
          UnitMismatchError: (error) => Effect.succeed(`mismatch ${error.left} ${error.right}`),
          UnitlessNumberError: () => Effect.succeed("unitless"),
          NotSupportedError: () => Effect.succeed("unsupported"),
        }),
      )

      expect(handled).toBe("mismatch m s")
    }),
  )
})
