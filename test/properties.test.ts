import { describe, it, expect } from "@effect/vitest"
import { Arbitrary, Schema } from "effect"
import * as FastCheck from "effect/FastCheck"
import { Prefix, UnitTerm, type UnitTerms } from "../src/Dimension.js"
import {
  dimensionsOf,
  merge,
  normalize,
  parseEither,
  rectify,
  sameDimensions,
  toExponentialString,
} from "../src/Units.js"

const TermSample = Schema.Struct({
  dimension: Schema.Literal(
    "Time",
    "Length",
    "Mass",
    "Current",
    "Temperature",
    "AmountOfSubstance",
    "LuminousIntensity",
  ),
  exponent: Schema.Int.pipe(Schema.greaterThanOrEqualTo(-4), Schema.lessThanOrEqualTo(4)),
  prefix: Prefix,
})

// kelvin takes no prefix in unit text
const rawTerms = Arbitrary.make(Schema.Array(TermSample).pipe(Schema.maxItems(6))).map((samples) =>
  samples.map(
    (sample) =>
      new UnitTerm({ ...sample, prefix: sample.dimension === "Temperature" ? "none" : sample.prefix }),
  ),
)

const normalizedTerms = rawTerms.map(normalize)

const sign = FastCheck.constantFrom<1 | -1>(1, -1)

const describeTerms = (terms: UnitTerms) => terms.map((t) => [t.dimension, t.exponent, t.prefix])

const sorted = (dimensions: Iterable<string>) => Array.from(dimensions).sort()

describe("unit algebra properties", () => {
  it("parses rendered exponential text back to the same dimensions", () => {
    FastCheck.assert(
      FastCheck.property(normalizedTerms, (terms) => {
        const reparsed = parseEither(toExponentialString(terms))
        expect(reparsed._tag).toBe("Right")
        if (reparsed._tag === "Right") {
          expect(sameDimensions(normalize(reparsed.right), terms)).toBe(true)
        }
      }),
    )
  })

  it("multiplies commutatively", () => {
    FastCheck.assert(
      FastCheck.property(normalizedTerms, normalizedTerms, (a, b) => {
        expect(sameDimensions(rectify(merge(a, b, 1)), rectify(merge(b, a, 1)))).toBe(true)
      }),
    )
  })

  it("rectifies idempotently", () => {
    FastCheck.assert(
      FastCheck.property(rawTerms, (terms) => {
        const once = rectify(terms)
        expect(describeTerms(rectify(once))).toEqual(describeTerms(once))
      }),
    )
  })

  it("merges to the union of both dimension sets", () => {
    FastCheck.assert(
      FastCheck.property(rawTerms, rawTerms, sign, (a, b, s) => {
        expect(sorted(dimensionsOf(merge(a, b, s)))).toEqual(
          sorted(new Set([...dimensionsOf(a), ...dimensionsOf(b)])),
        )
      }),
    )
  })

  it("undoes division by multiplying back", () => {
    FastCheck.assert(
      FastCheck.property(normalizedTerms, normalizedTerms, (a, b) => {
        expect(sameDimensions(rectify(merge(merge(a, b, -1), b, 1)), a)).toBe(true)
      }),
    )
  })
})
