/**
 * Value-carrying quantities.
 *
 * A {@link Quantity} owns a plain number and a normalized unit term sequence.
 * Fallible arithmetic returns an `Effect` that fails with a tagged error when
 * the operation breaks a unit rule; comparisons never fail and answer `false`
 * for mismatched units or operand types, so quantities can be sorted and
 * filtered by generic code.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import type { UnitTerms } from "./Dimension.js"
import { NotSupportedError, UnitlessNumberError, UnitMismatchError, type UnitParseError } from "./Errors.js"
import { merge, normalize, rectify, sameDimensions, scaleExponents, type Sign } from "./internal/units/Algebra.js"
import { format, parse, type DisplayMode } from "./Units.js"

/**
 * Per-quantity arithmetic policy. `implicitDimensionless` lets a bare number
 * multiply or divide a quantity without being wrapped as one.
 *
 * @since 0.1.0
 * @category Models
 */
export interface ArithmeticOptions {
  readonly implicitDimensionless: boolean
}

/**
 * @since 0.1.0
 * @category Models
 */
export interface QuantityOptions {
  readonly displayMode?: DisplayMode
  readonly implicitDimensionless?: boolean
}

/**
 * Shape recognised as a complex number so it can be rejected explicitly.
 *
 * @since 0.1.0
 * @category Models
 */
export interface Complex {
  readonly re: number
  readonly im: number
}

/**
 * What the right-hand side of an operation turned out to be.
 *
 * @since 0.1.0
 * @category Models
 */
export type Operand =
  | { readonly _tag: "Scalar"; readonly value: number }
  | { readonly _tag: "Measured"; readonly quantity: Quantity }
  | { readonly _tag: "Complex"; readonly value: Complex }
  | { readonly _tag: "Unsupported"; readonly received: string }

/**
 * @since 0.1.0
 * @category Guards
 */
export const isComplex = (value: unknown): value is Complex =>
  typeof value === "object" &&
  value !== null &&
  "re" in value &&
  "im" in value &&
  typeof value.re === "number" &&
  typeof value.im === "number"

const describe = (value: unknown): string => {
  if (value === null) {
    return "null"
  }
  if (typeof value === "object") {
    return value.constructor?.name ?? "object"
  }
  return typeof value
}

/**
 * @since 0.1.0
 * @category Guards
 */
export const classifyOperand = (operand: unknown): Operand => {
  if (operand instanceof Quantity) {
    return { _tag: "Measured", quantity: operand }
  }
  if (typeof operand === "number") {
    return { _tag: "Scalar", value: operand }
  }
  if (isComplex(operand)) {
    return { _tag: "Complex", value: operand }
  }
  return { _tag: "Unsupported", received: describe(operand) }
}

interface Outcome {
  readonly value: number
  readonly units: UnitTerms
}

type Combine = (left: number, right: number) => number

const sum: Combine = (left, right) => left + right
const difference: Combine = (left, right) => left - right
const product: Combine = (left, right) => left * right
const quotient: Combine = (left, right) => left / right
const floorQuotient: Combine = (left, right) => Math.floor(left / right)

// halves go to the even neighbour
const roundHalfEven = (value: number, digits: number): number => {
  const factor = 10 ** digits
  const scaled = value * factor
  if (!Number.isFinite(scaled)) {
    return value
  }
  const lower = Math.floor(scaled)
  const fraction = scaled - lower
  const rounded = fraction > 0.5 || (fraction === 0.5 && lower % 2 !== 0) ? lower + 1 : lower
  return rounded / factor
}

const unsupported = (operation: string, operand: Operand): NotSupportedError =>
  new NotSupportedError({
    operation,
    reason:
      operand._tag === "Complex"
        ? "complex numbers are not supported"
        : operand._tag === "Unsupported"
          ? `operand of type ${operand.received} is not a number or a quantity`
          : "operand must be a plain number",
  })

/**
 * A number with units.
 *
 * @since 0.1.0
 * @category Models
 * @example
 * ```ts
 * const density = yield* Quantity.make(10, "kg/m^3")
 * const flow = yield* Quantity.make(25.5, "m^3/s")
 * const massFlow = yield* density.multiply(flow)
 * massFlow.toString() // "255 kg/s"
 * ```
 */
export class Quantity {
  value: number
  units: UnitTerms
  displayMode: DisplayMode
  readonly options: ArithmeticOptions

  constructor(value: number, units: UnitTerms, options: QuantityOptions = {}) {
    this.value = value
    this.units = normalize(units)
    this.displayMode = options.displayMode ?? "fractional"
    this.options = { implicitDimensionless: options.implicitDimensionless ?? false }
  }

  /**
   * Build a quantity from unit text or an existing term sequence.
   */
  static make(
    value: number,
    units: string | UnitTerms,
    options: QuantityOptions = {},
  ): Effect.Effect<Quantity, UnitParseError> {
    return typeof units === "string"
      ? Effect.map(parse(units), (terms) => new Quantity(value, terms, options))
      : Effect.succeed(new Quantity(value, units, options))
  }

  // arithmetic

  add(other: unknown): Effect.Effect<Quantity, UnitMismatchError | UnitlessNumberError | NotSupportedError> {
    return Effect.map(this.#additive("add", other, sum), (outcome) => this.#derive(outcome))
  }

  subtract(other: unknown): Effect.Effect<Quantity, UnitMismatchError | UnitlessNumberError | NotSupportedError> {
    return Effect.map(this.#additive("subtract", other, difference), (outcome) => this.#derive(outcome))
  }

  multiply(other: unknown): Effect.Effect<Quantity, UnitlessNumberError | NotSupportedError> {
    return Effect.map(this.#multiplicative("multiply", other, 1, product), (outcome) => this.#derive(outcome))
  }

  divide(other: unknown): Effect.Effect<Quantity, UnitlessNumberError | NotSupportedError> {
    return Effect.map(this.#multiplicative("divide", other, -1, quotient), (outcome) => this.#derive(outcome))
  }

  floorDivide(other: unknown): Effect.Effect<Quantity, UnitlessNumberError | NotSupportedError> {
    return Effect.map(this.#multiplicative("floor divide", other, -1, floorQuotient), (outcome) => this.#derive(outcome))
  }

  /**
   * Raise to a plain-number power. Exponents may be fractional; the term
   * exponents are scaled as-is.
   */
  pow(exponent: unknown, modulo?: unknown): Effect.Effect<Quantity, NotSupportedError> {
    return Effect.map(this.#power(exponent, modulo), (outcome) => this.#derive(outcome))
  }

  mod(_other: unknown): Effect.Effect<Quantity, NotSupportedError> {
    return Effect.fail(new NotSupportedError({ operation: "mod", reason: "modulo of quantities is not implemented" }))
  }

  divmod(_other: unknown): Effect.Effect<readonly [Quantity, Quantity], NotSupportedError> {
    return Effect.fail(new NotSupportedError({ operation: "divmod", reason: "divmod of quantities is not implemented" }))
  }

  // in-place arithmetic: same rules, but the receiver takes the result

  addAssign(other: unknown): Effect.Effect<this, UnitMismatchError | UnitlessNumberError | NotSupportedError> {
    return Effect.map(this.#additive("add", other, sum), (outcome) => this.#assign(outcome))
  }

  subtractAssign(other: unknown): Effect.Effect<this, UnitMismatchError | UnitlessNumberError | NotSupportedError> {
    return Effect.map(this.#additive("subtract", other, difference), (outcome) => this.#assign(outcome))
  }

  multiplyAssign(other: unknown): Effect.Effect<this, UnitlessNumberError | NotSupportedError> {
    return Effect.map(this.#multiplicative("multiply", other, 1, product), (outcome) => this.#assign(outcome))
  }

  divideAssign(other: unknown): Effect.Effect<this, UnitlessNumberError | NotSupportedError> {
    return Effect.map(this.#multiplicative("divide", other, -1, quotient), (outcome) => this.#assign(outcome))
  }

  floorDivideAssign(other: unknown): Effect.Effect<this, UnitlessNumberError | NotSupportedError> {
    return Effect.map(this.#multiplicative("floor divide", other, -1, floorQuotient), (outcome) => this.#assign(outcome))
  }

  powAssign(exponent: unknown, modulo?: unknown): Effect.Effect<this, NotSupportedError> {
    return Effect.map(this.#power(exponent, modulo), (outcome) => this.#assign(outcome))
  }

  // unary

  negate(): Quantity {
    return this.#withValue(-this.value)
  }

  plus(): Quantity {
    return this.#withValue(this.value)
  }

  abs(): Quantity {
    return this.#withValue(Math.abs(this.value))
  }

  /**
   * Round to `digits` decimal places, halves to even (`2.5` → `2`, `3.5` → `4`).
   */
  round(digits = 0): Quantity {
    return this.#withValue(roundHalfEven(this.value, digits))
  }

  trunc(): Quantity {
    return this.#withValue(Math.trunc(this.value))
  }

  floor(): Quantity {
    return this.#withValue(Math.floor(this.value))
  }

  ceil(): Quantity {
    return this.#withValue(Math.ceil(this.value))
  }

  // comparison

  lessThan(other: unknown): boolean {
    return this.#compare(other, (left, right) => left < right)
  }

  lessThanOrEqual(other: unknown): boolean {
    return this.#compare(other, (left, right) => left <= right)
  }

  greaterThan(other: unknown): boolean {
    return other instanceof Quantity && other.lessThan(this)
  }

  greaterThanOrEqual(other: unknown): boolean {
    return other instanceof Quantity && other.lessThanOrEqual(this)
  }

  equals(other: unknown): boolean {
    return this.#compare(other, (left, right) => left === right)
  }

  // conversions

  toNumber(): number {
    return this.value
  }

  toInteger(): number {
    return Math.trunc(this.value)
  }

  isZero(): boolean {
    return this.value === 0
  }

  setDisplayMode(mode: DisplayMode): void {
    this.displayMode = mode
  }

  unitString(mode: DisplayMode = this.displayMode): string {
    return format(this.units, mode)
  }

  toString(): string {
    return `${this.value} ${this.unitString()}`
  }

  toJSON(): { readonly value: number; readonly units: string } {
    return { value: this.value, units: this.unitString("exponential") }
  }

  #derive(outcome: Outcome): Quantity {
    return new Quantity(outcome.value, outcome.units, {
      displayMode: this.displayMode,
      implicitDimensionless: this.options.implicitDimensionless,
    })
  }

  #assign(outcome: Outcome): this {
    this.value = outcome.value
    this.units = outcome.units
    return this
  }

  #withValue(value: number): Quantity {
    return this.#derive({ value, units: this.units })
  }

  #compare(other: unknown, predicate: (left: number, right: number) => boolean): boolean {
    return other instanceof Quantity && sameDimensions(this.units, other.units) && predicate(this.value, other.value)
  }

  #additive(
    operation: string,
    other: unknown,
    combine: Combine,
  ): Effect.Effect<Outcome, UnitMismatchError | UnitlessNumberError | NotSupportedError> {
    return Effect.suspend((): Effect.Effect<Outcome, UnitMismatchError | UnitlessNumberError | NotSupportedError> => {
      const operand = classifyOperand(other)
      switch (operand._tag) {
        case "Measured": {
          const right = operand.quantity
          return sameDimensions(this.units, right.units)
            ? Effect.succeed({ value: combine(this.value, right.value), units: this.units })
            : Effect.fail(
                new UnitMismatchError({
                  operation,
                  left: this.unitString("exponential"),
                  right: right.unitString("exponential"),
                }),
              )
        }
        case "Scalar":
          return Effect.fail(new UnitlessNumberError({ operation }))
        case "Complex":
        case "Unsupported":
          return Effect.fail(unsupported(operation, operand))
      }
    })
  }

  #multiplicative(
    operation: string,
    other: unknown,
    sign: Sign,
    combine: Combine,
  ): Effect.Effect<Outcome, UnitlessNumberError | NotSupportedError> {
    return Effect.suspend((): Effect.Effect<Outcome, UnitlessNumberError | NotSupportedError> => {
      const operand = classifyOperand(other)
      switch (operand._tag) {
        case "Measured":
          return Effect.succeed({
            value: combine(this.value, operand.quantity.value),
            units: rectify(merge(this.units, operand.quantity.units, sign)),
          })
        case "Scalar":
          return this.options.implicitDimensionless
            ? Effect.succeed({ value: combine(this.value, operand.value), units: this.units })
            : Effect.fail(new UnitlessNumberError({ operation }))
        case "Complex":
        case "Unsupported":
          return Effect.fail(unsupported(operation, operand))
      }
    })
  }

  #power(exponent: unknown, modulo: unknown): Effect.Effect<Outcome, NotSupportedError> {
    return Effect.suspend((): Effect.Effect<Outcome, NotSupportedError> => {
      if (modulo !== undefined) {
        return Effect.fail(new NotSupportedError({ operation: "pow", reason: "modulo in powers is not supported" }))
      }
      const operand = classifyOperand(exponent)
      if (operand._tag !== "Scalar") {
        return Effect.fail(unsupported("pow", operand))
      }
      if (!Number.isFinite(operand.value)) {
        return Effect.fail(new NotSupportedError({ operation: "pow", reason: "exponent must be finite" }))
      }
      const factor = operand.value
      if (this.units.some((term) => !Number.isFinite(term.exponent * factor))) {
        return Effect.fail(
          new NotSupportedError({ operation: "pow", reason: "resulting unit exponents must be finite" }),
        )
      }
      return Effect.succeed({
        value: this.value ** operand.value,
        units: rectify(scaleExponents(this.units, operand.value)),
      })
    })
  }
}
