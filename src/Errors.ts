/**
 * Error hierarchy for unit parsing, unit algebra and conversions.
 *
 * Every failure is a tagged error so callers can pattern match with
 * `Effect.catchTag`. Messages stay human-readable while the fields keep the
 * structured data for programmatic handling.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * Raised when unit text does not follow the unit grammar (more than one `/`,
 * unknown symbol, digits in a symbol, malformed exponent).
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new UnitParseError({ input: "m/s/s", problem: "Only one '/' is allowed", column: 4, snippet: "m/s/s\n   ^" })
 * ```
 */
export class UnitParseError extends Data.TaggedError("UnitParseError")<{
  readonly input: string
  readonly problem: string
  readonly column: number
  readonly snippet: string
}> {
  override get message(): string {
    return `Invalid unit "${this.input}" at column ${this.column}: ${this.problem}`
  }
}

/**
 * Raised when adding or subtracting quantities whose units differ.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnitMismatchError extends Data.TaggedError("UnitMismatchError")<{
  readonly operation: string
  readonly left: string
  readonly right: string
}> {
  override get message(): string {
    return `Cannot ${this.operation} ${this.left} and ${this.right}: units do not match`
  }
}

/**
 * Raised when a bare number takes part in arithmetic that requires units:
 * always for addition and subtraction, and for multiplication and division
 * unless `implicitDimensionless` is enabled.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnitlessNumberError extends Data.TaggedError("UnitlessNumberError")<{
  readonly operation: string
}> {
  override get message(): string {
    return `Cannot ${this.operation} a dimensionless number and a value with units`
  }
}

/**
 * Raised when a unit or alias name is unknown to a family's conversion table.
 *
 * @category Errors
 * @since 0.1.0
 */
export class ConversionError extends Data.TaggedError("ConversionError")<{
  readonly family: string
  readonly unit: string
}> {
  override get message(): string {
    return `Unknown ${this.family} unit "${this.unit}"`
  }
}

/**
 * Raised for operand types and operations the algebra does not handle:
 * complex numbers, modulo, divmod, non-scalar exponents.
 *
 * @category Errors
 * @since 0.1.0
 */
export class NotSupportedError extends Data.TaggedError("NotSupportedError")<{
  readonly operation: string
  readonly reason: string
}> {
  override get message(): string {
    return `${this.operation} is not supported: ${this.reason}`
  }
}

/**
 * Raised when a family name is not registered with the measurements service.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnknownFamilyError extends Data.TaggedError("UnknownFamilyError")<{
  readonly family: string
}> {
  override get message(): string {
    return `Unknown unit family "${this.family}"`
  }
}

/**
 * Failures of quantity arithmetic.
 *
 * @category Errors
 * @since 0.1.0
 */
export type ArithmeticError = UnitMismatchError | UnitlessNumberError | NotSupportedError
