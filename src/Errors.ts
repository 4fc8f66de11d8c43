/**
 * Error hierarchy for quantity arithmetic.
 *
 * Pure arithmetic throws these synchronously; Effect-returning APIs surface them
 * in the error channel so callers can pattern match with `Effect.catchTag`.
 * Messages name the operand types involved so an unsupported physical
 * combination can be diagnosed from the message alone.
 *
 * @since 0.1.0
 */

import { Data, Predicate } from "effect"
import type { PhysicalType } from "./PhysicalType.js"
import type { Prefix } from "./Prefix.js"

/**
 * Raised when two quantities of different physical types are added,
 * subtracted, compared or converted into one another.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * Quantity.add(meter(1), newton(1)) // throws DimensionMismatchError
 * ```
 */
export class DimensionMismatchError extends Data.TaggedError("DimensionMismatchError")<{
  readonly operation: string
  readonly left: PhysicalType
  readonly right: PhysicalType
}> {
  override get message(): string {
    return `Cannot ${this.operation} ${this.left} and ${this.right}: physical types differ`
  }
}

/**
 * Raised when a product or quotient has no entry in the derivation table.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UndefinedDerivationError extends Data.TaggedError("UndefinedDerivationError")<{
  readonly operation: "multiply" | "divide"
  readonly left: PhysicalType
  readonly right: PhysicalType
}> {
  override get message(): string {
    const symbol = this.operation === "multiply" ? "*" : "/"
    return `No physical type is derived from ${this.left} ${symbol} ${this.right}`
  }
}

/**
 * Raised when the divisor is a bare zero or a quantity whose base magnitude is
 * exactly zero.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DivisionByZeroError extends Data.TaggedError("DivisionByZeroError")<{
  readonly dividend: PhysicalType
}> {
  override get message(): string {
    return `Division of ${this.dividend} by zero`
  }
}

/**
 * Raised at construction time when a prefix is not allowed for a physical type
 * (e.g. kilo applied to Temperature).
 *
 * @category Errors
 * @since 0.1.0
 */
export class IllegalPrefixError extends Data.TaggedError("IllegalPrefixError")<{
  readonly physicalType: PhysicalType
  readonly prefix: Prefix
}> {
  override get message(): string {
    return `Prefix "${this.prefix}" cannot be applied to ${this.physicalType}`
  }
}

/**
 * Raised when a quantity is raised to a negative or non-integer power.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InvalidExponentError extends Data.TaggedError("InvalidExponentError")<{
  readonly exponent: number
}> {
  override get message(): string {
    return `Exponent ${this.exponent} is not a non-negative integer`
  }
}

/**
 * Raised at construction time when a magnitude is NaN or infinite, or
 * overflows once normalised to the base unit.
 *
 * @category Errors
 * @since 0.1.0
 */
export class NonFiniteMagnitudeError extends Data.TaggedError("NonFiniteMagnitudeError")<{
  readonly physicalType: PhysicalType
  readonly magnitude: number
}> {
  override get message(): string {
    return `Magnitude ${this.magnitude} of ${this.physicalType} is not finite in base units`
  }
}

/**
 * Raised when a requested unit symbol does not exist within the registry.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnitNotFoundError extends Data.TaggedError("UnitNotFoundError")<{
  readonly symbol: string
}> {
  override get message(): string {
    return `Unknown unit symbol "${this.symbol}"`
  }
}

/**
 * Raised when national annex parameters are requested for a country without a
 * parameter set.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnknownJurisdictionError extends Data.TaggedError("UnknownJurisdictionError")<{
  readonly country: string
}> {
  override get message(): string {
    return `No national annex parameters for "${this.country}"`
  }
}

/**
 * Union of the failures raised by quantity arithmetic.
 *
 * @category Errors
 * @since 0.1.0
 */
export type QuantityError =
  | DimensionMismatchError
  | UndefinedDerivationError
  | DivisionByZeroError
  | IllegalPrefixError
  | InvalidExponentError
  | NonFiniteMagnitudeError

/**
 * @category Guards
 * @since 0.1.0
 */
export const isQuantityError = (u: unknown): u is QuantityError =>
  Predicate.isTagged(u, "DimensionMismatchError") ||
  Predicate.isTagged(u, "UndefinedDerivationError") ||
  Predicate.isTagged(u, "DivisionByZeroError") ||
  Predicate.isTagged(u, "IllegalPrefixError") ||
  Predicate.isTagged(u, "InvalidExponentError") ||
  Predicate.isTagged(u, "NonFiniteMagnitudeError")
