/**
 * Quantity values.
 *
 * A quantity is an immutable magnitude bound to exactly one physical type. The
 * magnitude is stored in the base unit of its type (metres, newtons, pascals,
 * ...) so differently prefixed quantities combine without explicit conversion;
 * the prefix a quantity was built with is kept for display only.
 *
 * Arithmetic is checked when it runs: adding a force to a length, or
 * multiplying two types the derivation table does not relate, throws a tagged
 * error. `attempt` lifts a computation into an `Effect` with those errors in
 * the error channel.
 *
 * @example
 * ```ts
 * import { pipe } from "effect"
 *
 * const moment = pipe(kilonewton(12), Quantity.multiply(meter(3)))
 * String(moment) // "36000 J"
 * ```
 *
 * @since 0.1.0
 */

import { Effect, Equal, Hash, Option, Predicate, Schema } from "effect"
import { dual, type LazyArg } from "effect/Function"
import { NodeInspectSymbol } from "effect/Inspectable"
import type { ParseError } from "effect/ParseResult"
import { type Product, type Quotient, product, quotient } from "./Derivation.js"
import {
  DimensionMismatchError,
  DivisionByZeroError,
  IllegalPrefixError,
  InvalidExponentError,
  NonFiniteMagnitudeError,
  type QuantityError,
  UndefinedDerivationError,
  isQuantityError,
} from "./Errors.js"
import { PhysicalType, type Power, acceptsPrefix, dimension } from "./PhysicalType.js"
import { Prefix, scaleFor, symbol as prefixSymbol } from "./Prefix.js"

/**
 * @since 0.1.0
 * @category Symbols
 */
export const TypeId: unique symbol = Symbol.for("structural-units/Quantity")

/**
 * @since 0.1.0
 * @category Symbols
 */
export type TypeId = typeof TypeId

/**
 * Serialised form of a quantity: the magnitude as expressed in its prefix.
 *
 * @category Schemas
 * @since 0.1.0
 */
export const QuantityJson = Schema.Struct({
  physicalType: PhysicalType,
  value: Schema.Number.pipe(Schema.finite()),
  prefix: Schema.optionalWith(Prefix, { default: () => "one" as const }),
})

/**
 * @category Models
 * @since 0.1.0
 */
export type QuantityJson = typeof QuantityJson.Type

/**
 * Only the type is exported: instances come from `make`, `fromBaseValue`,
 * `fromJson` and the arithmetic operations.
 *
 * @category Models
 * @since 0.1.0
 */
class Quantity<T extends PhysicalType = PhysicalType> implements Equal.Equal {
  readonly [TypeId]: TypeId = TypeId

  constructor(
    readonly physicalType: T,
    /** Magnitude in the base unit of `physicalType`. */
    readonly baseValue: number,
    /** Prefix used for display; never affects `baseValue`. */
    readonly prefix: Prefix,
  ) {
    if (!acceptsPrefix(physicalType, prefix)) {
      throw new IllegalPrefixError({ physicalType, prefix })
    }
  }

  get power(): Power {
    return dimension(this.physicalType).power
  }

  /**
   * Magnitude expressed in `prefix`.
   */
  get value(): number {
    return this.baseValue / scaleFor(this.prefix, this.power)
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return isQuantity(that) && that.physicalType === this.physicalType && that.baseValue === this.baseValue
  }

  [Hash.symbol](): number {
    return Hash.cached(this, Hash.combine(Hash.number(this.baseValue))(Hash.string(this.physicalType)))
  }

  toJSON(): QuantityJson {
    return { physicalType: this.physicalType, value: this.value, prefix: this.prefix }
  }

  toString(): string {
    return `${this.value} ${prefixSymbol(this.prefix)}${dimension(this.physicalType).baseUnit}`
  }

  [NodeInspectSymbol](): unknown {
    return this.toJSON()
  }
}

export type { Quantity }

/**
 * @category Guards
 * @since 0.1.0
 */
export const isQuantity = (u: unknown): u is Quantity => Predicate.hasProperty(u, TypeId)

const checked = <T extends PhysicalType>(
  physicalType: T,
  magnitude: number,
  baseValue: number,
  prefix: Prefix,
): Quantity<T> => {
  const quantity = new Quantity(physicalType, baseValue, prefix)
  if (!Number.isFinite(baseValue)) {
    throw new NonFiniteMagnitudeError({ physicalType, magnitude })
  }
  return quantity
}

/**
 * Construct a quantity from a magnitude expressed in `prefix`.
 *
 * @throws IllegalPrefixError when `prefix` is not allowed for `physicalType`
 * @throws NonFiniteMagnitudeError when the magnitude is NaN or infinite in
 * base units
 * @category Constructors
 * @since 0.1.0
 */
export const make = <T extends PhysicalType>(
  physicalType: T,
  magnitude: number,
  prefix: Prefix = "one",
): Quantity<T> =>
  checked(physicalType, magnitude, magnitude * scaleFor(prefix, dimension(physicalType).power), prefix)

/**
 * Construct a quantity from a magnitude already normalised to base units.
 *
 * @throws IllegalPrefixError
 * @throws NonFiniteMagnitudeError
 * @category Constructors
 * @since 0.1.0
 */
export const fromBaseValue = <T extends PhysicalType>(
  physicalType: T,
  baseValue: number,
  prefix: Prefix = "one",
): Quantity<T> => checked(physicalType, baseValue, baseValue, prefix)

/**
 * Decode a serialised quantity.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const fromJson = (input: unknown): Effect.Effect<Quantity, ParseError | QuantityError> =>
  Schema.decodeUnknown(QuantityJson)(input).pipe(
    Effect.flatMap(({ physicalType, value, prefix }) => attempt(() => make(physicalType, value, prefix))),
  )

/**
 * Base-unit magnitude as a plain number, for boundary code that only
 * understands floats.
 *
 * @category Getters
 * @since 0.1.0
 */
export const toNumeric = (self: Quantity): number => self.baseValue

/**
 * Magnitude expressed in an arbitrary prefix, without changing the quantity.
 *
 * @category Getters
 * @since 0.1.0
 */
export const valueIn: {
  (prefix: Prefix): (self: Quantity) => number
  (self: Quantity, prefix: Prefix): number
} = dual(2, (self: Quantity, prefix: Prefix): number => self.baseValue / scaleFor(prefix, self.power))

/**
 * Same quantity presented in another prefix.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const withPrefix: {
  (prefix: Prefix): <A extends PhysicalType>(self: Quantity<A>) => Quantity<A>
  <A extends PhysicalType>(self: Quantity<A>, prefix: Prefix): Quantity<A>
} = dual(
  2,
  <A extends PhysicalType>(self: Quantity<A>, prefix: Prefix): Quantity<A> =>
    fromBaseValue(self.physicalType, self.baseValue, prefix),
)

const ensureSameType = (operation: string, self: Quantity, that: Quantity): void => {
  if (self.physicalType !== that.physicalType) {
    throw new DimensionMismatchError({ operation, left: self.physicalType, right: that.physicalType })
  }
}

/**
 * Sum of two quantities of the same physical type, presented in the prefix of
 * the left operand.
 *
 * @throws DimensionMismatchError
 * @category Math
 * @since 0.1.0
 */
export const add: {
  <A extends PhysicalType>(that: Quantity<A>): (self: Quantity<A>) => Quantity<A>
  <A extends PhysicalType>(self: Quantity<A>, that: Quantity<A>): Quantity<A>
} = dual(2, <A extends PhysicalType>(self: Quantity<A>, that: Quantity<A>): Quantity<A> => {
  ensureSameType("add", self, that)
  return new Quantity(self.physicalType, self.baseValue + that.baseValue, self.prefix)
})

/**
 * @throws DimensionMismatchError
 * @category Math
 * @since 0.1.0
 */
export const subtract: {
  <A extends PhysicalType>(that: Quantity<A>): (self: Quantity<A>) => Quantity<A>
  <A extends PhysicalType>(self: Quantity<A>, that: Quantity<A>): Quantity<A>
} = dual(2, <A extends PhysicalType>(self: Quantity<A>, that: Quantity<A>): Quantity<A> => {
  ensureSameType("subtract", self, that)
  return new Quantity(self.physicalType, self.baseValue - that.baseValue, self.prefix)
})

/**
 * @category Math
 * @since 0.1.0
 */
export const negate = <A extends PhysicalType>(self: Quantity<A>): Quantity<A> =>
  new Quantity(self.physicalType, -self.baseValue, self.prefix)

/**
 * @category Math
 * @since 0.1.0
 */
export const abs = <A extends PhysicalType>(self: Quantity<A>): Quantity<A> =>
  new Quantity(self.physicalType, Math.abs(self.baseValue), self.prefix)

const scale = <A extends PhysicalType>(self: Quantity<A>, factor: number): Quantity<A> =>
  new Quantity(self.physicalType, self.baseValue * factor, self.prefix)

/**
 * Multiply by a bare number (same type, same prefix) or by another quantity
 * (type taken from the derivation table, unscaled prefix).
 *
 * @throws UndefinedDerivationError when the table relates neither `(A, B)`
 * nor `(B, A)`
 * @category Math
 * @since 0.1.0
 */
export const multiply: {
  (that: number): <A extends PhysicalType>(self: Quantity<A>) => Quantity<A>
  <B extends PhysicalType>(that: Quantity<B>): <A extends PhysicalType>(self: Quantity<A>) => Quantity<Product<A, B>>
  <A extends PhysicalType>(self: Quantity<A>, that: number): Quantity<A>
  <B extends PhysicalType>(self: number, that: Quantity<B>): Quantity<B>
  <A extends PhysicalType, B extends PhysicalType>(self: Quantity<A>, that: Quantity<B>): Quantity<Product<A, B>>
} = dual(2, (self: Quantity | number, that: Quantity | number): Quantity | number => {
  if (typeof self === "number") {
    return typeof that === "number" ? self * that : scale(that, self)
  }
  if (typeof that === "number") {
    return scale(self, that)
  }
  const physicalType = Option.getOrThrowWith(
    product(self.physicalType, that.physicalType),
    () => new UndefinedDerivationError({ operation: "multiply", left: self.physicalType, right: that.physicalType }),
  )
  return new Quantity(physicalType, self.baseValue * that.baseValue, "one")
})

type IsUnion<T, U = T> = T extends unknown ? ([U] extends [T] ? false : true) : never

/**
 * Result of dividing a quantity of type `A` by a quantity of type `B`: a bare
 * ratio for identical types, otherwise the factor type from the derivation
 * table. Unresolved unions keep both possibilities.
 *
 * @category Models
 * @since 0.1.0
 */
export type Ratio<A extends PhysicalType, B extends PhysicalType> = [IsUnion<A>, IsUnion<B>] extends [false, false]
  ? [A] extends [B] ? number : Quantity<Quotient<A, B>>
  : number | Quantity<Quotient<A, B>>

/**
 * Divide by a bare number (same type), by a quantity of the same type (bare
 * ratio) or by another quantity (inverse derivation table lookup).
 *
 * @throws DivisionByZeroError when the divisor is zero
 * @throws UndefinedDerivationError when no table entry factors the dividend
 * by the divisor
 * @category Math
 * @since 0.1.0
 */
export const divide: {
  (that: number): <A extends PhysicalType>(self: Quantity<A>) => Quantity<A>
  <B extends PhysicalType>(that: Quantity<B>): <A extends PhysicalType>(self: Quantity<A>) => Ratio<A, B>
  <A extends PhysicalType>(self: Quantity<A>, that: number): Quantity<A>
  <A extends PhysicalType, B extends PhysicalType>(self: Quantity<A>, that: Quantity<B>): Ratio<A, B>
} = dual(2, (self: Quantity, that: Quantity | number): Quantity | number => {
  if (typeof that === "number") {
    if (that === 0) {
      throw new DivisionByZeroError({ dividend: self.physicalType })
    }
    return new Quantity(self.physicalType, self.baseValue / that, self.prefix)
  }
  if (self.physicalType === that.physicalType) {
    if (that.baseValue === 0) {
      throw new DivisionByZeroError({ dividend: self.physicalType })
    }
    return self.baseValue / that.baseValue
  }
  const physicalType = Option.getOrThrowWith(
    quotient(self.physicalType, that.physicalType),
    () => new UndefinedDerivationError({ operation: "divide", left: self.physicalType, right: that.physicalType }),
  )
  if (that.baseValue === 0) {
    throw new DivisionByZeroError({ dividend: self.physicalType })
  }
  return new Quantity(physicalType, self.baseValue / that.baseValue, "one")
})

/**
 * Physical type of `A` raised to the literal exponent `N`.
 *
 * @category Models
 * @since 0.1.0
 */
export type Raised<A extends PhysicalType, N extends number> = N extends 0 | 1
  ? A
  : N extends 2
    ? Product<A, A>
    : N extends 3
      ? Product<Product<A, A>, A>
      : N extends 4
        ? Product<Product<Product<A, A>, A>, A>
        : PhysicalType

/**
 * Repeated self-multiplication through the derivation table. The zeroth power
 * is the same-typed quantity of magnitude one.
 *
 * @throws InvalidExponentError for negative or non-integer exponents
 * @throws UndefinedDerivationError when an intermediate product is undefined
 * @category Math
 * @since 0.1.0
 */
export const power: {
  <N extends number>(exponent: N): <A extends PhysicalType>(self: Quantity<A>) => Quantity<Raised<A, N>>
  <A extends PhysicalType, N extends number>(self: Quantity<A>, exponent: N): Quantity<Raised<A, N>>
} = dual(2, (self: Quantity, exponent: number): Quantity => {
  if (!Number.isInteger(exponent) || exponent < 0) {
    throw new InvalidExponentError({ exponent })
  }
  if (exponent === 0) {
    return make(self.physicalType, 1)
  }
  let result: Quantity = self
  for (let i = 1; i < exponent; i++) {
    result = multiply(result, self)
  }
  return result
})

/**
 * Two-sided predicate over quantities of the same physical type.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Comparison {
  <A extends PhysicalType>(that: Quantity<A>): (self: Quantity<A>) => boolean
  <A extends PhysicalType>(self: Quantity<A>, that: Quantity<A>): boolean
}

const comparison = (predicate: (self: number, that: number) => boolean): Comparison =>
  dual(2, (self: Quantity, that: Quantity): boolean => {
    ensureSameType("compare", self, that)
    return predicate(self.baseValue, that.baseValue)
  })

/**
 * @throws DimensionMismatchError
 * @category Predicates
 * @since 0.1.0
 */
export const lessThan: Comparison = comparison((self, that) => self < that)

/**
 * @throws DimensionMismatchError
 * @category Predicates
 * @since 0.1.0
 */
export const lessThanOrEqualTo: Comparison = comparison((self, that) => self <= that)

/**
 * Exact equality of base magnitudes, so `100 cm` equals `1 m`.
 *
 * @throws DimensionMismatchError
 * @category Predicates
 * @since 0.1.0
 */
export const equals: Comparison = comparison((self, that) => self === that)

/**
 * @throws DimensionMismatchError
 * @category Predicates
 * @since 0.1.0
 */
export const notEquals: Comparison = comparison((self, that) => self !== that)

/**
 * @throws DimensionMismatchError
 * @category Predicates
 * @since 0.1.0
 */
export const greaterThanOrEqualTo: Comparison = comparison((self, that) => self >= that)

/**
 * @throws DimensionMismatchError
 * @category Predicates
 * @since 0.1.0
 */
export const greaterThan: Comparison = comparison((self, that) => self > that)

/**
 * @throws DimensionMismatchError
 * @category Predicates
 * @since 0.1.0
 */
export const compare: {
  <A extends PhysicalType>(that: Quantity<A>): (self: Quantity<A>) => -1 | 0 | 1
  <A extends PhysicalType>(self: Quantity<A>, that: Quantity<A>): -1 | 0 | 1
} = dual(2, (self: Quantity, that: Quantity): -1 | 0 | 1 => {
  ensureSameType("compare", self, that)
  return self.baseValue < that.baseValue ? -1 : self.baseValue > that.baseValue ? 1 : 0
})

/**
 * The smaller operand; `self` on a tie.
 *
 * @throws DimensionMismatchError
 * @category Math
 * @since 0.1.0
 */
export const min: {
  <A extends PhysicalType>(that: Quantity<A>): (self: Quantity<A>) => Quantity<A>
  <A extends PhysicalType>(self: Quantity<A>, that: Quantity<A>): Quantity<A>
} = dual(2, <A extends PhysicalType>(self: Quantity<A>, that: Quantity<A>): Quantity<A> =>
  lessThanOrEqualTo(self, that) ? self : that)

/**
 * The larger operand; `self` on a tie.
 *
 * @throws DimensionMismatchError
 * @category Math
 * @since 0.1.0
 */
export const max: {
  <A extends PhysicalType>(that: Quantity<A>): (self: Quantity<A>) => Quantity<A>
  <A extends PhysicalType>(self: Quantity<A>, that: Quantity<A>): Quantity<A>
} = dual(2, <A extends PhysicalType>(self: Quantity<A>, that: Quantity<A>): Quantity<A> =>
  greaterThanOrEqualTo(self, that) ? self : that)

/**
 * @category Models
 * @since 0.1.0
 */
export interface Tolerance {
  readonly relative?: number
  readonly absolute?: number
}

/**
 * Combined relative and absolute tolerance test on base magnitudes:
 * `|self - that| <= absolute + relative * |that|`.
 *
 * @throws DimensionMismatchError
 * @category Predicates
 * @since 0.1.0
 */
export const isClose = <A extends PhysicalType>(
  self: Quantity<A>,
  that: Quantity<A>,
  tolerance: Tolerance = {},
): boolean => {
  ensureSameType("compare", self, that)
  const { relative = 1e-5, absolute = 1e-8 } = tolerance
  return Math.abs(self.baseValue - that.baseValue) <= absolute + relative * Math.abs(that.baseValue)
}

/**
 * Run a computation over quantities, surfacing arithmetic failures in the
 * error channel. Anything else thrown is a defect.
 *
 * @example
 * ```ts
 * const stress = Quantity.attempt(() => Quantity.divide(force, area))
 * ```
 *
 * @category Effects
 * @since 0.1.0
 */
export const attempt = <A>(evaluate: LazyArg<A>): Effect.Effect<A, QuantityError> =>
  Effect.suspend((): Effect.Effect<A, QuantityError> => {
    try {
      return Effect.succeed(evaluate())
    } catch (error) {
      return isQuantityError(error) ? Effect.fail(error) : Effect.die(error)
    }
  })
