/**
 * Derivation table.
 *
 * The single source of truth for which physical types may be multiplied and
 * what they produce. Lookups are symmetric: an entry `[A, B, C]` answers both
 * `A * B` and `B * A`. Division is answered by inverting the same entries, so
 * `(a * b) / b` and `(a * b) / a` always recover the operand types.
 *
 * The table is a `const` tuple so the compiler derives result types for
 * literal operand types as well (`Product<"Force", "Length">` is `"Energy"`).
 *
 * @since 0.1.0
 */

import { Array as Arr, Option } from "effect"
import type { PhysicalType } from "./PhysicalType.js"

/**
 * @since 0.1.0
 */
export const table = [
  ["Length", "Length", "Area"],
  ["Area", "Length", "Volume"],
  ["Area", "Area", "SecondMomentOfArea"],
  ["Volume", "Length", "SecondMomentOfArea"],
  ["Speed", "Time", "Length"],
  ["Acceleration", "Time", "Speed"],
  ["Mass", "Acceleration", "Force"],
  ["Pressure", "Area", "Force"],
  ["Pressure", "Length", "ForcePerLength"],
  ["Pressure", "Volume", "Energy"],
  ["Force", "Length", "Energy"],
  ["ForcePerLength", "Length", "Force"],
  ["SpecificWeight", "Volume", "Force"],
  ["SpecificWeight", "Area", "ForcePerLength"],
  ["SpecificWeight", "Length", "Pressure"],
] as const satisfies ReadonlyArray<readonly [PhysicalType, PhysicalType, PhysicalType]>

/**
 * @category Models
 * @since 0.1.0
 */
export type Entry = (typeof table)[number]

type ProductOf<E, A, B> = E extends readonly [A, B, infer C extends PhysicalType] ? C : never

type QuotientOf<E, R, B> = E extends readonly [infer X extends PhysicalType, B, R]
  ? X
  : E extends readonly [B, infer X extends PhysicalType, R]
    ? X
    : never

/**
 * Physical type of `A * B`, or `never` when the table has no entry.
 *
 * @category Models
 * @since 0.1.0
 */
export type Product<A extends PhysicalType, B extends PhysicalType> =
  | ProductOf<Entry, A, B>
  | ProductOf<Entry, B, A>

/**
 * Physical type `X` such that `X * B` is `R`, or `never` when no entry factors
 * `R` by `B`.
 *
 * @category Models
 * @since 0.1.0
 */
export type Quotient<R extends PhysicalType, B extends PhysicalType> = QuotientOf<Entry, R, B>

/**
 * Result type of multiplying `left` by `right`.
 *
 * @since 0.1.0
 */
export const product = (left: PhysicalType, right: PhysicalType): Option.Option<PhysicalType> =>
  Arr.findFirst(table, ([a, b]) => (a === left && b === right) || (a === right && b === left)).pipe(
    Option.map(([, , result]) => result),
  )

/**
 * Type `X` such that `X * divisor` is `dividend`.
 *
 * @since 0.1.0
 */
export const quotient = (dividend: PhysicalType, divisor: PhysicalType): Option.Option<PhysicalType> =>
  Arr.findFirst(table, ([a, b, result]) => result === dividend && (a === divisor || b === divisor)).pipe(
    Option.map(([a, b]) => (a === divisor ? b : a)),
  )
