/**
 * Physical type tags.
 *
 * A physical type identifies a family of mutually compatible quantities. Two
 * quantities can be added or compared only when their tags are identical, and
 * the derivation table maps pairs of tags to the tag of their product.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"
import type { Prefix } from "./Prefix.js"

/**
 * Closed set of physical type tags.
 *
 * @category Schemas
 * @since 0.1.0
 */
export const PhysicalType = Schema.Literal(
  "Angle",
  "Time",
  "Length",
  "Area",
  "Volume",
  "SecondMomentOfArea",
  "Speed",
  "Acceleration",
  "Mass",
  "Force",
  "ForcePerLength",
  "Pressure",
  "SpecificWeight",
  "Energy",
  "Temperature",
)

/**
 * @category Models
 * @since 0.1.0
 */
export type PhysicalType = typeof PhysicalType.Type

/**
 * Exponent relating a dimension's prefix scaling to its linear unit.
 *
 * @category Models
 * @since 0.1.0
 */
export type Power = 1 | 2 | 3 | 4

/**
 * @category Models
 * @since 0.1.0
 */
export interface Dimension {
  /** Symbol of the canonical base unit every magnitude is normalised to. */
  readonly baseUnit: string
  readonly power: Power
  /** Whether decimal prefixes other than `one` may be applied. */
  readonly prefixable: boolean
}

const dimensions: { readonly [T in PhysicalType]: Dimension } = {
  Angle: { baseUnit: "rad", power: 1, prefixable: false },
  Time: { baseUnit: "s", power: 1, prefixable: false },
  Length: { baseUnit: "m", power: 1, prefixable: true },
  Area: { baseUnit: "m²", power: 2, prefixable: true },
  Volume: { baseUnit: "m³", power: 3, prefixable: true },
  SecondMomentOfArea: { baseUnit: "m⁴", power: 4, prefixable: true },
  Speed: { baseUnit: "m/s", power: 1, prefixable: true },
  Acceleration: { baseUnit: "m/s²", power: 1, prefixable: true },
  Mass: { baseUnit: "kg", power: 1, prefixable: false },
  Force: { baseUnit: "N", power: 1, prefixable: true },
  ForcePerLength: { baseUnit: "N/m", power: 1, prefixable: true },
  Pressure: { baseUnit: "Pa", power: 1, prefixable: true },
  SpecificWeight: { baseUnit: "N/m³", power: 1, prefixable: true },
  Energy: { baseUnit: "J", power: 1, prefixable: true },
  Temperature: { baseUnit: "K", power: 1, prefixable: false },
}

/**
 * @since 0.1.0
 */
export const all: ReadonlyArray<PhysicalType> = PhysicalType.literals

/**
 * @category Guards
 * @since 0.1.0
 */
export const isPhysicalType = Schema.is(PhysicalType)

/**
 * @since 0.1.0
 */
export const dimension = (physicalType: PhysicalType): Dimension => dimensions[physicalType]

/**
 * Whether `prefix` may be used to construct a quantity of `physicalType`.
 * The unscaled prefix is always accepted.
 *
 * @since 0.1.0
 */
export const acceptsPrefix = (physicalType: PhysicalType, prefix: Prefix): boolean =>
  prefix === "one" || dimensions[physicalType].prefixable
