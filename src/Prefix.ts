/**
 * Metric prefixes from nano (1e-9) to giga (1e9).
 *
 * Prefixes are stored by their decimal exponent so that scale factors raised to
 * a dimension's power (`cm²` is `(1e-2)²`) come out as correctly rounded powers
 * of ten instead of accumulating multiplication error.
 *
 * @since 0.1.0
 */

import { Array as Arr, Option, Schema } from "effect"

/**
 * Closed set of prefix names.
 *
 * @category Schemas
 * @since 0.1.0
 */
export const Prefix = Schema.Literal(
  "nano",
  "micro",
  "milli",
  "centi",
  "deci",
  "one",
  "deca",
  "hecto",
  "kilo",
  "mega",
  "giga",
)

/**
 * @category Models
 * @since 0.1.0
 */
export type Prefix = typeof Prefix.Type

interface PrefixDefinition {
  readonly symbol: string
  readonly exponent: number
}

const definitions: { readonly [P in Prefix]: PrefixDefinition } = {
  nano: { symbol: "n", exponent: -9 },
  micro: { symbol: "µ", exponent: -6 },
  milli: { symbol: "m", exponent: -3 },
  centi: { symbol: "c", exponent: -2 },
  deci: { symbol: "d", exponent: -1 },
  one: { symbol: "", exponent: 0 },
  deca: { symbol: "da", exponent: 1 },
  hecto: { symbol: "h", exponent: 2 },
  kilo: { symbol: "k", exponent: 3 },
  mega: { symbol: "M", exponent: 6 },
  giga: { symbol: "G", exponent: 9 },
}

// `10 ** -4` is not guaranteed to be the double nearest 1e-4; the literal is.
const powerOfTen = (exponent: number): number => Number(`1e${exponent}`)

/**
 * Every prefix, smallest first.
 *
 * @since 0.1.0
 */
export const all: ReadonlyArray<Prefix> = Prefix.literals

/**
 * @category Guards
 * @since 0.1.0
 */
export const isPrefix = Schema.is(Prefix)

/**
 * Short symbol used when rendering (`k` for kilo, empty for one).
 *
 * @since 0.1.0
 */
export const symbol = (prefix: Prefix): string => definitions[prefix].symbol

/**
 * @since 0.1.0
 */
export const exponent = (prefix: Prefix): number => definitions[prefix].exponent

/**
 * Scale factor of the prefix as a positive number (`scale("kilo") === 1000`).
 *
 * @since 0.1.0
 */
export const scale = (prefix: Prefix): number => powerOfTen(definitions[prefix].exponent)

/**
 * Scale factor of the prefix raised to `power`, for dimensions whose base unit is
 * a power of a length (`scaleFor("centi", 2) === 1e-4`).
 *
 * @since 0.1.0
 */
export const scaleFor = (prefix: Prefix, power: number): number =>
  powerOfTen(definitions[prefix].exponent * power)

/**
 * Find the prefix rendered with the given symbol.
 *
 * @since 0.1.0
 */
export const fromSymbol = (text: string): Option.Option<Prefix> =>
  Arr.findFirst(all, (prefix) => definitions[prefix].symbol === text)
