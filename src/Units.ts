/**
 * Units module providing named unit constructors and a symbolic unit registry.
 *
 * Named constructors (`meter`, `kilonewton`, `megapascal`, ...) fix a physical
 * type and prefix and accept only the magnitude. The registry maps unit
 * symbols such as `"kN/m3"` or `"km/h"` to definitions carrying a physical
 * type, a display prefix and a non-decimal factor, so boundary code that only
 * knows strings can build and read quantities. Conversions are explicit;
 * lookups are case sensitive (`"mm"` and `"Mm"` are different units).
 *
 * @since 0.1.0
 */

import { Context, Effect, Layer, Option, Ref, Schema } from "effect"
import unitData from "./data/units.json" with { type: "json" }
import { DimensionMismatchError, type QuantityError, UnitNotFoundError } from "./Errors.js"
import { PhysicalType, dimension } from "./PhysicalType.js"
import { Prefix, scaleFor } from "./Prefix.js"
import { type Quantity, attempt, fromBaseValue, make } from "./Quantity.js"

const unit =
  <T extends PhysicalType>(physicalType: T, prefix: Prefix = "one") =>
  (magnitude: number): Quantity<T> =>
    make(physicalType, magnitude, prefix)

/**
 * Lengths. Every named constructor takes the magnitude in its own unit and
 * throws what `Quantity.make` throws.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const meter = unit("Length")
export const kilometer = unit("Length", "kilo")
export const decimeter = unit("Length", "deci")
export const centimeter = unit("Length", "centi")
export const millimeter = unit("Length", "milli")

/**
 * Areas, volumes and second moments of area. The prefix scales with the
 * square, cube and fourth power of the length prefix: `squareCentimeter(1)`
 * is `1e-4` m².
 *
 * @category Constructors
 * @since 0.1.0
 */
export const squareMeter = unit("Area")
export const squareCentimeter = unit("Area", "centi")
export const squareMillimeter = unit("Area", "milli")
export const cubicMeter = unit("Volume")
export const cubicCentimeter = unit("Volume", "centi")
export const cubicMillimeter = unit("Volume", "milli")
export const quarticMeter = unit("SecondMomentOfArea")
export const quarticCentimeter = unit("SecondMomentOfArea", "centi")
export const quarticMillimeter = unit("SecondMomentOfArea", "milli")

/**
 * Forces, line loads, stresses, specific weights and energies.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const newton = unit("Force")
export const kilonewton = unit("Force", "kilo")
export const meganewton = unit("Force", "mega")
export const newtonPerMeter = unit("ForcePerLength")
export const kilonewtonPerMeter = unit("ForcePerLength", "kilo")
export const pascal = unit("Pressure")
export const kilopascal = unit("Pressure", "kilo")
export const megapascal = unit("Pressure", "mega")
export const gigapascal = unit("Pressure", "giga")
/**
 * One newton per square millimetre is one megapascal.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const newtonPerSquareMillimeter = megapascal
export const newtonPerCubicMeter = unit("SpecificWeight")
export const kilonewtonPerCubicMeter = unit("SpecificWeight", "kilo")
export const joule = unit("Energy")
export const kilojoule = unit("Energy", "kilo")
export const newtonMeter = joule
export const kilonewtonMeter = kilojoule

/**
 * Kinematics, and the dimensions that take no decimal prefix.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const meterPerSecond = unit("Speed")
export const meterPerSecondSquared = unit("Acceleration")
export const second = unit("Time")
export const kilogram = unit("Mass")
export const radian = unit("Angle")
export const kelvin = unit("Temperature")

/**
 * Declarative unit definition: a symbol, the physical type it measures, the
 * prefix it displays with and a factor for units that are not decimal
 * multiples of the base unit (minutes, degrees, tonnes, ...).
 *
 * @since 0.1.0
 */
export class UnitDefinition extends Schema.Class<UnitDefinition>("UnitDefinition")({
  symbol: Schema.NonEmptyTrimmedString,
  physicalType: PhysicalType,
  prefix: Schema.optionalWith(Prefix, { default: () => "one" as const }),
  factor: Schema.optionalWith(Schema.Number.pipe(Schema.greaterThan(0)), { default: () => 1 }),
  description: Schema.optional(Schema.String),
}) {
  /**
   * Base-unit magnitude of one of this unit.
   */
  get scale(): number {
    return this.factor * scaleFor(this.prefix, dimension(this.physicalType).power)
  }
}

const symbolIndex = new WeakMap<UnitRegistry, ReadonlyMap<string, UnitDefinition>>()

/**
 * Aggregate registry holding all known unit definitions.
 *
 * @since 0.1.0
 */
export class UnitRegistry extends Schema.Class<UnitRegistry>("UnitRegistry")({
  units: Schema.Array(UnitDefinition),
}) {
  /**
   * Convert the registry into a lookup map keyed by unit symbol. Later
   * definitions win over earlier ones with the same symbol.
   */
  toMap(): ReadonlyMap<string, UnitDefinition> {
    const cached = symbolIndex.get(this)
    if (cached !== undefined) {
      return cached
    }
    const index = new Map(this.units.map((definition) => [definition.symbol, definition] as const))
    symbolIndex.set(this, index)
    return index
  }
}

const lookupUnit = (
  registry: UnitRegistry,
  symbol: string,
): Effect.Effect<UnitDefinition, UnitNotFoundError> =>
  Option.match(Option.fromNullable(registry.toMap().get(symbol.trim())), {
    onNone: () => Effect.fail(new UnitNotFoundError({ symbol })),
    onSome: (definition) => Effect.succeed(definition),
  })

const ensureSameType = (
  from: UnitDefinition,
  to: UnitDefinition,
): Effect.Effect<void, DimensionMismatchError> =>
  from.physicalType === to.physicalType
    ? Effect.void
    : Effect.fail(
        new DimensionMismatchError({ operation: "convert", left: from.physicalType, right: to.physicalType }),
      )

/**
 * Register a set of unit definitions into a registry.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeRegistry = (definitions: ReadonlyArray<UnitDefinition>): UnitRegistry =>
  new UnitRegistry({ units: [...definitions] })

/**
 * Append additional unit definitions to an existing registry.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const extendRegistry = (
  registry: UnitRegistry,
  definitions: ReadonlyArray<UnitDefinition>,
): UnitRegistry => new UnitRegistry({ units: [...registry.units, ...definitions] })

/**
 * Construct a quantity from a value expressed in the unit named by `symbol`.
 * Decimal units keep their prefix for display; units with a factor display in
 * the base unit.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const quantityFromUnit = (
  registry: UnitRegistry,
  value: number,
  symbol: string,
): Effect.Effect<Quantity, UnitNotFoundError | QuantityError> =>
  Effect.flatMap(lookupUnit(registry, symbol), (definition) =>
    attempt(() =>
      fromBaseValue(definition.physicalType, value * definition.scale, definition.factor === 1 ? definition.prefix : "one"),
    ),
  )

/**
 * Explicitly convert a scalar value from one unit to another of the same
 * physical type.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const convertValue = (
  registry: UnitRegistry,
  value: number,
  fromSymbol: string,
  toSymbol: string,
): Effect.Effect<number, UnitNotFoundError | DimensionMismatchError> =>
  Effect.gen(function* () {
    const from = yield* lookupUnit(registry, fromSymbol)
    const to = yield* lookupUnit(registry, toSymbol)
    yield* ensureSameType(from, to)
    return (value * from.scale) / to.scale
  })

/**
 * Read a quantity's magnitude in the unit named by `symbol`.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const valueIn = (
  registry: UnitRegistry,
  quantity: Quantity,
  symbol: string,
): Effect.Effect<number, UnitNotFoundError | DimensionMismatchError> =>
  Effect.flatMap(lookupUnit(registry, symbol), (definition) =>
    definition.physicalType === quantity.physicalType
      ? Effect.succeed(quantity.baseValue / definition.scale)
      : Effect.fail(
          new DimensionMismatchError({
            operation: "convert",
            left: quantity.physicalType,
            right: definition.physicalType,
          }),
        ),
  )

/**
 * Definitions bundled with the library: SI units with the prefixes common in
 * structural design and the customary non-decimal units.
 *
 * @since 0.1.0
 */
export const DEFAULT_UNIT_DEFINITIONS: ReadonlyArray<UnitDefinition> = Schema.decodeUnknownSync(
  Schema.Array(UnitDefinition),
)(unitData)

export interface UnitManagerService {
  readonly register: (definitions: ReadonlyArray<UnitDefinition>) => Effect.Effect<UnitRegistry>
  readonly registry: Effect.Effect<UnitRegistry>
  readonly find: (symbol: string) => Effect.Effect<UnitDefinition, UnitNotFoundError>
  readonly quantity: (value: number, symbol: string) => Effect.Effect<Quantity, UnitNotFoundError | QuantityError>
  readonly convertValue: (
    value: number,
    fromSymbol: string,
    toSymbol: string,
  ) => Effect.Effect<number, UnitNotFoundError | DimensionMismatchError>
  readonly valueIn: (
    quantity: Quantity,
    symbol: string,
  ) => Effect.Effect<number, UnitNotFoundError | DimensionMismatchError>
}

export class UnitManager extends Context.Tag("structural-units/UnitManager")<
  UnitManager,
  UnitManagerService
>() {
  static layer(initialDefinitions: ReadonlyArray<UnitDefinition> = DEFAULT_UNIT_DEFINITIONS) {
    return Layer.effect(this, Effect.gen(function* () {
      const registryRef = yield* Ref.make(makeRegistry(initialDefinitions))
      const getRegistry = Ref.get(registryRef)

      const service: UnitManagerService = {
        register: (definitions) =>
          Ref.updateAndGet(registryRef, (current) => extendRegistry(current, definitions)),
        registry: getRegistry,
        find: (symbol) => Effect.flatMap(getRegistry, (registry) => lookupUnit(registry, symbol)),
        quantity: (value, symbol) =>
          Effect.flatMap(getRegistry, (registry) => quantityFromUnit(registry, value, symbol)),
        convertValue: (value, fromSymbol, toSymbol) =>
          Effect.flatMap(getRegistry, (registry) => convertValue(registry, value, fromSymbol, toSymbol)),
        valueIn: (quantity, symbol) =>
          Effect.flatMap(getRegistry, (registry) => valueIn(registry, quantity, symbol)),
      }

      return service
    }))
  }
}
