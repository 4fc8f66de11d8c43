import { describe, it, expect } from "@effect/vitest"
import { Cause, Effect, Equal, Exit, Hash, Option, pipe } from "effect"
import {
  DimensionMismatchError,
  DivisionByZeroError,
  IllegalPrefixError,
  InvalidExponentError,
  NonFiniteMagnitudeError,
  UndefinedDerivationError,
} from "../src/Errors.js"
import * as Quantity from "../src/Quantity.js"
import {
  centimeter,
  joule,
  kelvin,
  kilogram,
  kilonewton,
  kilonewtonMeter,
  megapascal,
  meter,
  millimeter,
  newton,
  quarticCentimeter,
  radian,
  second,
  squareCentimeter,
  squareMeter,
} from "../src/Units.js"

describe("Quantity", () => {
  describe("construction", () => {
    it("normalises the magnitude to the base unit", () => {
      const length = Quantity.make("Length", 5, "milli")
      expect(length.physicalType).toBe("Length")
      expect(length.prefix).toBe("milli")
      expect(length.baseValue).toBeCloseTo(0.005, 15)
      expect(length.value).toBeCloseTo(5, 12)
    })

    it("scales area prefixes with the square of the length prefix", () => {
      expect(squareCentimeter(1).baseValue).toBe(1e-4)
      expect(quarticCentimeter(1).baseValue).toBe(1e-8)
    })

    it("rejects prefixes on angle, time, mass and temperature", () => {
      expect(() => Quantity.make("Temperature", 1, "kilo")).toThrow(IllegalPrefixError)
      expect(() => Quantity.make("Time", 1, "milli")).toThrow(IllegalPrefixError)
      expect(() => Quantity.make("Mass", 1, "kilo")).toThrow(IllegalPrefixError)
      expect(() => Quantity.make("Angle", 1, "micro")).toThrow(IllegalPrefixError)
      expect(kelvin(293).baseValue).toBe(293)
    })

    it("reports the rejected prefix", () => {
      expect(() => Quantity.withPrefix(kelvin(1), "kilo")).toThrow('Prefix "kilo" cannot be applied to Temperature')
    })

    it("offers no public constructor that bypasses prefix validation", () => {
      expect(Quantity).not.toHaveProperty("Quantity")
      expect(() => Reflect.construct(kelvin(1).constructor, ["Temperature", 1, "kilo"])).toThrow(IllegalPrefixError)
      expect(() => Quantity.fromBaseValue("Temperature", 1, "kilo")).toThrow(IllegalPrefixError)
      expect(Quantity.fromBaseValue("Length", 5, "kilo").value).toBe(0.005)
    })

    it("rejects magnitudes that are not finite in base units", () => {
      expect(() => Quantity.make("Length", Number.NaN)).toThrow(NonFiniteMagnitudeError)
      expect(() => Quantity.make("Force", Number.POSITIVE_INFINITY)).toThrow(NonFiniteMagnitudeError)
      expect(() => Quantity.fromBaseValue("Force", Number.NEGATIVE_INFINITY)).toThrow(NonFiniteMagnitudeError)
      expect(() => Quantity.make("SecondMomentOfArea", 1e300, "giga")).toThrow(
        "Magnitude 1e+300 of SecondMomentOfArea is not finite in base units",
      )
      expect(() => Quantity.make("Temperature", Number.NaN, "kilo")).toThrow(IllegalPrefixError)
    })

    it("exposes the base magnitude for numeric code", () => {
      expect(Quantity.toNumeric(kilonewton(1.3))).toBe(1300)
    })
  })

  describe("prefix presentation", () => {
    it("renders the magnitude in its own prefix", () => {
      expect(String(kilonewton(1.3))).toBe("1.3 kN")
      expect(String(megapascal(235))).toBe("235 MPa")
      expect(String(Quantity.multiply(squareCentimeter(1), 100))).toBe("100 cm²")
    })

    it("switches prefix without changing the base magnitude", () => {
      const force = Quantity.withPrefix(kilonewton(1.3), "one")
      expect(force.baseValue).toBe(1300)
      expect(String(force)).toBe("1300 N")
      expect(Quantity.valueIn(kilonewton(1.3), "one")).toBe(1300)
      expect(pipe(newton(2500), Quantity.valueIn("kilo"))).toBe(2.5)
    })
  })

  describe("addition and subtraction", () => {
    it("adds quantities of mixed prefixes in base units", () => {
      const total = Quantity.add(Quantity.multiply(kilonewton(1), 2), Quantity.multiply(newton(1), 3))
      expect(total.physicalType).toBe("Force")
      expect(total.baseValue).toBe(2003)
      expect(total.prefix).toBe("kilo")
      expect(String(total)).toBe("2.003 kN")
    })

    it("keeps the prefix of the left operand", () => {
      const sum = pipe(meter(1), Quantity.add(centimeter(100)))
      expect(sum.baseValue).toBe(2)
      expect(sum.prefix).toBe("one")
      expect(Quantity.subtract(kilonewton(2), newton(500)).prefix).toBe("kilo")
      expect(Quantity.subtract(kilonewton(2), newton(500)).baseValue).toBe(1500)
    })

    it("rejects operands of different physical types", () => {
      const length: Quantity.Quantity = meter(1)
      const force: Quantity.Quantity = newton(1)
      expect(() => Quantity.add(length, force)).toThrow(DimensionMismatchError)
      expect(() => Quantity.subtract(force, length)).toThrow("Cannot subtract Force and Length: physical types differ")
    })

    it("negates and takes absolute values", () => {
      const negative = Quantity.negate(kilonewton(2))
      expect(negative.baseValue).toBe(-2000)
      expect(negative.prefix).toBe("kilo")
      expect(Quantity.abs(negative).baseValue).toBe(2000)
    })
  })

  describe("multiplication", () => {
    it("derives energy from length and force", () => {
      const work = Quantity.multiply(Quantity.multiply(meter(1), 5), Quantity.multiply(newton(1), 3))
      expect(work.physicalType).toBe("Energy")
      expect(work.baseValue).toBe(15)
      expect(work.prefix).toBe("one")
      expect(String(work)).toBe("15 J")
    })

    it("is symmetric in the operand types", () => {
      const moment = Quantity.multiply(kilonewton(12), meter(3))
      const reversed = Quantity.multiply(meter(3), kilonewton(12))
      expect(String(moment)).toBe("36000 J")
      expect(Quantity.equals(moment, reversed)).toBe(true)
    })

    it("scales by bare numbers on either side", () => {
      const scaled = Quantity.multiply(2, kilonewton(1))
      expect(scaled.baseValue).toBe(2000)
      expect(scaled.prefix).toBe("kilo")
      expect(Quantity.equals(Quantity.multiply(meter(5), 5), meter(25))).toBe(true)
    })

    it("keeps the prefix when scaling", () => {
      const area = Quantity.multiply(squareCentimeter(1), 100)
      expect(area.physicalType).toBe("Area")
      expect(area.prefix).toBe("centi")
      expect(area.baseValue).toBeCloseTo(0.01, 15)
    })

    it("fails for combinations the table does not relate", () => {
      const angle: Quantity.Quantity = radian(1)
      const length: Quantity.Quantity = meter(1)
      expect(() => Quantity.multiply(angle, length)).toThrow(UndefinedDerivationError)
      expect(() => Quantity.multiply(angle, length)).toThrow("No physical type is derived from Angle * Length")
    })
  })

  describe("division", () => {
    it("recovers length from energy and force", () => {
      const length = Quantity.divide(Quantity.multiply(joule(1), 15), Quantity.multiply(newton(1), 3))
      expect(length.physicalType).toBe("Length")
      expect(length.baseValue).toBe(5)
    })

    it("derives pressure from force and area", () => {
      const pressure = Quantity.divide(Quantity.multiply(newton(1), 15), Quantity.multiply(squareMeter(1), 5))
      expect(pressure.physicalType).toBe("Pressure")
      expect(pressure.baseValue).toBe(3)
    })

    it("returns a bare ratio for identical types", () => {
      const ratio: number = Quantity.divide(kilonewtonMeter(3), joule(1500))
      expect(ratio).toBe(2)
    })

    it("scales by bare numbers", () => {
      const energy = pipe(joule(15), Quantity.divide(10))
      expect(energy.physicalType).toBe("Energy")
      expect(energy.baseValue).toBe(1.5)
    })

    it("rejects zero divisors", () => {
      expect(() => Quantity.divide(joule(15), 0)).toThrow(DivisionByZeroError)
      expect(() => Quantity.divide(joule(15), joule(0))).toThrow(DivisionByZeroError)
      expect(() => Quantity.divide(joule(15), meter(0))).toThrow("Division of Energy by zero")
    })

    it("reports an undefined quotient before a zero divisor", () => {
      const energy: Quantity.Quantity = joule(15)
      const time: Quantity.Quantity = second(0)
      expect(() => Quantity.divide(energy, time)).toThrow(UndefinedDerivationError)
      expect(() => Quantity.divide(energy, time)).toThrow("No physical type is derived from Energy / Time")
    })
  })

  describe("power", () => {
    it("follows the derivation table", () => {
      const area: Quantity.Quantity<"Area"> = Quantity.power(meter(2), 2)
      const volume: Quantity.Quantity<"Volume"> = pipe(meter(2), Quantity.power(3))
      expect(area.baseValue).toBe(4)
      expect(volume.baseValue).toBe(8)
      expect(Quantity.isClose(Quantity.power(centimeter(1), 4), quarticCentimeter(1))).toBe(true)
    })

    it("returns a unit quantity of the same type for exponent zero", () => {
      const one = Quantity.power(meter(3), 0)
      expect(one.physicalType).toBe("Length")
      expect(one.baseValue).toBe(1)
      expect(Quantity.power(meter(3), 1).baseValue).toBe(3)
    })

    it("rejects negative and fractional exponents", () => {
      expect(() => Quantity.power(meter(1), -1)).toThrow(InvalidExponentError)
      expect(() => Quantity.power(meter(1), 1.5)).toThrow("Exponent 1.5 is not a non-negative integer")
    })

    it("fails when an intermediate product is undefined", () => {
      const time: Quantity.Quantity = second(2)
      expect(() => Quantity.power(time, 2)).toThrow(UndefinedDerivationError)
      const mass: Quantity.Quantity = kilogram(2)
      expect(Quantity.power(mass, 1).baseValue).toBe(2)
    })
  })

  describe("equality", () => {
    it("compares base magnitudes and physical types", () => {
      expect(Quantity.equals(meter(1), Quantity.multiply(centimeter(1), 100))).toBe(true)
      expect(Quantity.notEquals(meter(1), Quantity.multiply(meter(1), 2))).toBe(true)
      expect(Equal.equals(meter(1), centimeter(100))).toBe(true)
      expect(Hash.hash(meter(1))).toBe(Hash.hash(centimeter(100)))
      expect(Equal.equals(meter(1), newton(1))).toBe(false)
    })
  })

  describe("serialisation", () => {
    it("writes the magnitude in its prefix", () => {
      expect(millimeter(250).toJSON()).toEqual({ physicalType: "Length", value: 250, prefix: "milli" })
      expect(JSON.stringify(kilonewton(2))).toBe('{"physicalType":"Force","value":2,"prefix":"kilo"}')
    })

    it.effect("decodes serialised quantities", () =>
      Effect.gen(function* () {
        const force = yield* Quantity.fromJson({ physicalType: "Force", value: 12, prefix: "kilo" })
        expect(force.baseValue).toBe(12000)
        expect(force.prefix).toBe("kilo")

        const length = yield* Quantity.fromJson({ physicalType: "Length", value: 1 })
        expect(length.prefix).toBe("one")
      }))

    it.effect("rejects illegal prefixes and unknown types", () =>
      Effect.gen(function* () {
        const prefixError = yield* Effect.flip(Quantity.fromJson({ physicalType: "Mass", value: 1, prefix: "kilo" }))
        expect(prefixError).toBeInstanceOf(IllegalPrefixError)

        const parseError = yield* Effect.flip(Quantity.fromJson({ physicalType: "Colour", value: 1 }))
        expect(parseError._tag).toBe("ParseError")
      }))

    it.effect("fails instead of overflowing to infinity", () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(
          Quantity.fromJson({ physicalType: "SecondMomentOfArea", value: 1e300, prefix: "giga" }),
        )
        expect(error).toBeInstanceOf(NonFiniteMagnitudeError)
      }))
  })

  describe("attempt", () => {
    it.effect("succeeds with the computed value", () =>
      Effect.gen(function* () {
        const moment = yield* Quantity.attempt(() => Quantity.multiply(kilonewton(12), meter(3)))
        expect(moment.baseValue).toBe(36000)
      }))

    it.effect("moves arithmetic errors into the error channel", () =>
      Effect.gen(function* () {
        const length: Quantity.Quantity = meter(1)
        const force: Quantity.Quantity = newton(1)
        const error = yield* Effect.flip(Quantity.attempt(() => Quantity.add(length, force)))
        expect(error).toBeInstanceOf(DimensionMismatchError)
        expect(error._tag).toBe("DimensionMismatchError")
      }))

    it.effect("can be recovered by tag", () =>
      Effect.gen(function* () {
        const result = yield* Quantity.attempt(() => Quantity.divide(joule(1), 0)).pipe(
          Effect.catchTag("DivisionByZeroError", () => Effect.succeed(joule(0))),
        )
        expect(result.baseValue).toBe(0)
      }))

    it.effect("treats other exceptions as defects", () =>
      Effect.gen(function* () {
        const exit = yield* Effect.exit(
          Quantity.attempt((): number => {
            throw new Error("boom")
          }),
        )
        expect(Exit.isFailure(exit)).toBe(true)
        if (Exit.isFailure(exit)) {
          expect(Option.isSome(Cause.dieOption(exit.cause))).toBe(true)
        }
      }))
  })
})
