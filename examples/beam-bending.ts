import { Effect, Layer, Option, pipe } from "effect"
import { CalculationConfig } from "../src/Config.js"
import { NationalAnnex, loadParameter } from "../src/NationalAnnex.js"
import * as Quantity from "../src/Quantity.js"
import { Stepper, step } from "../src/Stepper.js"
import {
  cubicCentimeter,
  kilonewtonPerCubicMeter,
  kilonewtonPerMeter,
  megapascal,
  meter,
  squareCentimeter,
} from "../src/Units.js"

// Simply supported IPE300 under self weight and an imposed line load.
const span = meter(6)
const area = squareCentimeter(53.8)
const sectionModulus = cubicCentimeter(557)
const yieldStrength = megapascal(235)
const unitWeight = kilonewtonPerCubicMeter(78.5)
const imposed = kilonewtonPerMeter(12)

const layer = Layer.mergeAll(Stepper.layer(), NationalAnnex.layer()).pipe(
  Layer.provide(CalculationConfig.fromEnv),
)

const program = Effect.gen(function* () {
  const selfWeight = Quantity.multiply(unitWeight, area)
  yield* step(`Self weight g = ${Quantity.withPrefix(selfWeight, "kilo")}.`)

  const load = Quantity.add(imposed, selfWeight)
  const moment = yield* Quantity.attempt(() =>
    pipe(load, Quantity.multiply(span), Quantity.multiply(span), Quantity.divide(8)),
  )
  yield* step(`Midspan moment M = ${Quantity.withPrefix(moment, "kilo")}.`)

  const stress = Quantity.divide(moment, sectionModulus)
  const gammaM0 = yield* loadParameter("EN1993-1-1_6.1_note_2b#gamma_M0").pipe(
    Effect.map(Option.getOrElse(() => 1.0)),
  )
  const utilisation = Quantity.divide(stress, Quantity.divide(yieldStrength, gammaM0))
  yield* step(`Bending stress ${Quantity.withPrefix(stress, "mega")} gives utilisation ${utilisation.toFixed(3)}.`)
  return utilisation
})

Effect.runPromise(program.pipe(Effect.provide(layer))).catch((error) => {
  console.error("Failed to run beam bending example", error)
  process.exitCode = 1
})
