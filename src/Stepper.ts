/**
 * Calculation step log.
 *
 * Formula code records human-readable steps ("IPE300 is of cross-section
 * class 3.") while it runs. The log is owned by a scoped layer: when the scope
 * closes the steps are joined with single spaces and written as one info log
 * line, unless output is disabled.
 *
 * @example
 * ```ts
 * const program = Effect.gen(function* () {
 *   yield* step("Steel section IPE300 has height 0.3 m.")
 *   yield* step("IPE300 is of cross-section class 3.")
 * })
 *
 * Effect.runSync(program.pipe(Effect.provide(Stepper.layer())))
 * ```
 *
 * @since 0.1.0
 */

import { Chunk, Context, Effect, Layer, Option, Ref } from "effect"
import { CalculationConfig } from "./Config.js"

export interface StepperService {
  readonly output: boolean
  readonly step: (description: string) => Effect.Effect<void>
  readonly steps: Effect.Effect<ReadonlyArray<string>>
  /** Recorded steps joined with single spaces. */
  readonly render: Effect.Effect<string>
  /** Write the recorded steps to the log (when output is enabled) and clear them. */
  readonly flush: Effect.Effect<void>
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeStepper = (output: boolean): Effect.Effect<StepperService> =>
  Effect.map(Ref.make(Chunk.empty<string>()), (ref): StepperService => ({
    output,
    step: (description) => Ref.update(ref, Chunk.append(description)),
    steps: Effect.map(Ref.get(ref), (recorded) => Chunk.toReadonlyArray(recorded)),
    render: Effect.map(Ref.get(ref), (recorded) => Chunk.join(recorded, " ")),
    flush: Effect.gen(function* () {
      const recorded = yield* Ref.getAndSet(ref, Chunk.empty())
      if (output && Chunk.isNonEmpty(recorded)) {
        yield* Effect.logInfo(Chunk.join(recorded, " "))
      }
    }),
  }))

/**
 * @category Services
 * @since 0.1.0
 */
export class Stepper extends Context.Tag("structural-units/Stepper")<Stepper, StepperService>() {
  /**
   * Scoped stepper flushed when its scope closes. Output follows
   * `CalculationConfig` when that service is present, and is on otherwise.
   *
   * @category Layers
   * @since 0.1.0
   */
  static layer(options: { readonly output?: boolean } = {}) {
    return Layer.scoped(
      this,
      Effect.gen(function* () {
        const config = yield* Effect.serviceOption(CalculationConfig)
        const output = options.output ?? Option.match(config, {
          onNone: () => CalculationConfig.defaults.stepperOutput,
          onSome: (settings) => settings.stepperOutput,
        })
        return yield* Effect.acquireRelease(makeStepper(output), (stepper) => stepper.flush)
      }),
    )
  }
}

/**
 * Record a step on the current stepper.
 *
 * @since 0.1.0
 */
export const step = (description: string): Effect.Effect<void, never, Stepper> =>
  Effect.flatMap(Stepper, (stepper) => stepper.step(description))
