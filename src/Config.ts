/**
 * Calculation configuration.
 *
 * Settings shared by the services that sit around the arithmetic core: whether
 * calculation steps are written to the log and which national annex applies
 * when a parameter lookup names no country.
 *
 * @since 0.1.0
 */

import { Config, Context, Effect, Layer, Option } from "effect"

export interface CalculationConfigService {
  readonly stepperOutput: boolean
  /** ISO 3166-1 alpha-2 country code, or none for the base standard. */
  readonly nationalAnnex: Option.Option<string>
}

/**
 * @category Services
 * @since 0.1.0
 */
export class CalculationConfig extends Context.Tag("structural-units/CalculationConfig")<
  CalculationConfig,
  CalculationConfigService
>() {
  static readonly defaults: CalculationConfigService = {
    stepperOutput: true,
    nationalAnnex: Option.none(),
  }

  static layer(options: Partial<CalculationConfigService> = {}) {
    return Layer.succeed(this, { ...CalculationConfig.defaults, ...options })
  }

  /**
   * Reads `STEPPER_OUTPUT` and `NATIONAL_ANNEX` from the current
   * `ConfigProvider` (the environment by default).
   *
   * @category Layers
   * @since 0.1.0
   */
  static readonly fromEnv = Layer.effect(
    this,
    Effect.gen(function* () {
      const stepperOutput = yield* Config.boolean("STEPPER_OUTPUT").pipe(Config.withDefault(true))
      const nationalAnnex = yield* Config.option(Config.string("NATIONAL_ANNEX"))
      return { stepperOutput, nationalAnnex: Option.map(nationalAnnex, (code) => code.toLowerCase()) }
    }),
  )
}
