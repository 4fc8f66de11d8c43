/**
 * National annex parameters.
 *
 * Nationally determined parameters override values of the base standard for
 * one country. The jurisdiction is part of the `NationalAnnex` service value:
 * it defaults to `CalculationConfig.nationalAnnex`, can be passed per lookup
 * and can be replaced for a single effect with `withCountry`. Nothing is kept
 * in module state, so concurrent calculations for different countries do not
 * interfere.
 *
 * @since 0.1.0
 */

import { Context, Effect, Layer, Option, Record, Schema } from "effect"
import parameterData from "./data/national-annex.json" with { type: "json" }
import { CalculationConfig } from "./Config.js"
import { UnknownJurisdictionError } from "./Errors.js"

/**
 * Parameter values keyed by lower-case country code, then by parameter key.
 *
 * @category Schemas
 * @since 0.1.0
 */
export const ParameterSets = Schema.Record({
  key: Schema.String,
  value: Schema.Record({ key: Schema.String, value: Schema.Number }),
})

/**
 * @category Models
 * @since 0.1.0
 */
export type ParameterSets = typeof ParameterSets.Type

/**
 * @since 0.1.0
 */
export const DEFAULT_PARAMETERS: ParameterSets = Schema.decodeUnknownSync(ParameterSets)(parameterData)

export interface LoadOptions {
  /** Overrides the service's jurisdiction for this lookup. */
  readonly country?: string
}

export interface NationalAnnexService {
  readonly country: Option.Option<string>
  readonly parameters: ParameterSets
  /**
   * Look up a parameter override. Succeeds with none when no jurisdiction
   * applies or the jurisdiction does not override `key`.
   */
  readonly load: (key: string, options?: LoadOptions) => Effect.Effect<Option.Option<number>, UnknownJurisdictionError>
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const makeNationalAnnex = (
  parameters: ParameterSets,
  country: Option.Option<string>,
): NationalAnnexService => ({
  country,
  parameters,
  load: (key, options = {}) =>
    Option.match(options.country !== undefined ? Option.some(options.country) : country, {
      onNone: () => Effect.succeed(Option.none()),
      onSome: (code) =>
        Option.match(Record.get(parameters, code.toLowerCase()), {
          onNone: () => Effect.fail(new UnknownJurisdictionError({ country: code })),
          onSome: (values) => Effect.succeed(Record.get(values, key)),
        }),
    }),
})

/**
 * @category Services
 * @since 0.1.0
 */
export class NationalAnnex extends Context.Tag("structural-units/NationalAnnex")<
  NationalAnnex,
  NationalAnnexService
>() {
  static layer(parameters: ParameterSets = DEFAULT_PARAMETERS) {
    return Layer.effect(
      this,
      Effect.map(Effect.serviceOption(CalculationConfig), (config) =>
        makeNationalAnnex(parameters, Option.flatMap(config, (settings) => settings.nationalAnnex)),
      ),
    )
  }
}

/**
 * Look up a parameter override through the current service.
 *
 * @since 0.1.0
 */
export const loadParameter = (
  key: string,
  options?: LoadOptions,
): Effect.Effect<Option.Option<number>, UnknownJurisdictionError, NationalAnnex> =>
  Effect.flatMap(NationalAnnex, (annex) => annex.load(key, options))

/**
 * Run `effect` with the jurisdiction replaced; `null` applies the base
 * standard.
 *
 * @since 0.1.0
 */
export const withCountry =
  (country: string | null) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R | NationalAnnex> =>
    Effect.flatMap(NationalAnnex, (annex) =>
      Effect.provideService(effect, NationalAnnex, makeNationalAnnex(annex.parameters, Option.fromNullable(country))),
    )
