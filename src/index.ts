/**
 * @since 0.1.0
 */
export * as Derivation from "./Derivation.js"
export * as PhysicalType from "./PhysicalType.js"
export * as Prefix from "./Prefix.js"
export * as Quantity from "./Quantity.js"
export * from "./Errors.js"
export * from "./Units.js"
export * from "./Config.js"
export * from "./Stepper.js"
export * from "./NationalAnnex.js"
