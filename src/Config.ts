/**
 * Settings applied to quantities built by the {@link Measurements} service.
 *
 * Read through `effect/Config`, so they come from the environment by default
 * (`UNITS_IMPLICIT_DIMENSIONLESS`, `UNITS_DISPLAY_MODE`) or from any
 * `ConfigProvider` the program installs.
 *
 * @since 0.1.0
 */

import { Config } from "effect"
import type { DisplayMode } from "./Units.js"

/**
 * @since 0.1.0
 * @category Models
 */
export interface QuantitySettings {
  readonly implicitDimensionless: boolean
  readonly displayMode: DisplayMode
}

/**
 * @since 0.1.0
 * @category Constants
 */
export const DEFAULT_SETTINGS: QuantitySettings = {
  implicitDimensionless: false,
  displayMode: "fractional",
}

/**
 * @since 0.1.0
 * @category Config
 */
export const QuantitySettings: Config.Config<QuantitySettings> = Config.all({
  implicitDimensionless: Config.boolean("IMPLICIT_DIMENSIONLESS").pipe(
    Config.withDefault(DEFAULT_SETTINGS.implicitDimensionless),
  ),
  displayMode: Config.literal("fractional", "exponential")("DISPLAY_MODE").pipe(
    Config.withDefault(DEFAULT_SETTINGS.displayMode),
  ),
}).pipe(Config.nested("UNITS"))
