/**
 * Configuration for reporting parse errors through the Effect logger.
 *
 * @since 0.1.0
 */

import { Config, Context, Layer, LogLevel } from "effect"

/**
 * @since 0.1.0
 */
export interface DiagnosticsSettings {
  /** Level at which `Reporter.report` logs rendered errors. */
  readonly logLevel: LogLevel.LogLevel
}

/**
 * Settings read from `DIAGNOSTICS_LOG_LEVEL` (`error`, `warn`, `info`, ...).
 *
 * @category Config
 * @since 0.1.0
 */
export const settingsConfig: Config.Config<DiagnosticsSettings> = Config.all({
  logLevel: Config.logLevel("DIAGNOSTICS_LOG_LEVEL").pipe(Config.withDefault(LogLevel.Error)),
})

/**
 * @category Config
 * @since 0.1.0
 */
export class DiagnosticsConfig extends Context.Tag("rule-diagnostics/DiagnosticsConfig")<
  DiagnosticsConfig,
  DiagnosticsSettings
>() {
  static readonly Default = Layer.succeed(this, { logLevel: LogLevel.Error })

  static readonly fromEnv = Layer.effect(this, settingsConfig)
}
