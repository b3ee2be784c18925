import { describe, expect, it } from "@effect/vitest"
import { ConfigProvider, Effect, LogLevel } from "effect"
import { DiagnosticsConfig, settingsConfig } from "../src/DiagnosticsConfig.js"

const withEnv = (entries: ReadonlyArray<readonly [string, string]>) =>
  Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries)))

describe("DiagnosticsConfig", () => {
  it.effect("defaults to the error level", () =>
    Effect.gen(function* () {
      const settings = yield* settingsConfig

      expect(settings.logLevel).toBe(LogLevel.Error)
    }).pipe(withEnv([])),
  )

  it.effect("parses the level case-insensitively", () =>
    Effect.gen(function* () {
      const settings = yield* settingsConfig

      expect(settings.logLevel).toBe(LogLevel.Debug)
    }).pipe(withEnv([["DIAGNOSTICS_LOG_LEVEL", "debug"]])),
  )

  it.effect("rejects unknown levels", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(settingsConfig)

      expect(error._op).toBe("InvalidData")
    }).pipe(withEnv([["DIAGNOSTICS_LOG_LEVEL", "loud"]])),
  )

  it.effect("provides the default settings", () =>
    Effect.gen(function* () {
      const { logLevel } = yield* DiagnosticsConfig

      expect(logLevel).toBe(LogLevel.Error)
    }).pipe(Effect.provide(DiagnosticsConfig.Default)),
  )
})
