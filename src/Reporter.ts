/**
 * Reporter service: renders parse errors and hands them to the Effect logger.
 *
 * Rendering itself is pure (`ParseError.format`); the service only adds the
 * logging and the failure channel, at the level chosen by `DiagnosticsConfig`.
 *
 * @since 0.1.0
 */

import { Context, Effect, Layer, type LogLevel } from "effect"
import { DiagnosticsConfig } from "./DiagnosticsConfig.js"
import { description, format, lineCol, ParseFailure, type ParseError } from "./ParseError.js"

/**
 * @since 0.1.0
 */
export interface ReporterService {
  /** Renders the report without logging it. */
  readonly render: <R>(error: ParseError<R>) => Effect.Effect<string>
  /** Logs the report, annotated with `line`, `column` and `description`, and returns it. */
  readonly report: <R>(error: ParseError<R>) => Effect.Effect<string>
  /** Logs the report, then fails with `ParseFailure`. */
  readonly fail: <R>(error: ParseError<R>) => Effect.Effect<never, ParseFailure>
}

const makeReporter = (logLevel: LogLevel.LogLevel): ReporterService => {
  const report = <R>(error: ParseError<R>): Effect.Effect<string> => {
    const rendered = format(error)
    const [line, column] = lineCol(error)
    return Effect.logWithLevel(logLevel, rendered).pipe(
      Effect.annotateLogs({ line, column, description: description(error) }),
      Effect.as(rendered),
    )
  }

  return {
    render: (error) => Effect.sync(() => format(error)),
    report,
    fail: (error) => report(error).pipe(Effect.zipRight(Effect.fail(new ParseFailure({ error })))),
  }
}

/**
 * @category Services
 * @since 0.1.0
 * @example
 * ```ts
 * const program = Effect.gen(function* () {
 *   const reporter = yield* Reporter
 *   return yield* reporter.report(error)
 * }).pipe(Effect.provide(Reporter.Default))
 * ```
 */
export class Reporter extends Context.Tag("rule-diagnostics/Reporter")<Reporter, ReporterService>() {
  static readonly layer = Layer.effect(
    this,
    Effect.map(DiagnosticsConfig, ({ logLevel }) => makeReporter(logLevel)),
  )

  static readonly Default = this.layer.pipe(Layer.provide(DiagnosticsConfig.Default))
}
