/**
 * Error types raised by the diagnostics library itself.
 *
 * Rendering a `ParseError` never fails; the only failure mode of the library
 * is building a location from offsets that do not fit the input, which the
 * `unsafeMake` constructors report with `InvalidLocationError`. The partial
 * constructors (`Position.make`, `Span.make`) return `Option` instead.
 *
 * @since 0.1.0
 */

import { Data } from "effect"
import type { ParseFailure } from "./ParseError.js"

/**
 * Raised when an offset (or a pair of offsets) does not describe a location
 * inside the input it refers to.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new InvalidLocationError({ length: 3, start: 5, end: 5 })
 * error.message // => "Offset 5 is outside of an input of length 3"
 * ```
 */
export class InvalidLocationError extends Data.TaggedError("InvalidLocationError")<{
  readonly length: number
  readonly start: number
  readonly end: number
}> {
  override get message(): string {
    return this.start === this.end
      ? `Offset ${this.start} is outside of an input of length ${this.length}`
      : `Span ${this.start}..${this.end} is not a valid range of an input of length ${this.length}`
  }
}

/**
 * Union of all errors the library can surface in the Effect error channel.
 *
 * @category Errors
 * @since 0.1.0
 */
export type DiagnosticsError = InvalidLocationError | ParseFailure
