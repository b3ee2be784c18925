/**
 * Spans over an input buffer: a pair of offsets `start <= end` that share the
 * input reference of the positions they split into.
 *
 * @since 0.1.0
 */

import { Data, Option } from "effect"
import { InvalidLocationError } from "./Errors.js"
import * as Position from "./Position.js"

/**
 * @category Models
 * @since 0.1.0
 */
export class Span extends Data.Class<{
  readonly input: string
  readonly start: number
  readonly end: number
}> {}

const isRangeOf = (input: string, start: number, end: number): boolean =>
  Number.isInteger(start) && Number.isInteger(end) && start >= 0 && start <= end && end <= input.length

/**
 * Builds a span, or `None` unless `0 <= start <= end <= input.length`.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const make = (input: string, start: number, end: number): Option.Option<Span> =>
  isRangeOf(input, start, end) ? Option.some(new Span({ input, start, end })) : Option.none()

/**
 * @category Constructors
 * @since 0.1.0
 * @throws InvalidLocationError
 */
export const unsafeMake = (input: string, start: number, end: number): Span => {
  if (!isRangeOf(input, start, end)) {
    throw new InvalidLocationError({ length: input.length, start, end })
  }
  return new Span({ input, start, end })
}

/**
 * Builds a span with both offsets moved into the input, and `end` moved up to
 * `start` when the two are reversed.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const clamp = (input: string, start: number, end: number): Span => {
  const from = Position.clampOffset(input, start)
  return new Span({ input, start: from, end: Math.max(from, Position.clampOffset(input, end)) })
}

/**
 * Span between two positions. `None` when they point into different inputs or
 * `start` comes after `end`.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const fromPositions = (start: Position.Position, end: Position.Position): Option.Option<Span> =>
  start.input === end.input ? make(start.input, start.offset, end.offset) : Option.none()

/**
 * @category Getters
 * @since 0.1.0
 */
export const start = (self: Span): number => self.start

/**
 * @category Getters
 * @since 0.1.0
 */
export const end = (self: Span): number => self.end

/**
 * Number of code units covered by the span.
 *
 * @category Getters
 * @since 0.1.0
 */
export const width = (self: Span): number => self.end - self.start

/**
 * Splits the span into its start and end positions.
 *
 * @category Getters
 * @since 0.1.0
 */
export const split = (self: Span): readonly [start: Position.Position, end: Position.Position] => [
  new Position.Position({ input: self.input, offset: self.start }),
  new Position.Position({ input: self.input, offset: self.end }),
]

/**
 * The text covered by the span.
 *
 * @category Getters
 * @since 0.1.0
 */
export const asString = (self: Span): string => self.input.slice(self.start, self.end)
