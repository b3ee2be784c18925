/**
 * Positions inside an input buffer.
 *
 * A `Position` keeps a reference to the whole input together with an offset;
 * strings are immutable, so the input is shared and never copied. Offsets are
 * UTF-16 code-unit indices, while reported columns count code points.
 *
 * @since 0.1.0
 */

import { Data, Option } from "effect"
import { InvalidLocationError } from "./Errors.js"

/**
 * @category Models
 * @since 0.1.0
 */
export class Position extends Data.Class<{
  readonly input: string
  readonly offset: number
}> {}

const isOffsetOf = (input: string, offset: number): boolean =>
  Number.isInteger(offset) && offset >= 0 && offset <= input.length

/**
 * Builds a position, or `None` when `offset` is not inside `[0, input.length]`.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const make = (input: string, offset: number): Option.Option<Position> =>
  isOffsetOf(input, offset) ? Option.some(new Position({ input, offset })) : Option.none()

/**
 * @category Constructors
 * @since 0.1.0
 * @throws InvalidLocationError
 */
export const unsafeMake = (input: string, offset: number): Position => {
  if (!isOffsetOf(input, offset)) {
    throw new InvalidLocationError({ length: input.length, start: offset, end: offset })
  }
  return new Position({ input, offset })
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const fromStart = (input: string): Position => new Position({ input, offset: 0 })

/**
 * Builds a position, moving out-of-range or fractional offsets to the nearest
 * valid one.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const clamp = (input: string, offset: number): Position =>
  new Position({ input, offset: clampOffset(input, offset) })

/** @internal */
export const clampOffset = (input: string, offset: number): number =>
  Number.isNaN(offset) ? input.length : Math.min(Math.max(0, Math.trunc(offset)), input.length)

/**
 * Counts code points of `input` in `[from, to)`, treating a lone surrogate as
 * a single code point.
 */
const countCodePoints = (input: string, from: number, to: number): number => {
  let count = 0
  let index = from
  while (index < to) {
    const codePoint = input.codePointAt(index) ?? 0
    index += codePoint > 0xffff ? 2 : 1
    count++
  }
  return count
}

const lineStartOf = (input: string, offset: number): number =>
  offset === 0 ? 0 : input.lastIndexOf("\n", offset - 1) + 1

/**
 * 1-based line and column of the position.
 *
 * @category Getters
 * @since 0.1.0
 * @example
 * ```ts
 * lineCol(unsafeMake("ab\ncd\nef", 4)) // => [2, 2]
 * ```
 */
export const lineCol = (self: Position): readonly [line: number, column: number] => {
  const { input, offset } = self
  let line = 1
  for (let index = input.indexOf("\n"); index !== -1 && index < offset; index = input.indexOf("\n", index + 1)) {
    line++
  }
  const start = lineStartOf(input, offset)
  return [line, countCodePoints(input, start, offset) + 1]
}

/**
 * The full line containing the position, without its `\n` or `\r\n`
 * terminator. A position on a terminator belongs to the line it ends.
 *
 * @category Getters
 * @since 0.1.0
 */
export const lineOf = (self: Position): string => {
  const { input, offset } = self
  const start = lineStartOf(input, offset)
  const newline = input.indexOf("\n", offset)
  let end = newline === -1 ? input.length : newline
  if (end > start && input.charCodeAt(end - 1) === 13) {
    end--
  }
  return input.slice(start, end)
}
