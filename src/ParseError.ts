/**
 * Parse errors and their source-anchored rendering.
 *
 * A `ParseError` is produced either by a grammar matcher, as the rules it
 * expected (`positives`) and rejected (`negatives`) at the deepest position it
 * reached, or by a call site that already knows what went wrong, as a message
 * at a position or over a span. `format` turns any of them into a report:
 *
 * ```text
 *  --> 2:2
 *   |
 * 2 | cd
 *   |  ^---
 *   |
 *   = unexpected 4, 5, or 6; expected 1, 2, or 3
 * ```
 *
 * Every operation here is total: degenerate inputs (no rules, empty spans,
 * long line numbers) have a rendering, and nothing throws.
 *
 * @since 0.1.0
 */

import { Data } from "effect"
import { composeMessage, defaultRuleName } from "./internal/message.js"
import * as Render from "./internal/render.js"
import * as Position from "./Position.js"
import * as Span from "./Span.js"

/**
 * Closed union of the three error shapes. `R` is the grammar's rule
 * identifier type.
 *
 * @category Models
 * @since 0.1.0
 */
export type ParseError<R> = Data.TaggedEnum<{
  /** Rules attempted at `pos`, in the order the matcher tried them. */
  ParsingError: {
    readonly positives: ReadonlyArray<R>
    readonly negatives: ReadonlyArray<R>
    readonly pos: Position.Position
  }
  CustomErrorPos: {
    readonly message: string
    readonly pos: Position.Position
  }
  CustomErrorSpan: {
    readonly message: string
    readonly span: Span.Span
  }
}>

interface ParseErrorDefinition extends Data.TaggedEnum.WithGenerics<1> {
  readonly taggedEnum: ParseError<this["A"]>
}

/**
 * Variant constructors and guards.
 *
 * @category Constructors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = ParsingError({
 *   positives: ["ident"],
 *   negatives: [],
 *   pos: Position.unsafeMake("let = 1", 4),
 * })
 * ```
 */
export const { $is, CustomErrorPos, CustomErrorSpan, ParsingError } = Data.taggedEnum<ParseErrorDefinition>()

/**
 * Replaces rule identifiers with names, turning a `ParsingError` into a
 * `CustomErrorPos` at the same position. Custom errors are returned as is.
 *
 * @category Combinators
 * @since 0.1.0
 * @example
 * ```ts
 * renamedRules(error, (rule) => rule === "open_paren" ? "(" : rule)
 * ```
 */
export const renamedRules = <R>(self: ParseError<R>, f: (rule: R) => string): ParseError<R> => {
  switch (self._tag) {
    case "ParsingError":
      return CustomErrorPos({ message: composeMessage(self.positives, self.negatives, f), pos: self.pos })
    case "CustomErrorPos":
    case "CustomErrorSpan":
      return self
  }
}

/**
 * The text shown after `=` in the report.
 *
 * @category Getters
 * @since 0.1.0
 */
export const message = <R>(self: ParseError<R>): string => {
  switch (self._tag) {
    case "ParsingError":
      return composeMessage(self.positives, self.negatives, defaultRuleName)
    case "CustomErrorPos":
    case "CustomErrorSpan":
      return self.message
  }
}

/**
 * The position the report is keyed to: the error position, or the start of
 * the span.
 *
 * @category Getters
 * @since 0.1.0
 */
export const anchor = <R>(self: ParseError<R>): Position.Position => {
  switch (self._tag) {
    case "ParsingError":
    case "CustomErrorPos":
      return self.pos
    case "CustomErrorSpan":
      return Span.split(self.span)[0]
  }
}

/**
 * @category Getters
 * @since 0.1.0
 */
export const lineCol = <R>(self: ParseError<R>): readonly [line: number, column: number] =>
  Position.lineCol(anchor(self))

const marker = <R>(self: ParseError<R>): Render.Marker =>
  self._tag === "CustomErrorSpan" ? { _tag: "Range", width: Span.width(self.span) } : { _tag: "Point" }

/**
 * Underline row, shifted right by `offset` spaces. Span errors are underlined
 * across their width (`^`, `^^`, `^--^`); the other variants get the fixed
 * `^---` marker.
 *
 * @category Rendering
 * @since 0.1.0
 */
export const underline = <R>(self: ParseError<R>, offset: number): string => Render.underline(marker(self), offset)

/**
 * Multi-line report with location header, source line, underline and
 * message, with no trailing newline.
 *
 * @category Rendering
 * @since 0.1.0
 */
export const format = <R>(self: ParseError<R>): string => Render.report(anchor(self), marker(self), message(self))

/**
 * One-line description: `"parsing error"` for rule attempts, the message
 * otherwise.
 *
 * @category Rendering
 * @since 0.1.0
 */
export const description = <R>(self: ParseError<R>): string =>
  self._tag === "ParsingError" ? "parsing error" : self.message

/**
 * Failure carrying a `ParseError` through the Effect error channel. Its
 * `message` is the full report.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * yield* new ParseFailure({ error })
 * ```
 */
export class ParseFailure extends Data.TaggedError("ParseFailure")<{
  readonly error: ParseError<unknown>
}> {
  override get message(): string {
    return format(this.error)
  }

  get description(): string {
    return description(this.error)
  }
}
