/**
 * Adapters from chevrotain lexer and parser output to `ParseError`, so a
 * chevrotain-based front end can report its failures with `format`.
 *
 * Chevrotain marks end-of-input tokens with `NaN` offsets; those are anchored
 * at the end of the input.
 *
 * @since 0.1.0
 */

import type { ILexingError, IRecognitionException, IToken, Lexer } from "chevrotain"
import { Either } from "effect"
import { CustomErrorPos, CustomErrorSpan, type ParseError } from "./ParseError.js"
import * as Position from "./Position.js"
import * as Span from "./Span.js"

/**
 * Span error over the characters the lexer skipped.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const fromLexingError = (input: string, error: ILexingError): ParseError<never> =>
  CustomErrorSpan({
    message: error.message,
    span: Span.clamp(input, error.offset, error.offset + error.length),
  })

/**
 * Span error covering the token image.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const fromToken = (input: string, token: IToken, message: string): ParseError<never> => {
  const start = token.startOffset
  const end = token.endOffset === undefined || Number.isNaN(token.endOffset) ? start : token.endOffset + 1
  return CustomErrorSpan({ message, span: Span.clamp(input, start, end) })
}

/**
 * Point error at the token the parser could not accept.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const fromRecognitionException = (input: string, exception: IRecognitionException): ParseError<never> =>
  CustomErrorPos({
    message: exception.message,
    pos: Position.clamp(input, exception.token.startOffset),
  })

/**
 * Tokenizes `input`, failing with the first lexing error.
 *
 * @category Lexing
 * @since 0.1.0
 */
export const tokenizeEither = (lexer: Lexer, input: string): Either.Either<ReadonlyArray<IToken>, ParseError<never>> => {
  const { tokens, errors } = lexer.tokenize(input)
  const [first] = errors
  return first === undefined ? Either.right(tokens) : Either.left(fromLexingError(input, first))
}
