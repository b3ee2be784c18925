/**
 * @since 0.1.0
 */
export * from "./Errors.js"
export * from "./DiagnosticsConfig.js"
export * from "./Reporter.js"
export { ParseFailure } from "./ParseError.js"

/**
 * @since 0.1.0
 */
export * as ParseError from "./ParseError.js"

/**
 * @since 0.1.0
 */
export * as Position from "./Position.js"

/**
 * @since 0.1.0
 */
export * as Span from "./Span.js"

/**
 * @since 0.1.0
 */
export * as Lexer from "./Lexer.js"
