import { Either, Effect } from "effect"
import { createToken, Lexer, type IToken } from "chevrotain"
import { tokenizeEither } from "../src/Lexer.js"
import { ParsingError, renamedRules, type ParseError } from "../src/ParseError.js"
import * as Position from "../src/Position.js"
import { Reporter } from "../src/Reporter.js"

type Rule = "key" | "equals" | "value" | "newline"

const WhiteSpace = createToken({ name: "WhiteSpace", pattern: /[ \t]+/, group: Lexer.SKIPPED })
const Newline = createToken({ name: "Newline", pattern: /\r?\n/ })
const Word = createToken({ name: "Word", pattern: /[A-Za-z_][A-Za-z0-9_]*/ })
const Equals = createToken({ name: "Equals", pattern: /=/ })
const NumberLiteral = createToken({ name: "NumberLiteral", pattern: /\d+/ })

const lexer = new Lexer([WhiteSpace, Newline, Word, Equals, NumberLiteral])

const expectedAt: ReadonlyArray<Rule> = ["key", "equals", "value", "newline"]

const ruleOf = (token: IToken): Rule => {
  switch (token.tokenType) {
    case Word:
      return "key"
    case Equals:
      return "equals"
    case NumberLiteral:
      return "value"
    default:
      return "newline"
  }
}

/** Checks `key = value` lines, reporting the first token out of place. */
const check = (input: string): Either.Either<number, ParseError<Rule>> =>
  Either.flatMap(tokenizeEither(lexer, input), (tokens) => {
    let lines = 0
    for (const [index, token] of tokens.entries()) {
      const expected = expectedAt[index % expectedAt.length] ?? "key"
      const found = ruleOf(token)
      const acceptsWord = expected === "value" && found === "key"
      if (found !== expected && !acceptsWord) {
        return Either.left(
          ParsingError<Rule>({
            positives: expected === "value" ? ["value", "key"] : [expected],
            negatives: [found],
            pos: Position.clamp(input, token.startOffset),
          }),
        )
      }
      if (found === "newline") {
        lines++
      }
    }
    return Either.right(lines)
  })

const ruleNames: Record<Rule, string> = {
  key: "a key",
  equals: "`=`",
  value: "a number",
  newline: "a line break",
}

const program = Effect.gen(function* () {
  const reporter = yield* Reporter
  const inputs = ["width = 80\nheight = 24\n", "width = 80\nheight 24\n", "depth = #\n"]
  for (const input of inputs) {
    const result = check(input)
    if (Either.isLeft(result)) {
      yield* reporter.report(renamedRules(result.left, (rule) => ruleNames[rule]))
    } else {
      yield* Effect.logInfo(`${result.right} lines ok`)
    }
  }
}).pipe(Effect.provide(Reporter.Default))

Effect.runPromise(program).catch((error) => {
  console.error("Failed to run key-value example", error)
  process.exitCode = 1
})
