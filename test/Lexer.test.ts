import { describe, expect, it } from "@effect/vitest"
import { createToken, CstParser, Lexer } from "chevrotain"
import { Either } from "effect"
import { fromRecognitionException, fromToken, tokenizeEither } from "../src/Lexer.js"
import { format } from "../src/ParseError.js"

const WhiteSpace = createToken({ name: "WhiteSpace", pattern: /\s+/, group: Lexer.SKIPPED })
const Word = createToken({ name: "Word", pattern: /[a-z]+/ })
const Comma = createToken({ name: "Comma", pattern: /,/ })
const pairTokens = [WhiteSpace, Word, Comma]
const pairLexer = new Lexer(pairTokens)

class PairParser extends CstParser {
  constructor() {
    super(pairTokens)
    this.performSelfAnalysis()
  }

  pair = this.RULE("pair", () => {
    this.CONSUME(Word)
    this.CONSUME(Comma)
    this.CONSUME2(Word)
  })
}

const parsePair = (input: string) => {
  const parser = new PairParser()
  parser.input = pairLexer.tokenize(input).tokens
  parser.pair()
  return parser.errors
}

describe("tokenizeEither", () => {
  it("returns tokens when the input lexes", () => {
    const tokens = Either.getOrThrow(tokenizeEither(pairLexer, "ab, cd"))

    expect(tokens.map((token) => token.image)).toEqual(["ab", ",", "cd"])
  })

  it("underlines the characters the lexer skipped", () => {
    const input = "ab cd $$ ef"
    const [lexingError] = pairLexer.tokenize(input).errors
    const result = tokenizeEither(pairLexer, input)

    expect(lexingError?.offset).toBe(6)
    expect(lexingError?.length).toBe(2)
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(format(result.left)).toBe(
        [" --> 1:7", "  |", "1 | ab cd $$ ef", "  |       ^^", "  |", `  = ${lexingError?.message}`].join("\n"),
      )
    }
  })
})

describe("fromToken", () => {
  it("spans the token image", () => {
    const input = "ab,\nlonger"
    const tokens = Either.getOrThrow(tokenizeEither(pairLexer, input))
    const token = tokens[2]
    if (token === undefined) {
      throw new Error("expected three tokens")
    }

    expect(format(fromToken(input, token, "unknown word"))).toBe(
      [" --> 2:1", "  |", "2 | longer", "  | ^----^", "  |", "  = unknown word"].join("\n"),
    )
  })
})

describe("fromRecognitionException", () => {
  it("points at the offending token", () => {
    const input = "ab cd"
    const [exception] = parsePair(input)
    if (exception === undefined) {
      throw new Error("expected a recognition error")
    }

    expect(format(fromRecognitionException(input, exception))).toBe(
      [" --> 1:4", "  |", "1 | ab cd", "  |    ^---", "  |", `  = ${exception.message}`].join("\n"),
    )
  })

  it("points past the input for end-of-input errors", () => {
    const input = "ab"
    const [exception] = parsePair(input)
    if (exception === undefined) {
      throw new Error("expected a recognition error")
    }

    expect(format(fromRecognitionException(input, exception))).toBe(
      [" --> 1:3", "  |", "1 | ab", "  |   ^---", "  |", `  = ${exception.message}`].join("\n"),
    )
  })
})
