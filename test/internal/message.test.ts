import { describe, expect, it } from "@effect/vitest"
import { enumerate } from "../../src/internal/enumerate.js"
import { composeMessage, defaultRuleName } from "../../src/internal/message.js"

const show = (n: number): string => `${n}`

describe("enumerate", () => {
  it("renders a single item without a connective", () => {
    expect(enumerate([7], show)).toBe("7")
  })

  it("joins two items with or", () => {
    expect(enumerate([1, 2], show)).toBe("1 or 2")
  })

  it("uses a serial comma for three or more items", () => {
    expect(enumerate([1, 2, 3], show)).toBe("1, 2, or 3")
    expect(enumerate(["a", "b", "c", "d"], (s) => `'${s}'`)).toBe("'a', 'b', 'c', or 'd'")
  })

  it("keeps order and duplicates", () => {
    expect(enumerate([3, 1, 3], show)).toBe("3, 1, or 3")
  })
})

describe("composeMessage", () => {
  it("covers every combination of rule lists", () => {
    expect(composeMessage([1, 2, 3], [4, 5, 6], show)).toBe("unexpected 4, 5, or 6; expected 1, 2, or 3")
    expect(composeMessage([], [4], show)).toBe("unexpected 4")
    expect(composeMessage([1, 2], [], show)).toBe("expected 1 or 2")
    expect(composeMessage([], [], show)).toBe("unknown parsing error")
  })

  it("renders rules in the order given", () => {
    const seen: Array<number> = []
    composeMessage([1, 2], [3], (n) => {
      seen.push(n)
      return show(n)
    })

    expect(seen).toEqual([3, 1, 2])
  })
})

describe("defaultRuleName", () => {
  it("prints primitives as themselves", () => {
    expect(defaultRuleName("ident")).toBe("ident")
    expect(defaultRuleName(4)).toBe("4")
    expect(defaultRuleName(true)).toBe("true")
  })

  it("prints structured rules as JSON", () => {
    expect(defaultRuleName(["a", 1])).toBe(`["a",1]`)
  })

  it("falls back to String for cyclic rules", () => {
    const rule: { self?: unknown } = {}
    rule.self = rule

    expect(defaultRuleName(rule)).toBe("[object Object]")
  })
})
