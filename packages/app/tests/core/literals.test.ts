import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { runParser } from "../../src/core/combinator.js"
import { booleanLiteral, nullLiteral, numberLiteral } from "../../src/core/grammar.js"
import { booleanValue, nullValue, numberValue } from "../../src/core/value.js"
import { expectLeft, expectRight } from "./test-helpers.js"

describe("nullLiteral", () => {
  it.effect("matches null exactly", () =>
    Effect.sync(() => {
      const outcome = expectRight(runParser(nullLiteral, "null,"))
      expect(outcome.value).toEqual(nullValue)
      expect(outcome.remaining).toBe(",")
    }))

  it.effect("consumes nothing on a different word", () =>
    Effect.sync(() => {
      const error = expectLeft(runParser(nullLiteral, "nil"))
      expect(error.offset).toBe(0)
      expect(error.committed).toBe(false)
    }))
})

describe("booleanLiteral", () => {
  it.effect("parses true", () =>
    Effect.sync(() => {
      expect(expectRight(runParser(booleanLiteral, "true")).value).toEqual(booleanValue(true))
    }))

  it.effect("parses false and leaves the rest", () =>
    Effect.sync(() => {
      const outcome = expectRight(runParser(booleanLiteral, "false]"))
      expect(outcome.value).toEqual(booleanValue(false))
      expect(outcome.remaining).toBe("]")
    }))
})

describe("numberLiteral", () => {
  const numberOf = (text: string): number => {
    const outcome = expectRight(runParser(numberLiteral, text))
    if (outcome.value._tag !== "Number") {
      throw new Error(`expected a Number, got ${outcome.value._tag}`)
    }
    return outcome.value.value
  }

  it.effect("parses integers, fractions and exponents", () =>
    Effect.sync(() => {
      expect(numberOf("123")).toBe(123)
      expect(numberOf("-1.5e2")).toBe(-150)
      expect(numberOf("+.5")).toBe(0.5)
      expect(numberOf("1.")).toBe(1)
    }))

  it.effect("stores 32-bit float precision", () =>
    Effect.sync(() => {
      expect(numberOf("0.1")).toBe(Math.fround(0.1))
      expect(expectRight(runParser(numberLiteral, "0.1")).value).toEqual(numberValue(0.1))
    }))

  it.effect("rounds straight from the decimal text", () =>
    Effect.sync(() => {
      expect(numberOf("1.000000059604644775390625000000000000001")).toBe(1 + 2 ** -23)
    }))

  it.effect("leaves an incomplete exponent unconsumed", () =>
    Effect.sync(() => {
      const outcome = expectRight(runParser(numberLiteral, "1e"))
      expect(outcome.remaining).toBe("e")
    }))

  it.effect("rejects text without digits", () =>
    Effect.sync(() => {
      const error = expectLeft(runParser(numberLiteral, "-"))
      expect(error.kind).toBe("SyntaxMismatch")
      expect(error.expected).toBe("a number")
    }))

  it.effect("rejects numbers beyond 32-bit float range", () =>
    Effect.sync(() => {
      const error = expectLeft(runParser(numberLiteral, "1e39"))
      expect(error.expected).toBe("a number within 32-bit float range")
      expect(error.committed).toBe(true)
    }))
})
