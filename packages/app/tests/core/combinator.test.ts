import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import type { Parser } from "../../src/core/combinator.js"
import {
  alt,
  char,
  context,
  cut,
  lazy,
  many0,
  nested,
  preceded,
  runParser,
  separatedList0,
  tag,
  terminated
} from "../../src/core/combinator.js"
import { expectLeft, expectRight } from "./test-helpers.js"

describe("tag", () => {
  it.effect("consumes the literal and leaves the rest", () =>
    Effect.sync(() => {
      const outcome = expectRight(runParser(tag("null"), "nullx"))
      expect(outcome).toEqual({ value: "null", remaining: "x", offset: 4 })
    }))

  it.effect("reports a cut-off literal as truncated input", () =>
    Effect.sync(() => {
      const error = expectLeft(runParser(tag("null"), "nu"))
      expect(error.kind).toBe("TruncatedInput")
      expect(error.expected).toBe("'null'")
      expect(error.offset).toBe(0)
    }))

  it.effect("reports a different word as a syntax mismatch", () =>
    Effect.sync(() => {
      const error = expectLeft(runParser(tag("null"), "nope"))
      expect(error.kind).toBe("SyntaxMismatch")
      expect(error.committed).toBe(false)
    }))
})

describe("alt", () => {
  it.effect("falls through uncommitted failures", () =>
    Effect.sync(() => {
      const outcome = expectRight(runParser(alt(tag("ab"), tag("ac")), "ac"))
      expect(outcome.value).toBe("ac")
    }))

  it.effect("stops at a committed failure", () =>
    Effect.sync(() => {
      const error = expectLeft(runParser(alt(cut(tag("ab")), tag("ac")), "ac"))
      expect(error.expected).toBe("'ab'")
      expect(error.committed).toBe(true)
    }))
})

describe("many0", () => {
  it.effect("collects until the item stops matching", () =>
    Effect.sync(() => {
      const outcome = expectRight(runParser(many0(char("a")), "aab"))
      expect(outcome.value).toEqual(["a", "a"])
      expect(outcome.remaining).toBe("b")
    }))
})

describe("separatedList0", () => {
  const list = separatedList0(char(","), tag("a"))

  it.effect("parses separated items", () =>
    Effect.sync(() => {
      const outcome = expectRight(runParser(list, "a,a,a;"))
      expect(outcome.value).toEqual(["a", "a", "a"])
      expect(outcome.remaining).toBe(";")
    }))

  it.effect("accepts zero items", () =>
    Effect.sync(() => {
      const outcome = expectRight(runParser(list, ""))
      expect(outcome.value).toEqual([])
    }))

  it.effect("requires an item after a separator", () =>
    Effect.sync(() => {
      const error = expectLeft(runParser(list, "a,"))
      expect(error.kind).toBe("TruncatedInput")
      expect(error.offset).toBe(2)
      expect(error.committed).toBe(true)
    }))
})

describe("context", () => {
  it.effect("lists labels outermost first", () =>
    Effect.sync(() => {
      const error = expectLeft(runParser(context("outer", context("inner", char("x"))), "y"))
      expect(error.context).toEqual(["outer", "inner"])
      expect(error.kind).toBe("SyntaxMismatch")
    }))
})

describe("nested", () => {
  const group: Parser<string> = alt(
    preceded(char("("), nested(terminated(lazy(() => group), char(")")))),
    tag("x")
  )

  it.effect("allows nesting up to the limit", () =>
    Effect.sync(() => {
      const outcome = expectRight(runParser(group, "((x))", { maxDepth: 2 }))
      expect(outcome.value).toBe("x")
      expect(outcome.remaining).toBe("")
    }))

  it.effect("fails past the limit", () =>
    Effect.sync(() => {
      const error = expectLeft(runParser(group, "(((x)))", { maxDepth: 2 }))
      expect(error.kind).toBe("DepthExceeded")
      expect(error.offset).toBe(3)
      expect(error.expected).toBe("at most 2 nested containers")
    }))
})
