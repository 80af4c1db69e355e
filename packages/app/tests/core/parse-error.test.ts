import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { parse } from "../../src/core/grammar.js"
import { locate } from "../../src/core/location.js"
import { formatParseError } from "../../src/core/parse-error.js"
import { expectLeft } from "./test-helpers.js"

describe("locate", () => {
  it.effect("counts lines and columns from 1", () =>
    Effect.sync(() => {
      expect(locate("abc", 0)).toEqual({ line: 1, column: 1 })
      expect(locate("ab\ncd", 4)).toEqual({ line: 2, column: 2 })
    }))

  it.effect("clamps offsets past the end", () =>
    Effect.sync(() => {
      expect(locate("abc", 10)).toEqual({ line: 1, column: 4 })
    }))
})

describe("formatParseError", () => {
  it.effect("describes a truncated object", () =>
    Effect.sync(() => {
      const text = `{"a":1`
      const error = expectLeft(parse(text))
      expect(formatParseError(text, error)).toBe(
        "TruncatedInput at 1:7 (object): expected '}', found end of input"
      )
    }))

  it.effect("shows the offending character", () =>
    Effect.sync(() => {
      const text = "[1 2]"
      const error = expectLeft(parse(text))
      expect(formatParseError(text, error)).toBe("SyntaxMismatch at 1:4 (array): expected ']', found \"2\"")
    }))

  it.effect("joins nested context labels", () =>
    Effect.sync(() => {
      const text = "{\n  \"a\" 1}"
      const error = expectLeft(parse(text))
      expect(formatParseError(text, error)).toBe(
        "SyntaxMismatch at 2:7 (object > object item): expected ':', found \"1\""
      )
    }))

  it.effect("omits the found part for depth failures", () =>
    Effect.sync(() => {
      const text = "[[1]]"
      const error = expectLeft(parse(text, { maxDepth: 1 }))
      expect(formatParseError(text, error)).toBe(
        "DepthExceeded at 1:3 (array > array): expected at most 1 nested containers"
      )
    }))
})
