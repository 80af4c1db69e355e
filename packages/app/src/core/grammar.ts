import * as Either from "effect/Either"
import { pipe } from "effect/Function"

import type { Cursor, ParseOptions, ParseOutcome, Parser, Step } from "./combinator.js"
import {
  alt,
  char,
  context,
  cut,
  defaultParseOptions,
  delimited,
  expecting,
  flatMap,
  lazy,
  many0,
  map,
  mapError,
  nested,
  preceded,
  regex,
  runParser,
  satisfy,
  separatedList0,
  separatedPair,
  tag,
  takeWhile,
  terminated
} from "./combinator.js"
import { roundToFloat32 } from "./float32.js"
import type { ParseError } from "./parse-error.js"
import { commit, malformedEscape, syntaxMismatch } from "./parse-error.js"
import type { Value } from "./value.js"
import { arrayValue, booleanValue, nullValue, numberValue, objectValue, stringValue } from "./value.js"

// CHANGE: recursive-descent grammar for JSON-like documents
// WHY: turn a fully decoded text into a Value tree or a typed ParseError
// REF: req-grammar-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t: parse(t) = Right(o) → o.remaining is a suffix of t
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: no partial tree is returned for a failed construct
// COMPLEXITY: O(n) where n = input length

const isSpace = (unit: string): boolean => unit === " " || unit === "\n" || unit === "\r" || unit === "\t"

/** Space, LF, CR and TAB; never fails. */
export const spaces: Parser<string> = takeWhile(isSpace)

export const ws = <A>(parser: Parser<A>): Parser<A> => terminated(parser, spaces)

export const nullLiteral: Parser<Value> = map(tag("null"), () => nullValue)

export const booleanLiteral: Parser<Value> = alt(
  map(tag("true"), (): Value => booleanValue(true)),
  map(tag("false"), (): Value => booleanValue(false))
)

const decimal = /[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/u

const finiteNumber = (
  literal: string,
  start: number,
  next: Cursor
): Either.Either<Step<Value>, ParseError> => {
  const parsed = numberValue(roundToFloat32(literal))
  return Number.isFinite(parsed.value)
    ? Either.right({ value: parsed, cursor: next })
    : Either.left(commit(syntaxMismatch("a number within 32-bit float range", start)))
}

export const numberLiteral: Parser<Value> = (cursor) =>
  Either.flatMap(
    regex("a number", decimal)(cursor),
    (literal) => finiteNumber(literal.value, cursor.offset, literal.cursor)
  )

const unescape = (character: string): string => {
  switch (character) {
    case "n":
      return "\n"
    case "r":
      return "\r"
    case "t":
      return "\t"
    default:
      return character
  }
}

const isSurrogate = (unit: number): boolean => unit >= 0xd8_00 && unit <= 0xdf_ff

const hexUnit: Parser<number> = mapError(
  map(regex("four hex digits", /[0-9a-fA-F]{4}/u), (hex) => Number.parseInt(hex, 16)),
  (error) => malformedEscape("four hex digits", error.offset)
)

// cursor sits just after `\u`; each escape stands for one scalar value on its own
const unicodeEscape: Parser<string> = (cursor) =>
  Either.flatMap(hexUnit(cursor), (unit): Either.Either<Step<string>, ParseError> =>
    isSurrogate(unit.value)
      ? Either.left(malformedEscape("a Unicode scalar value", cursor.offset))
      : Either.right({ value: String.fromCharCode(unit.value), cursor: unit.cursor }))

const simpleEscape: Parser<string> = map(satisfy("an escape character", () => true), unescape)

const escape: Parser<string> = preceded(
  char("\\"),
  cut(alt(preceded(char("u"), unicodeEscape), simpleEscape))
)

const normalChar: Parser<string> = satisfy(
  "a string character",
  (character) => character !== "\\" && character !== "\""
)

/**
 * Quoted string with escapes decoded; shared by string values and object keys.
 *
 * @pure true
 * @invariant the closing quote is consumed and not part of the result
 * @complexity O(n)
 */
export const jsString: Parser<string> = context(
  "string",
  preceded(
    char("\""),
    cut(terminated(map(many0(alt(escape, normalChar)), (chunks) => chunks.join("")), char("\"")))
  )
)

export const stringLiteral: Parser<Value> = map(jsString, stringValue)

const valueRef: Parser<Value> = lazy(() => value)

const comma = ws(char(","))

export const array: Parser<Value> = context(
  "array",
  preceded(
    ws(char("[")),
    nested(cut(terminated(map(separatedList0(comma, valueRef), arrayValue), char("]"))))
  )
)

const objectItem: Parser<readonly [string, Value]> = context(
  "object item",
  separatedPair(ws(jsString), cut(ws(char(":"))), cut(valueRef))
)

export const object: Parser<Value> = context(
  "object",
  preceded(
    ws(char("{")),
    nested(cut(terminated(map(separatedList0(comma, objectItem), objectValue), char("}"))))
  )
)

const valueInner: Parser<Value> = expecting(
  "a value",
  alt(nullLiteral, booleanLiteral, numberLiteral, stringLiteral, array, object)
)

/** Any value with the whitespace around it. */
export const value: Parser<Value> = delimited(spaces, valueInner, spaces)

/**
 * Parse a value from the start of `text`.
 *
 * @param text - Full input, already decoded.
 * @param options - Nesting limit.
 * @returns The value and whatever suffix was not consumed.
 *
 * @pure true
 * @invariant leading and trailing whitespace around the value is consumed
 * @complexity O(n)
 */
export const parse = (
  text: string,
  options: ParseOptions = defaultParseOptions
): Either.Either<ParseOutcome<Value>, ParseError> => runParser(value, text, options)

const endOfInput: Parser<null> = (cursor) =>
  cursor.offset === cursor.text.length
    ? Either.right({ value: null, cursor })
    : Either.left(commit(syntaxMismatch("end of input", cursor.offset)))

/**
 * Parse a whole document: one value and nothing but whitespace around it.
 *
 * @pure true
 * @invariant Right(o) → o.remaining = ""
 */
export const parseDocument = (
  text: string,
  options: ParseOptions = defaultParseOptions
): Either.Either<Value, ParseError> =>
  pipe(
    runParser(flatMap(value, (result) => map(endOfInput, () => result)), text, options),
    Either.map((outcome) => outcome.value)
  )
