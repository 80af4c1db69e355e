import * as Either from "effect/Either"
import { pipe } from "effect/Function"

import type { ParseError } from "./parse-error.js"
import { commit, depthExceeded, mismatchAt, syntaxMismatch, truncatedInput, withContext } from "./parse-error.js"

// CHANGE: provide a small parser-combinator kernel over immutable cursors
// WHY: grammar rules are composed from independently testable sub-parsers
// REF: req-combinator-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p,c: p(c) = Right(s) → s.cursor.offset ≥ c.offset
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: alternation only retries uncommitted failures
// COMPLEXITY: O(n) per primitive where n = matched length

export interface Cursor {
  readonly text: string
  readonly offset: number
  readonly depth: number
  readonly maxDepth: number
}

export interface Step<A> {
  readonly value: A
  readonly cursor: Cursor
}

export type Parser<A> = (cursor: Cursor) => Either.Either<Step<A>, ParseError>

export interface ParseOptions {
  readonly maxDepth: number
}

export const defaultParseOptions: ParseOptions = { maxDepth: 128 }

export interface ParseOutcome<A> {
  readonly value: A
  readonly remaining: string
  readonly offset: number
}

const advance = (cursor: Cursor, count: number): Cursor => ({
  ...cursor,
  offset: cursor.offset + count
})

const step = <A>(value: A, cursor: Cursor): Either.Either<Step<A>, ParseError> => Either.right({ value, cursor })

export const char = (expected: string): Parser<string> => (cursor) =>
  cursor.text[cursor.offset] === expected
    ? step(expected, advance(cursor, 1))
    : Either.left(mismatchAt(cursor.text, cursor.offset, `'${expected}'`))

/**
 * Match an exact literal.
 *
 * @param literal - Text that must appear at the cursor.
 * @returns Parser that consumes the literal or fails consuming nothing.
 *
 * @pure true
 * @invariant a proper prefix of the literal at end of input is TruncatedInput
 * @complexity O(|literal|)
 */
export const tag = (literal: string): Parser<string> => (cursor) => {
  const found = cursor.text.slice(cursor.offset, cursor.offset + literal.length)
  if (found === literal) {
    return step(literal, advance(cursor, literal.length))
  }
  const expected = `'${literal}'`
  return literal.startsWith(found)
    ? Either.left(truncatedInput(expected, cursor.offset))
    : Either.left(syntaxMismatch(expected, cursor.offset))
}

// one code point
export const satisfy = (
  expected: string,
  predicate: (character: string) => boolean
): Parser<string> =>
(cursor) => {
  const codePoint = cursor.text.codePointAt(cursor.offset)
  if (codePoint === undefined) {
    return Either.left(truncatedInput(expected, cursor.offset))
  }
  const character = String.fromCodePoint(codePoint)
  return predicate(character)
    ? step(character, advance(cursor, character.length))
    : Either.left(syntaxMismatch(expected, cursor.offset))
}

export const takeWhile = (predicate: (unit: string) => boolean): Parser<string> => (cursor) => {
  let end = cursor.offset
  while (end < cursor.text.length && predicate(cursor.text.charAt(end))) {
    end += 1
  }
  return step(cursor.text.slice(cursor.offset, end), advance(cursor, end - cursor.offset))
}

/**
 * Match a regular expression anchored at the cursor.
 *
 * @param expected - Label reported on failure.
 * @param pattern - Pattern; flags other than `u` are ignored.
 * @returns Parser yielding the matched text.
 *
 * @pure true
 * @invariant the pattern object passed in is never mutated
 */
export const regex = (expected: string, pattern: RegExp): Parser<string> => (cursor) => {
  const sticky = new RegExp(pattern.source, pattern.unicode ? "uy" : "y")
  sticky.lastIndex = cursor.offset
  const match = sticky.exec(cursor.text)
  const matched = match?.[0]
  if (matched === undefined || matched.length === 0) {
    return Either.left(mismatchAt(cursor.text, cursor.offset, expected))
  }
  return step(matched, advance(cursor, matched.length))
}

export const map = <A, B>(parser: Parser<A>, f: (value: A) => B): Parser<B> => (cursor) =>
  Either.map(parser(cursor), (result) => ({ value: f(result.value), cursor: result.cursor }))

export const flatMap = <A, B>(parser: Parser<A>, f: (value: A) => Parser<B>): Parser<B> => (cursor) =>
  Either.flatMap(parser(cursor), (result) => f(result.value)(result.cursor))

export const mapError = <A>(parser: Parser<A>, f: (error: ParseError) => ParseError): Parser<A> => (cursor) =>
  Either.mapLeft(parser(cursor), f)

/**
 * Try parsers in order; the first success wins.
 *
 * @returns Last failure when every alternative fails uncommitted.
 *
 * @pure true
 * @invariant a committed failure is returned without trying later alternatives
 * @complexity O(k) attempts where k = number of alternatives
 */
export const alt = <A>(...parsers: ReadonlyArray<Parser<A>>): Parser<A> => (cursor) => {
  let last: ParseError = syntaxMismatch("an alternative", cursor.offset)
  for (const parser of parsers) {
    const result = parser(cursor)
    if (Either.isRight(result) || result.left.committed) {
      return result
    }
    last = result.left
  }
  return Either.left(last)
}

export const preceded = <A, B>(first: Parser<A>, second: Parser<B>): Parser<B> =>
  flatMap(first, () => second)

export const terminated = <A, B>(first: Parser<A>, second: Parser<B>): Parser<A> =>
  flatMap(first, (value) => map(second, () => value))

export const delimited = <A, B, C>(open: Parser<A>, inner: Parser<B>, close: Parser<C>): Parser<B> =>
  preceded(open, terminated(inner, close))

export const separatedPair = <A, B, C>(
  left: Parser<A>,
  separator: Parser<B>,
  right: Parser<C>
): Parser<readonly [A, C]> =>
  flatMap(left, (first) => map(preceded(separator, right), (second) => [first, second] as const))

export const many0 = <A>(parser: Parser<A>): Parser<ReadonlyArray<A>> => (cursor) => {
  const items: Array<A> = []
  let current = cursor
  for (;;) {
    const result = parser(current)
    if (Either.isLeft(result)) {
      return result.left.committed ? Either.left(result.left) : step(items, current)
    }
    // a parser that consumes nothing would loop forever
    if (result.right.cursor.offset === current.offset) {
      return step(items, current)
    }
    items.push(result.right.value)
    current = result.right.cursor
  }
}

/**
 * Zero or more items separated by `separator`.
 *
 * @param separator - Parser between two items.
 * @param item - Element parser.
 * @returns Items in source order.
 *
 * @pure true
 * @invariant once a separator is consumed the next item is required
 * @complexity O(n) items
 */
export const separatedList0 = <A, S>(separator: Parser<S>, item: Parser<A>): Parser<ReadonlyArray<A>> =>
(cursor) => {
  const first = item(cursor)
  if (Either.isLeft(first)) {
    return first.left.committed ? Either.left(first.left) : step([], cursor)
  }
  const items: Array<A> = [first.right.value]
  let current = first.right.cursor
  for (;;) {
    const separated = separator(current)
    if (Either.isLeft(separated)) {
      return separated.left.committed ? Either.left(separated.left) : step(items, current)
    }
    const next = item(separated.right.cursor)
    if (Either.isLeft(next)) {
      return Either.left(commit(next.left))
    }
    items.push(next.right.value)
    current = next.right.cursor
  }
}

export const cut = <A>(parser: Parser<A>): Parser<A> => mapError(parser, commit)

export const context = <A>(label: string, parser: Parser<A>): Parser<A> =>
  mapError(parser, (error) => withContext(error, label))

/**
 * Replace an uncommitted failure with a single expectation at the cursor.
 *
 * @pure true
 * @invariant committed failures pass through unchanged
 */
export const expecting = <A>(expected: string, parser: Parser<A>): Parser<A> => (cursor) =>
  Either.mapLeft(
    parser(cursor),
    (error) => error.committed ? error : mismatchAt(cursor.text, cursor.offset, expected)
  )

export const lazy = <A>(thunk: () => Parser<A>): Parser<A> => (cursor) => thunk()(cursor)

/**
 * Run `parser` one container level deeper.
 *
 * @pure true
 * @invariant depth after success equals depth before
 */
export const nested = <A>(parser: Parser<A>): Parser<A> => (cursor) => {
  if (cursor.depth >= cursor.maxDepth) {
    return Either.left(depthExceeded(cursor.maxDepth, cursor.offset))
  }
  return Either.map(
    parser({ ...cursor, depth: cursor.depth + 1 }),
    (result) => ({ value: result.value, cursor: { ...result.cursor, depth: cursor.depth } })
  )
}

/**
 * Run a parser over a whole text.
 *
 * @param parser - Parser to run from offset 0.
 * @param text - Full input.
 * @param options - Depth limit.
 * @returns Value with the unconsumed suffix, or the failure.
 *
 * @pure true
 * @invariant remaining = text.slice(offset)
 * @complexity O(n)
 */
export const runParser = <A>(
  parser: Parser<A>,
  text: string,
  options: ParseOptions = defaultParseOptions
): Either.Either<ParseOutcome<A>, ParseError> =>
  pipe(
    parser({ text, offset: 0, depth: 0, maxDepth: options.maxDepth }),
    Either.map(({ cursor, value }) => ({
      value,
      remaining: cursor.text.slice(cursor.offset),
      offset: cursor.offset
    }))
  )
