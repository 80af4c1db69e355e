import { Match } from "effect"

import { locate } from "./location.js"

// CHANGE: typed parse failures with context labels
// WHY: failures are returned as values and must be exhaustively matchable
// REF: req-parse-error-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ ParseError: 0 ≤ e.offset ≤ |text|
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: context labels never change whether a parse succeeds
// COMPLEXITY: O(1)/O(1)

export type ParseErrorKind =
  | "SyntaxMismatch"
  | "MalformedEscape"
  | "TruncatedInput"
  | "DepthExceeded"

export interface ParseError {
  readonly _tag: "ParseError"
  readonly kind: ParseErrorKind
  readonly expected: string
  readonly offset: number
  // outermost construct first
  readonly context: ReadonlyArray<string>
  // a committed failure is not retried by alternation
  readonly committed: boolean
}

export const parseError = (
  kind: ParseErrorKind,
  expected: string,
  offset: number
): ParseError => ({
  _tag: "ParseError",
  kind,
  expected,
  offset,
  context: [],
  committed: false
})

export const syntaxMismatch = (expected: string, offset: number): ParseError =>
  parseError("SyntaxMismatch", expected, offset)

export const malformedEscape = (expected: string, offset: number): ParseError => ({
  ...parseError("MalformedEscape", expected, offset),
  committed: true
})

export const truncatedInput = (expected: string, offset: number): ParseError =>
  parseError("TruncatedInput", expected, offset)

export const depthExceeded = (maxDepth: number, offset: number): ParseError => ({
  ...parseError("DepthExceeded", `at most ${maxDepth} nested containers`, offset),
  committed: true
})

/**
 * Mismatch at a position: end of input means the token never appeared.
 *
 * @pure true
 * @invariant offset ≥ text.length → kind = TruncatedInput
 */
export const mismatchAt = (text: string, offset: number, expected: string): ParseError =>
  offset >= text.length ? truncatedInput(expected, offset) : syntaxMismatch(expected, offset)

export const withContext = (error: ParseError, label: string): ParseError => ({
  ...error,
  context: [label, ...error.context]
})

export const commit = (error: ParseError): ParseError =>
  error.committed ? error : { ...error, committed: true }

const describeFound = (text: string, offset: number): string => {
  const found = text.codePointAt(offset)
  return found === undefined ? "end of input" : JSON.stringify(String.fromCodePoint(found))
}

const formatContext = (context: ReadonlyArray<string>): string =>
  context.length === 0 ? "" : ` (${context.join(" > ")})`

/**
 * Render a ParseError against the text it was produced from.
 *
 * @param text - Input given to the parser.
 * @param error - Failure returned by the parser.
 * @returns Single line such as `TruncatedInput at 1:9 (object): expected '}', found end of input`.
 *
 * @pure true
 * @complexity O(n) where n = error.offset
 */
export const formatParseError = (text: string, error: ParseError): string => {
  const { column, line } = locate(text, error.offset)
  const found = Match.value(error.kind).pipe(
    Match.when("DepthExceeded", () => ""),
    Match.orElse(() => `, found ${describeFound(text, error.offset)}`)
  )
  return `${error.kind} at ${line}:${column}${formatContext(error.context)}: expected ${error.expected}${found}`
}
