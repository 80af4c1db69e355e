// CHANGE: expose the parser as a library entry point
// WHY: callers embed the parser without going through the CLI
// REF: req-library-1
// SOURCE: n/a
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: only pure modules are re-exported
// COMPLEXITY: O(1)

export type { Cursor, ParseOptions, ParseOutcome, Parser, Step } from "./core/combinator.js"
export { defaultParseOptions, runParser } from "./core/combinator.js"
export {
  array,
  booleanLiteral,
  jsString,
  nullLiteral,
  numberLiteral,
  object,
  parse,
  parseDocument,
  spaces,
  stringLiteral,
  value,
  ws
} from "./core/grammar.js"
export { roundToFloat32 } from "./core/float32.js"
export type { Json } from "./core/json.js"
export type { Location } from "./core/location.js"
export { locate } from "./core/location.js"
export type { ParseError, ParseErrorKind } from "./core/parse-error.js"
export { formatParseError } from "./core/parse-error.js"
export { formatFloat32, renderValue } from "./core/render.js"
export type { ArrayValue, BooleanValue, NullValue, NumberValue, ObjectValue, StringValue, Value } from "./core/value.js"
export {
  arrayValue,
  booleanValue,
  equalsValue,
  nullValue,
  numberValue,
  objectValue,
  stringValue,
  toPlain
} from "./core/value.js"
