import { Match } from "effect"

import type { Json } from "./json.js"

// CHANGE: model parsed documents as a closed tagged union
// WHY: every consumer matches the six kinds exhaustively
// REF: req-value-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ Value: v._tag ∈ {Null, Boolean, Number, String, Array, Object}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: trees are acyclic and hold no reference to the input text
// COMPLEXITY: O(1) per constructor, O(n) for equality and conversion

export type NullValue = { readonly _tag: "Null" }
export type BooleanValue = { readonly _tag: "Boolean"; readonly value: boolean }
export type NumberValue = { readonly _tag: "Number"; readonly value: number }
export type StringValue = { readonly _tag: "String"; readonly value: string }
export type ArrayValue = { readonly _tag: "Array"; readonly items: ReadonlyArray<Value> }
export type ObjectValue = { readonly _tag: "Object"; readonly entries: ReadonlyMap<string, Value> }

export type Value =
  | NullValue
  | BooleanValue
  | NumberValue
  | StringValue
  | ArrayValue
  | ObjectValue

export const nullValue: NullValue = { _tag: "Null" }

export const booleanValue = (value: boolean): BooleanValue => ({
  _tag: "Boolean",
  value
})

/**
 * Numbers are stored with 32-bit float precision.
 *
 * @pure true
 * @invariant result.value === Math.fround(result.value)
 */
export const numberValue = (value: number): NumberValue => ({
  _tag: "Number",
  value: Math.fround(value)
})

export const stringValue = (value: string): StringValue => ({
  _tag: "String",
  value
})

export const arrayValue = (items: ReadonlyArray<Value>): ArrayValue => ({
  _tag: "Array",
  items
})

/**
 * Collect key/value pairs into an Object value.
 *
 * @param pairs - Pairs in source order.
 * @returns ObjectValue where a repeated key keeps its last value.
 *
 * @pure true
 * @invariant entries.size ≤ pairs.length
 * @complexity O(n)
 */
export const objectValue = (
  pairs: Iterable<readonly [string, Value]>
): ObjectValue => {
  const entries = new Map<string, Value>()
  for (const [key, value] of pairs) {
    entries.set(key, value)
  }
  return { _tag: "Object", entries }
}

const equalsItems = (left: ReadonlyArray<Value>, right: ReadonlyArray<Value>): boolean =>
  left.length === right.length && left.every((item, index) => {
    const other = right[index]
    return other !== undefined && equalsValue(item, other)
  })

const equalsEntries = (
  left: ReadonlyMap<string, Value>,
  right: ReadonlyMap<string, Value>
): boolean => {
  if (left.size !== right.size) {
    return false
  }
  for (const [key, value] of left) {
    const other = right.get(key)
    if (other === undefined || !equalsValue(value, other)) {
      return false
    }
  }
  return true
}

/**
 * Structural equality; object entries are compared regardless of order.
 *
 * @pure true
 * @complexity O(n) where n = number of nodes
 */
export const equalsValue = (left: Value, right: Value): boolean =>
  Match.value(left).pipe(
    Match.tag("Null", () => right._tag === "Null"),
    Match.tag("Boolean", (value) => right._tag === "Boolean" && right.value === value.value),
    Match.tag("Number", (value) => right._tag === "Number" && Object.is(right.value, value.value)),
    Match.tag("String", (value) => right._tag === "String" && right.value === value.value),
    Match.tag("Array", (value) => right._tag === "Array" && equalsItems(value.items, right.items)),
    Match.tag("Object", (value) => right._tag === "Object" && equalsEntries(value.entries, right.entries)),
    Match.exhaustive
  )

// own properties only: a "__proto__" key must not reach the prototype setter
const toPlainObject = (entries: ReadonlyMap<string, Value>): Json =>
  Object.fromEntries([...entries].map(([key, value]): readonly [string, Json] => [key, toPlain(value)]))

/**
 * Convert a Value tree into plain JavaScript data.
 *
 * @param value - Parsed tree.
 * @returns Json with the same shape.
 *
 * @pure true
 * @invariant toPlain(objectValue(p)) has one property per distinct key
 * @complexity O(n)
 */
export const toPlain = (value: Value): Json =>
  Match.value(value).pipe(
    Match.tag("Null", (): Json => null),
    Match.tag("Boolean", (node): Json => node.value),
    Match.tag("Number", (node): Json => node.value),
    Match.tag("String", (node): Json => node.value),
    Match.tag("Array", (node): Json => node.items.map(toPlain)),
    Match.tag("Object", (node): Json => toPlainObject(node.entries)),
    Match.exhaustive
  )
