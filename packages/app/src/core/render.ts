import { Match } from "effect"

import type { Value } from "./value.js"

// CHANGE: render parsed trees as a readable debug dump
// WHY: the CLI shows the structure it parsed, tags included
// REF: req-render-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: render(v) starts with v._tag
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: object keys are listed in sorted order
// COMPLEXITY: O(n log n)

const compareStrings = (left: string, right: string): number => left < right ? -1 : left > right ? 1 : 0

/**
 * Shortest decimal that reads back to the same 32-bit float.
 *
 * @pure true
 * @invariant Math.fround(Number(formatFloat32(x))) === x for finite float32 x
 */
export const formatFloat32 = (value: number): string => {
  for (let precision = 1; precision <= 9; precision++) {
    const candidate = Number(value.toPrecision(precision))
    if (Math.fround(candidate) === value) {
      return String(candidate)
    }
  }
  return String(value)
}

const pad = (indent: number, level: number): string => " ".repeat(indent * level)

const renderBlock = (
  open: string,
  close: string,
  parts: ReadonlyArray<string>,
  indent: number,
  level: number
): string => {
  if (parts.length === 0) {
    return `${open}${close}`
  }
  if (indent === 0) {
    return `${open}${parts.join(", ")}${close}`
  }
  const inner = parts.map((part) => `${pad(indent, level + 1)}${part},`)
  return [open, ...inner, `${pad(indent, level)}${close}`].join("\n")
}

const renderAt = (value: Value, indent: number, level: number): string =>
  Match.value(value).pipe(
    Match.tag("Null", () => "Null"),
    Match.tag("Boolean", (node) => `Boolean(${String(node.value)})`),
    Match.tag("Number", (node) => `Number(${formatFloat32(node.value)})`),
    Match.tag("String", (node) => `String(${JSON.stringify(node.value)})`),
    Match.tag("Array", (node) =>
      renderBlock(
        "Array [",
        "]",
        node.items.map((item) => renderAt(item, indent, level + 1)),
        indent,
        level
      )),
    Match.tag("Object", (node) =>
      renderBlock(
        "Object {",
        "}",
        [...node.entries]
          .toSorted(([left], [right]) => compareStrings(left, right))
          .map(([key, entry]) => `${JSON.stringify(key)}: ${renderAt(entry, indent, level + 1)}`),
        indent,
        level
      )),
    Match.exhaustive
  )

/**
 * Render a Value tree.
 *
 * @param value - Parsed tree.
 * @param indent - Spaces per nesting level; 0 renders on one line.
 * @returns Debug text, e.g. `Array [Number(1), String("a")]` for indent 0.
 *
 * @pure true
 * @invariant empty containers render as `Array []` and `Object {}`
 * @complexity O(n log n)
 */
export const renderValue = (value: Value, indent: number): string => renderAt(value, indent, 0)
