// CHANGE: map character offsets to line/column positions
// WHY: diagnostics point at the place in the document a failure happened
// REF: req-location-1
// SOURCE: n/a
// FORMAT THEOREM: ∀o: locate(t, o).line = 1 + |{i < o : t[i] = '\n'}|
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: line and column are 1-based
// COMPLEXITY: O(n) where n = offset

export interface Location {
  readonly line: number
  readonly column: number
}

export const locate = (text: string, offset: number): Location => {
  const end = Math.min(Math.max(offset, 0), text.length)
  let line = 1
  let lineStart = 0
  for (let index = 0; index < end; index++) {
    if (text[index] === "\n") {
      line += 1
      lineStart = index + 1
    }
  }
  return { line, column: end - lineStart + 1 }
}
