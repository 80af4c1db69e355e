// CHANGE: describe plain JavaScript data produced from a parsed tree
// WHY: callers that do not want tagged nodes get ordinary values
// REF: req-plain-json-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ Value: toPlain(v) ∈ Json
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Json is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(1)/O(1)

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }
