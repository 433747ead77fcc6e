// CHANGE: keep a JSON domain type for open-ended finding payloads
// WHY: checks attach structured context without the engine knowing its shape
// QUOTE(TZ): "an open structured data payload"
// REF: req-finding-data-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ Json: JSON.parse(JSON.stringify(x)) ≅ x
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

export type JsonObject = { readonly [key: string]: Json }
