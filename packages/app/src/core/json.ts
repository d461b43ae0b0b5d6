import * as Schema from "@effect/schema/Schema"

// CHANGE: JSON domain type for machine-generated metadata documents
// WHY: keep the raw metadata alongside the decoded view
// REF: req-io-json-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t: decode(JsonParseSchema, t) = Right(x) → x ∈ Json; isJsonObject(x) ↔ x is a non-null, non-array object
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

export const JsonSchema: Schema.Schema<Json> = Schema.suspend(() =>
  Schema.Union(
    Schema.Null,
    Schema.Boolean,
    Schema.Number,
    Schema.String,
    Schema.Array(JsonSchema),
    Schema.Record({ key: Schema.String, value: JsonSchema })
  )
)

export const JsonParseSchema = Schema.parseJson(JsonSchema)

export const isJsonObject = (value: Json): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value)
