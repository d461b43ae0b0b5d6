// CHANGE: introduce a TOML value domain for the raw manifest document
// WHY: the raw document keeps every field, typed or not
// REF: req-toml-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ TomlValue: x is a primitive, a date, an array of TomlValue or a TomlTable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: TOML has no null; absence is the missing key
// COMPLEXITY: O(n) for the guards, n = number of nested values

export type TomlPrimitive = string | number | bigint | boolean | Date

export type TomlValue =
  | TomlPrimitive
  | ReadonlyArray<TomlValue>
  | TomlTable

export type TomlTable = { readonly [key: string]: TomlValue }

const isPrimitive = (value: unknown): value is TomlPrimitive =>
  typeof value === "string" ||
  typeof value === "number" ||
  typeof value === "bigint" ||
  typeof value === "boolean" ||
  value instanceof Date

const isPlainObject = (value: unknown): value is object =>
  typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date)

export const isTomlValue = (value: unknown): value is TomlValue => {
  if (isPrimitive(value)) {
    return true
  }
  if (Array.isArray(value)) {
    return value.every((entry: unknown) => isTomlValue(entry))
  }
  return isTomlTable(value)
}

/**
 * Check that a value is a table whose entries are all TOML values.
 *
 * @pure true
 * @complexity O(n)
 */
export const isTomlTable = (value: unknown): value is TomlTable =>
  isPlainObject(value) && Object.values(value).every((entry: unknown) => isTomlValue(entry))

export const isStringArray = (value: TomlValue): value is ReadonlyArray<string> =>
  Array.isArray(value) && value.every((entry: unknown) => typeof entry === "string")
