import * as Either from "effect/Either"

import type { TomlTable, TomlValue } from "./toml.js"
import { isTomlTable } from "./toml.js"

// CHANGE: typed wrappers for the narrow manifest substructures
// WHY: decode a known subset of keys and carry the rest verbatim
// REF: req-fields-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t,K: keys(split(t,K).known) ⊎ keys(split(t,K).unhandled) = keys(t)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unhandled never holds a recognized key after decode
// COMPLEXITY: O(n) where n = number of table keys

/**
 * Keys the typed model does not interpret. An `undefined` value marks a key
 * that is dropped on write.
 */
export type Unhandled = { readonly [key: string]: TomlValue | undefined }

export interface SplitTable<K extends string> {
  readonly known: Readonly<Partial<Record<K, TomlValue>>>
  readonly unhandled: TomlTable
}

/**
 * Split a table into recognized keys and the remaining keys, in source order.
 *
 * @pure true
 * @invariant every key of `table` lands in exactly one of known/unhandled
 * @complexity O(n)
 */
export const splitTable = <K extends string>(
  table: TomlTable,
  keys: ReadonlyArray<K>
): SplitTable<K> => {
  const isKnown = (key: string): key is K => keys.some((candidate) => candidate === key)
  const known: Partial<Record<K, TomlValue>> = {}
  const unhandled: Record<string, TomlValue> = {}
  for (const [key, value] of Object.entries(table)) {
    if (isKnown(key)) {
      known[key] = value
    } else {
      unhandled[key] = value
    }
  }
  return { known, unhandled }
}

/**
 * Merge typed fields with unhandled fields into one table.
 *
 * Typed fields come first and win on key collision; `undefined` entries on
 * either side are left out.
 *
 * @pure true
 * @complexity O(n + m)
 */
export const mergeTable = (
  typed: Readonly<Record<string, TomlValue | undefined>>,
  unhandled: Unhandled
): TomlTable => {
  const result: Record<string, TomlValue> = {}
  for (const [key, value] of Object.entries(typed)) {
    if (value !== undefined) {
      result[key] = value
    }
  }
  for (const [key, value] of Object.entries(unhandled)) {
    if (value !== undefined && !Object.hasOwn(result, key)) {
      result[key] = value
    }
  }
  return result
}

// Version / edition descriptor: a literal string or `{ workspace = true }`.

export type WorkspaceInherited = { readonly workspace: true }

export type FieldValue = string | WorkspaceInherited

export const inheritFromWorkspace: WorkspaceInherited = { workspace: true }

export const isWorkspaceInherited = (value: FieldValue): value is WorkspaceInherited =>
  typeof value !== "string"

export const decodeFieldValue = (
  field: string,
  value: TomlValue | undefined
): Either.Either<FieldValue | undefined, string> => {
  if (value === undefined || typeof value === "string") {
    return Either.right(value)
  }
  if (isTomlTable(value) && value["workspace"] === true && Object.keys(value).length === 1) {
    return Either.right(inheritFromWorkspace)
  }
  return Either.left(`${field} must be a string or { workspace = true }`)
}

export const encodeFieldValue = (value: FieldValue | undefined): TomlValue | undefined => {
  if (value === undefined || typeof value === "string") {
    return value
  }
  return { workspace: true }
}

export const decodeOptionalString = (
  field: string,
  value: TomlValue | undefined
): Either.Either<string | undefined, string> =>
  value === undefined || typeof value === "string"
    ? Either.right(value)
    : Either.left(`${field} must be a string`)

// [[bin]] entries

export interface BuildTarget {
  readonly name: string
  readonly path: string | undefined
  readonly unhandled: Unhandled
}

const buildTargetKeys = ["name", "path"] as const

export const decodeBuildTarget = (
  field: string,
  value: TomlValue
): Either.Either<BuildTarget, string> => {
  if (!isTomlTable(value)) {
    return Either.left(`${field} must be a table`)
  }
  const { known, unhandled } = splitTable(value, buildTargetKeys)
  if (typeof known.name !== "string") {
    return Either.left(`${field}.name must be a string`)
  }
  const path = decodeOptionalString(`${field}.path`, known.path)
  if (Either.isLeft(path)) {
    return Either.left(path.left)
  }
  return Either.right({ name: known.name, path: path.right, unhandled })
}

export const encodeBuildTarget = (target: BuildTarget): TomlTable =>
  mergeTable({ name: target.name, path: target.path }, target.unhandled)

// [dependencies] is carried as-is; its syntax is not modeled.

export interface DependenciesSection {
  readonly data: TomlTable
}

export const decodeDependencies = (
  value: TomlValue
): Either.Either<DependenciesSection, string> =>
  isTomlTable(value)
    ? Either.right({ data: value })
    : Either.left("dependencies must be a table")

export const encodeDependencies = (section: DependenciesSection): TomlTable => section.data
