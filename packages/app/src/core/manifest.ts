import * as Either from "effect/Either"
import * as TOML from "smol-toml"

import type { InvalidManifest, ParseError } from "./errors.js"
import { invalidManifest, parseError } from "./errors.js"
import type { BuildTarget, DependenciesSection, FieldValue, Unhandled } from "./fields.js"
import {
  decodeBuildTarget,
  decodeDependencies,
  decodeFieldValue,
  decodeOptionalString,
  encodeBuildTarget,
  encodeDependencies,
  encodeFieldValue,
  mergeTable,
  splitTable
} from "./fields.js"
import type { TomlTable, TomlValue } from "./toml.js"
import { isStringArray, isTomlTable } from "./toml.js"

// CHANGE: model Cargo.toml as a raw document with typed overlays
// WHY: mutate package/workspace/bin fields without dropping unknown content
// REF: req-manifest-1
// SOURCE: n/a
// FORMAT THEOREM: ∀d: toDocument(of(d)) ≡ d modulo empty bin/members elision
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: package ∨ workspace is present on read
// COMPLEXITY: O(n) where n = size of the document

export interface PackageSection {
  readonly name: string
  readonly version: FieldValue | undefined
  readonly edition: FieldValue | undefined
  readonly unhandled: Unhandled
}

export interface WorkspacePackageSection {
  readonly version: string | undefined
  readonly edition: string | undefined
  readonly unhandled: Unhandled
}

export interface WorkspaceSection {
  readonly package: WorkspacePackageSection | undefined
  readonly members: ReadonlyArray<string> | undefined
  readonly unhandled: Unhandled
}

export interface CargoManifest {
  readonly path: string
  readonly raw: TomlTable
  readonly package: PackageSection | undefined
  readonly workspace: WorkspaceSection | undefined
  readonly dependencies: DependenciesSection | undefined
  readonly bin: ReadonlyArray<BuildTarget>
}

type Decoded<A> = Either.Either<A, string>

const packageKeys = ["name", "version", "edition"] as const
const workspacePackageKeys = ["version", "edition"] as const
const workspaceKeys = ["package", "members"] as const

const decodeOptional = <A>(
  value: TomlValue | undefined,
  decode: (value: TomlValue) => Decoded<A>
): Decoded<A | undefined> => value === undefined ? Either.right(undefined) : decode(value)

const decodePackage = (value: TomlValue): Decoded<PackageSection> => {
  if (!isTomlTable(value)) {
    return Either.left("package must be a table")
  }
  const { known, unhandled } = splitTable(value, packageKeys)
  if (typeof known.name !== "string") {
    return Either.left("package.name must be a string")
  }
  const name = known.name
  return Either.flatMap(decodeFieldValue("package.version", known.version), (version) =>
    Either.map(decodeFieldValue("package.edition", known.edition), (edition) => ({
      name,
      version,
      edition,
      unhandled
    })))
}

const decodeWorkspacePackage = (value: TomlValue): Decoded<WorkspacePackageSection> => {
  if (!isTomlTable(value)) {
    return Either.left("workspace.package must be a table")
  }
  const { known, unhandled } = splitTable(value, workspacePackageKeys)
  return Either.flatMap(decodeOptionalString("workspace.package.version", known.version), (version) =>
    Either.map(decodeOptionalString("workspace.package.edition", known.edition), (edition) => ({
      version,
      edition,
      unhandled
    })))
}

const decodeMembers = (value: TomlValue | undefined): Decoded<ReadonlyArray<string> | undefined> => {
  if (value === undefined) {
    return Either.right(value)
  }
  return isStringArray(value)
    ? Either.right(value)
    : Either.left("workspace.members must be an array of strings")
}

const decodeWorkspace = (value: TomlValue): Decoded<WorkspaceSection> => {
  if (!isTomlTable(value)) {
    return Either.left("workspace must be a table")
  }
  const { known, unhandled } = splitTable(value, workspaceKeys)
  return Either.flatMap(decodeOptional(known.package, decodeWorkspacePackage), (decodedPackage) =>
    Either.map(decodeMembers(known.members), (members) => ({
      package: decodedPackage,
      members,
      unhandled
    })))
}

const decodeBin = (value: TomlValue | undefined): Decoded<ReadonlyArray<BuildTarget>> => {
  if (value === undefined) {
    return Either.right([])
  }
  if (!Array.isArray(value)) {
    return Either.left("bin must be an array of tables")
  }
  const entries: ReadonlyArray<TomlValue> = value
  const result: Array<BuildTarget> = []
  for (const [index, entry] of entries.entries()) {
    const decoded = decodeBuildTarget(`bin[${index}]`, entry)
    if (Either.isLeft(decoded)) {
      return Either.left(decoded.left)
    }
    result.push(decoded.right)
  }
  return Either.right(result)
}

/**
 * Build the typed overlay for an already parsed manifest document.
 *
 * @param path - Location the document was read from; default save target.
 * @param raw - Parsed document, kept as the base of every write.
 *
 * @pure true
 * @invariant result.package !== undefined || result.workspace !== undefined
 * @complexity O(n)
 */
export const manifestOf = (
  path: string,
  raw: TomlTable
): Either.Either<CargoManifest, InvalidManifest> => {
  const decoded = Either.all({
    package: decodeOptional(raw["package"], decodePackage),
    workspace: decodeOptional(raw["workspace"], decodeWorkspace),
    dependencies: decodeOptional(raw["dependencies"], decodeDependencies),
    bin: decodeBin(raw["bin"])
  })
  if (Either.isLeft(decoded)) {
    return Either.left(invalidManifest(path, decoded.left))
  }
  const sections = decoded.right
  if (sections.package === undefined && sections.workspace === undefined) {
    return Either.left(invalidManifest(path, "manifest must declare a [package] or [workspace] table"))
  }
  return Either.right({ path, raw, ...sections })
}

/**
 * Parse manifest text and build its typed overlay.
 *
 * @pure true
 * @complexity O(n)
 */
export const parseManifestText = (
  path: string,
  text: string
): Either.Either<CargoManifest, ParseError | InvalidManifest> => {
  const parsed = Either.try({
    try: (): unknown => TOML.parse(text, { integersAsBigInt: true }),
    catch: (error) => parseError(path, error instanceof Error ? error.message : String(error))
  })
  if (Either.isLeft(parsed)) {
    return Either.left(parsed.left)
  }
  const document = parsed.right
  if (!isTomlTable(document)) {
    return Either.left(parseError(path, "document root must be a table"))
  }
  return manifestOf(path, document)
}

const encodePackage = (section: PackageSection): TomlTable =>
  mergeTable(
    {
      name: section.name,
      version: encodeFieldValue(section.version),
      edition: encodeFieldValue(section.edition)
    },
    section.unhandled
  )

const encodeWorkspacePackage = (section: WorkspacePackageSection): TomlTable =>
  mergeTable({ version: section.version, edition: section.edition }, section.unhandled)

const encodeWorkspace = (section: WorkspaceSection): TomlTable =>
  mergeTable(
    {
      package: section.package === undefined ? undefined : encodeWorkspacePackage(section.package),
      members: section.members === undefined || section.members.length === 0 ? undefined : section.members
    },
    section.unhandled
  )

/**
 * Merge the typed sections back into a copy of the raw document.
 *
 * This is the only path from a manifest to output.
 *
 * @pure true
 * @invariant raw keys without a typed section are copied unchanged
 * @complexity O(n)
 */
export const manifestToDocument = (manifest: CargoManifest): TomlTable => {
  const result: Record<string, TomlValue> = { ...manifest.raw }
  if (manifest.bin.length > 0) {
    result["bin"] = manifest.bin.map(encodeBuildTarget)
  } else {
    delete result["bin"]
  }
  if (manifest.package !== undefined) {
    result["package"] = encodePackage(manifest.package)
  }
  if (manifest.workspace !== undefined) {
    result["workspace"] = encodeWorkspace(manifest.workspace)
  }
  if (manifest.dependencies !== undefined) {
    result["dependencies"] = encodeDependencies(manifest.dependencies)
  }
  return result
}

/**
 * Integers are read as bigint and every JS number is written back as a
 * float, so `1` and `1.0` keep their TOML types.
 *
 * @pure true
 * @complexity O(n)
 */
export const renderManifest = (manifest: CargoManifest): string =>
  TOML.stringify(manifestToDocument(manifest), { numbersAsFloat: true })

/**
 * Replace the version of the package, or of `[workspace.package]` for a
 * virtual manifest.
 *
 * @pure true
 * @complexity O(1)
 */
export const setManifestVersion = (
  manifest: CargoManifest,
  version: string
): Either.Either<CargoManifest, InvalidManifest> => {
  if (manifest.package !== undefined) {
    return Either.right({ ...manifest, package: { ...manifest.package, version } })
  }
  const workspacePackage = manifest.workspace?.package
  if (manifest.workspace !== undefined && workspacePackage !== undefined) {
    return Either.right({
      ...manifest,
      workspace: { ...manifest.workspace, package: { ...workspacePackage, version } }
    })
  }
  return Either.left(
    invalidManifest(manifest.path, "manifest has neither [package] nor [workspace.package] to version")
  )
}

export const manifestVersion = (manifest: CargoManifest): FieldValue | undefined =>
  manifest.package === undefined ? manifest.workspace?.package?.version : manifest.package.version
