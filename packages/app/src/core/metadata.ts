import * as Schema from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Either from "effect/Either"

import type { ParseError } from "./errors.js"
import { parseError } from "./errors.js"
import type { JsonObject } from "./json.js"
import { isJsonObject, JsonParseSchema } from "./json.js"

// CHANGE: derive workspace members and build artifacts from cargo metadata
// WHY: callers need the local build outputs without the dependency graph
// REF: req-metadata-1
// SOURCE: n/a
// FORMAT THEOREM: ∀a ∈ artifacts: package(a).id ∈ workspace_members
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: order follows packages, then targets; nothing is deduplicated
// COMPLEXITY: O(p * t) where p = packages, t = targets per package

export type ArtifactKind = "binary" | "library"

export interface Artifact {
  readonly name: string
  readonly path: string
  readonly kind: ArtifactKind
}

export interface WorkspaceMember {
  readonly id: string
  readonly name: string
  readonly version: string
  readonly edition: string
  readonly manifestPath: string
}

export interface CargoMetadata {
  readonly projectDir: string
  readonly raw: JsonObject
  readonly workspaceMembers: ReadonlyArray<WorkspaceMember>
  readonly artifacts: ReadonlyArray<Artifact>
}

const TargetSchema = Schema.Struct({
  name: Schema.String,
  src_path: Schema.String,
  kind: Schema.Array(Schema.String)
})

const PackageSchema = Schema.Struct({
  id: Schema.String,
  name: Schema.String,
  version: Schema.String,
  edition: Schema.String,
  manifest_path: Schema.String,
  targets: Schema.Array(TargetSchema)
})

const MetadataSchema = Schema.Struct({
  packages: Schema.Array(PackageSchema),
  workspace_members: Schema.Array(Schema.String)
})

type MetadataTarget = Schema.Schema.Type<typeof TargetSchema>

// Checked in this order; the first tag found in a target's kind list wins.
const targetClassification: ReadonlyArray<{ readonly tag: string; readonly kind: ArtifactKind }> = [
  { tag: "bin", kind: "binary" },
  { tag: "lib", kind: "library" }
]

/**
 * Classify a target by its kind tags.
 *
 * @returns The artifact kind, or undefined for tags that produce no tracked artifact.
 *
 * @pure true
 * @complexity O(k)
 */
export const classifyTarget = (kinds: ReadonlyArray<string>): ArtifactKind | undefined => {
  const match = targetClassification.find((entry) => kinds.includes(entry.tag))
  if (match === undefined) {
    return undefined
  }
  return match.kind
}

const toArtifact = (target: MetadataTarget): Artifact | undefined => {
  const kind = classifyTarget(target.kind)
  return kind === undefined ? undefined : { name: target.name, path: target.src_path, kind }
}

/**
 * Extract workspace members and their artifacts from a metadata document.
 *
 * @param projectDir - Project the metadata was generated for.
 * @param raw - Parsed `cargo metadata --format-version=1` output.
 *
 * @pure true
 * @invariant packages outside workspace_members contribute nothing
 * @complexity O(p * t)
 */
export const metadataOf = (
  projectDir: string,
  raw: JsonObject
): Either.Either<CargoMetadata, ParseError> => {
  const decoded = Schema.decodeUnknownEither(MetadataSchema)(raw)
  if (Either.isLeft(decoded)) {
    return Either.left(parseError(projectDir, TreeFormatter.formatErrorSync(decoded.left)))
  }
  const memberIds = new Set(decoded.right.workspace_members)
  const workspaceMembers: Array<WorkspaceMember> = []
  const artifacts: Array<Artifact> = []
  for (const pkg of decoded.right.packages) {
    if (!memberIds.has(pkg.id)) {
      continue
    }
    workspaceMembers.push({
      id: pkg.id,
      name: pkg.name,
      version: pkg.version,
      edition: pkg.edition,
      manifestPath: pkg.manifest_path
    })
    for (const target of pkg.targets) {
      const artifact = toArtifact(target)
      if (artifact !== undefined) {
        artifacts.push(artifact)
      }
    }
  }
  return Either.right({ projectDir, raw, workspaceMembers, artifacts })
}

export const parseMetadataText = (
  projectDir: string,
  text: string
): Either.Either<CargoMetadata, ParseError> => {
  const parsed = Schema.decodeUnknownEither(JsonParseSchema)(text)
  if (Either.isLeft(parsed)) {
    return Either.left(parseError(projectDir, TreeFormatter.formatErrorSync(parsed.left)))
  }
  if (!isJsonObject(parsed.right)) {
    return Either.left(parseError(projectDir, "metadata must be a JSON object"))
  }
  return metadataOf(projectDir, parsed.right)
}
