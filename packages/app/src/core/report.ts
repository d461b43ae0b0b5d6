import { Match } from "effect"

import type { AppError } from "./errors.js"
import type { FieldValue } from "./fields.js"
import { isWorkspaceInherited } from "./fields.js"
import type { CargoManifest } from "./manifest.js"
import type { CargoMetadata } from "./metadata.js"

// CHANGE: render manifest and metadata views for stdout
// WHY: keep output formatting pure and deterministic
// REF: req-report-1
// SOURCE: n/a
// FORMAT THEOREM: ∀m: render(m) is a pure function of m
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: JSON output is stable (fixed key order)
// COMPLEXITY: O(n)

export interface ManifestSummary {
  readonly path: string
  readonly package: {
    readonly name: string
    readonly version: string | null
    readonly edition: string | null
  } | null
  readonly workspace: {
    readonly version: string | null
    readonly members: ReadonlyArray<string>
  } | null
  readonly dependencies: ReadonlyArray<string>
  readonly bin: ReadonlyArray<{ readonly name: string; readonly path: string | null }>
}

const formatField = (value: FieldValue | undefined): string | null => {
  if (value === undefined) {
    return null
  }
  return isWorkspaceInherited(value) ? "workspace" : value
}

export const summarizeManifest = (manifest: CargoManifest): ManifestSummary => ({
  path: manifest.path,
  package: manifest.package === undefined ? null : {
    name: manifest.package.name,
    version: formatField(manifest.package.version),
    edition: formatField(manifest.package.edition)
  },
  workspace: manifest.workspace === undefined ? null : {
    version: manifest.workspace.package?.version ?? null,
    members: manifest.workspace.members ?? []
  },
  dependencies: Object.keys(manifest.dependencies?.data ?? {}),
  bin: manifest.bin.map((target) => ({ name: target.name, path: target.path ?? null }))
})

const formatList = (title: string, values: ReadonlyArray<string>): ReadonlyArray<string> => {
  if (values.length === 0) {
    return [`${title}: (none)`]
  }
  return [title + ":", ...values.map((value) => `  - ${value}`)]
}

/**
 * Render the typed view of a manifest for humans.
 *
 * @pure true
 * @complexity O(n)
 */
export const renderManifestSummary = (summary: ManifestSummary): string => {
  const lines: Array<string> = [`manifest: ${summary.path}`]
  if (summary.package !== null) {
    const { edition, name, version } = summary.package
    lines.push(`package: ${name} ${version ?? "(no version)"}${edition === null ? "" : ` (edition ${edition})`}`)
  }
  if (summary.workspace !== null) {
    if (summary.workspace.version !== null) {
      lines.push(`workspace version: ${summary.workspace.version}`)
    }
    lines.push(...formatList("workspace members", summary.workspace.members))
  }
  lines.push(...formatList("dependencies", summary.dependencies))
  lines.push(
    ...formatList(
      "bin",
      summary.bin.map((target) => target.path === null ? target.name : `${target.name} (${target.path})`)
    )
  )
  return lines.join("\n")
}

export const renderMetadata = (metadata: CargoMetadata): string =>
  [
    ...formatList(
      "workspace members",
      metadata.workspaceMembers.map((member) => `${member.name} ${member.version} (edition ${member.edition})`)
    ),
    ...formatList(
      "artifacts",
      metadata.artifacts.map((artifact) => `[${artifact.kind}] ${artifact.name} ${artifact.path}`)
    )
  ].join("\n")

export const renderMetadataJson = (metadata: CargoMetadata): string =>
  JSON.stringify(
    {
      projectDir: metadata.projectDir,
      workspaceMembers: metadata.workspaceMembers,
      artifacts: metadata.artifacts
    },
    null,
    2
  )

export const renderJson = (value: ManifestSummary): string => JSON.stringify(value, null, 2)

/**
 * One-line description of an application error.
 *
 * @pure true
 * @complexity O(1)
 */
export const formatAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (value) => `error: ${value.message}`),
    Match.tag("ConfigError", (value) => `config error: ${value.message}`),
    Match.tag("ParseError", (value) => `parse error in ${value.file}: ${value.error}`),
    Match.tag("InvalidManifest", (value) => `invalid manifest ${value.file}: ${value.message}`),
    Match.tag("IOError", (value) => `I/O error on ${value.path}: ${value.message}`),
    Match.tag(
      "ExternalToolError",
      (value) =>
        value.exitCode === undefined
          ? `${value.command} failed: ${value.message}`
          : `${value.command} exited with code ${value.exitCode}: ${value.message}`
    ),
    Match.exhaustive
  )
