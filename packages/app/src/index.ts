export type { CliArgs, CliCommand, CliError } from "./core/cli.js"
export type {
  AppError,
  ConfigError,
  ExternalToolError,
  InvalidManifest,
  IoError,
  ParseError
} from "./core/errors.js"
export type { BuildTarget, DependenciesSection, FieldValue, Unhandled, WorkspaceInherited } from "./core/fields.js"
export { inheritFromWorkspace, isWorkspaceInherited, mergeTable, splitTable } from "./core/fields.js"
export type { Json, JsonObject } from "./core/json.js"
export type { CargoManifest, PackageSection, WorkspacePackageSection, WorkspaceSection } from "./core/manifest.js"
export {
  manifestOf,
  manifestToDocument,
  manifestVersion,
  parseManifestText,
  renderManifest,
  setManifestVersion
} from "./core/manifest.js"
export type { Artifact, ArtifactKind, CargoMetadata, WorkspaceMember } from "./core/metadata.js"
export { classifyTarget, metadataOf, parseMetadataText } from "./core/metadata.js"
export { formatAppError } from "./core/report.js"
export type { TomlTable, TomlValue } from "./core/toml.js"
export { readManifest, saveManifest } from "./shell/manifest-file.js"
export type { MetadataSourceService } from "./shell/metadata.js"
export { MetadataSource, MetadataSourceLive, readCargoMetadata } from "./shell/metadata.js"
