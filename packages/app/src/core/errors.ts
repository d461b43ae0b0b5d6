import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for manifest and metadata handling
// WHY: every failure reaches the caller as one typed value
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type ParseError = { readonly _tag: "ParseError"; readonly file: string; readonly error: string }
export type InvalidManifest = {
  readonly _tag: "InvalidManifest"
  readonly file: string
  readonly message: string
}
export type IoError = { readonly _tag: "IOError"; readonly path: string; readonly message: string }
export type ExternalToolError = {
  readonly _tag: "ExternalToolError"
  readonly command: string
  readonly message: string
  readonly exitCode: number | undefined
}

export type AppError =
  | CliError
  | ConfigError
  | ParseError
  | InvalidManifest
  | IoError
  | ExternalToolError

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const parseError = (file: string, error: string): ParseError => ({
  _tag: "ParseError",
  file,
  error
})

export const invalidManifest = (file: string, message: string): InvalidManifest => ({
  _tag: "InvalidManifest",
  file,
  message
})

export const ioError = (path: string, message: string): IoError => ({
  _tag: "IOError",
  path,
  message
})

export const externalToolError = (
  command: string,
  message: string,
  exitCode?: number
): ExternalToolError => ({
  _tag: "ExternalToolError",
  command,
  message,
  exitCode
})
