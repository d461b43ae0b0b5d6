import type { CliArgs } from "./cli.js"

// CHANGE: define config merging rules and defaults
// WHY: CLI flags override the config file, which overrides defaults
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved cargo command is non-empty
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly cargo?: string
  readonly json?: boolean
}

export interface ResolvedConfig {
  readonly cargo: string
  readonly json: boolean
}

export const defaultCargoCommand = "cargo"

export const defaultConfigPath = "./.cargo-manifest.json"

const nonEmpty = (value: string | undefined): string | undefined =>
  value === undefined || value.trim().length === 0 ? undefined : value

/**
 * Merge CLI flags, config file and defaults.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (cli: CliArgs, fileConfig: FileConfig | undefined): ResolvedConfig => ({
  cargo: nonEmpty(cli.cargo) ?? nonEmpty(fileConfig?.cargo) ?? defaultCargoCommand,
  json: cli.json ?? fileConfig?.json ?? false
})
