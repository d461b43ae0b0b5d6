import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import { Effect, Logger, LogLevel, Match } from "effect"
import type * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { defaultConfigPath, resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { setManifestVersion } from "../core/manifest.js"
import {
  renderJson,
  renderManifestSummary,
  renderMetadata,
  renderMetadataJson,
  summarizeManifest
} from "../core/report.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readManifest, saveManifest } from "../shell/manifest-file.js"
import type { MetadataSource } from "../shell/metadata.js"
import { manifestFileName, readCargoMetadata } from "../shell/metadata.js"

// CHANGE: orchestrate CLI commands with functional core + imperative shell
// WHY: single entrypoint with typed errors and deterministic outputs
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀cmd: run(cmd) returns exitCode = 0 or fails with AppError
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, Services>
// INVARIANT: output emitted at most once
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly output: string
  readonly exitCode: number
}

type ProgramEnv = FileSystemService | PathService | MetadataSource

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const emit = (cli: CliArgs, output: string): Effect.Effect<ProgramResult> =>
  Effect.gen(function*(_) {
    if (!cli.silent) {
      yield* _(writeStdout(output))
    }
    return { output, exitCode: 0 }
  })

const resolveManifestPath = (cli: CliArgs): Effect.Effect<string, never, PathService> =>
  Effect.map(Path, (path) => path.join(cli.projectDir, manifestFileName))

const handleShow = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService | PathService> =>
  Effect.gen(function*(_) {
    const manifestPath = yield* _(resolveManifestPath(cli))
    const manifest = yield* _(readManifest(manifestPath))
    const summary = summarizeManifest(manifest)
    return yield* _(emit(cli, config.json ? renderJson(summary) : renderManifestSummary(summary)))
  })

const handleSetVersion = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService | PathService> =>
  Effect.gen(function*(_) {
    const manifestPath = yield* _(resolveManifestPath(cli))
    const manifest = yield* _(readManifest(manifestPath))
    const next = yield* _(fromEither(setManifestVersion(manifest, cli.version ?? "")))
    yield* _(saveManifest(next, cli.outputPath))
    const summary = summarizeManifest({ ...next, path: cli.outputPath ?? next.path })
    return yield* _(emit(cli, config.json ? renderJson(summary) : renderManifestSummary(summary)))
  })

const handleMetadata = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, MetadataSource | PathService> =>
  Effect.gen(function*(_) {
    const metadata = yield* _(readCargoMetadata(cli.projectDir, config.cargo))
    return yield* _(emit(cli, config.json ? renderMetadataJson(metadata) : renderMetadata(metadata)))
  })

const executeCommand = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Match.value(cli.command).pipe(
    Match.when("show", () => handleShow(cli, config)),
    Match.when("set-version", () => handleSetVersion(cli, config)),
    Match.when("metadata", () => handleMetadata(cli, config)),
    Match.exhaustive
  )

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with rendered output and exit code.
 *
 * @pure false
 * @effect FileSystem, Path, MetadataSource
 * @invariant output is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const program = Effect.gen(function*(_) {
      const fileConfig = yield* _(
        loadConfigFile({ path: cli.configPath ?? defaultConfigPath, explicit: cli.configPathExplicit })
      )
      const config = resolveConfig(cli, fileConfig)
      yield* _(Effect.logDebug(`running ${cli.command}`))
      return yield* _(executeCommand(cli, config))
    })
    return yield* _(
      program.pipe(Logger.withMinimumLogLevel(cli.verbose ? LogLevel.Debug : LogLevel.Info))
    )
  })
