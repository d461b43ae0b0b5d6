import * as CommandExecutor from "@effect/platform/CommandExecutor"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Layer from "effect/Layer"

import type { AppError, ExternalToolError } from "../core/errors.js"
import { externalToolError } from "../core/errors.js"
import type { CargoMetadata } from "../core/metadata.js"
import { parseMetadataText } from "../core/metadata.js"
import type { CapturedOutput } from "./command.js"
import { captureCommand } from "./command.js"

// CHANGE: bridge between the metadata extractor and the external cargo tool
// WHY: metadata JSON comes from a subprocess the core does not control
// REF: req-metadata-bridge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p: read(p) = Right(s) → s is non-empty stdout of an exit-0 run
// PURITY: SHELL
// EFFECT: Effect<string, ExternalToolError, never>
// INVARIANT: no retry and no timeout at this layer
// COMPLEXITY: O(n)

export const manifestFileName = "Cargo.toml"

export interface MetadataSourceService {
  readonly read: (manifestPath: string, cargo: string) => Effect.Effect<string, ExternalToolError>
}

export class MetadataSource extends Context.Tag("cargo-manifest/MetadataSource")<
  MetadataSource,
  MetadataSourceService
>() {}

export const metadataArgs = (manifestPath: string): ReadonlyArray<string> => [
  "metadata",
  "--no-deps",
  "--format-version=1",
  "--manifest-path",
  manifestPath
]

const checkOutput = (cargo: string, output: CapturedOutput): Either.Either<string, ExternalToolError> => {
  if (output.exitCode !== 0) {
    const stderr = output.stderr.trim()
    return Either.left(
      externalToolError(cargo, stderr.length > 0 ? stderr : "metadata command failed", output.exitCode)
    )
  }
  if (output.stdout.trim().length === 0) {
    return Either.left(externalToolError(cargo, "metadata command produced no output", output.exitCode))
  }
  return Either.right(output.stdout)
}

export const MetadataSourceLive: Layer.Layer<MetadataSource, never, CommandExecutor.CommandExecutor> = Layer
  .effect(
    MetadataSource,
    Effect.map(CommandExecutor.CommandExecutor, (executor) => ({
      read: (manifestPath: string, cargo: string) =>
        captureCommand(cargo, metadataArgs(manifestPath)).pipe(
          Effect.flatMap((output) => checkOutput(cargo, output)),
          Effect.tap(() => Effect.logDebug("metadata generated")),
          Effect.annotateLogs("manifest", manifestPath),
          Effect.provideService(CommandExecutor.CommandExecutor, executor)
        )
    }))
  )

/**
 * Generate metadata for the project in `projectDir` and extract members and artifacts.
 *
 * @pure false
 * @effect MetadataSource, Path
 * @complexity O(n)
 */
export const readCargoMetadata = (
  projectDir: string,
  cargo: string
): Effect.Effect<CargoMetadata, AppError, MetadataSource | PathService> =>
  Effect.gen(function*(_) {
    const path = yield* _(Path)
    const source = yield* _(MetadataSource)
    const text = yield* _(source.read(path.join(projectDir, manifestFileName), cargo))
    const parsed = parseMetadataText(projectDir, text)
    if (Either.isLeft(parsed)) {
      return yield* _(Effect.fail(parsed.left))
    }
    return parsed.right
  })
