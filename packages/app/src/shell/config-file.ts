import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"

import type { FileConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError, ioError } from "../core/errors.js"

// CHANGE: decode .cargo-manifest.json with schema validation
// WHY: keep boundary data typed and reject invalid config early
// REF: req-config-file-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: a missing implicit config yields undefined; a missing explicit one is a ConfigError
// COMPLEXITY: O(n)

const RawConfigSchema = S.partial(
  S.Struct({
    cargo: S.String,
    json: S.Boolean
  })
)

const ConfigSchema = S.parseJson(RawConfigSchema)

export const decodeConfig = (raw: string): Effect.Effect<FileConfig, AppError> =>
  pipe(
    S.decodeUnknown(ConfigSchema)(raw),
    Effect.map((config) => ({
      ...(config.cargo === undefined ? {} : { cargo: config.cargo }),
      ...(config.json === undefined ? {} : { json: config.json })
    })),
    Effect.mapError((error) => configError(TreeFormatter.formatErrorSync(error)))
  )

/** Where to look for the config file, and whether the user named it. */
export interface ConfigLocation {
  readonly path: string
  readonly explicit: boolean
}

const missingConfig = (location: ConfigLocation): Effect.Effect<undefined, AppError> =>
  location.explicit
    ? Effect.fail(configError(`Config file not found: ${location.path}`))
    : Effect.succeed(undefined)

const readConfigText = (
  location: ConfigLocation
): Effect.Effect<string | undefined, AppError, FileSystemService> =>
  Effect.flatMap(FileSystem, (fs) => fs.readFileString(location.path)).pipe(
    Effect.catchAll((error): Effect.Effect<undefined, AppError> =>
      error._tag === "SystemError" && error.reason === "NotFound"
        ? missingConfig(location)
        : Effect.fail(ioError(location.path, String(error)))
    )
  )

export const loadConfigFile = (
  location: ConfigLocation
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  readConfigText(location).pipe(
    Effect.tap((text) => Effect.logDebug(text === undefined ? "no config file" : "config file read")),
    Effect.flatMap((text): Effect.Effect<FileConfig | undefined, AppError> =>
      text === undefined ? Effect.succeed(undefined) : decodeConfig(text)
    ),
    Effect.annotateLogs("config", location.path)
  )
