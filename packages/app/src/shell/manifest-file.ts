import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"

import type { AppError } from "../core/errors.js"
import { ioError } from "../core/errors.js"
import type { CargoManifest } from "../core/manifest.js"
import { parseManifestText, renderManifest } from "../core/manifest.js"

// CHANGE: Cargo.toml read/write helpers over the Effect file system
// WHY: isolate filesystem IO from the pure manifest overlay
// REF: req-manifest-io-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p: read(p) = Right(m) → m.package ≠ ∅ ∨ m.workspace ≠ ∅
// PURITY: SHELL
// EFFECT: Effect<CargoManifest, AppError, FileSystem>
// INVARIANT: a save writes the whole rendered document at once
// COMPLEXITY: O(n)

export const readManifest = (
  path: string
): Effect.Effect<CargoManifest, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const raw = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => ioError(path, String(error))))
    )
    const parsed = parseManifestText(path, raw)
    if (Either.isLeft(parsed)) {
      return yield* _(Effect.fail(parsed.left))
    }
    yield* _(Effect.logDebug("manifest read"))
    return parsed.right
  }).pipe(Effect.annotateLogs("manifest", path))

/**
 * Write the manifest to `path`, or back where it was read from.
 *
 * @pure false
 * @effect FileSystem
 * @complexity O(n)
 */
export const saveManifest = (
  manifest: CargoManifest,
  path?: string
): Effect.Effect<void, AppError, FileSystemService> => {
  const target = path ?? manifest.path
  return Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const payload = renderManifest(manifest)
    yield* _(
      fs.writeFileString(target, payload).pipe(Effect.mapError((error) => ioError(target, String(error))))
    )
    yield* _(Effect.logDebug("manifest saved"))
  }).pipe(Effect.annotateLogs("manifest", target))
}
