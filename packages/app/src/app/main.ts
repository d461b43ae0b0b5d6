#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Layer } from "effect"

import { formatAppError } from "../core/report.js"
import { MetadataSourceLive } from "../shell/metadata.js"
import { runCli } from "./program.js"

// CHANGE: wire CLI program into Node runtime with proper teardown
// WHY: execute effects with platform services and typed error handling
// REF: req-main-1
// SOURCE: n/a
// FORMAT THEOREM: runMain(program) terminates with exitCode from ProgramResult or 1 on AppError
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: non-zero exit codes terminate the process
// COMPLEXITY: O(1)

const main = runCli(process.argv).pipe(
  Effect.flatMap((result) =>
    Effect.sync(() => {
      if (result.exitCode !== 0) {
        process.exitCode = result.exitCode
      }
    })
  ),
  Effect.catchAll((error) =>
    Effect.sync(() => {
      process.stderr.write(`${formatAppError(error)}\n`)
      process.exitCode = 1
    })
  )
)

const live = Layer.provideMerge(MetadataSourceLive, NodeContext.layer)

NodeRuntime.runMain(Effect.provide(main, live))
