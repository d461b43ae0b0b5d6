import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { parseToolCommand } from "../../src/shell/command.js"

describe("parseToolCommand", () => {
  it.effect("splits the program from its leading arguments", () =>
    Effect.sync(() => {
      expect(parseToolCommand("cargo +nightly")).toEqual(Either.right({ program: "cargo", leading: ["+nightly"] }))
      expect(parseToolCommand("  cargo   ")).toEqual(Either.right({ program: "cargo", leading: [] }))
    }))

  it.effect("keeps quoted words together", () =>
    Effect.sync(() => {
      expect(parseToolCommand("node -e \"process.exit(3)\" --")).toEqual(
        Either.right({ program: "node", leading: ["-e", "process.exit(3)", "--"] })
      )
      expect(parseToolCommand("run 'a b' c\\ d ''")).toEqual(
        Either.right({ program: "run", leading: ["a b", "c d", ""] })
      )
    }))

  it.effect("fails with an ExternalToolError on an unterminated quote", () =>
    Effect.sync(() => {
      expect(parseToolCommand("cargo 'oops")).toEqual(
        Either.left({
          _tag: "ExternalToolError",
          command: "cargo 'oops",
          message: "Unterminated quote in command: cargo 'oops",
          exitCode: undefined
        })
      )
    }))

  it.effect("fails when no program is named", () =>
    Effect.sync(() => {
      expect(parseToolCommand("   ")).toEqual(
        Either.left({ _tag: "ExternalToolError", command: "   ", message: "empty command", exitCode: undefined })
      )
    }))
})
