import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { configError, externalToolError, invalidManifest, ioError, parseError } from "../../src/core/errors.js"
import { parseManifestText } from "../../src/core/manifest.js"
import { metadataOf } from "../../src/core/metadata.js"
import { formatAppError, renderManifestSummary, renderMetadata, summarizeManifest } from "../../src/core/report.js"

describe("renderManifestSummary", () => {
  it.effect("lists the typed view of a workspace root", () =>
    Effect.sync(() => {
      const parsed = parseManifestText(
        "Cargo.toml",
        "[package]\nname = \"root\"\nversion.workspace = true\n\n[workspace]\nmembers = [\"crates/a\"]\n\n[workspace.package]\nversion = \"2.0.0\"\n\n[[bin]]\nname = \"tool\"\n"
      )
      expect(Either.isRight(parsed)).toBe(true)
      if (Either.isRight(parsed)) {
        expect(renderManifestSummary(summarizeManifest(parsed.right))).toBe(
          [
            "manifest: Cargo.toml",
            "package: root workspace",
            "workspace version: 2.0.0",
            "workspace members:",
            "  - crates/a",
            "dependencies: (none)",
            "bin:",
            "  - tool"
          ].join("\n")
        )
      }
    }))
})

describe("renderMetadata", () => {
  it.effect("prints members and artifacts", () =>
    Effect.sync(() => {
      const metadata = metadataOf("/work/demo", {
        packages: [
          {
            id: "demo",
            name: "demo",
            version: "0.1.0",
            edition: "2021",
            manifest_path: "/work/demo/Cargo.toml",
            targets: [{ name: "demo", src_path: "/work/demo/src/main.rs", kind: ["bin"] }]
          }
        ],
        workspace_members: ["demo"]
      })
      expect(Either.map(metadata, renderMetadata)).toEqual(
        Either.right(
          [
            "workspace members:",
            "  - demo 0.1.0 (edition 2021)",
            "artifacts:",
            "  - [binary] demo /work/demo/src/main.rs"
          ].join("\n")
        )
      )
    }))
})

describe("formatAppError", () => {
  it.effect("renders one line per error kind", () =>
    Effect.sync(() => {
      expect(formatAppError({ _tag: "CliError", message: "Unknown command: x" })).toBe("error: Unknown command: x")
      expect(formatAppError(configError("bad"))).toBe("config error: bad")
      expect(formatAppError(parseError("Cargo.toml", "unexpected end"))).toBe(
        "parse error in Cargo.toml: unexpected end"
      )
      expect(formatAppError(invalidManifest("Cargo.toml", "no package"))).toBe(
        "invalid manifest Cargo.toml: no package"
      )
      expect(formatAppError(ioError("/missing/Cargo.toml", "not found"))).toBe(
        "I/O error on /missing/Cargo.toml: not found"
      )
      expect(formatAppError(externalToolError("cargo", "boom", 101))).toBe("cargo exited with code 101: boom")
      expect(formatAppError(externalToolError("cargo", "spawn failed"))).toBe("cargo failed: spawn failed")
    }))
})
