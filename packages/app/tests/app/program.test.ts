import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { runCli } from "../../src/app/program.js"
import { parseManifestText } from "../../src/core/manifest.js"
import { fakeMetadataSource, provideNodeContext, sampleManifest, withTempDir } from "./test-helpers.js"

const metadataText = JSON.stringify({
  packages: [
    {
      id: "demo",
      name: "demo",
      version: "0.1.0",
      edition: "2021",
      manifest_path: "/work/demo/Cargo.toml",
      targets: [{ name: "demo-cli", src_path: "/work/demo/src/bin/cli.rs", kind: ["bin"] }]
    }
  ],
  workspace_members: ["demo"]
})

describe("runCli", () => {
  it.effect("shows the typed view of a manifest", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const manifestPath = path.join(tempDir, "Cargo.toml")
        yield* _(fs.writeFileString(manifestPath, sampleManifest))
        const result = yield* _(runCli(["node", "cli", "show", "--project", tempDir, "--silent"]))
        expect(result.exitCode).toBe(0)
        expect(result.output).toBe(
          [
            `manifest: ${manifestPath}`,
            "package: demo 0.1.0 (edition 2021)",
            "dependencies:",
            "  - anyhow",
            "  - serde",
            "bin:",
            "  - demo-cli (src/bin/cli.rs)"
          ].join("\n")
        )
      })
    ).pipe(Effect.provide(fakeMetadataSource(undefined)), provideNodeContext))

  it.effect("bumps the version in place", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const manifestPath = path.join(tempDir, "Cargo.toml")
        yield* _(fs.writeFileString(manifestPath, sampleManifest))
        const result = yield* _(
          runCli(["node", "cli", "set-version", "--to", "0.2.0", "--project", tempDir, "--silent"])
        )
        expect(result.output.split("\n")[1]).toBe("package: demo 0.2.0 (edition 2021)")
        const written = parseManifestText(manifestPath, yield* _(fs.readFileString(manifestPath)))
        expect(Either.map(written, (manifest) => manifest.raw)).toEqual(
          Either.right({
            package: { name: "demo", version: "0.2.0", edition: "2021" },
            dependencies: { anyhow: "1", serde: "1.0" },
            bin: [{ name: "demo-cli", path: "src/bin/cli.rs" }]
          })
        )
      })
    ).pipe(Effect.provide(fakeMetadataSource(undefined)), provideNodeContext))

  it.effect("reads JSON output from the config file", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        yield* _(fs.writeFileString(path.join(tempDir, "Cargo.toml"), sampleManifest))
        const configPath = path.join(tempDir, "cargo-manifest.json")
        yield* _(fs.writeFileString(configPath, "{\"json\": true}"))
        const result = yield* _(
          runCli(["node", "cli", "show", "--project", tempDir, "--config", configPath, "--silent"])
        )
        const parsed: unknown = JSON.parse(result.output)
        expect(parsed).toMatchObject({
          package: { name: "demo", version: "0.1.0", edition: "2021" },
          workspace: null,
          dependencies: ["anyhow", "serde"],
          bin: [{ name: "demo-cli", path: "src/bin/cli.rs" }]
        })
      })
    ).pipe(Effect.provide(fakeMetadataSource(undefined)), provideNodeContext))

  it.effect("lists artifacts through the metadata source", () =>
    Effect.gen(function*(_) {
      const result = yield* _(
        runCli(["node", "cli", "metadata", "--project", "/work/demo", "--cargo", "cargo +stable", "--silent"])
      )
      expect(result.output).toBe(
        [
          "workspace members:",
          "  - demo 0.1.0 (edition 2021)",
          "artifacts:",
          "  - [binary] demo-cli /work/demo/src/bin/cli.rs"
        ].join("\n")
      )
    }).pipe(Effect.provide(fakeMetadataSource(metadataText)), provideNodeContext))

  it.effect("fails with an IOError when the project has no manifest", () =>
    withTempDir(({ tempDir }) =>
      Effect.gen(function*(_) {
        const error = yield* _(Effect.flip(runCli(["node", "cli", "show", "--project", tempDir, "--silent"])))
        expect(error._tag).toBe("IOError")
      })
    ).pipe(Effect.provide(fakeMetadataSource(undefined)), provideNodeContext))

  it.effect("fails with a ConfigError when an explicit config is missing", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const configPath = path.join(tempDir, "missing.json")
        const error = yield* _(
          Effect.flip(runCli(["node", "cli", "show", "--project", tempDir, "--config", configPath]))
        )
        expect(error).toEqual({ _tag: "ConfigError", message: `Config file not found: ${configPath}` })
      })
    ).pipe(Effect.provide(fakeMetadataSource(undefined)), provideNodeContext))
})
