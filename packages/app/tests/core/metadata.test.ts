import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import type { JsonObject } from "../../src/core/json.js"
import { classifyTarget, metadataOf, parseMetadataText } from "../../src/core/metadata.js"

const demoId = "path+file:///work/demo#0.1.0"
const helperId = "registry+https://example.invalid/index#helper@0.3.0"

const metadataJson: JsonObject = {
  packages: [
    {
      id: demoId,
      name: "demo",
      version: "0.1.0",
      edition: "2021",
      manifest_path: "/work/demo/Cargo.toml",
      dependencies: [],
      targets: [
        { name: "demo", src_path: "/work/demo/src/main.rs", kind: ["bin"], crate_types: ["bin"] },
        { name: "demo", src_path: "/work/demo/src/lib.rs", kind: ["lib"], crate_types: ["lib"] },
        { name: "sample", src_path: "/work/demo/examples/sample.rs", kind: ["example"], crate_types: ["bin"] }
      ]
    },
    {
      id: helperId,
      name: "helper",
      version: "0.3.0",
      edition: "2018",
      manifest_path: "/registry/helper-0.3.0/Cargo.toml",
      dependencies: [],
      targets: [
        { name: "helper", src_path: "/registry/helper-0.3.0/src/lib.rs", kind: ["lib"], crate_types: ["lib"] }
      ]
    }
  ],
  workspace_members: [demoId, "path+file:///work/ghost#1.0.0"],
  resolve: null,
  version: 1
}

describe("classifyTarget", () => {
  it.effect("maps bin and lib tags and skips the rest", () =>
    Effect.sync(() => {
      expect(classifyTarget(["bin"])).toBe("binary")
      expect(classifyTarget(["lib"])).toBe("library")
      expect(classifyTarget(["lib", "bin"])).toBe("binary")
      expect(classifyTarget(["example"])).toBeUndefined()
      expect(classifyTarget(["proc-macro"])).toBeUndefined()
      expect(classifyTarget([])).toBeUndefined()
    }))
})

describe("metadataOf", () => {
  it.effect("lists workspace members and their artifacts in declaration order", () =>
    Effect.sync(() => {
      const metadata = metadataOf("/work/demo", metadataJson)
      expect(Either.isRight(metadata)).toBe(true)
      if (Either.isRight(metadata)) {
        expect(metadata.right.projectDir).toBe("/work/demo")
        expect(metadata.right.workspaceMembers).toEqual([
          {
            id: demoId,
            name: "demo",
            version: "0.1.0",
            edition: "2021",
            manifestPath: "/work/demo/Cargo.toml"
          }
        ])
        expect(metadata.right.artifacts).toEqual([
          { name: "demo", path: "/work/demo/src/main.rs", kind: "binary" },
          { name: "demo", path: "/work/demo/src/lib.rs", kind: "library" }
        ])
        expect(metadata.right.raw).toBe(metadataJson)
      }
    }))

  it.effect("ignores packages outside workspace_members", () =>
    Effect.sync(() => {
      const metadata = metadataOf("/work/demo", { ...metadataJson, workspace_members: [] })
      expect(Either.map(metadata, (value) => [value.workspaceMembers, value.artifacts])).toEqual(
        Either.right([[], []])
      )
    }))

  it.effect("fails on a document without workspace_members", () =>
    Effect.sync(() => {
      const metadata = metadataOf("/work/demo", { packages: [] })
      expect(Either.isLeft(metadata)).toBe(true)
      if (Either.isLeft(metadata)) {
        expect(metadata.left._tag).toBe("ParseError")
        expect(metadata.left.file).toBe("/work/demo")
      }
    }))
})

describe("parseMetadataText", () => {
  it.effect("parses generated JSON", () =>
    Effect.sync(() => {
      const metadata = parseMetadataText("/work/demo", JSON.stringify(metadataJson))
      expect(Either.map(metadata, (value) => value.artifacts.map((artifact) => artifact.kind))).toEqual(
        Either.right(["binary", "library"])
      )
    }))

  it.effect("reports malformed JSON as a parse error", () =>
    Effect.sync(() => {
      const metadata = parseMetadataText("/work/demo", "{\"packages\": [")
      expect(Either.isLeft(metadata)).toBe(true)
      if (Either.isLeft(metadata)) {
        expect(metadata.left._tag).toBe("ParseError")
      }
    }))

  it.effect("rejects a non-object root", () =>
    Effect.sync(() => {
      expect(parseMetadataText("/work/demo", "[]")).toEqual(
        Either.left({ _tag: "ParseError", file: "/work/demo", error: "metadata must be a JSON object" })
      )
    }))
})
