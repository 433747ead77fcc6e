import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { decodeConfig } from "../../src/shell/config-file.js"
import { decodeModel } from "../../src/shell/model-file.js"

describe("decodeConfig", () => {
  it.effect("maps snake_case keys onto the raw config", () =>
    Effect.gen(function*(_) {
      const config = yield* _(decodeConfig(JSON.stringify({
        profile: "compat",
        fail_on: "warning",
        max_findings: 25,
        checks: {
          "deps.path_requires_version": { ignore_publish_false: true, allow: ["local-*"] }
        },
        unrelated: "ignored"
      })))
      expect(config).toEqual({
        profile: "compat",
        failOn: "warning",
        maxFindings: 25,
        checks: {
          "deps.path_requires_version": { ignorePublishFalse: true, allow: ["local-*"] }
        }
      })
    }))

  it.effect("rejects negative or fractional max_findings", () =>
    Effect.gen(function*(_) {
      const negative = yield* _(Effect.either(decodeConfig(`{"max_findings": -1}`)))
      const fractional = yield* _(Effect.either(decodeConfig(`{"max_findings": 1.5}`)))
      expect(Either.isLeft(negative)).toBe(true)
      expect(Either.isLeft(fractional)).toBe(true)
    }))

  it.effect("reports invalid JSON as a config error", () =>
    Effect.gen(function*(_) {
      const result = yield* _(Effect.either(decodeConfig("{not json")))
      expect(Either.isLeft(result) && result.left._tag).toBe("ConfigError")
    }))
})

describe("decodeModel", () => {
  it.effect("canonicalizes paths and fills defaults", () =>
    Effect.gen(function*(_) {
      const model = yield* _(decodeModel(JSON.stringify({
        workspace_dependencies: { serde: { version: "1.0" } },
        manifests: [
          {
            path: "./crates\\a\\Cargo.toml",
            package: { name: "a" },
            features: { json: ["dep:serde_json"] },
            dependencies: [
              {
                kind: "dev",
                name: "serde_json",
                spec: { version: "1", optional: true, default_features: false },
                location: { path: "crates/a/Cargo.toml", line: 12 },
                target: "cfg(unix)"
              }
            ]
          }
        ]
      })))
      expect(model).toEqual({
        root: ".",
        workspaceDependencies: { serde: { name: "serde", version: "1.0", workspace: false } },
        manifests: [
          {
            path: "crates/a/Cargo.toml",
            package: { name: "a", publish: true },
            features: { json: ["dep:serde_json"] },
            dependencies: [
              {
                kind: "dev",
                name: "serde_json",
                spec: { version: "1", workspace: false, defaultFeatures: false, optional: true },
                location: { path: "crates/a/Cargo.toml", line: 12 },
                target: "cfg(unix)"
              }
            ]
          }
        ]
      })
    }))

  it.effect("rejects unknown dependency kinds", () =>
    Effect.gen(function*(_) {
      const result = yield* _(Effect.either(decodeModel(JSON.stringify({
        manifests: [{ path: "Cargo.toml", dependencies: [{ kind: "peer", name: "x", spec: {} }] }]
      }))))
      expect(Either.isLeft(result) && result.left._tag).toBe("ModelError")
    }))
})
