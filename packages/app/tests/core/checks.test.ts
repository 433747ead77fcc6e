import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { defaultChecks } from "../../src/core/checks/index.js"
import { defaultFeaturesExplicit } from "../../src/core/checks/default-features-explicit.js"
import { devOnlyInNormal } from "../../src/core/checks/dev-only-in-normal.js"
import { gitRequiresVersion } from "../../src/core/checks/git-requires-version.js"
import { noMultipleVersions } from "../../src/core/checks/no-multiple-versions.js"
import { noWildcards } from "../../src/core/checks/no-wildcards.js"
import { optionalUnused, referencedName } from "../../src/core/checks/optional-unused.js"
import { pathRequiresVersion } from "../../src/core/checks/path-requires-version.js"
import { escapesRoot, isAbsolutePath, pathSafety } from "../../src/core/checks/path-safety.js"
import { workspaceInheritance } from "../../src/core/checks/workspace-inheritance.js"
import { fingerprint } from "../../src/core/fingerprint.js"
import { CheckIds, Codes, policyCheckIds } from "../../src/core/ids.js"
import { presetFor } from "../../src/core/presets.js"
import { declare, manifest, onlyCheck, publishable, workspace } from "./fixtures.js"

describe("check registry", () => {
  it.effect("registers every policy check once, in order", () =>
    Effect.sync(() => {
      expect(defaultChecks.map((check) => check.id)).toEqual(policyCheckIds)
    }))
})

describe("deps.no_wildcards", () => {
  const model = workspace([
    manifest("Cargo.toml", [
      declare("serde", { version: "*" }, { location: { path: "Cargo.toml", line: 5 } }),
      declare("tokio", { version: "1.*" }),
      declare("anyhow", { version: "1.0" }),
      declare("inherited", { version: "*", workspace: true })
    ], { package: publishable("root") })
  ])

  it.effect("flags wildcard requirements with the configured severity", () =>
    Effect.sync(() => {
      const findings = noWildcards.run(model, presetFor("compat"))
      expect(findings.map((finding) => finding.message)).toEqual([
        "dependency 'serde' uses a wildcard version: *",
        "dependency 'tokio' uses a wildcard version: 1.*"
      ])
      const [first] = findings
      expect(first?.severity).toBe("warning")
      expect(first?.code).toBe(Codes.wildcardVersion)
      expect(first?.location).toEqual({ path: "Cargo.toml", line: 5 })
      expect(first?.fingerprint).toBe("157bc9aee66a5aaf94de931c73988ed120f75c0178d597d32fd3ba19c72543d8")
      expect(first?.data).toEqual({
        current_spec: { version: "*" },
        dependency: "serde",
        fix_action: "pin_version",
        fix_hint: "Pin to a specific semver requirement",
        manifest: "Cargo.toml",
        section: "dependencies"
      })
    }))

  it.effect("honours the allowlist and a disabled policy", () =>
    Effect.sync(() => {
      const allowed = noWildcards.run(model, onlyCheck(CheckIds.noWildcards, { allow: ["tok*"] }))
      expect(allowed.map((finding) => finding.data["dependency"])).toEqual(["serde"])
      expect(noWildcards.run(model, onlyCheck(CheckIds.noWildcards, { enabled: false }))).toEqual([])
      expect(noWildcards.run(model, onlyCheck(CheckIds.pathSafety))).toEqual([])
    }))
})

describe("deps.path_requires_version", () => {
  const member = (publish: boolean | undefined) =>
    manifest(
      "crates/app/Cargo.toml",
      [
        declare("local", { path: "../local" }),
        declare("pinned", { path: "../pinned", version: "0.1" }),
        declare("shared", { path: "../shared", workspace: true })
      ],
      publish === undefined ? {} : { package: { name: "app", publish } }
    )

  it.effect("flags versionless path dependencies of publishable packages", () =>
    Effect.sync(() => {
      const findings = pathRequiresVersion.run(workspace([member(true)]), presetFor("strict"))
      expect(findings).toHaveLength(1)
      expect(findings[0]?.message).toBe("dependency 'local' uses a path dependency without an explicit version")
      expect(findings[0]?.data["path"]).toBe("../local")
      expect(findings[0]?.data["fix_action"]).toBe("add_version_with_path")
      expect(findings[0]?.fingerprint).toBe(
        fingerprint(CheckIds.pathRequiresVersion, Codes.pathWithoutVersion, "crates/app/Cargo.toml", "local", "../local")
      )
    }))

  it.effect("skips unpublishable manifests unless ignore_publish_false is set", () =>
    Effect.sync(() => {
      const strict = presetFor("strict")
      expect(pathRequiresVersion.run(workspace([member(false)]), strict)).toEqual([])
      expect(pathRequiresVersion.run(workspace([member(undefined)]), strict)).toEqual([])
      const lenient = onlyCheck(CheckIds.pathRequiresVersion, { ignorePublishFalse: true })
      expect(pathRequiresVersion.run(workspace([member(false)]), lenient)).toHaveLength(1)
    }))
})

describe("deps.path_safety", () => {
  const model = workspace([
    manifest("Cargo.toml", [
      declare("a", { path: "/abs/path", version: "1" }),
      declare("b", { path: "../outside", version: "1" }),
      declare("c", { path: "crates/c", version: "1" })
    ]),
    manifest("crates/x/Cargo.toml", [
      declare("y", { path: "../y", version: "1" }),
      declare("z", { path: "../../../z", version: "1" })
    ])
  ])

  it.effect("reports absolute paths and root escapes", () =>
    Effect.sync(() => {
      const findings = pathSafety.run(model, presetFor("strict"))
      expect(findings.map((finding) => [finding.code, finding.message])).toEqual([
        [Codes.absolutePath, "dependency 'a' uses an absolute path: /abs/path"],
        [Codes.parentEscape, "dependency 'b' uses a path that escapes the repo root: ../outside"],
        [Codes.parentEscape, "dependency 'z' uses a path that escapes the repo root: ../../../z"]
      ])
      expect(findings[0]?.fingerprint).toBe("cd138a1d611144f96c1acecda2708ca1ac48cdf47a58d416a116163b01ac3efe")
    }))

  it.effect("matches the allowlist against the dependency path", () =>
    Effect.sync(() => {
      const findings = pathSafety.run(model, onlyCheck(CheckIds.pathSafety, { allow: ["../outside", "/abs/**"] }))
      expect(findings.map((finding) => finding.data["dependency"])).toEqual(["z"])
    }))

  it.effect("exempts nested parent paths with a single-star allow pattern", () =>
    Effect.sync(() => {
      const vendored = workspace([manifest("Cargo.toml", [declare("v", { path: "../vendor/v", version: "1" })])])
      expect(pathSafety.run(vendored, onlyCheck(CheckIds.pathSafety, { allow: ["../*"] }))).toEqual([])
      const findings = pathSafety.run(model, onlyCheck(CheckIds.pathSafety, { allow: ["../*"] }))
      expect(findings.map((finding) => finding.data["dependency"])).toEqual(["a"])
    }))

  it.effect("classifies absolute and escaping paths", () =>
    Effect.sync(() => {
      expect(isAbsolutePath("/usr/lib")).toBe(true)
      expect(isAbsolutePath("\\\\server\\share")).toBe(true)
      expect(isAbsolutePath("C:\\deps")).toBe(true)
      expect(isAbsolutePath("deps/a")).toBe(false)
      expect(escapesRoot(0, "../outside")).toBe(true)
      expect(escapesRoot(2, "../../a")).toBe(false)
      expect(escapesRoot(1, "a/../../..")).toBe(true)
      expect(escapesRoot(0, "./a/./b")).toBe(false)
      expect(escapesRoot(1, "..\\..\\c")).toBe(true)
    }))
})

describe("deps.workspace_inheritance", () => {
  const shared = { serde: { name: "serde", version: "1.0", workspace: false } }
  const member = manifest("crates/a/Cargo.toml", [
    declare("serde", { version: "1.0" }, { location: { path: "crates/a/Cargo.toml", line: 9 } }),
    declare("inherited", { workspace: true }),
    declare("local-only", { version: "0.3" })
  ])

  it.effect("flags redeclared workspace dependencies", () =>
    Effect.sync(() => {
      const findings = workspaceInheritance.run(workspace([member], shared), presetFor("strict"))
      expect(findings).toHaveLength(1)
      expect(findings[0]?.code).toBe(Codes.missingWorkspaceTrue)
      expect(findings[0]?.location).toEqual({ path: "crates/a/Cargo.toml", line: 9 })
      expect(findings[0]?.data["fix_action"]).toBe("use_workspace_true")
    }))

  it.effect("does nothing without workspace-level definitions", () =>
    Effect.sync(() => {
      expect(workspaceInheritance.run(workspace([member]), presetFor("strict"))).toEqual([])
    }))
})

describe("deps.git_requires_version", () => {
  it.effect("flags versionless git dependencies of publishable packages", () =>
    Effect.sync(() => {
      const model = workspace([
        manifest("Cargo.toml", [
          declare("forked", { git: "https://example.invalid/forked.git", branch: "main" }),
          declare("tagged", { git: "https://example.invalid/tagged.git", version: "2.0" })
        ], { package: publishable("root") })
      ])
      const findings = gitRequiresVersion.run(model, presetFor("strict"))
      expect(findings.map((finding) => finding.message)).toEqual([
        "dependency 'forked' uses a git dependency without an explicit version"
      ])
      expect(findings[0]?.data["current_spec"]).toEqual({
        git: "https://example.invalid/forked.git",
        branch: "main"
      })
    }))
})

describe("deps.dev_only_in_normal", () => {
  const model = workspace([
    manifest("Cargo.toml", [
      declare("proptest", { version: "1" }),
      declare("mockall", { version: "0.12" }, { kind: "dev" }),
      declare("serde", { version: "1" }),
      declare("tempfile", { version: "3" }, { kind: "build" })
    ])
  ])

  it.effect("flags test-only packages in normal dependencies", () =>
    Effect.sync(() => {
      const findings = devOnlyInNormal.run(model, presetFor("strict"))
      expect(findings.map((finding) => finding.data["dependency"])).toEqual(["proptest"])
      expect(findings[0]?.data["section"]).toBe("dependencies")
    }))

  it.effect("respects the allowlist", () =>
    Effect.sync(() => {
      expect(devOnlyInNormal.run(model, onlyCheck(CheckIds.devOnlyInNormal, { allow: ["prop*"] }))).toEqual([])
    }))
})

describe("deps.default_features_explicit", () => {
  it.effect("requires default-features on declarations with inline options", () =>
    Effect.sync(() => {
      const model = workspace([
        manifest("Cargo.toml", [
          declare("opt", { version: "1", optional: true }),
          declare("pathy", { path: "pathy", version: "1", defaultFeatures: false }),
          declare("plain", { version: "1" }),
          declare("gitty", { git: "https://example.invalid/gitty.git" }),
          declare("inherited", { workspace: true, optional: true })
        ])
      ])
      const findings = defaultFeaturesExplicit.run(model, presetFor("strict"))
      expect(findings.map((finding) => finding.data["dependency"])).toEqual(["opt", "gitty"])
    }))
})

describe("deps.no_multiple_versions", () => {
  it.effect("reports one workspace-level finding per name", () =>
    Effect.sync(() => {
      const model = workspace([
        manifest("Cargo.toml", [
          declare("serde", { version: "2.0" }, { location: { path: "Cargo.toml", line: 4 } }),
          declare("log", { version: "0.4" })
        ]),
        manifest("crates/a/Cargo.toml", [
          declare("serde", { version: "1.0" }),
          declare("log", { version: "0.4" }),
          declare("serde", { workspace: true })
        ])
      ])
      const findings = noMultipleVersions.run(model, presetFor("strict"))
      expect(findings).toHaveLength(1)
      const [only] = findings
      expect(only?.message).toBe("dependency 'serde' has multiple versions across workspace: 1.0, 2.0")
      expect(only?.location).toBeUndefined()
      expect(only?.fingerprint).toBe(
        fingerprint(CheckIds.noMultipleVersions, Codes.duplicateDifferentVersions, ".", "serde")
      )
      expect(only?.data).toEqual({
        dependency: "serde",
        occurrences: [["1.0", "crates/a/Cargo.toml"], ["2.0", "Cargo.toml"]],
        versions: ["1.0", "2.0"]
      })
    }))
})

describe("deps.optional_unused", () => {
  it.effect("flags optional dependencies no feature references", () =>
    Effect.sync(() => {
      const model = workspace([
        manifest("Cargo.toml", [
          declare("serde_json", { version: "1", optional: true }),
          declare("simd", { version: "0.2", optional: true }),
          declare("log", { version: "0.4", optional: true }),
          declare("extra", { version: "1", optional: true }),
          declare("always", { version: "1" })
        ], {
          features: {
            json: ["dep:serde_json"],
            fast: ["simd?/fast"],
            logging: ["log"]
          }
        })
      ])
      const findings = optionalUnused.run(model, presetFor("strict"))
      expect(findings.map((finding) => finding.message)).toEqual([
        "optional dependency 'extra' is not referenced in any feature"
      ])
    }))

  it.effect("extracts the referenced name from feature tokens", () =>
    Effect.sync(() => {
      expect(referencedName("dep:serde")).toBe("serde")
      expect(referencedName("tokio/rt")).toBe("tokio")
      expect(referencedName("tokio?/rt")).toBe("tokio")
      expect(referencedName("std")).toBe("std")
    }))
})
