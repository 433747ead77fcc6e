import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { parseCliArgs, toOverrides } from "../../src/core/cli.js"

const argv = (...args: ReadonlyArray<string>): ReadonlyArray<string> => ["node", "depwarden", ...args]

const errorOf = (args: ReadonlyArray<string>): string =>
  Either.match(parseCliArgs(args), {
    onLeft: (error) => error.message,
    onRight: () => "parsed"
  })

describe("parseCliArgs", () => {
  it.effect("defaults to the check command", () =>
    Effect.sync(() => {
      const parsed = Either.getOrThrow(parseCliArgs(argv()))
      expect(parsed.command).toBe("check")
      expect(parsed.modelPath).toBe("./depwarden.model.json")
      expect(parsed.configPath).toBe("./depwarden.json")
      expect(parsed.configExplicit).toBe(false)
      expect(parsed.format).toBe("markdown")
      expect(toOverrides(parsed)).toEqual({})
    }))

  it.effect("parses check flags in both spellings", () =>
    Effect.sync(() => {
      const parsed = Either.getOrThrow(
        parseCliArgs(
          argv(
            "check",
            "--model",
            "model.json",
            "--config=policy.json",
            "--scope=diff",
            "--changed",
            "crates/a/Cargo.toml, crates/b/Cargo.toml",
            "--changed=Cargo.toml",
            "--max-findings",
            "5",
            "--profile",
            "warn",
            "--format",
            "annotations",
            "--advisory",
            "--verbose"
          )
        )
      )
      expect(parsed.modelPath).toBe("model.json")
      expect(parsed.configPath).toBe("policy.json")
      expect(parsed.configExplicit).toBe(true)
      expect(parsed.changed).toEqual(["crates/a/Cargo.toml", "crates/b/Cargo.toml", "Cargo.toml"])
      expect(parsed.format).toBe("annotations")
      expect(parsed.advisory).toBe(true)
      expect(parsed.verbose).toBe(true)
      expect(toOverrides(parsed)).toEqual({ profile: "warn", scope: "diff", maxFindings: 5 })
    }))

  it.effect("parses explain with its identifier", () =>
    Effect.sync(() => {
      const parsed = Either.getOrThrow(parseCliArgs(argv("explain", "deps.path_safety")))
      expect(parsed.command).toBe("explain")
      expect(parsed.explainId).toBe("deps.path_safety")
    }))

  it.effect("rejects bad input with a specific message", () =>
    Effect.sync(() => {
      expect(errorOf(argv("frobnicate"))).toBe("Unknown command: frobnicate")
      expect(errorOf(argv("--nope"))).toBe("Unknown flag: --nope")
      expect(errorOf(argv("--model"))).toBe("Missing value for --model")
      expect(errorOf(argv("--max-findings=abc"))).toBe(
        "Invalid --max-findings: abc (expected a non-negative integer)"
      )
      expect(errorOf(argv("--format", "xml"))).toBe("Invalid --format: xml (expected markdown|json|annotations)")
      expect(errorOf(argv("explain"))).toBe("explain requires a check id or finding code")
      expect(errorOf(argv("check", "extra"))).toBe("Unexpected positional argument: extra")
    }))
})
