import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { compileGlobs, matchesAnyGlob, validateGlob } from "../../src/core/glob.js"

const matches = (pattern: string, value: string): boolean => matchesAnyGlob(compileGlobs([pattern]), value)

describe("validateGlob", () => {
  it.effect("reports malformed patterns", () =>
    Effect.sync(() => {
      expect(validateGlob("abc\\")).toEqual(Either.left("dangling escape"))
      expect(validateGlob("[ab")).toEqual(Either.left("unclosed character class"))
      expect(validateGlob("{a,{b}}")).toEqual(Either.left("nested alternation"))
      expect(validateGlob("{a,b")).toEqual(Either.left("unclosed alternation"))
      expect(Either.isRight(validateGlob("serde*"))).toBe(true)
    }))

  it.effect("accepts an escaped trailing backslash", () =>
    Effect.sync(() => {
      expect(Either.isRight(validateGlob("abc\\\\"))).toBe(true)
    }))

  it.effect("accepts the empty pattern, which matches only the empty value", () =>
    Effect.sync(() => {
      expect(Either.isRight(validateGlob(""))).toBe(true)
      expect(matches("", "")).toBe(true)
      expect(matches("", "a")).toBe(false)
    }))
})

describe("matchesAnyGlob", () => {
  it.effect("lets * and ? match path separators", () =>
    Effect.sync(() => {
      expect(matches("serde*", "serde_json")).toBe(true)
      expect(matches("serde*", "my-serde")).toBe(false)
      expect(matches("vendor/*", "vendor/a/b")).toBe(true)
      expect(matches("../*", "../vendor/v")).toBe(true)
      expect(matches("a?b", "a/b")).toBe(true)
      expect(matches("[!x]b", "/b")).toBe(true)
    }))

  it.effect("lets ** cross segments", () =>
    Effect.sync(() => {
      expect(matches("**/vendor/*", "vendor/x")).toBe(true)
      expect(matches("**/vendor/*", "a/b/vendor/x")).toBe(true)
      expect(matches("**/vendor/*", "vendor/x/y")).toBe(true)
      expect(matches("**/vendor/*", "vendored/x")).toBe(false)
    }))

  it.effect("supports ?, classes and alternation", () =>
    Effect.sync(() => {
      expect(matches("log?", "log4")).toBe(true)
      expect(matches("[!a]bc", "xbc")).toBe(true)
      expect(matches("[!a]bc", "abc")).toBe(false)
      expect(matches("[a-c]x", "bx")).toBe(true)
      expect(matches("{tokio,serde}", "tokio")).toBe(true)
      expect(matches("{tokio,serde}", "tokio-util")).toBe(false)
    }))

  it.effect("normalizes leading ./ and backslashes and stays case-sensitive", () =>
    Effect.sync(() => {
      expect(matches("./vendor/*", "vendor/lib")).toBe(true)
      expect(matches("vendor/*", "./vendor/lib")).toBe(true)
      expect(matches("vendor/*", "vendor\\lib")).toBe(true)
      expect(matches("Serde", "serde")).toBe(false)
    }))

  it.effect("treats regex metacharacters literally", () =>
    Effect.sync(() => {
      expect(matches("a.b", "a.b")).toBe(true)
      expect(matches("a.b", "axb")).toBe(false)
      expect(matchesAnyGlob([], "anything")).toBe(false)
    }))
})
