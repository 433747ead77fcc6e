import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify the error algebra for configuration, model and runtime failures
// WHY: every failure must name the field or check that caused it
// QUOTE(TZ): "surfaced immediately and specifically (naming the field/check), never silently defaulted"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type InvalidScope = { readonly _tag: "InvalidScope"; readonly field: string; readonly value: string }
export type InvalidSeverity = {
  readonly _tag: "InvalidSeverity"
  readonly checkId: string
  readonly value: string
}
export type InvalidFailOn = { readonly _tag: "InvalidFailOn"; readonly value: string }
export type InvalidGlob = {
  readonly _tag: "InvalidGlob"
  readonly checkId: string
  readonly pattern: string
  readonly reason: string
}
export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type ModelError = { readonly _tag: "ModelError"; readonly message: string }
export type ScopeError = { readonly _tag: "ScopeError"; readonly message: string }

export type ConfigResolutionError = InvalidScope | InvalidSeverity | InvalidFailOn | InvalidGlob

export type AppError =
  | CliError
  | ConfigResolutionError
  | ConfigError
  | FileError
  | ModelError
  | ScopeError

export const invalidScope = (field: string, value: string): InvalidScope => ({
  _tag: "InvalidScope",
  field,
  value
})

export const invalidSeverity = (checkId: string, value: string): InvalidSeverity => ({
  _tag: "InvalidSeverity",
  checkId,
  value
})

export const invalidFailOn = (value: string): InvalidFailOn => ({
  _tag: "InvalidFailOn",
  value
})

export const invalidGlob = (checkId: string, pattern: string, reason: string): InvalidGlob => ({
  _tag: "InvalidGlob",
  checkId,
  pattern,
  reason
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const modelError = (message: string): ModelError => ({
  _tag: "ModelError",
  message
})

export const scopeError = (message: string): ScopeError => ({
  _tag: "ScopeError",
  message
})

/**
 * Render an error as a single line for reports and stderr.
 *
 * @pure true
 * @invariant resolver errors mention the offending field or check id
 */
export const formatAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (value) => value.message),
    Match.tag("InvalidScope", (value) => `invalid ${value.field}: ${value.value} (expected 'repo' or 'diff')`),
    Match.tag(
      "InvalidSeverity",
      (value) => `invalid severity for ${value.checkId}: ${value.value} (expected info|warning|error)`
    ),
    Match.tag("InvalidFailOn", (value) => `invalid fail_on: ${value.value} (expected error|warning)`),
    Match.tag(
      "InvalidGlob",
      (value) => `invalid allow glob for ${value.checkId}: ${value.pattern} (${value.reason})`
    ),
    Match.tag("ConfigError", (value) => `config: ${value.message}`),
    Match.tag("FileError", (value) => value.message),
    Match.tag("ModelError", (value) => `workspace model: ${value.message}`),
    Match.tag("ScopeError", (value) => value.message),
    Match.exhaustive
  )
