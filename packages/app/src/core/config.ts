import * as Either from "effect/Either"

import type { ConfigResolutionError } from "./errors.js"
import { invalidFailOn, invalidGlob, invalidScope, invalidSeverity } from "./errors.js"
import type { Severity } from "./finding.js"
import { validateGlob } from "./glob.js"
import type { CheckPolicy, EffectiveConfig, FailOn, Scope } from "./policy.js"
import { disabledPolicy } from "./policy.js"
import { DEFAULT_PROFILE, presetFor } from "./presets.js"

// CHANGE: resolve presets, file configuration and caller overrides into one policy
// WHY: precedence must be auditable, so each layer is its own merge pass
// QUOTE(TZ): "Resolution order (later wins)"
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k ∈ {scope, maxFindings}: resolve(raw, o).k = o.k ?? raw.k ?? preset.k
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a Left is returned on the first invalid token; no partial config escapes
// COMPLEXITY: O(c·a) where c = configured checks, a = allow patterns per check

export interface RawCheckConfig {
  readonly enabled?: boolean
  readonly severity?: string
  readonly allow?: ReadonlyArray<string>
  readonly ignorePublishFalse?: boolean
}

export interface RawConfig {
  readonly profile?: string
  readonly scope?: string
  readonly failOn?: string
  readonly maxFindings?: number
  readonly checks?: Readonly<Record<string, RawCheckConfig>>
}

export interface Overrides {
  readonly profile?: string
  readonly scope?: string
  readonly maxFindings?: number
}

type Resolution = Either.Either<EffectiveConfig, ConfigResolutionError>

const compareCodeUnits = (left: string, right: string): number => left < right ? -1 : left > right ? 1 : 0

export const parseScope = (field: string, value: string): Either.Either<Scope, ConfigResolutionError> => {
  switch (value) {
    case "repo":
    case "diff":
      return Either.right(value)
    default:
      return Either.left(invalidScope(field, value))
  }
}

export const parseSeverity = (
  checkId: string,
  value: string
): Either.Either<Severity, ConfigResolutionError> => {
  switch (value) {
    case "info":
      return Either.right("info")
    case "warn":
    case "warning":
      return Either.right("warning")
    case "error":
      return Either.right("error")
    default:
      return Either.left(invalidSeverity(checkId, value))
  }
}

export const parseFailOn = (value: string): Either.Either<FailOn, ConfigResolutionError> => {
  switch (value) {
    case "error":
      return Either.right("error")
    case "warn":
    case "warning":
      return Either.right("warning")
    default:
      return Either.left(invalidFailOn(value))
  }
}

const validateAllowlist = (
  checkId: string,
  patterns: ReadonlyArray<string>
): Either.Either<ReadonlyArray<string>, ConfigResolutionError> => {
  for (const pattern of patterns) {
    const compiled = validateGlob(pattern)
    if (Either.isLeft(compiled)) {
      return Either.left(invalidGlob(checkId, pattern, compiled.left))
    }
  }
  return Either.right(patterns)
}

/** Profile name asked for by the caller, then the file, then the default. */
export const requestedProfile = (raw: RawConfig, overrides: Overrides): string =>
  overrides.profile ?? raw.profile ?? DEFAULT_PROFILE

/**
 * Pass 0: pick the requested preset; unknown names fall back to strict.
 *
 * @pure true
 */
export const selectPreset = (raw: RawConfig, overrides: Overrides): EffectiveConfig =>
  presetFor(requestedProfile(raw, overrides))

/**
 * Pass 1: top-level fields of the configuration file.
 *
 * @pure true
 * @invariant fields absent from the file keep the preset value
 */
export const applyTopLevel = (config: EffectiveConfig, raw: RawConfig): Resolution =>
  Either.gen(function*() {
    const scope = raw.scope === undefined ? config.scope : yield* parseScope("scope", raw.scope)
    const failOn = raw.failOn === undefined ? config.failOn : yield* parseFailOn(raw.failOn)
    return {
      ...config,
      scope,
      failOn,
      maxFindings: raw.maxFindings ?? config.maxFindings
    }
  })

const mergeCheck = (
  checkId: string,
  base: CheckPolicy,
  override: RawCheckConfig
): Either.Either<CheckPolicy, ConfigResolutionError> =>
  Either.gen(function*() {
    const severity = override.severity === undefined
      ? base.severity
      : yield* parseSeverity(checkId, override.severity)
    const allow = override.allow === undefined ? base.allow : yield* validateAllowlist(checkId, override.allow)
    return {
      enabled: override.enabled ?? base.enabled,
      severity,
      allow,
      ignorePublishFalse: override.ignorePublishFalse ?? base.ignorePublishFalse
    }
  })

/**
 * Pass 2: per-check overrides from the configuration file.
 *
 * A check missing from the preset starts from the disabled policy.
 *
 * @pure true
 * @invariant checks are visited in code-unit order of their ids
 * @complexity O(c log c + c·a)
 */
export const applyCheckOverrides = (config: EffectiveConfig, raw: RawConfig): Resolution => {
  const overrides = raw.checks ?? {}
  const checks: Record<string, CheckPolicy> = { ...config.checks }
  for (const checkId of Object.keys(overrides).sort(compareCodeUnits)) {
    const override = overrides[checkId]
    if (override === undefined) {
      continue
    }
    const base = Object.hasOwn(checks, checkId) ? checks[checkId] ?? disabledPolicy : disabledPolicy
    const merged = mergeCheck(checkId, base, override)
    if (Either.isLeft(merged)) {
      return Either.left(merged.left)
    }
    checks[checkId] = merged.right
  }
  return Either.right({ ...config, checks })
}

/**
 * Pass 3: caller overrides win over everything for scope and max findings.
 *
 * @pure true
 */
export const applyCallerOverrides = (config: EffectiveConfig, overrides: Overrides): Resolution =>
  Either.gen(function*() {
    const scope = overrides.scope === undefined ? config.scope : yield* parseScope("--scope", overrides.scope)
    return {
      ...config,
      scope,
      maxFindings: overrides.maxFindings ?? config.maxFindings
    }
  })

/**
 * Resolve the effective config from the preset, the file config and caller overrides.
 *
 * @param raw - Decoded configuration file (empty when no file exists).
 * @param overrides - Values supplied by the caller, e.g. CLI flags.
 * @returns EffectiveConfig or the first configuration error.
 *
 * @pure true
 * @invariant result.profile ∈ {strict, warn, compat}
 * @complexity O(c log c + c·a)
 */
export const resolveConfig = (raw: RawConfig, overrides: Overrides): Resolution =>
  Either.gen(function*() {
    const preset = selectPreset(raw, overrides)
    const topLevel = yield* applyTopLevel(preset, raw)
    const perCheck = yield* applyCheckOverrides(topLevel, raw)
    return yield* applyCallerOverrides(perCheck, overrides)
  })
