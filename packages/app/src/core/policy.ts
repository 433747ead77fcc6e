import type { Severity } from "./finding.js"

// CHANGE: describe the resolved policy consumed by checks and the engine
// WHY: one immutable value carries every per-run decision
// QUOTE(TZ): "EffectiveConfig: resolved policy for one run"
// REF: req-policy-1
// SOURCE: n/a
// FORMAT THEOREM: ∀id: checkPolicy(cfg, id) = Some(p) → p.enabled
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: maxFindings is a non-negative integer
// COMPLEXITY: O(1)/O(1)

export type Scope = "repo" | "diff"

export type FailOn = "error" | "warning"

export interface CheckPolicy {
  readonly enabled: boolean
  readonly severity: Severity
  readonly allow: ReadonlyArray<string>
  /** Path and git version checks also run for manifests with `publish = false`. */
  readonly ignorePublishFalse: boolean
}

export interface EffectiveConfig {
  readonly profile: string
  readonly scope: Scope
  readonly failOn: FailOn
  readonly maxFindings: number
  readonly checks: Readonly<Record<string, CheckPolicy>>
}

export const enabledPolicy = (severity: Severity): CheckPolicy => ({
  enabled: true,
  severity,
  allow: [],
  ignorePublishFalse: false
})

export const disabledPolicy: CheckPolicy = {
  enabled: false,
  severity: "info",
  allow: [],
  ignorePublishFalse: false
}

/**
 * Look up the policy of an enabled check.
 *
 * @returns The policy, or undefined when the check is absent or disabled.
 *
 * @pure true
 */
export const checkPolicy = (config: EffectiveConfig, checkId: string): CheckPolicy | undefined => {
  const policy = Object.hasOwn(config.checks, checkId) ? config.checks[checkId] : undefined
  return policy?.enabled === true ? policy : undefined
}
