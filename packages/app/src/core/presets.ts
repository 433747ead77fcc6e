import type { Severity } from "./finding.js"
import { policyCheckIds } from "./ids.js"
import type { CheckPolicy, EffectiveConfig } from "./policy.js"
import { enabledPolicy } from "./policy.js"

// CHANGE: provide named preset profiles as the resolution baseline
// WHY: an unknown or absent profile must fall back to a strict, fully enabled policy
// QUOTE(TZ): "unknown/absent profile name defaults to a built-in \"strict\" preset"
// REF: req-presets-1
// SOURCE: n/a
// FORMAT THEOREM: ∀name ∉ {warn, compat}: preset(name).profile = "strict"
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every preset enables every policy check
// COMPLEXITY: O(k) where k = number of checks

export const DEFAULT_PROFILE = "strict"

export const DEFAULT_MAX_FINDINGS = 200

const defaultChecks = (severity: Severity): Readonly<Record<string, CheckPolicy>> => {
  const checks: Record<string, CheckPolicy> = {}
  for (const checkId of policyCheckIds) {
    checks[checkId] = enabledPolicy(severity)
  }
  return checks
}

const strictProfile = (): EffectiveConfig => ({
  profile: "strict",
  scope: "repo",
  failOn: "error",
  maxFindings: DEFAULT_MAX_FINDINGS,
  checks: defaultChecks("error")
})

const warnProfile = (): EffectiveConfig => ({
  profile: "warn",
  scope: "repo",
  failOn: "warning",
  maxFindings: DEFAULT_MAX_FINDINGS,
  checks: defaultChecks("warning")
})

// Mostly on, but nothing blocks a merge unless it is configured as an error.
const compatProfile = (): EffectiveConfig => ({
  profile: "compat",
  scope: "repo",
  failOn: "error",
  maxFindings: DEFAULT_MAX_FINDINGS,
  checks: defaultChecks("warning")
})

export const profileNames: ReadonlyArray<string> = ["strict", "warn", "compat"]

/** True when `presetFor` has a preset of that name rather than the strict fallback. */
export const isKnownProfile = (profile: string): boolean => profileNames.includes(profile)

export const presetFor = (profile: string): EffectiveConfig => {
  switch (profile) {
    case "warn":
      return warnProfile()
    case "compat":
      return compatProfile()
    default:
      return strictProfile()
  }
}
