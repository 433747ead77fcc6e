import { fingerprint } from "../fingerprint.js"
import type { Finding } from "../finding.js"
import { CheckIds, Codes, FixActions } from "../ids.js"
import { checkPolicy } from "../policy.js"
import type { Check } from "./types.js"
import { buildAllowlist, declarationData, isAllowed } from "./utils.js"

// CHANGE: flag version requirements containing a wildcard
// WHY: wildcard requirements accept any release, including breaking ones
// QUOTE(TZ): "flags any declared version requirement string containing a wildcard marker"
// REF: req-check-wildcard-1
// SOURCE: n/a
// FORMAT THEOREM: ∀f ∈ run(m, c): f.code = wildcard_version ∧ version(f) contains '*'
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: inheriting specs are never inspected
// COMPLEXITY: O(d) where d = total declarations

const WILDCARD = "*"

export const noWildcards: Check = {
  id: CheckIds.noWildcards,
  run: (model, config) => {
    const policy = checkPolicy(config, CheckIds.noWildcards)
    if (policy === undefined) {
      return []
    }
    const allowlist = buildAllowlist(policy.allow)
    const findings: Array<Finding> = []
    for (const manifest of model.manifests) {
      for (const dep of manifest.dependencies) {
        const version = dep.spec.version
        if (dep.spec.workspace || version === undefined || !version.includes(WILDCARD)) {
          continue
        }
        if (isAllowed(allowlist, dep.name)) {
          continue
        }
        findings.push({
          severity: policy.severity,
          checkId: CheckIds.noWildcards,
          code: Codes.wildcardVersion,
          message: `dependency '${dep.name}' uses a wildcard version: ${version}`,
          ...(dep.location === undefined ? {} : { location: dep.location }),
          help: "Replace wildcard versions with an explicit semver requirement.",
          fingerprint: fingerprint(CheckIds.noWildcards, Codes.wildcardVersion, manifest.path, dep.name, dep.spec.path),
          data: declarationData(manifest, dep, {
            fix_action: FixActions.pinVersion,
            fix_hint: "Pin to a specific semver requirement"
          })
        })
      }
    }
    return findings
  }
}
