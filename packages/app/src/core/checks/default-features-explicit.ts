import { fingerprint } from "../fingerprint.js"
import type { Finding } from "../finding.js"
import { CheckIds, Codes } from "../ids.js"
import type { DepSpec } from "../model.js"
import { checkPolicy } from "../policy.js"
import type { Check } from "./types.js"
import { buildAllowlist, declarationData, isAllowed } from "./utils.js"

// CHANGE: require default-features to be stated on declarations with inline qualifiers
// WHY: implicit default features are easy to miss once a declaration is non-trivial
// QUOTE(TZ): "inheriting or simple version-only specs are exempt"
// REF: req-check-default-features-1
// SOURCE: n/a
// FORMAT THEOREM: ∀f ∈ run(m, c): hasInline(spec(f)) ∧ spec(f).defaultFeatures = ∅
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: inheriting specs are skipped
// COMPLEXITY: O(d)

const hasInlineQualifier = (spec: DepSpec): boolean =>
  spec.path !== undefined || spec.git !== undefined || spec.optional

export const defaultFeaturesExplicit: Check = {
  id: CheckIds.defaultFeaturesExplicit,
  run: (model, config) => {
    const policy = checkPolicy(config, CheckIds.defaultFeaturesExplicit)
    if (policy === undefined) {
      return []
    }
    const allowlist = buildAllowlist(policy.allow)
    const findings: Array<Finding> = []
    for (const manifest of model.manifests) {
      for (const dep of manifest.dependencies) {
        if (dep.spec.workspace || !hasInlineQualifier(dep.spec) || dep.spec.defaultFeatures !== undefined) {
          continue
        }
        if (isAllowed(allowlist, dep.name)) {
          continue
        }
        findings.push({
          severity: policy.severity,
          checkId: CheckIds.defaultFeaturesExplicit,
          code: Codes.defaultFeaturesImplicit,
          message: `dependency '${dep.name}' has inline options but no explicit default-features declaration`,
          ...(dep.location === undefined ? {} : { location: dep.location }),
          help: "Add `default-features = true` or `default-features = false` to make the intent explicit.",
          fingerprint: fingerprint(
            CheckIds.defaultFeaturesExplicit,
            Codes.defaultFeaturesImplicit,
            manifest.path,
            dep.name
          ),
          data: declarationData(manifest, dep)
        })
      }
    }
    return findings
  }
}
