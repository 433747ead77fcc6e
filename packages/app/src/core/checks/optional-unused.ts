import { fingerprint } from "../fingerprint.js"
import type { Finding } from "../finding.js"
import { CheckIds, Codes } from "../ids.js"
import type { ManifestModel } from "../model.js"
import { checkPolicy } from "../policy.js"
import type { Check } from "./types.js"
import { buildAllowlist, declarationData, isAllowed } from "./utils.js"

// CHANGE: flag optional dependencies that no feature of their manifest activates
// WHY: an optional dependency nothing enables is dead weight in the manifest
// QUOTE(TZ): "supporting three reference syntaxes"
// REF: req-check-optional-unused-1
// SOURCE: n/a
// FORMAT THEOREM: ∀f ∈ run(m, c): spec(f).optional ∧ name(f) ∉ referenced(manifest(f))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: references never cross manifests
// COMPLEXITY: O(d + t) where t = feature tokens

const EXPLICIT_DEPENDENCY_PREFIX = "dep:"

/**
 * Name referenced by one feature token: `dep:name`, `name/feature` (or `name?/feature`), or a bare token.
 *
 * @pure true
 */
export const referencedName = (token: string): string => {
  if (token.startsWith(EXPLICIT_DEPENDENCY_PREFIX)) {
    return token.slice(EXPLICIT_DEPENDENCY_PREFIX.length)
  }
  const slash = token.indexOf("/")
  if (slash >= 0) {
    const head = token.slice(0, slash)
    return head.endsWith("?") ? head.slice(0, -1) : head
  }
  return token
}

export const referencedNames = (manifest: ManifestModel): ReadonlySet<string> => {
  const names = new Set<string>()
  for (const tokens of Object.values(manifest.features)) {
    for (const token of tokens) {
      names.add(referencedName(token))
    }
  }
  return names
}

export const optionalUnused: Check = {
  id: CheckIds.optionalUnused,
  run: (model, config) => {
    const policy = checkPolicy(config, CheckIds.optionalUnused)
    if (policy === undefined) {
      return []
    }
    const allowlist = buildAllowlist(policy.allow)
    const findings: Array<Finding> = []
    for (const manifest of model.manifests) {
      const referenced = referencedNames(manifest)
      for (const dep of manifest.dependencies) {
        if (!dep.spec.optional || referenced.has(dep.name) || isAllowed(allowlist, dep.name)) {
          continue
        }
        findings.push({
          severity: policy.severity,
          checkId: CheckIds.optionalUnused,
          code: Codes.optionalNotInFeatures,
          message: `optional dependency '${dep.name}' is not referenced in any feature`,
          ...(dep.location === undefined ? {} : { location: dep.location }),
          help: "Add a feature that enables this dependency, or drop `optional = true`.",
          fingerprint: fingerprint(CheckIds.optionalUnused, Codes.optionalNotInFeatures, manifest.path, dep.name),
          data: declarationData(manifest, dep)
        })
      }
    }
    return findings
  }
}
