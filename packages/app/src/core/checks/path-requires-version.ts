import { fingerprint } from "../fingerprint.js"
import type { Finding } from "../finding.js"
import { CheckIds, Codes, FixActions } from "../ids.js"
import { isPublishable } from "../model.js"
import { checkPolicy } from "../policy.js"
import type { Check } from "./types.js"
import { buildAllowlist, declarationData, isAllowed } from "./utils.js"

// CHANGE: require an explicit version next to local path dependencies of publishable packages
// WHY: a registry consumer never sees the path, only the version
// QUOTE(TZ): "flags a local-path dependency lacking both an explicit version and the workspace-inheritance flag"
// REF: req-check-path-version-1
// SOURCE: n/a
// FORMAT THEOREM: ∀f ∈ run(m, c): spec(f).path ≠ ∅ ∧ spec(f).version = ∅ ∧ ¬spec(f).workspace
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unpublishable manifests are skipped unless ignorePublishFalse is set
// COMPLEXITY: O(d)

export const pathRequiresVersion: Check = {
  id: CheckIds.pathRequiresVersion,
  run: (model, config) => {
    const policy = checkPolicy(config, CheckIds.pathRequiresVersion)
    if (policy === undefined) {
      return []
    }
    const allowlist = buildAllowlist(policy.allow)
    const findings: Array<Finding> = []
    for (const manifest of model.manifests) {
      if (!policy.ignorePublishFalse && !isPublishable(manifest)) {
        continue
      }
      for (const dep of manifest.dependencies) {
        const path = dep.spec.path
        if (path === undefined || dep.spec.version !== undefined || dep.spec.workspace) {
          continue
        }
        if (isAllowed(allowlist, dep.name)) {
          continue
        }
        findings.push({
          severity: policy.severity,
          checkId: CheckIds.pathRequiresVersion,
          code: Codes.pathWithoutVersion,
          message: `dependency '${dep.name}' uses a path dependency without an explicit version`,
          ...(dep.location === undefined ? {} : { location: dep.location }),
          help: "Add an explicit version alongside the path, or inherit the workspace definition.",
          fingerprint: fingerprint(CheckIds.pathRequiresVersion, Codes.pathWithoutVersion, manifest.path, dep.name, path),
          data: declarationData(manifest, dep, {
            fix_action: FixActions.addVersionWithPath,
            path
          })
        })
      }
    }
    return findings
  }
}
