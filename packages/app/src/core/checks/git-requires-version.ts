import { fingerprint } from "../fingerprint.js"
import type { Finding } from "../finding.js"
import { CheckIds, Codes, FixActions } from "../ids.js"
import { isPublishable } from "../model.js"
import { checkPolicy } from "../policy.js"
import type { Check } from "./types.js"
import { buildAllowlist, declarationData, isAllowed } from "./utils.js"

// CHANGE: require an explicit version next to version-control dependencies
// WHY: published packages cannot depend on a repository URL alone
// QUOTE(TZ): "mirrors \"path requires version\" for version-control-URL dependencies"
// REF: req-check-git-version-1
// SOURCE: n/a
// FORMAT THEOREM: ∀f ∈ run(m, c): spec(f).git ≠ ∅ ∧ spec(f).version = ∅ ∧ ¬spec(f).workspace
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the repository URL takes part in the fingerprint
// COMPLEXITY: O(d)

export const gitRequiresVersion: Check = {
  id: CheckIds.gitRequiresVersion,
  run: (model, config) => {
    const policy = checkPolicy(config, CheckIds.gitRequiresVersion)
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
        const git = dep.spec.git
        if (git === undefined || dep.spec.version !== undefined || dep.spec.workspace) {
          continue
        }
        if (isAllowed(allowlist, dep.name)) {
          continue
        }
        findings.push({
          severity: policy.severity,
          checkId: CheckIds.gitRequiresVersion,
          code: Codes.gitWithoutVersion,
          message: `dependency '${dep.name}' uses a git dependency without an explicit version`,
          ...(dep.location === undefined ? {} : { location: dep.location }),
          help: "Add an explicit version alongside the git source, or inherit the workspace definition.",
          fingerprint: fingerprint(CheckIds.gitRequiresVersion, Codes.gitWithoutVersion, manifest.path, dep.name, git),
          data: declarationData(manifest, dep, {
            fix_action: FixActions.addVersionWithGit,
            fix_hint: "Add version alongside the git dependency"
          })
        })
      }
    }
    return findings
  }
}
