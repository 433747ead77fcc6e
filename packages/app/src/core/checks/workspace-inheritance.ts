import { fingerprint } from "../fingerprint.js"
import type { Finding } from "../finding.js"
import { CheckIds, Codes, FixActions } from "../ids.js"
import { checkPolicy } from "../policy.js"
import type { Check } from "./types.js"
import { buildAllowlist, declarationData, isAllowed } from "./utils.js"

// CHANGE: flag local declarations that shadow a workspace-level definition
// WHY: inheriting keeps versions and features aligned across members
// QUOTE(TZ): "duplicate a shared definition locally instead of inheriting it"
// REF: req-check-inheritance-1
// SOURCE: n/a
// FORMAT THEOREM: ∀f ∈ run(m, c): name(f) ∈ keys(m.workspaceDependencies) ∧ ¬spec(f).workspace
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: no shared definitions → no findings
// COMPLEXITY: O(d)

export const workspaceInheritance: Check = {
  id: CheckIds.workspaceInheritance,
  run: (model, config) => {
    const policy = checkPolicy(config, CheckIds.workspaceInheritance)
    const shared = model.workspaceDependencies
    if (policy === undefined || Object.keys(shared).length === 0) {
      return []
    }
    const allowlist = buildAllowlist(policy.allow)
    const findings: Array<Finding> = []
    for (const manifest of model.manifests) {
      for (const dep of manifest.dependencies) {
        if (!Object.hasOwn(shared, dep.name) || dep.spec.workspace) {
          continue
        }
        if (isAllowed(allowlist, dep.name)) {
          continue
        }
        findings.push({
          severity: policy.severity,
          checkId: CheckIds.workspaceInheritance,
          code: Codes.missingWorkspaceTrue,
          message: `dependency '${dep.name}' has a workspace-level definition but is not declared with \`workspace = true\``,
          ...(dep.location === undefined ? {} : { location: dep.location }),
          help: "Prefer `workspace = true` to inherit the workspace dependency version and features.",
          fingerprint: fingerprint(
            CheckIds.workspaceInheritance,
            Codes.missingWorkspaceTrue,
            manifest.path,
            dep.name,
            dep.spec.path
          ),
          data: declarationData(manifest, dep, { fix_action: FixActions.useWorkspaceTrue })
        })
      }
    }
    return findings
  }
}
