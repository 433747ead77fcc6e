import { WORKSPACE_LEVEL_PATH, fingerprint } from "../fingerprint.js"
import type { Finding } from "../finding.js"
import { CheckIds, Codes } from "../ids.js"
import type { WorkspaceModel } from "../model.js"
import { checkPolicy } from "../policy.js"
import type { Check } from "./types.js"
import { buildAllowlist, isAllowed } from "./utils.js"

// CHANGE: report dependency names declared with more than one distinct version across the workspace
// WHY: diverging requirements pull several copies of one package into a build
// QUOTE(TZ): "produces one workspace-level finding (no single location) listing all distinct versions found"
// REF: req-check-multiple-versions-1
// SOURCE: n/a
// FORMAT THEOREM: ∀f ∈ run(m, c): |versions(f)| ≥ 2 ∧ f.location = ∅
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: names and versions are emitted in code-unit order
// COMPLEXITY: O(d log d)

interface Occurrence {
  readonly version: string
  readonly manifest: string
}

const compareCodeUnits = (left: string, right: string): number => left < right ? -1 : left > right ? 1 : 0

const compareOccurrences = (left: Occurrence, right: Occurrence): number =>
  compareCodeUnits(left.version, right.version) || compareCodeUnits(left.manifest, right.manifest)

const collectOccurrences = (model: WorkspaceModel): ReadonlyMap<string, ReadonlyArray<Occurrence>> => {
  const byName = new Map<string, Map<string, Occurrence>>()
  for (const manifest of model.manifests) {
    for (const dep of manifest.dependencies) {
      const version = dep.spec.version
      if (dep.spec.workspace || version === undefined) {
        continue
      }
      const occurrences = byName.get(dep.name) ?? new Map<string, Occurrence>()
      occurrences.set(`${version}\u0000${manifest.path}`, { version, manifest: manifest.path })
      byName.set(dep.name, occurrences)
    }
  }
  const result = new Map<string, ReadonlyArray<Occurrence>>()
  for (const [name, occurrences] of byName) {
    result.set(name, [...occurrences.values()].sort(compareOccurrences))
  }
  return result
}

export const noMultipleVersions: Check = {
  id: CheckIds.noMultipleVersions,
  run: (model, config) => {
    const policy = checkPolicy(config, CheckIds.noMultipleVersions)
    if (policy === undefined) {
      return []
    }
    const allowlist = buildAllowlist(policy.allow)
    const occurrencesByName = collectOccurrences(model)
    const findings: Array<Finding> = []
    for (const name of [...occurrencesByName.keys()].sort(compareCodeUnits)) {
      const occurrences = occurrencesByName.get(name) ?? []
      const versions = [...new Set(occurrences.map((occurrence) => occurrence.version))]
      if (versions.length <= 1 || isAllowed(allowlist, name)) {
        continue
      }
      findings.push({
        severity: policy.severity,
        checkId: CheckIds.noMultipleVersions,
        code: Codes.duplicateDifferentVersions,
        message: `dependency '${name}' has multiple versions across workspace: ${versions.join(", ")}`,
        help: "Align all workspace members on one version via the workspace dependency table.",
        fingerprint: fingerprint(
          CheckIds.noMultipleVersions,
          Codes.duplicateDifferentVersions,
          WORKSPACE_LEVEL_PATH,
          name
        ),
        data: {
          dependency: name,
          occurrences: occurrences.map((occurrence) => [occurrence.version, occurrence.manifest]),
          versions
        }
      })
    }
    return findings
  }
}
