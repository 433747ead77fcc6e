import * as Arr from "effect/Array"
import * as Order from "effect/Order"

import type { Check } from "./checks/index.js"
import { defaultChecks } from "./checks/index.js"
import type { Finding, Severity, SeverityCounts, Verdict } from "./finding.js"
import { severityRank } from "./finding.js"
import type { WorkspaceModel } from "./model.js"
import type { EffectiveConfig, FailOn, Scope } from "./policy.js"

// CHANGE: evaluate all checks and turn their findings into a bounded, ordered report
// WHY: output must be identical for identical input regardless of check or insertion order
// QUOTE(TZ): "it must not rely on any unstable/hash-based iteration"
// REF: req-engine-1
// SOURCE: n/a
// FORMAT THEOREM: ∀π permutation: sort(π(F)) = sort(F)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: verdict and counts are computed over the emitted (truncated) findings
// COMPLEXITY: O(n log n) where n = findings

export interface ReportData {
  readonly scope: Scope
  readonly profile: string
  readonly manifestsScanned: number
  readonly dependenciesScanned: number
  readonly findingsTotal: number
  readonly findingsEmitted: number
  readonly truncatedReason?: string
}

export interface DomainReport {
  readonly verdict: Verdict
  readonly findings: ReadonlyArray<Finding>
  readonly counts: SeverityCounts
  readonly data: ReportData
}

/** Sorts after every real path; absent locations are also ranked after present ones. */
export const MISSING_PATH = "~"

export const MISSING_LINE = Number.MAX_SAFE_INTEGER

const bySeverity: Order.Order<Finding> = Order.mapInput(Order.number, (finding: Finding) =>
  severityRank(finding.severity))

const byLocationPresence: Order.Order<Finding> = Order.mapInput(
  Order.number,
  (finding: Finding) => finding.location === undefined ? 1 : 0
)

const byPath: Order.Order<Finding> = Order.mapInput(
  Order.string,
  (finding: Finding) => finding.location?.path ?? MISSING_PATH
)

const byLine: Order.Order<Finding> = Order.mapInput(
  Order.number,
  (finding: Finding) => finding.location?.line ?? MISSING_LINE
)

const byCheckId: Order.Order<Finding> = Order.mapInput(Order.string, (finding: Finding) => finding.checkId)

const byCode: Order.Order<Finding> = Order.mapInput(Order.string, (finding: Finding) => finding.code)

const byMessage: Order.Order<Finding> = Order.mapInput(Order.string, (finding: Finding) => finding.message)

/**
 * Total order on findings: severity, location path, line, check id, code, message.
 *
 * Strings compare by UTF-16 code units, never by locale.
 */
export const compareFindings: Order.Order<Finding> = Order.combineAll([
  bySeverity,
  byLocationPresence,
  byPath,
  byLine,
  byCheckId,
  byCode,
  byMessage
])

export const sortFindings = (findings: ReadonlyArray<Finding>): ReadonlyArray<Finding> =>
  Arr.sort(findings, compareFindings)

const hasSeverity = (findings: ReadonlyArray<Finding>, severity: Severity): boolean =>
  findings.some((finding) => finding.severity === severity)

/**
 * Verdict over the findings that are actually emitted.
 *
 * @pure true
 * @invariant any error → fail; warnings → fail only when failOn = warning
 */
export const computeVerdict = (findings: ReadonlyArray<Finding>, failOn: FailOn): Verdict => {
  if (hasSeverity(findings, "error")) {
    return "fail"
  }
  if (hasSeverity(findings, "warning")) {
    return failOn === "warning" ? "fail" : "warn"
  }
  return "pass"
}

export const countSeverities = (findings: ReadonlyArray<Finding>): SeverityCounts => {
  let info = 0
  let warning = 0
  let error = 0
  for (const finding of findings) {
    switch (finding.severity) {
      case "info":
        info += 1
        break
      case "warning":
        warning += 1
        break
      case "error":
        error += 1
        break
    }
  }
  return { info, warning, error }
}

export const runChecks = (
  model: WorkspaceModel,
  config: EffectiveConfig,
  checks: ReadonlyArray<Check>
): ReadonlyArray<Finding> => checks.flatMap((check) => check.run(model, config))

export const truncationReason = (maxFindings: number): string =>
  `findings truncated to max_findings=${maxFindings}`

/**
 * Evaluate every registered check and assemble the report.
 *
 * A finding dropped by truncation does not influence the verdict.
 *
 * @param model - Workspace model in scope.
 * @param config - Resolved policy.
 * @param checks - Ordered check registry.
 * @returns DomainReport; evaluation never fails.
 *
 * @pure true
 * @invariant findings.length = min(findingsTotal, maxFindings)
 * @complexity O(n log n)
 */
export const evaluate = (
  model: WorkspaceModel,
  config: EffectiveConfig,
  checks: ReadonlyArray<Check> = defaultChecks
): DomainReport => {
  const sorted = sortFindings(runChecks(model, config, checks))
  const findingsTotal = sorted.length
  const truncated = findingsTotal > config.maxFindings
  const emitted = truncated ? sorted.slice(0, config.maxFindings) : sorted
  const dependenciesScanned = model.manifests.reduce(
    (total, manifest) => total + manifest.dependencies.length,
    0
  )
  return {
    verdict: computeVerdict(emitted, config.failOn),
    findings: emitted,
    counts: countSeverities(emitted),
    data: {
      scope: config.scope,
      profile: config.profile,
      manifestsScanned: model.manifests.length,
      dependenciesScanned,
      findingsTotal,
      findingsEmitted: emitted.length,
      ...(truncated ? { truncatedReason: truncationReason(config.maxFindings) } : {})
    }
  }
}
