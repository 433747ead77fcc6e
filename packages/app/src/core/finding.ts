import type { JsonObject } from "./json.js"
import type { Location } from "./model.js"

// CHANGE: define findings, severities and verdicts produced by the engine
// WHY: checks, engine and renderers share one immutable finding shape
// QUOTE(TZ): "Findings are created only by checks, consumed read-only thereafter"
// REF: req-finding-1
// SOURCE: n/a
// FORMAT THEOREM: ∀f ∈ Finding: f.severity ∈ {info, warning, error}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: severity order is info < warning < error
// COMPLEXITY: O(1)/O(1)

export type Severity = "info" | "warning" | "error"

export type Verdict = "pass" | "warn" | "fail"

export interface Finding {
  readonly severity: Severity
  readonly checkId: string
  readonly code: string
  readonly message: string
  readonly location?: Location
  readonly help?: string
  readonly url?: string
  /** Stable identity for cross-run deduplication; independent of message wording. */
  readonly fingerprint?: string
  readonly data: JsonObject
}

export interface SeverityCounts {
  readonly info: number
  readonly warning: number
  readonly error: number
}

/** Sort rank: errors first. */
export const severityRank = (severity: Severity): number => {
  switch (severity) {
    case "error":
      return 0
    case "warning":
      return 1
    case "info":
      return 2
  }
}
