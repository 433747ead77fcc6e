import type { Finding } from "../finding.js"
import type { WorkspaceModel } from "../model.js"
import type { EffectiveConfig } from "../policy.js"

// CHANGE: describe a check as a small object exposing one pure method
// WHY: the registry is an explicit ordered list instead of hidden global state
// QUOTE(TZ): "an explicit, ordered collection of function references"
// REF: req-check-registry-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: c.run(model, cfg) depends only on (model, cfg)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: checks never read each other's output
// COMPLEXITY: O(1)/O(1)

export interface Check {
  readonly id: string
  readonly run: (model: WorkspaceModel, config: EffectiveConfig) => ReadonlyArray<Finding>
}
