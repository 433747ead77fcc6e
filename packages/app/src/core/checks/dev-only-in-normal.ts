import { fingerprint } from "../fingerprint.js"
import type { Finding } from "../finding.js"
import { CheckIds, Codes, FixActions } from "../ids.js"
import { checkPolicy } from "../policy.js"
import type { Check } from "./types.js"
import { buildAllowlist, declarationData, isAllowed } from "./utils.js"

// CHANGE: flag test, mocking and benchmark packages declared as production dependencies
// WHY: they bloat every consumer's build for no runtime benefit
// QUOTE(TZ): "a fixed reference set of conventionally test/dev/benchmark-only packages"
// REF: req-check-dev-only-1
// SOURCE: n/a
// FORMAT THEOREM: ∀f ∈ run(m, c): kind(f) = normal ∧ name(f) ∈ DEV_ONLY_PACKAGES
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: dev and build declarations are never flagged
// COMPLEXITY: O(d)

export const DEV_ONLY_PACKAGES: ReadonlySet<string> = new Set([
  // test frameworks
  "proptest",
  "quickcheck",
  "rstest",
  "test-case",
  "test-strategy",
  // mocking
  "mockall",
  "mockito",
  "wiremock",
  "httpmock",
  // snapshots
  "insta",
  "expect-test",
  // benchmarks
  "criterion",
  "divan",
  "iai",
  // test utilities
  "tempfile",
  "assert_cmd",
  "assert_fs",
  "predicates",
  "fake",
  "arbitrary",
  "cargo-llvm-cov"
])

export const devOnlyInNormal: Check = {
  id: CheckIds.devOnlyInNormal,
  run: (model, config) => {
    const policy = checkPolicy(config, CheckIds.devOnlyInNormal)
    if (policy === undefined) {
      return []
    }
    const allowlist = buildAllowlist(policy.allow)
    const findings: Array<Finding> = []
    for (const manifest of model.manifests) {
      for (const dep of manifest.dependencies) {
        if (dep.kind !== "normal" || !DEV_ONLY_PACKAGES.has(dep.name)) {
          continue
        }
        if (isAllowed(allowlist, dep.name)) {
          continue
        }
        findings.push({
          severity: policy.severity,
          checkId: CheckIds.devOnlyInNormal,
          code: Codes.devDepInNormal,
          message: `dependency '${dep.name}' is typically dev-only but appears in [dependencies]`,
          ...(dep.location === undefined ? {} : { location: dep.location }),
          help: "Move this dependency to [dev-dependencies] unless production code needs it.",
          fingerprint: fingerprint(CheckIds.devOnlyInNormal, Codes.devDepInNormal, manifest.path, dep.name),
          data: declarationData(manifest, dep, {
            fix_action: FixActions.moveToDevDependencies,
            fix_hint: "Move to [dev-dependencies]"
          })
        })
      }
    }
    return findings
  }
}
