import { createHash } from "node:crypto"

// CHANGE: compute stable identities for findings
// WHY: deduplicate and trend findings across runs even when message text changes
// QUOTE(TZ): "a content identity for a finding independent of message wording"
// REF: req-fingerprint-1
// SOURCE: n/a
// FORMAT THEOREM: ∀a,b: fields(a) = fields(b) → fingerprint(a) = fingerprint(b)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: output is 64 lowercase hex characters
// COMPLEXITY: O(n) where n = total field length

const FIELD_DELIMITER = "|"

/** Manifest path used for findings that belong to the workspace as a whole. */
export const WORKSPACE_LEVEL_PATH = "."

/**
 * SHA-256 over `checkId|code|manifestPath|dependencyName[|extra]`.
 *
 * @param extra - Optional disambiguator such as a dependency path or URL; appended only when defined.
 * @returns Hex-encoded digest.
 *
 * @pure true
 * @complexity O(n)
 */
export const fingerprint = (
  checkId: string,
  code: string,
  manifestPath: string,
  dependencyName: string,
  extra?: string
): string => {
  const parts = [checkId, code, manifestPath, dependencyName]
  if (extra !== undefined) {
    parts.push(extra)
  }
  return createHash("sha256").update(parts.join(FIELD_DELIMITER), "utf8").digest("hex")
}
