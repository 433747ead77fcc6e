import { fingerprint } from "../fingerprint.js"
import type { Finding } from "../finding.js"
import { CheckIds, Codes } from "../ids.js"
import type { DependencyDecl, ManifestModel } from "../model.js"
import { manifestDirDepth } from "../model.js"
import type { CheckPolicy } from "../policy.js"
import { checkPolicy } from "../policy.js"
import type { Check } from "./types.js"
import { buildAllowlist, declarationData, isAllowed } from "./utils.js"

// CHANGE: reject absolute dependency paths and paths that climb above the workspace root
// WHY: such paths are not portable and leak the host layout
// QUOTE(TZ): "a negative depth signals an escape"
// REF: req-check-path-safety-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p: escapes(d, p) ↔ ∃ prefix of p where d + Σ(step) < 0
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: at most one finding per declaration; absolute wins over escape
// COMPLEXITY: O(d·s) where s = segments per path

const DRIVE_PREFIX = /^[A-Za-z]:/u

export const isAbsolutePath = (path: string): boolean =>
  path.startsWith("/") || path.startsWith("\\") || DRIVE_PREFIX.test(path)

/**
 * Walk the relative path from the manifest directory and report whether it leaves the root.
 *
 * @param startDepth - Directory depth of the manifest below the workspace root.
 * @param relativePath - Dependency path as declared.
 *
 * @pure true
 * @complexity O(s)
 */
export const escapesRoot = (startDepth: number, relativePath: string): boolean => {
  let depth = startDepth
  for (const segment of relativePath.split(/[/\\]/u)) {
    if (segment === "" || segment === ".") {
      continue
    }
    if (segment === "..") {
      depth -= 1
      if (depth < 0) {
        return true
      }
      continue
    }
    depth += 1
  }
  return false
}

const pathFinding = (
  policy: CheckPolicy,
  manifest: ManifestModel,
  dep: DependencyDecl,
  path: string,
  code: string,
  message: string,
  help: string
): Finding => ({
  severity: policy.severity,
  checkId: CheckIds.pathSafety,
  code,
  message,
  ...(dep.location === undefined ? {} : { location: dep.location }),
  help,
  fingerprint: fingerprint(CheckIds.pathSafety, code, manifest.path, dep.name, path),
  data: declarationData(manifest, dep, { path })
})

export const pathSafety: Check = {
  id: CheckIds.pathSafety,
  run: (model, config) => {
    const policy = checkPolicy(config, CheckIds.pathSafety)
    if (policy === undefined) {
      return []
    }
    const allowlist = buildAllowlist(policy.allow)
    const findings: Array<Finding> = []
    for (const manifest of model.manifests) {
      const depth = manifestDirDepth(manifest.path)
      for (const dep of manifest.dependencies) {
        const path = dep.spec.path
        if (path === undefined || isAllowed(allowlist, path)) {
          continue
        }
        if (isAbsolutePath(path)) {
          findings.push(
            pathFinding(
              policy,
              manifest,
              dep,
              path,
              Codes.absolutePath,
              `dependency '${dep.name}' uses an absolute path: ${path}`,
              "Use repo-relative paths; absolute paths are not portable and may leak host layout."
            )
          )
          continue
        }
        if (escapesRoot(depth, path)) {
          findings.push(
            pathFinding(
              policy,
              manifest,
              dep,
              path,
              Codes.parentEscape,
              `dependency '${dep.name}' uses a path that escapes the repo root: ${path}`,
              "Avoid `..` segments that escape the repository root."
            )
          )
        }
      }
    }
    return findings
  }
}
