import type { Json, JsonObject } from "../json.js"
import { compileGlobs, matchesAnyGlob } from "../glob.js"
import type { DependencyDecl, ManifestModel } from "../model.js"
import { sectionName, specToJson } from "../model.js"

// shared helpers for check implementations

export type Allowlist = ReadonlyArray<RegExp>

export const buildAllowlist = (allow: ReadonlyArray<string>): Allowlist => compileGlobs(allow)

export const isAllowed = (allowlist: Allowlist, value: string): boolean =>
  allowlist.length > 0 && matchesAnyGlob(allowlist, value)

/**
 * Common payload for findings about a single declaration; keys are in ascending order.
 */
export const declarationData = (
  manifest: ManifestModel,
  dep: DependencyDecl,
  extra: Readonly<Record<string, Json>> = {}
): JsonObject => {
  const entries: Record<string, Json> = {
    ...extra,
    current_spec: specToJson(dep.spec),
    dependency: dep.name,
    manifest: manifest.path,
    section: sectionName(dep.kind),
    ...(dep.target === undefined ? {} : { target: dep.target })
  }
  const ordered: Record<string, Json> = {}
  for (const key of Object.keys(entries).sort()) {
    const value = entries[key]
    if (value !== undefined) {
      ordered[key] = value
    }
  }
  return ordered
}
