import type { JsonObject } from "./json.js"

// CHANGE: model the workspace, its manifests and their dependency declarations
// WHY: checks evaluate an immutable, already-normalized view of the workspace
// QUOTE(TZ): "Built once per evaluation run; never mutated after construction"
// REF: req-model-1
// SOURCE: n/a
// FORMAT THEOREM: ∀m ∈ manifests: m.path = repoPath(m.path)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every field is readonly; checks only read the model
// COMPLEXITY: O(1)/O(1)

export type DepKind = "normal" | "dev" | "build"

export interface Location {
  readonly path: string
  readonly line?: number
  readonly col?: number
}

export interface DepSpec {
  readonly version?: string
  readonly path?: string
  readonly git?: string
  readonly branch?: string
  readonly tag?: string
  readonly rev?: string
  /** Inherit the definition from the workspace-level dependency table. */
  readonly workspace: boolean
  /** `undefined` when the manifest does not state it. */
  readonly defaultFeatures?: boolean
  readonly optional: boolean
}

export interface DependencyDecl {
  readonly kind: DepKind
  readonly name: string
  readonly spec: DepSpec
  readonly location?: Location
  /** Target qualifier such as `cfg(unix)`; diagnostic context only. */
  readonly target?: string
}

export interface PackageMeta {
  readonly name: string
  readonly publish: boolean
}

export interface ManifestModel {
  readonly path: string
  readonly package?: PackageMeta
  readonly features: Readonly<Record<string, ReadonlyArray<string>>>
  readonly dependencies: ReadonlyArray<DependencyDecl>
}

export interface WorkspaceDependency {
  readonly name: string
  readonly version?: string
  readonly path?: string
  readonly workspace: boolean
}

export interface WorkspaceModel {
  readonly root: string
  readonly workspaceDependencies: Readonly<Record<string, WorkspaceDependency>>
  /** Root manifest first. */
  readonly manifests: ReadonlyArray<ManifestModel>
}

/**
 * Canonicalize a repo-relative path.
 *
 * @param value - Raw path as produced by the model builder.
 * @returns Path with forward slashes and without leading `./`; empty becomes `.`.
 *
 * @pure true
 * @invariant repoPath(repoPath(p)) = repoPath(p)
 * @complexity O(n)
 */
export const repoPath = (value: string): string => {
  let normalized = value.replaceAll("\\", "/")
  while (normalized.startsWith("./")) {
    normalized = normalized.slice(2)
  }
  return normalized.length === 0 ? "." : normalized
}

export const isPublishable = (manifest: ManifestModel): boolean => manifest.package?.publish ?? false

/**
 * Number of directory segments above the manifest file.
 *
 * @param manifestPath - Repo-relative manifest path, e.g. `crates/foo/Cargo.toml`.
 * @returns 0 for a root manifest, 2 for `crates/foo/Cargo.toml`.
 *
 * @pure true
 * @complexity O(n)
 */
export const manifestDirDepth = (manifestPath: string): number => {
  const segments = repoPath(manifestPath).split("/").filter((segment) => segment.length > 0)
  return segments
    .slice(0, -1)
    .filter((segment) => segment !== ".")
    .length
}

export const sectionName = (kind: DepKind): string => {
  switch (kind) {
    case "normal":
      return "dependencies"
    case "dev":
      return "dev-dependencies"
    case "build":
      return "build-dependencies"
  }
}

/**
 * Render a declared spec as a JSON object for finding data.
 *
 * @pure true
 * @invariant only fields the manifest states are present
 */
export const specToJson = (spec: DepSpec): JsonObject => ({
  ...(spec.version === undefined ? {} : { version: spec.version }),
  ...(spec.path === undefined ? {} : { path: spec.path }),
  ...(spec.workspace ? { workspace: true } : {}),
  ...(spec.git === undefined ? {} : { git: spec.git }),
  ...(spec.branch === undefined ? {} : { branch: spec.branch }),
  ...(spec.tag === undefined ? {} : { tag: spec.tag }),
  ...(spec.rev === undefined ? {} : { rev: spec.rev }),
  ...(spec.defaultFeatures === undefined ? {} : { "default-features": spec.defaultFeatures }),
  ...(spec.optional ? { optional: true } : {})
})
