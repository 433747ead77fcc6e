import * as Either from "effect/Either"

import type { ScopeError } from "./errors.js"
import { scopeError } from "./errors.js"
import type { ManifestModel, WorkspaceModel } from "./model.js"
import { repoPath } from "./model.js"
import type { Scope } from "./policy.js"

// CHANGE: narrow the workspace to changed manifests for incremental runs
// WHY: diff scope evaluates only what a change touched, plus the root for shared definitions
// QUOTE(TZ): "whether evaluation covers the whole workspace or only a caller-supplied changed-file subset"
// REF: req-scope-1
// SOURCE: n/a
// FORMAT THEOREM: ∀m ∈ select(diff).manifests: m = root ∨ m.path ∈ changed
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: manifest order and workspace dependencies are preserved
// COMPLEXITY: O(m + c)

const ROOT_MANIFEST = "Cargo.toml"

const rootManifestPath = (manifests: ReadonlyArray<ManifestModel>): string | undefined =>
  manifests.some((manifest) => manifest.path === ROOT_MANIFEST) ? ROOT_MANIFEST : manifests[0]?.path

/**
 * Select the manifests in scope.
 *
 * @param model - Full workspace model.
 * @param scope - Resolved scope.
 * @param changedFiles - Repo-relative paths changed by the current revision; required for diff scope.
 *
 * @pure true
 * @invariant select(repo) = model
 */
export const selectScope = (
  model: WorkspaceModel,
  scope: Scope,
  changedFiles: ReadonlyArray<string> | undefined
): Either.Either<WorkspaceModel, ScopeError> => {
  if (scope === "repo") {
    return Either.right(model)
  }
  if (changedFiles === undefined) {
    return Either.left(scopeError("diff scope requires a list of changed files"))
  }
  const changed = new Set(changedFiles.map(repoPath))
  const root = rootManifestPath(model.manifests)
  return Either.right({
    ...model,
    manifests: model.manifests.filter((manifest) => manifest.path === root || changed.has(manifest.path))
  })
}
