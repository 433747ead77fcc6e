// CHANGE: centralize stable check identifiers and finding codes
// WHY: ids are part of the report contract and of every fingerprint
// QUOTE(TZ): "independently addressable by a stable dotted check identifier"
// REF: req-ids-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c ∈ CheckIds: c matches /^[a-z]+\.[a-z_]+$/
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: ids never change once released
// COMPLEXITY: O(1)/O(1)

export const CheckIds = {
  noWildcards: "deps.no_wildcards",
  pathRequiresVersion: "deps.path_requires_version",
  pathSafety: "deps.path_safety",
  workspaceInheritance: "deps.workspace_inheritance",
  gitRequiresVersion: "deps.git_requires_version",
  devOnlyInNormal: "deps.dev_only_in_normal",
  defaultFeaturesExplicit: "deps.default_features_explicit",
  noMultipleVersions: "deps.no_multiple_versions",
  optionalUnused: "deps.optional_unused",
  toolRuntime: "tool.runtime"
} as const

export const Codes = {
  wildcardVersion: "wildcard_version",
  pathWithoutVersion: "path_without_version",
  absolutePath: "absolute_path",
  parentEscape: "parent_escape",
  missingWorkspaceTrue: "missing_workspace_true",
  gitWithoutVersion: "git_without_version",
  devDepInNormal: "dev_dep_in_normal",
  defaultFeaturesImplicit: "default_features_implicit",
  duplicateDifferentVersions: "duplicate_different_versions",
  optionalNotInFeatures: "optional_not_in_features",
  runtimeError: "runtime_error"
} as const

export const FixActions = {
  pinVersion: "pin_version",
  addVersionWithPath: "add_version_with_path",
  addVersionWithGit: "add_version_with_git",
  useWorkspaceTrue: "use_workspace_true",
  moveToDevDependencies: "move_to_dev_dependencies"
} as const

/** Checks evaluated against dependency declarations, in registration order. */
export const policyCheckIds: ReadonlyArray<string> = [
  CheckIds.noWildcards,
  CheckIds.pathRequiresVersion,
  CheckIds.pathSafety,
  CheckIds.workspaceInheritance,
  CheckIds.gitRequiresVersion,
  CheckIds.devOnlyInNormal,
  CheckIds.defaultFeaturesExplicit,
  CheckIds.noMultipleVersions,
  CheckIds.optionalUnused
]
