import { CheckIds, Codes } from "./ids.js"

// CHANGE: map check ids and finding codes to remediation guidance
// WHY: `explain` answers "what does this finding mean and how do I fix it"
// QUOTE(TZ): n/a
// REF: req-explain-1
// SOURCE: n/a
// FORMAT THEOREM: ∀id ∈ CheckIds ∪ Codes: lookup(id) ≠ undefined
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every policy check and every code has an entry
// COMPLEXITY: O(1)/O(1)

export interface Explanation {
  readonly title: string
  readonly description: string
  readonly remediation: string
}

const wildcard: Explanation = {
  title: "No Wildcard Versions",
  description: "Dependencies declared with wildcard requirements such as `*` or `1.*` accept any release, " +
    "so builds are not reproducible and breaking or vulnerable versions can be pulled in unnoticed.",
  remediation: "Replace the wildcard with an explicit requirement, e.g. `1.0` or `=1.2.3`."
}

const pathWithoutVersion: Explanation = {
  title: "Path Dependencies Require Version",
  description: "A publishable package that depends on a local path without a version cannot be consumed " +
    "from a registry: the path is dropped on publish and nothing remains to resolve.",
  remediation: "Add `version = \"x.y.z\"` next to `path`, or declare the dependency with `workspace = true`."
}

const absolutePath: Explanation = {
  title: "Absolute Dependency Path",
  description: "Absolute paths tie the workspace to one machine's layout and leak host details into manifests.",
  remediation: "Use a path relative to the manifest directory that stays inside the repository."
}

const parentEscape: Explanation = {
  title: "Dependency Path Escapes Repository",
  description: "A relative path whose `..` segments climb above the workspace root points outside the " +
    "repository, so checkouts elsewhere will not build.",
  remediation: "Move the dependency into the repository or depend on a published version instead."
}

const missingWorkspaceTrue: Explanation = {
  title: "Workspace Inheritance",
  description: "The dependency has a workspace-level definition, but this manifest declares it again " +
    "locally, so the two can drift apart.",
  remediation: "Declare it as `name = { workspace = true }` and keep the version in the workspace table."
}

const gitWithoutVersion: Explanation = {
  title: "Git Dependencies Require Version",
  description: "A publishable package cannot depend on a repository URL alone; registries need a version.",
  remediation: "Add `version = \"x.y.z\"` next to `git`, or declare the dependency with `workspace = true`."
}

const devDepInNormal: Explanation = {
  title: "Dev-Only Package In Normal Dependencies",
  description: "Test, mocking and benchmark packages declared under [dependencies] end up in every " +
    "consumer's build.",
  remediation: "Move the declaration to [dev-dependencies]; allowlist it if production code really uses it."
}

const defaultFeaturesImplicit: Explanation = {
  title: "Explicit Default Features",
  description: "Declarations with inline options (path, git, optional) should state whether default " +
    "features are enabled, so the intent survives later edits.",
  remediation: "Add `default-features = true` or `default-features = false`."
}

const duplicateDifferentVersions: Explanation = {
  title: "No Multiple Versions",
  description: "The same dependency is required with different version strings in different manifests " +
    "of the workspace.",
  remediation: "Define the dependency once in the workspace table and inherit it with `workspace = true`."
}

const optionalNotInFeatures: Explanation = {
  title: "Unused Optional Dependency",
  description: "An optional dependency that no feature enables can never be activated.",
  remediation: "Add a feature referencing it (`dep:name` or `name/feature`), or drop `optional = true`."
}

const runtimeError: Explanation = {
  title: "Tool Runtime Error",
  description: "The run failed before policy evaluation, e.g. because the configuration or the workspace " +
    "model could not be read.",
  remediation: "Fix the error named in the finding message and run again."
}

const explanations: Readonly<Record<string, Explanation>> = {
  [CheckIds.noWildcards]: wildcard,
  [CheckIds.pathRequiresVersion]: pathWithoutVersion,
  [CheckIds.pathSafety]: {
    title: "Path Safety",
    description: `${absolutePath.description} ${parentEscape.description}`,
    remediation: parentEscape.remediation
  },
  [CheckIds.workspaceInheritance]: missingWorkspaceTrue,
  [CheckIds.gitRequiresVersion]: gitWithoutVersion,
  [CheckIds.devOnlyInNormal]: devDepInNormal,
  [CheckIds.defaultFeaturesExplicit]: defaultFeaturesImplicit,
  [CheckIds.noMultipleVersions]: duplicateDifferentVersions,
  [CheckIds.optionalUnused]: optionalNotInFeatures,
  [CheckIds.toolRuntime]: runtimeError,
  [Codes.wildcardVersion]: wildcard,
  [Codes.pathWithoutVersion]: pathWithoutVersion,
  [Codes.absolutePath]: absolutePath,
  [Codes.parentEscape]: parentEscape,
  [Codes.missingWorkspaceTrue]: missingWorkspaceTrue,
  [Codes.gitWithoutVersion]: gitWithoutVersion,
  [Codes.devDepInNormal]: devDepInNormal,
  [Codes.defaultFeaturesImplicit]: defaultFeaturesImplicit,
  [Codes.duplicateDifferentVersions]: duplicateDifferentVersions,
  [Codes.optionalNotInFeatures]: optionalNotInFeatures,
  [Codes.runtimeError]: runtimeError
}

export const lookupExplanation = (identifier: string): Explanation | undefined =>
  Object.hasOwn(explanations, identifier) ? explanations[identifier] : undefined

export const allCheckIds: ReadonlyArray<string> = Object.values(CheckIds)

export const allCodes: ReadonlyArray<string> = Object.values(Codes)

export const renderExplanation = (identifier: string, explanation: Explanation): string =>
  [
    `${explanation.title} (${identifier})`,
    "",
    explanation.description,
    "",
    "Remediation:",
    `  ${explanation.remediation}`
  ].join("\n")
