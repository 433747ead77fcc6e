import { defaultFeaturesExplicit } from "./default-features-explicit.js"
import { devOnlyInNormal } from "./dev-only-in-normal.js"
import { gitRequiresVersion } from "./git-requires-version.js"
import { noMultipleVersions } from "./no-multiple-versions.js"
import { noWildcards } from "./no-wildcards.js"
import { optionalUnused } from "./optional-unused.js"
import { pathRequiresVersion } from "./path-requires-version.js"
import { pathSafety } from "./path-safety.js"
import type { Check } from "./types.js"
import { workspaceInheritance } from "./workspace-inheritance.js"

export type { Check } from "./types.js"

/** Built-in checks in registration order. */
export const defaultChecks: ReadonlyArray<Check> = [
  noWildcards,
  pathRequiresVersion,
  pathSafety,
  workspaceInheritance,
  gitRequiresVersion,
  devOnlyInNormal,
  defaultFeaturesExplicit,
  noMultipleVersions,
  optionalUnused
]
