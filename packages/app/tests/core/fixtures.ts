import type { Finding } from "../../src/core/finding.js"
import type {
  DependencyDecl,
  DepKind,
  DepSpec,
  Location,
  ManifestModel,
  PackageMeta,
  WorkspaceDependency,
  WorkspaceModel
} from "../../src/core/model.js"
import type { CheckPolicy, EffectiveConfig } from "../../src/core/policy.js"
import { enabledPolicy } from "../../src/core/policy.js"
import { presetFor } from "../../src/core/presets.js"

export interface DeclOptions {
  readonly kind?: DepKind
  readonly location?: Location
  readonly target?: string
}

export const declare = (
  name: string,
  spec: Partial<DepSpec>,
  options: DeclOptions = {}
): DependencyDecl => ({
  kind: options.kind ?? "normal",
  name,
  spec: { workspace: false, optional: false, ...spec },
  ...(options.location === undefined ? {} : { location: options.location }),
  ...(options.target === undefined ? {} : { target: options.target })
})

export interface ManifestOptions {
  readonly package?: PackageMeta
  readonly features?: Readonly<Record<string, ReadonlyArray<string>>>
}

export const publishable = (name: string): PackageMeta => ({ name, publish: true })

export const manifest = (
  path: string,
  dependencies: ReadonlyArray<DependencyDecl>,
  options: ManifestOptions = {}
): ManifestModel => ({
  path,
  ...(options.package === undefined ? {} : { package: options.package }),
  features: options.features ?? {},
  dependencies
})

export const workspace = (
  manifests: ReadonlyArray<ManifestModel>,
  workspaceDependencies: Readonly<Record<string, WorkspaceDependency>> = {}
): WorkspaceModel => ({
  root: ".",
  workspaceDependencies,
  manifests
})

/** Strict preset with every check but `checkId` removed. */
export const onlyCheck = (checkId: string, policy: Partial<CheckPolicy> = {}): EffectiveConfig => ({
  ...presetFor("strict"),
  checks: { [checkId]: { ...enabledPolicy("error"), ...policy } }
})

export const finding = (overrides: Partial<Finding> & Pick<Finding, "checkId">): Finding => ({
  severity: "error",
  code: "code",
  message: "message",
  data: {},
  ...overrides
})
