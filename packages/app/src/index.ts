export type { Check } from "./core/checks/index.js"
export { defaultChecks } from "./core/checks/index.js"
export type { Overrides, RawCheckConfig, RawConfig } from "./core/config.js"
export { applyCallerOverrides, applyCheckOverrides, applyTopLevel, requestedProfile, resolveConfig, selectPreset } from "./core/config.js"
export type { DomainReport, ReportData } from "./core/engine.js"
export { compareFindings, computeVerdict, evaluate } from "./core/engine.js"
export type { AppError, ConfigResolutionError } from "./core/errors.js"
export { formatAppError } from "./core/errors.js"
export type { Explanation } from "./core/explain.js"
export { allCheckIds, allCodes, lookupExplanation, renderExplanation } from "./core/explain.js"
export type { Finding, Severity, SeverityCounts, Verdict } from "./core/finding.js"
export { fingerprint } from "./core/fingerprint.js"
export { CheckIds, Codes } from "./core/ids.js"
export type {
  DependencyDecl,
  DepKind,
  DepSpec,
  Location,
  ManifestModel,
  PackageMeta,
  WorkspaceDependency,
  WorkspaceModel
} from "./core/model.js"
export { isPublishable, manifestDirDepth, repoPath } from "./core/model.js"
export type { CheckPolicy, EffectiveConfig, FailOn, Scope } from "./core/policy.js"
export { checkPolicy } from "./core/policy.js"
export { isKnownProfile, presetFor, profileNames } from "./core/presets.js"
export type { ReportEnvelope, ToolInfo } from "./core/report.js"
export { buildEnvelope, renderAnnotations, renderJson, renderMarkdown, runtimeFailureReport, verdictExitCode } from "./core/report.js"
export { selectScope } from "./core/scope.js"
export { decodeModel, loadModelFile } from "./shell/model-file.js"
export { decodeConfig, loadConfigFile } from "./shell/config-file.js"
