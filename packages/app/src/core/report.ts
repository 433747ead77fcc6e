import { Match } from "effect"

import type { DomainReport, ReportData } from "./engine.js"
import type { Finding, Severity, Verdict } from "./finding.js"
import { fingerprint, WORKSPACE_LEVEL_PATH } from "./fingerprint.js"
import { CheckIds, Codes } from "./ids.js"
import type { Json, JsonObject } from "./json.js"
import type { Scope } from "./policy.js"
import { DEFAULT_PROFILE } from "./presets.js"

// CHANGE: wrap domain reports in a versioned envelope and render output formats
// WHY: keep reporting pure and deterministic across CLI modes
// QUOTE(TZ): "The report structure (envelope/schema) is owned by the surrounding system"
// REF: req-report-1
// SOURCE: n/a
// FORMAT THEOREM: ∀r: render(r) depends only on r
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: findings are rendered in report order
// COMPLEXITY: O(n)

export const REPORT_SCHEMA = "depwarden.report.v1"

export interface ToolInfo {
  readonly name: string
  readonly version: string
}

export interface RunMeta {
  readonly tool: ToolInfo
  readonly startedAt: Date
  readonly finishedAt: Date
}

export interface ReportEnvelope extends DomainReport {
  readonly schema: typeof REPORT_SCHEMA
  readonly tool: ToolInfo
  readonly startedAt: string
  readonly finishedAt: string
}

/**
 * Attach tool identity and run timestamps to a domain report.
 *
 * @pure true
 * @invariant timestamps are ISO-8601 UTC
 */
export const buildEnvelope = (report: DomainReport, meta: RunMeta): ReportEnvelope => ({
  schema: REPORT_SCHEMA,
  tool: meta.tool,
  startedAt: meta.startedAt.toISOString(),
  finishedAt: meta.finishedAt.toISOString(),
  ...report
})

export interface RuntimeContext {
  readonly scope?: Scope
  readonly profile?: string
}

/**
 * Report emitted when the run fails before evaluation (bad config, unreadable model).
 *
 * @param message - Rendered error.
 * @param context - Whatever of scope/profile was known when the failure happened.
 * @returns Single-finding report with verdict fail.
 *
 * @pure true
 * @invariant verdict = fail ∧ counts.error = 1
 */
export const runtimeFailureReport = (message: string, context: RuntimeContext = {}): DomainReport => {
  const finding: Finding = {
    severity: "error",
    checkId: CheckIds.toolRuntime,
    code: Codes.runtimeError,
    message,
    fingerprint: fingerprint(CheckIds.toolRuntime, Codes.runtimeError, WORKSPACE_LEVEL_PATH, "", message),
    data: { error: message }
  }
  return {
    verdict: "fail",
    findings: [finding],
    counts: { info: 0, warning: 0, error: 1 },
    data: {
      scope: context.scope ?? "repo",
      profile: context.profile ?? DEFAULT_PROFILE,
      manifestsScanned: 0,
      dependenciesScanned: 0,
      findingsTotal: 1,
      findingsEmitted: 1
    }
  }
}

/** Exit status for tool failures (bad input, unreadable files, unknown explain ids). */
export const RUNTIME_ERROR_EXIT_CODE = 1

/** Process exit status: pass 0, warn 1, fail 2; advisory runs always exit 0. */
export const verdictExitCode = (verdict: Verdict, advisory = false): number => {
  if (advisory) {
    return 0
  }
  return Match.value(verdict).pipe(
    Match.when("pass", () => 0),
    Match.when("warn", () => 1),
    Match.when("fail", () => 2),
    Match.exhaustive
  )
}

const verdictLabel = (verdict: Verdict): string => verdict.toUpperCase()

const severityLabel = (severity: Severity): string =>
  Match.value(severity).pipe(
    Match.when("info", () => "INFO"),
    Match.when("warning", () => "WARN"),
    Match.when("error", () => "ERROR"),
    Match.exhaustive
  )

const markdownFinding = (finding: Finding): ReadonlyArray<string> => {
  const head = `- [${severityLabel(finding.severity)}] \`${finding.checkId}\` / \`${finding.code}\`: ${finding.message}`
  const location = finding.location === undefined
    ? ""
    : finding.location.line === undefined
    ? ` (\`${finding.location.path}\`)`
    : ` (\`${finding.location.path}\`:${finding.location.line})`
  return [
    head + location,
    ...(finding.help === undefined ? [] : [`  - help: ${finding.help}`]),
    ...(finding.url === undefined ? [] : [`  - url: ${finding.url}`])
  ]
}

/**
 * Render a Markdown summary suitable for PR comments and job summaries.
 *
 * @pure true
 * @complexity O(n)
 */
export const renderMarkdown = (report: DomainReport): string => {
  const header = [
    "# depwarden report",
    "",
    `- Verdict: **${verdictLabel(report.verdict)}**`,
    `- Findings: ${report.data.findingsEmitted} (emitted) / ${report.data.findingsTotal} (total)`,
    ""
  ]
  const note = report.data.truncatedReason === undefined ? [] : [`> Note: ${report.data.truncatedReason}`, ""]
  if (report.findings.length === 0) {
    return [...header, ...note, "No findings.", ""].join("\n")
  }
  return [...header, ...note, "## Findings", "", ...report.findings.flatMap(markdownFinding), ""].join("\n")
}

const annotationLevel = (severity: Severity): string =>
  Match.value(severity).pipe(
    Match.when("info", () => "notice"),
    Match.when("warning", () => "warning"),
    Match.when("error", () => "error"),
    Match.exhaustive
  )

/** Workflow-command escaping for annotation messages. */
export const escapeAnnotation = (value: string): string =>
  value.replaceAll("%", "%25").replaceAll("\r", "%0D").replaceAll("\n", "%0A")

const annotationProperties = (finding: Finding): string => {
  const location = finding.location
  if (location === undefined) {
    return ""
  }
  const parts = [
    `file=${location.path}`,
    ...(location.line === undefined ? [] : [`line=${location.line}`]),
    ...(location.col === undefined ? [] : [`col=${location.col}`])
  ]
  return ` ${parts.join(",")}`
}

/**
 * Render one GitHub Actions workflow command per finding.
 *
 * @pure true
 * @invariant result.length = report.findings.length
 */
export const renderAnnotations = (report: DomainReport): ReadonlyArray<string> =>
  report.findings.map((finding) =>
    `::${annotationLevel(finding.severity)}${annotationProperties(finding)}::${
      escapeAnnotation(`[${finding.checkId}:${finding.code}] ${finding.message}`)
    }`
  )

const findingToJson = (finding: Finding): JsonObject => ({
  severity: finding.severity,
  check_id: finding.checkId,
  code: finding.code,
  message: finding.message,
  ...(finding.location === undefined ? {} : {
    location: {
      path: finding.location.path,
      ...(finding.location.line === undefined ? {} : { line: finding.location.line }),
      ...(finding.location.col === undefined ? {} : { col: finding.location.col })
    }
  }),
  ...(finding.help === undefined ? {} : { help: finding.help }),
  ...(finding.url === undefined ? {} : { url: finding.url }),
  ...(finding.fingerprint === undefined ? {} : { fingerprint: finding.fingerprint }),
  data: finding.data
})

const dataToJson = (data: ReportData): JsonObject => ({
  scope: data.scope,
  profile: data.profile,
  manifests_scanned: data.manifestsScanned,
  dependencies_scanned: data.dependenciesScanned,
  findings_total: data.findingsTotal,
  findings_emitted: data.findingsEmitted,
  ...(data.truncatedReason === undefined ? {} : { truncated_reason: data.truncatedReason })
})

/**
 * Wire form of the envelope (snake_case keys, absent fields omitted).
 *
 * @pure true
 */
export const envelopeToJson = (envelope: ReportEnvelope): Json => ({
  schema: envelope.schema,
  tool: { name: envelope.tool.name, version: envelope.tool.version },
  started_at: envelope.startedAt,
  finished_at: envelope.finishedAt,
  verdict: envelope.verdict,
  counts: { info: envelope.counts.info, warning: envelope.counts.warning, error: envelope.counts.error },
  findings: envelope.findings.map(findingToJson),
  data: dataToJson(envelope.data)
})

export const renderJson = (envelope: ReportEnvelope): string => JSON.stringify(envelopeToJson(envelope), null, 2)
