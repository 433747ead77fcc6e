import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Match } from "effect"
import * as Clock from "effect/Clock"
import type * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs, toOverrides } from "../core/cli.js"
import { requestedProfile, resolveConfig } from "../core/config.js"
import type { DomainReport } from "../core/engine.js"
import { evaluate } from "../core/engine.js"
import { type AppError, formatAppError } from "../core/errors.js"
import { allCheckIds, allCodes, lookupExplanation, renderExplanation } from "../core/explain.js"
import type { WorkspaceModel } from "../core/model.js"
import type { EffectiveConfig } from "../core/policy.js"
import { isKnownProfile, profileNames } from "../core/presets.js"
import type { ReportEnvelope, RuntimeContext, ToolInfo } from "../core/report.js"
import {
  buildEnvelope,
  renderAnnotations,
  renderJson,
  renderMarkdown,
  RUNTIME_ERROR_EXIT_CODE,
  runtimeFailureReport,
  verdictExitCode
} from "../core/report.js"
import { selectScope } from "../core/scope.js"
import { loadConfigFile } from "../shell/config-file.js"
import { loggingLayer } from "../shell/logging.js"
import { loadModelFile } from "../shell/model-file.js"

// CHANGE: orchestrate check/explain with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// QUOTE(TZ): "Configuration errors abort evaluation before any check runs; the caller is expected to convert them into a runtime-failure report"
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: run(argv) returns exitCode ∈ {0,1,2}
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: report emitted at most once
// COMPLEXITY: O(n log n) where n = findings

export const TOOL: ToolInfo = { name: "depwarden", version: "0.1.0" }

export interface ProgramResult {
  readonly exitCode: number
  /** Everything written to stdout. */
  readonly output: string
  readonly report?: ReportEnvelope
}

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const writeStderr = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stderr.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const resolveEffectiveConfig = (cli: CliArgs): Effect.Effect<EffectiveConfig, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const raw = yield* _(loadConfigFile(cli.configPath, cli.configExplicit))
    const overrides = toOverrides(cli)
    const config = yield* _(fromEither(resolveConfig(raw, overrides)))
    const requested = requestedProfile(raw, overrides)
    if (!isKnownProfile(requested)) {
      yield* _(
        Effect.logWarning(`unknown profile ${requested}, using strict`).pipe(
          Effect.annotateLogs({ known: profileNames.join("|") })
        )
      )
    }
    yield* _(
      Effect.logDebug("config resolved").pipe(
        Effect.annotateLogs({ profile: config.profile, scope: config.scope, failOn: config.failOn })
      )
    )
    return config
  })

const loadScopedModel = (
  cli: CliArgs,
  config: EffectiveConfig
): Effect.Effect<WorkspaceModel, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const model = yield* _(loadModelFile(cli.modelPath))
    const scoped = yield* _(fromEither(selectScope(model, config.scope, cli.changed)))
    yield* _(
      Effect.logDebug("workspace model loaded").pipe(
        Effect.annotateLogs({ manifests: model.manifests.length, inScope: scoped.manifests.length })
      )
    )
    return scoped
  })

const failureReport = (error: AppError, context: RuntimeContext): Effect.Effect<DomainReport> => {
  const message = formatAppError(error)
  return Effect.logError(message).pipe(Effect.as(runtimeFailureReport(message, context)))
}

interface Evaluation {
  readonly report: DomainReport
  readonly failed: boolean
}

const evaluateRun = (cli: CliArgs): Effect.Effect<Evaluation, never, FileSystemService> =>
  resolveEffectiveConfig(cli).pipe(
    Effect.matchEffect({
      onFailure: (error) => Effect.map(failureReport(error, {}), (report) => ({ report, failed: true })),
      onSuccess: (config) =>
        loadScopedModel(cli, config).pipe(
          Effect.matchEffect({
            onFailure: (error) =>
              Effect.map(
                failureReport(error, { scope: config.scope, profile: config.profile }),
                (report) => ({ report, failed: true })
              ),
            onSuccess: (model) => Effect.succeed({ report: evaluate(model, config), failed: false })
          })
        )
    })
  )

const renderEnvelope = (cli: CliArgs, envelope: ReportEnvelope): string =>
  Match.value(cli.format).pipe(
    Match.when("markdown", () => renderMarkdown(envelope)),
    Match.when("json", () => renderJson(envelope)),
    Match.when("annotations", () => renderAnnotations(envelope).join("\n")),
    Match.exhaustive
  )

const currentDate: Effect.Effect<Date> = Effect.map(Clock.currentTimeMillis, (millis) => new Date(millis))

const handleCheck = (cli: CliArgs): Effect.Effect<ProgramResult, never, FileSystemService> =>
  Effect.gen(function*(_) {
    const startedAt = yield* _(currentDate)
    const { failed, report } = yield* _(evaluateRun(cli))
    const finishedAt = yield* _(currentDate)
    const envelope = buildEnvelope(report, { tool: TOOL, startedAt, finishedAt })
    yield* _(
      Effect.logInfo("evaluation finished").pipe(
        Effect.annotateLogs({
          verdict: envelope.verdict,
          findings: envelope.data.findingsEmitted,
          total: envelope.data.findingsTotal
        })
      )
    )
    const output = cli.silent ? "" : renderEnvelope(cli, envelope)
    if (output.length > 0) {
      yield* _(writeStdout(output))
    }
    const exitCode = failed && !cli.advisory
      ? RUNTIME_ERROR_EXIT_CODE
      : verdictExitCode(envelope.verdict, cli.advisory)
    return { exitCode, output, report: envelope }
  })

const notFoundMessage = (identifier: string): string =>
  [
    `Unknown check id or code: ${identifier}`,
    "",
    "Available check ids:",
    ...allCheckIds.map((id) => `  ${id}`),
    "",
    "Available codes:",
    ...allCodes.map((code) => `  ${code}`)
  ].join("\n")

const handleExplain = (identifier: string): Effect.Effect<ProgramResult> =>
  Effect.gen(function*(_) {
    const explanation = lookupExplanation(identifier)
    if (explanation === undefined) {
      yield* _(writeStderr(notFoundMessage(identifier)))
      return { exitCode: RUNTIME_ERROR_EXIT_CODE, output: "" }
    }
    const output = renderExplanation(identifier, explanation)
    yield* _(writeStdout(output))
    return { exitCode: 0, output }
  })

const executeCommand = (cli: CliArgs): Effect.Effect<ProgramResult, never, FileSystemService> =>
  Match.value(cli.command).pipe(
    Match.when("check", () => handleCheck(cli)),
    Match.when("explain", () => handleExplain(cli.explainId ?? "")),
    Match.exhaustive
  )

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with rendered output and exit code; only argument errors fail.
 *
 * @pure false
 * @effect FileSystem, Clock, Logger
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n log n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    return yield* _(executeCommand(cli).pipe(Effect.provide(loggingLayer(cli.verbose))))
  })
