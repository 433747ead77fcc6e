import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"

import type { RawCheckConfig, RawConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError, fileError } from "../core/errors.js"

// CHANGE: decode depwarden.json with schema validation
// WHY: keep boundary data typed and reject malformed config before resolution
// QUOTE(TZ): "a user configuration layer (profile name, scope, fail_on, max_findings, per-check overrides)"
// REF: req-config-file-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types
// PURITY: SHELL
// EFFECT: Effect<RawConfig, AppError, FileSystem>
// INVARIANT: a missing default config yields the empty raw config
// COMPLEXITY: O(n)

const CheckConfigSchema = S.partial(
  S.Struct({
    enabled: S.Boolean,
    severity: S.String,
    allow: S.Array(S.String),
    ignore_publish_false: S.Boolean
  })
)

const RawConfigSchema = S.partial(
  S.Struct({
    profile: S.String,
    scope: S.String,
    fail_on: S.String,
    max_findings: S.Number.pipe(S.int(), S.nonNegative()),
    checks: S.Record({ key: S.String, value: CheckConfigSchema })
  })
)

const ConfigSchema = S.parseJson(RawConfigSchema)

type DecodedCheck = S.Schema.Type<typeof CheckConfigSchema>

const toRawCheck = (check: DecodedCheck): RawCheckConfig => ({
  ...(check.enabled === undefined ? {} : { enabled: check.enabled }),
  ...(check.severity === undefined ? {} : { severity: check.severity }),
  ...(check.allow === undefined ? {} : { allow: check.allow }),
  ...(check.ignore_publish_false === undefined ? {} : { ignorePublishFalse: check.ignore_publish_false })
})

const toRawChecks = (
  checks: Readonly<Record<string, DecodedCheck>>
): Readonly<Record<string, RawCheckConfig>> =>
  Object.fromEntries(Object.entries(checks).map(([id, check]) => [id, toRawCheck(check)]))

/**
 * Decode configuration text into the raw (unresolved) config.
 *
 * @pure true
 * @invariant snake_case file keys map to camelCase fields
 */
export const decodeConfig = (raw: string): Effect.Effect<RawConfig, AppError> =>
  pipe(
    S.decodeUnknown(ConfigSchema)(raw),
    Effect.map((config) => ({
      ...(config.profile === undefined ? {} : { profile: config.profile }),
      ...(config.scope === undefined ? {} : { scope: config.scope }),
      ...(config.fail_on === undefined ? {} : { failOn: config.fail_on }),
      ...(config.max_findings === undefined ? {} : { maxFindings: config.max_findings }),
      ...(config.checks === undefined ? {} : { checks: toRawChecks(config.checks) })
    })),
    Effect.mapError((error) => configError(TreeFormatter.formatErrorSync(error)))
  )

export const loadConfigFile = (
  path: string,
  explicit: boolean
): Effect.Effect<RawConfig, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(fileError(`Config file not found: ${path}`)))
      }
      return {}
    }
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    return yield* _(decodeConfig(contents))
  })
