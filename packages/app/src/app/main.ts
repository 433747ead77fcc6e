#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { formatAppError } from "../core/errors.js"
import { RUNTIME_ERROR_EXIT_CODE } from "../core/report.js"
import { runCli } from "./program.js"

// CHANGE: wire CLI program into Node runtime with proper teardown
// WHY: execute effects with platform services and typed error handling
// QUOTE(TZ): n/a
// REF: req-main-1
// SOURCE: n/a
// FORMAT THEOREM: runMain(program) terminates with exitCode from ProgramResult
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: non-zero exit codes terminate the process
// COMPLEXITY: O(1)

const setExitCode = (exitCode: number): Effect.Effect<void> =>
  Effect.sync(() => {
    process.exitCode = exitCode
  })

const main = Effect.gen(function*(_) {
  const result = yield* _(runCli(process.argv))
  if (result.exitCode !== 0) {
    yield* _(setExitCode(result.exitCode))
  }
}).pipe(
  Effect.catchAll((error) =>
    Effect.zipRight(
      Effect.sync(() => {
        process.stderr.write(`depwarden: ${formatAppError(error)}\n`)
      }),
      setExitCode(RUNTIME_ERROR_EXIT_CODE)
    )
  )
)

NodeRuntime.runMain(Effect.provide(main, NodeContext.layer))
