import * as Layer from "effect/Layer"
import * as Logger from "effect/Logger"
import * as LogLevel from "effect/LogLevel"

// CHANGE: route program logs to stderr in logfmt
// WHY: stdout carries only the rendered report
// QUOTE(TZ): n/a
// REF: req-logging-1
// SOURCE: n/a
// FORMAT THEOREM: ∀line ∈ logs: line is written to stderr
// PURITY: SHELL
// EFFECT: Layer<never>
// INVARIANT: minimum level is Info unless verbose
// COMPLEXITY: O(1)

const stderrLogger = Logger.withConsoleError(Logger.logfmtLogger)

/**
 * Logger layer for the CLI.
 *
 * @param verbose - Lower the minimum level to Debug.
 */
export const loggingLayer = (verbose: boolean): Layer.Layer<never> =>
  Layer.merge(
    Logger.replace(Logger.defaultLogger, stderrLogger),
    Logger.minimumLogLevel(verbose ? LogLevel.Debug : LogLevel.Info)
  )
