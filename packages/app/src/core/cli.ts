import { Match } from "effect"
import * as Either from "effect/Either"

import type { Overrides } from "./config.js"

// CHANGE: implement deterministic CLI parsing for depwarden
// WHY: keep CLI decoding pure and testable at the boundary
// QUOTE(TZ): "caller-supplied overrides (scope, max findings)"
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "check" | "explain"

export type OutputFormat = "markdown" | "json" | "annotations"

export interface CliArgs {
  readonly command: CliCommand
  readonly modelPath: string
  readonly configPath: string
  readonly configExplicit: boolean
  readonly profile: string | undefined
  readonly scope: string | undefined
  readonly maxFindings: number | undefined
  readonly changed: ReadonlyArray<string> | undefined
  readonly format: OutputFormat
  readonly advisory: boolean
  readonly silent: boolean
  readonly verbose: boolean
  readonly explainId: string | undefined
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

export const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const DEFAULT_MODEL_PATH = "./depwarden.model.json"

export const DEFAULT_CONFIG_PATH = "./depwarden.json"

const isFlag = (value: string): boolean => value.startsWith("-")

const splitList = (value: string): ReadonlyArray<string> =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0)

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("check", () => Either.right<CliCommand>("check")),
    Match.when("explain", () => Either.right<CliCommand>("explain")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const parseFormat = (value: string): Either.Either<OutputFormat, CliError> =>
  Match.value(value).pipe(
    Match.when("markdown", () => Either.right<OutputFormat>("markdown")),
    Match.when("md", () => Either.right<OutputFormat>("markdown")),
    Match.when("json", () => Either.right<OutputFormat>("json")),
    Match.when("annotations", () => Either.right<OutputFormat>("annotations")),
    Match.orElse(() => Either.left(cliError(`Invalid --format: ${value} (expected markdown|json|annotations)`)))
  )

const parseCount = (flagName: string, value: string): Either.Either<number, CliError> =>
  /^\d+$/.test(value)
    ? Either.right(Number.parseInt(value, 10))
    : Either.left(cliError(`Invalid --${flagName}: ${value} (expected a non-negative integer)`))

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  modelPath: DEFAULT_MODEL_PATH,
  configPath: DEFAULT_CONFIG_PATH,
  configExplicit: false,
  profile: undefined,
  scope: undefined,
  maxFindings: undefined,
  changed: undefined,
  format: "markdown",
  advisory: false,
  silent: false,
  verbose: false,
  explainId: undefined
})

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

type ParsedFlag = Either.Either<{ readonly next: CliArgs; readonly consumed: number }, CliError>

const setParsedFlag = (next: CliArgs, consumed: number): ParsedFlag => Either.right({ next, consumed })

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => Either.Either<CliArgs, CliError>
): ParsedFlag =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (value) =>
    Either.map(update(current, value), (next) => ({
      next,
      consumed: inlineValue === undefined ? 2 : 1
    })))

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => ParsedFlag

const flagParsers: Record<string, FlagParser> = {
  advisory: (current) => setParsedFlag({ ...current, advisory: true }, 1),
  silent: (current) => setParsedFlag({ ...current, silent: true }, 1),
  verbose: (current) => setParsedFlag({ ...current, verbose: true }, 1),
  json: (current) => setParsedFlag({ ...current, format: "json" }, 1),
  model: (current, inlineValue, nextValue) =>
    parseValueFlag("model", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, modelPath: value })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) =>
      Either.right({
        ...args,
        configPath: value,
        configExplicit: true
      })),
  profile: (current, inlineValue, nextValue) =>
    parseValueFlag("profile", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, profile: value })),
  scope: (current, inlineValue, nextValue) =>
    parseValueFlag("scope", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, scope: value })),
  "max-findings": (current, inlineValue, nextValue) =>
    parseValueFlag("max-findings", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseCount("max-findings", value), (maxFindings) => ({ ...args, maxFindings }))),
  changed: (current, inlineValue, nextValue) =>
    parseValueFlag("changed", current, inlineValue, nextValue, (args, value) =>
      Either.right({
        ...args,
        changed: [...(args.changed ?? []), ...splitList(value)]
      })),
  format: (current, inlineValue, nextValue) =>
    parseValueFlag("format", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseFormat(value), (format) => ({ ...args, format })))
}

const parseFlag = (raw: string, nextValue: string | undefined, current: CliArgs): ParsedFlag => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const [name = "", inlineValue] = raw.slice(2).split("=", 2)
  const parser = Object.hasOwn(flagParsers, name) ? flagParsers[name] : undefined
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

interface ParsedCommand {
  readonly command: CliCommand
  readonly startIndex: number
}

const parseCommandFromArgs = (rawArgs: ReadonlyArray<string>): Either.Either<ParsedCommand, CliError> => {
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.right({ command: "check", startIndex: 0 })
  }
  return Either.map(parseCommand(first), (command) => ({ command, startIndex: 1 }))
}

const acceptPositional = (args: CliArgs, value: string): Either.Either<CliArgs, CliError> => {
  if (args.command === "explain" && args.explainId === undefined) {
    return Either.right({ ...args, explainId: value })
  }
  return Either.left(cliError(`Unexpected positional argument: ${value}`))
}

const parseFlags = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = startIndex
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      const accepted = acceptPositional(args, current)
      if (Either.isLeft(accepted)) {
        return Either.left(accepted.left)
      }
      args = accepted.right
      index += 1
      continue
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  if (args.command === "explain" && args.explainId === undefined) {
    return Either.left(cliError("explain requires a check id or finding code"))
  }
  return Either.right(args)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to check when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (argv: ReadonlyArray<string>): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  return Either.flatMap(
    parseCommandFromArgs(rawArgs),
    (parsed) => parseFlags(rawArgs, parsed.startIndex, defaultArgs(parsed.command))
  )
}

/**
 * Caller overrides handed to the config resolver.
 *
 * @pure true
 */
export const toOverrides = (args: CliArgs): Overrides => ({
  ...(args.profile === undefined ? {} : { profile: args.profile }),
  ...(args.scope === undefined ? {} : { scope: args.scope }),
  ...(args.maxFindings === undefined ? {} : { maxFindings: args.maxFindings })
})
