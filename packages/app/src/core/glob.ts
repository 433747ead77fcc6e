import * as Either from "effect/Either"

// CHANGE: extend minimal glob matching with classes, alternation and validation
// WHY: allowlist patterns must be rejected at resolution time when malformed
// QUOTE(TZ): "every allow pattern must be a syntactically valid glob"
// REF: req-glob-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p: validate(p) = Right(r) → ∀v: match(p, v) = r.test(v)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: '*' and '?' also match '/'; matching is case-sensitive against the whole value
// COMPLEXITY: O(n) per match

const normalizeSlashes = (value: string): string => value.replaceAll("\\", "/")

const stripDotSlash = (value: string): string => value.startsWith("./") ? value.slice(2) : value

const escapeRegex = (value: string): string => value.replaceAll(/[.+^${}()|[\]\\/]/gu, String.raw`\$&`)

const escapeClassBody = (value: string): string => value.replaceAll(/[\\\]^[]/gu, String.raw`\$&`)

const findClassEnd = (pattern: string, open: number): number => {
  let index = open + 1
  const first = pattern.charAt(index)
  if (first === "!" || first === "^") {
    index += 1
  }
  if (pattern.charAt(index) === "]") {
    index += 1
  }
  return pattern.indexOf("]", index)
}

const translateClass = (pattern: string, open: number, close: number): string => {
  const body = pattern.slice(open + 1, close)
  const negated = body.startsWith("!") || body.startsWith("^")
  const members = negated ? body.slice(1) : body
  return negated ? `[^${escapeClassBody(members)}]` : `[${escapeClassBody(members)}]`
}

const trailingBackslashes = (value: string): number => {
  let count = 0
  while (count < value.length && value.charAt(value.length - 1 - count) === "\\") {
    count += 1
  }
  return count
}

/** A pattern ending in an unescaped backslash escapes nothing. */
const hasDanglingEscape = (pattern: string): boolean => trailingBackslashes(pattern) % 2 === 1

const translate = (pattern: string): Either.Either<string, string> => {
  let regex = "^"
  let index = 0
  let inAlternation = false
  while (index < pattern.length) {
    const char = pattern.charAt(index)
    const next = pattern.charAt(index + 1)
    if (char === "*" && next === "*") {
      const after = pattern.charAt(index + 2)
      if (after === "/") {
        regex += "(?:.*/)?"
        index += 3
        continue
      }
      regex += ".*"
      index += 2
      continue
    }
    if (char === "*") {
      regex += ".*"
      index += 1
      continue
    }
    if (char === "?") {
      regex += "."
      index += 1
      continue
    }
    if (char === "[") {
      const close = findClassEnd(pattern, index)
      if (close === -1) {
        return Either.left("unclosed character class")
      }
      regex += translateClass(pattern, index, close)
      index = close + 1
      continue
    }
    if (char === "{") {
      if (inAlternation) {
        return Either.left("nested alternation")
      }
      inAlternation = true
      regex += "(?:"
      index += 1
      continue
    }
    if (char === "," && inAlternation) {
      regex += "|"
      index += 1
      continue
    }
    if (char === "}" && inAlternation) {
      inAlternation = false
      regex += ")"
      index += 1
      continue
    }
    regex += escapeRegex(char)
    index += 1
  }
  if (inAlternation) {
    return Either.left("unclosed alternation")
  }
  return Either.right(`${regex}$`)
}

const toRegexSource = (pattern: string): Either.Either<string, string> =>
  hasDanglingEscape(pattern)
    ? Either.left("dangling escape")
    : translate(stripDotSlash(normalizeSlashes(pattern)))

/**
 * Validate and compile a single glob pattern.
 *
 * @param pattern - Raw glob pattern.
 * @returns Right with the compiled regex, Left with the reason it is malformed.
 *
 * @pure true
 * @invariant compiled regexes match only whole values
 * @complexity O(n) where n = pattern length
 */
export const validateGlob = (pattern: string): Either.Either<RegExp, string> =>
  Either.flatMap(
    toRegexSource(pattern),
    (source) =>
      Either.try({
        try: () => new RegExp(source, "u"),
        catch: (error) => error instanceof Error ? error.message : String(error)
      })
  )

/**
 * Compile glob patterns into regexes, skipping malformed ones.
 *
 * Patterns reaching this point have been validated by the config resolver.
 *
 * @pure true
 * @complexity O(n) where n = total pattern length
 */
export const compileGlobs = (patterns: ReadonlyArray<string>): ReadonlyArray<RegExp> => {
  const compiled: Array<RegExp> = []
  for (const pattern of patterns) {
    const result = validateGlob(pattern)
    if (Either.isRight(result)) {
      compiled.push(result.right)
    }
  }
  return compiled
}

/**
 * Check if any compiled glob matches the value.
 *
 * @pure true
 * @complexity O(k) where k = number of globs
 */
export const matchesAnyGlob = (
  globs: ReadonlyArray<RegExp>,
  candidate: string
): boolean => {
  const normalized = stripDotSlash(normalizeSlashes(candidate))
  for (const glob of globs) {
    if (glob.test(normalized)) {
      return true
    }
  }
  return false
}
