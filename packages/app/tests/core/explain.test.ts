import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { allCheckIds, allCodes, lookupExplanation, renderExplanation } from "../../src/core/explain.js"

describe("explain registry", () => {
  it.effect("covers every check id and code", () =>
    Effect.sync(() => {
      for (const identifier of [...allCheckIds, ...allCodes]) {
        expect(lookupExplanation(identifier), identifier).toBeDefined()
      }
      expect(allCheckIds).toHaveLength(10)
      expect(allCodes).toHaveLength(11)
    }))

  it.effect("returns nothing for unknown identifiers", () =>
    Effect.sync(() => {
      expect(lookupExplanation("deps.nope")).toBeUndefined()
      expect(lookupExplanation("toString")).toBeUndefined()
    }))

  it.effect("renders title, description and remediation", () =>
    Effect.sync(() => {
      const explanation = lookupExplanation("wildcard_version")
      expect(explanation?.title).toBe("No Wildcard Versions")
      if (explanation !== undefined) {
        const lines = renderExplanation("wildcard_version", explanation).split("\n")
        expect(lines[0]).toBe("No Wildcard Versions (wildcard_version)")
        expect(lines[4]).toBe("Remediation:")
        expect(lines[5]).toBe("  Replace the wildcard with an explicit requirement, e.g. `1.0` or `=1.2.3`.")
      }
    }))
})
