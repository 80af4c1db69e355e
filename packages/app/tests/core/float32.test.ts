import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { roundToFloat32 } from "../../src/core/float32.js"

describe("roundToFloat32", () => {
  it.effect("matches Math.fround away from midpoints", () =>
    Effect.sync(() => {
      expect(roundToFloat32("0.5")).toBe(0.5)
      expect(roundToFloat32("0.1")).toBe(Math.fround(0.1))
      expect(roundToFloat32("-2.5e3")).toBe(-2500)
    }))

  it.effect("rounds a literal just above a midpoint upward", () =>
    Effect.sync(() => {
      expect(roundToFloat32("1.000000059604644775390625000000000000001")).toBe(1 + 2 ** -23)
      expect(roundToFloat32("-1.000000059604644775390625000000000000001")).toBe(-(1 + 2 ** -23))
    }))

  it.effect("rounds a literal just below a midpoint downward", () =>
    Effect.sync(() => {
      expect(roundToFloat32("1.0000001788139343261718749")).toBe(1 + 2 ** -23)
    }))

  it.effect("breaks an exact tie toward the even float", () =>
    Effect.sync(() => {
      expect(roundToFloat32("1.000000059604644775390625")).toBe(1)
      expect(roundToFloat32("1.000000178813934326171875")).toBe(1 + 2 ** -22)
    }))
})
