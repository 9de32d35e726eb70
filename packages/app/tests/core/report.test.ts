import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Option from "effect/Option"

import { JsonMap } from "../../src/core/json-map.js"
import { float } from "../../src/core/native.js"
import {
  inspectMap,
  renderCoerced,
  renderGetResult,
  renderHumanInspection,
  renderJsonInspection
} from "../../src/core/report.js"

describe("inspection tables", () => {
  it.effect("lists every target type per key", () =>
    Effect.sync(() => {
      const rows = inspectMap(JsonMap.create<unknown>().putValue("n", "42"))
      expect(renderHumanInspection(rows)).toBe(
        [
          "n:",
          "  byte    42",
          "  short   42",
          "  integer 42",
          "  long    42",
          "  float   42",
          "  double  42",
          "  char    -",
          "  string  42",
          "  boolean -"
        ].join("\n")
      )
    }))

  it.effect("renders an empty map", () =>
    Effect.sync(() => {
      expect(renderHumanInspection(inspectMap(JsonMap.create<unknown>()))).toBe("(no keys)")
      expect(renderJsonInspection([])).toBe("{}")
    }))

  it.effect("renders JSON with longs as strings and misses as null", () =>
    Effect.sync(() => {
      const rows = inspectMap(JsonMap.create<unknown>().putValue("flag", true))
      expect(JSON.parse(renderJsonInspection(rows))).toEqual({
        flag: {
          byte: null,
          short: null,
          integer: null,
          long: null,
          float: null,
          double: null,
          char: null,
          string: "true",
          boolean: true
        }
      })
    }))
})

describe("single values", () => {
  it.effect("prints floats in their shortest form", () =>
    Effect.sync(() => {
      expect(renderCoerced("float", Math.fround(1.1))).toBe("1.1")
      expect(renderCoerced("double", Math.fround(1.1))).toBe("1.100000023841858")
      expect(renderCoerced("long", 5n)).toBe("5")
    }))

  it.effect("renders get results as text or JSON", () =>
    Effect.sync(() => {
      expect(renderGetResult("integer", Option.none(), false)).toBe("-")
      expect(renderGetResult("integer", Option.some(7), false)).toBe("7")
      expect(renderGetResult("long", Option.some(5n), true)).toBe("{\"type\":\"long\",\"value\":\"5\"}")
      expect(renderGetResult("char", Option.none(), true)).toBe("{\"type\":\"char\",\"value\":null}")
      expect(renderGetResult("double", Option.some(Number.POSITIVE_INFINITY), true)).toBe(
        "{\"type\":\"double\",\"value\":\"Infinity\"}"
      )
      const map = JsonMap.create<unknown>().putValue("f", float(1.1))
      expect(renderGetResult("float", map.getAs("f", "float"), true)).toBe("{\"type\":\"float\",\"value\":1.1}")
    }))
})
