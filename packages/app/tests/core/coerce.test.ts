import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import {
  coerceAs,
  coerceBoolean,
  coerceByte,
  coerceChar,
  coerceDouble,
  coerceFloat,
  coerceInteger,
  coerceLong,
  coerceShort,
  coerceString,
  targetTypes
} from "../../src/core/coerce.js"
import { byte, char, float, NativeNumber, short } from "../../src/core/native.js"

class Point {
  toString(): string {
    return "Point(1,2)"
  }
}

describe("coerceInteger", () => {
  it.effect("parses integer strings and truncates doubles", () =>
    Effect.sync(() => {
      expect(coerceInteger(42)).toEqual(Option.some(42))
      expect(coerceInteger("42")).toEqual(Option.some(42))
      expect(coerceInteger("-17")).toEqual(Option.some(-17))
      expect(coerceInteger(3.9)).toEqual(Option.some(3))
      expect(coerceInteger(-3.9)).toEqual(Option.some(-3))
    }))

  it.effect("returns none for non-integer strings and non-numeric values", () =>
    Effect.sync(() => {
      expect(coerceInteger("42.5")).toEqual(Option.none())
      expect(coerceInteger("4e1")).toEqual(Option.none())
      expect(coerceInteger(true)).toEqual(Option.none())
      expect(coerceInteger([1])).toEqual(Option.none())
    }))

  it.effect("wraps integers wider than 32 bits unless strict", () =>
    Effect.sync(() => {
      expect(coerceInteger(3000000000)).toEqual(Option.some(-1294967296))
      expect(coerceInteger(3000000000, "strict")).toEqual(Option.none())
      expect(coerceInteger("3000000000")).toEqual(Option.none())
    }))
})

describe("byte, short and long coercion", () => {
  it.effect("narrows numbers and range-checks strings", () =>
    Effect.sync(() => {
      expect(coerceByte(200)).toEqual(Option.some(-56))
      expect(coerceByte("200")).toEqual(Option.none())
      expect(coerceByte(byte(5))).toEqual(Option.some(5))
      expect(coerceShort(70000)).toEqual(Option.some(4464))
      expect(coerceShort(short(-2))).toEqual(Option.some(-2))
      expect(coerceShort("-32768")).toEqual(Option.some(-32768))
    }))

  it.effect("reads longs as bigints", () =>
    Effect.sync(() => {
      expect(coerceLong(42)).toEqual(Option.some(42n))
      expect(coerceLong("9007199254740993")).toEqual(Option.some(9007199254740993n))
      expect(coerceLong(1.5e19)).toEqual(Option.some(9223372036854775807n))
      expect(coerceLong(12n)).toEqual(Option.some(12n))
    }))
})

describe("directly constructed boxes", () => {
  it.effect("read an integral box holding a fraction or NaN as a double", () =>
    Effect.sync(() => {
      const fractional = new NativeNumber({ kind: "int", value: 1.5 })
      expect(coerceInteger(fractional)).toEqual(Option.some(1))
      expect(coerceLong(fractional)).toEqual(Option.some(1n))
      expect(coerceString(fractional)).toEqual(Option.some("1.5"))
      expect(coerceInteger(new NativeNumber({ kind: "long", value: Number.NaN }))).toEqual(Option.some(0))
      expect(coerceInteger(new NativeNumber({ kind: "long", value: Number.NaN }), "strict")).toEqual(Option.none())
    }))

  it.effect("wrap an out-of-range integral box into its kind", () =>
    Effect.sync(() => {
      const wide = new NativeNumber({ kind: "byte", value: 300 })
      expect(coerceByte(wide)).toEqual(Option.some(44))
      expect(coerceString(wide)).toEqual(Option.some("44"))
    }))

  it.effect("read bigints past 64 bits as doubles", () =>
    Effect.sync(() => {
      expect(coerceLong(2n ** 64n)).toEqual(Option.some(9223372036854775807n))
      expect(coerceDouble(2n ** 64n)).toEqual(Option.some(18446744073709551616))
    }))
})

describe("floating coercion", () => {
  it.effect("rounds to float precision", () =>
    Effect.sync(() => {
      expect(coerceFloat(1.1)).toEqual(Option.some(Math.fround(1.1)))
      expect(coerceFloat("1.1")).toEqual(Option.some(Math.fround(1.1)))
      expect(coerceFloat(float(2.5))).toEqual(Option.some(2.5))
      expect(coerceFloat(1e39)).toEqual(Option.some(Number.POSITIVE_INFINITY))
      expect(coerceFloat(1e39, "strict")).toEqual(Option.none())
    }))

  it.effect("widens to double", () =>
    Effect.sync(() => {
      expect(coerceDouble(float(1.1))).toEqual(Option.some(Math.fround(1.1)))
      expect(coerceDouble("1e3")).toEqual(Option.some(1000))
      expect(coerceDouble(7)).toEqual(Option.some(7))
      expect(coerceDouble(10n)).toEqual(Option.some(10))
      expect(coerceDouble("abc")).toEqual(Option.none())
      expect(coerceDouble(true)).toEqual(Option.none())
    }))
})

describe("coerceBoolean", () => {
  it.effect("accepts only true/false in any case", () =>
    Effect.sync(() => {
      expect(coerceBoolean("TRUE")).toEqual(Option.some(true))
      expect(coerceBoolean("False")).toEqual(Option.some(false))
      expect(coerceBoolean(true)).toEqual(Option.some(true))
      expect(coerceBoolean("yes")).toEqual(Option.none())
      expect(coerceBoolean(" true")).toEqual(Option.none())
      expect(coerceBoolean(1)).toEqual(Option.none())
    }))
})

describe("coerceChar", () => {
  it.effect("accepts char boxes and one-character strings", () =>
    Effect.sync(() => {
      expect(coerceChar("a")).toEqual(Option.some("a"))
      expect(coerceChar(Either.getOrThrow(char("x")))).toEqual(Option.some("x"))
      expect(coerceChar("ab")).toEqual(Option.none())
      expect(coerceChar("")).toEqual(Option.none())
      expect(coerceChar(65)).toEqual(Option.none())
    }))
})

describe("coerceString", () => {
  it.effect("renders every present value", () =>
    Effect.sync(() => {
      expect(coerceString("x")).toEqual(Option.some("x"))
      expect(coerceString(7)).toEqual(Option.some("7"))
      expect(coerceString(3.5)).toEqual(Option.some("3.5"))
      expect(coerceString(true)).toEqual(Option.some("true"))
      expect(coerceString(10n)).toEqual(Option.some("10"))
      expect(coerceString(float(1.1))).toEqual(Option.some("1.1"))
      expect(coerceString(Either.getOrThrow(char("c")))).toEqual(Option.some("c"))
    }))

  it.effect("renders containers as JSON and other objects with String()", () =>
    Effect.sync(() => {
      expect(coerceString([1, "a"])).toEqual(Option.some("[1,\"a\"]"))
      expect(coerceString({ a: 1 })).toEqual(Option.some("{\"a\":1}"))
      expect(coerceString(new Map([["k", true]]))).toEqual(Option.some("{\"k\":true}"))
      expect(coerceString(new Point())).toEqual(Option.some("Point(1,2)"))
    }))

  it.effect("returns none only for null and undefined", () =>
    Effect.sync(() => {
      expect(coerceString(null)).toEqual(Option.none())
      expect(coerceString(undefined)).toEqual(Option.none())
    }))
})

describe("coerceAs", () => {
  it.effect("dispatches on the target type", () =>
    Effect.sync(() => {
      expect(coerceAs("long", "12")).toEqual(Option.some(12n))
      expect(coerceAs("integer", 3.9)).toEqual(Option.some(3))
      expect(coerceAs("byte", 200, "strict")).toEqual(Option.none())
    }))

  it.effect("is none for every target when the value is absent", () =>
    Effect.sync(() => {
      for (const target of targetTypes) {
        expect(coerceAs(target, null)).toEqual(Option.none())
        expect(coerceAs(target, undefined)).toEqual(Option.none())
      }
    }))
})
