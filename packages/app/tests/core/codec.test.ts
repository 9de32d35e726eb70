import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { decodeEntries, decodeJson, encodeJson } from "../../src/core/codec.js"
import { JsonMap } from "../../src/core/json-map.js"
import { byte, char, float, long } from "../../src/core/native.js"

const encodeFailure = (value: unknown) => Either.getOrThrow(Either.flip(encodeJson(value)))

describe("decodeJson", () => {
  it.effect("decodes an object root with nested values", () =>
    Effect.sync(() => {
      const decoded = Either.getOrThrow(decodeJson("{\"a\":1,\"b\":[true,null],\"c\":{\"d\":\"x\"}}"))
      expect(decoded).toEqual({ a: 1, b: [true, null], c: { d: "x" } })
    }))

  it.effect("rejects non-object roots", () =>
    Effect.sync(() => {
      expect(Either.getOrThrow(Either.flip(decodeJson("[1,2]")))).toEqual({
        _tag: "DecodeError",
        message: "Expected an object at the document root, got array"
      })
      expect(Either.getOrThrow(Either.flip(decodeJson("null"))).message).toBe(
        "Expected an object at the document root, got null"
      )
      expect(Either.getOrThrow(Either.flip(decodeJson("42"))).message).toBe(
        "Expected an object at the document root, got number"
      )
    }))

  it.effect("rejects malformed text", () =>
    Effect.sync(() => {
      expect(Either.getOrThrow(Either.flip(decodeJson("{")))._tag).toBe("DecodeError")
      expect(Either.isLeft(decodeJson(""))).toBe(true)
    }))

  it.effect("rejects comments and trailing commas", () =>
    Effect.sync(() => {
      expect(Either.isLeft(decodeJson("{\"a\":1,}"))).toBe(true)
      expect(Either.isLeft(decodeJson("{\"a\":1 // note\n}"))).toBe(true)
      expect(Either.isLeft(decodeJson("{} {}"))).toBe(true)
    }))

  it.effect("keeps integer literals beyond 2^53 as bigints", () =>
    Effect.sync(() => {
      const decoded = Either.getOrThrow(decodeJson("{\"id\":9007199254740993,\"n\":[-9223372036854775808],\"s\":42}"))
      expect(decoded["id"]).toBe(9007199254740993n)
      expect(decoded["n"]).toEqual([-9223372036854775808n])
      expect(decoded["s"]).toBe(42)
    }))

  it.effect("reads integers past 64 bits and decimals as doubles", () =>
    Effect.sync(() => {
      const decoded = Either.getOrThrow(decodeJson("{\"huge\":18446744073709551616,\"d\":1.5,\"e\":1e2}"))
      expect(decoded["huge"]).toBe(18446744073709551616)
      expect(decoded["d"]).toBe(1.5)
      expect(decoded["e"]).toBe(100)
    }))

  it.effect("decodes members in document order, __proto__ included", () =>
    Effect.sync(() => {
      expect(Either.getOrThrow(decodeEntries("{\"b\":1,\"2\":2,\"a\":3}"))).toEqual([["b", 1], ["2", 2], ["a", 3]])
      const decoded = Either.getOrThrow(decodeJson("{\"__proto__\":\"x\",\"b\":1}"))
      expect(Object.keys(decoded)).toEqual(["__proto__", "b"])
      expect(Object.getPrototypeOf(decoded)).toBe(Object.prototype)
    }))
})

describe("encodeJson", () => {
  it.effect("encodes compactly by default and indents on request", () =>
    Effect.sync(() => {
      expect(Either.getOrThrow(encodeJson({ a: 1, b: ["x", null] }))).toBe("{\"a\":1,\"b\":[\"x\",null]}")
      expect(Either.getOrThrow(encodeJson({ a: 1 }, { indent: 2 }))).toBe("{\n  \"a\": 1\n}")
    }))

  it.effect("encodes native boxes, bigints, Maps and adapters", () =>
    Effect.sync(() => {
      const value = { b: byte(7), f: float(1.1), c: Either.getOrThrow(char("z")), l: 5n }
      expect(Either.getOrThrow(encodeJson(value))).toBe("{\"b\":7,\"f\":1.1,\"c\":\"z\",\"l\":5}")
      expect(Either.getOrThrow(encodeJson(new Map([["k", [1, 2]]])))).toBe("{\"k\":[1,2]}")
      const inner = JsonMap.create<number>().putValue("x", 1)
      expect(Either.getOrThrow(encodeJson({ inner }))).toBe("{\"inner\":{\"x\":1}}")
    }))

  it.effect("reports the path of the first unrepresentable value", () =>
    Effect.sync(() => {
      expect(encodeFailure({ n: Number.NaN })).toEqual({
        _tag: "EncodeError",
        path: "$.n",
        message: "NaN is not representable in JSON"
      })
      expect(encodeFailure({ list: [1, undefined] })).toEqual({
        _tag: "EncodeError",
        path: "$.list[1]",
        message: "undefined is not representable in JSON"
      })
      expect(encodeFailure({ "a b": [Number.POSITIVE_INFINITY] })).toEqual({
        _tag: "EncodeError",
        path: "$[\"a b\"][0]",
        message: "Infinity is not representable in JSON"
      })
    }))

  it.effect("rejects cycles, non-string keys and class instances", () =>
    Effect.sync(() => {
      const cyclic: Record<string, unknown> = {}
      cyclic["self"] = cyclic
      expect(encodeFailure(cyclic)).toEqual({ _tag: "EncodeError", path: "$.self", message: "cyclic reference" })
      expect(encodeFailure(new Map([[1, "x"]]))).toEqual({
        _tag: "EncodeError",
        path: "$",
        message: "map key of type number is not a string"
      })
      expect(encodeFailure({ at: new Date(0) })).toEqual({
        _tag: "EncodeError",
        path: "$.at",
        message: "instance of Date is not representable in JSON"
      })
      expect(encodeFailure({ s: Symbol("s") }).message).toBe("symbol is not representable in JSON")
    }))

  it.effect("writes bigints as their digits", () =>
    Effect.sync(() => {
      expect(Either.getOrThrow(encodeJson({ id: 2n ** 60n, low: -(2n ** 63n) }))).toBe(
        "{\"id\":1152921504606846976,\"low\":-9223372036854775808}"
      )
      const decoded = Either.getOrThrow(decodeJson(Either.getOrThrow(encodeJson({ id: long(2n ** 60n) }))))
      expect(decoded["id"]).toBe(2n ** 60n)
    }))

  it.effect("writes Map entries in insertion order", () =>
    Effect.sync(() => {
      const map = new Map<string, unknown>([["b", 1], ["2", [true]], ["__proto__", {}]])
      expect(Either.getOrThrow(encodeJson(map))).toBe("{\"b\":1,\"2\":[true],\"__proto__\":{}}")
      expect(Either.getOrThrow(encodeJson(map, { indent: 2 }))).toBe(
        "{\n  \"b\": 1,\n  \"2\": [\n    true\n  ],\n  \"__proto__\": {}\n}"
      )
    }))

  it.effect("allows the same object twice when it is not an ancestor", () =>
    Effect.sync(() => {
      const shared = { v: 1 }
      expect(Either.getOrThrow(encodeJson({ a: shared, b: shared }))).toBe("{\"a\":{\"v\":1},\"b\":{\"v\":1}}")
    }))

  it.effect("round-trips decoded documents", () =>
    Effect.sync(() => {
      const text = "{\"name\":\"x\",\"items\":[1,2.5,false],\"meta\":{}}"
      const decoded = Either.getOrThrow(decodeJson(text))
      expect(Either.getOrThrow(encodeJson(decoded))).toBe(text)
    }))
})
