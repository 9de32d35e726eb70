import * as Either from "effect/Either"
import { pipe } from "effect/Function"
import * as Match from "effect/Match"
import * as Option from "effect/Option"

import { encodeJson } from "./codec.js"
import type { FloatingKind, IntegralKind, NarrowingMode } from "./numeric.js"
import {
  defaultNarrowing,
  formatFloat,
  narrowIntegral,
  parseFloating,
  parseIntegral,
  toFloat,
  truncateFloating
} from "./numeric.js"
import type { Scalar } from "./scalar.js"
import { classify } from "./scalar.js"

// CHANGE: per-type coercion of stored values into requested scalar types
// WHY: optional-field reads must never throw; a miss is Option.none
// REF: req-coerce-1
// FORMAT THEOREM: ∀v,T: coerceT(v) = first match of [same type, numeric cast, string parse] else None
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: classify(v) = Absent → coerceT(v) = None for every T
// COMPLEXITY: O(1) except string parsing, O(n) in the literal length

export type TargetType =
  | "byte"
  | "short"
  | "integer"
  | "long"
  | "float"
  | "double"
  | "char"
  | "string"
  | "boolean"

export const targetTypes: ReadonlyArray<TargetType> = [
  "byte",
  "short",
  "integer",
  "long",
  "float",
  "double",
  "char",
  "string",
  "boolean"
]

export type CoercedValue = number | bigint | boolean | string

const toIntegral = (scalar: Scalar, kind: IntegralKind, mode: NarrowingMode): Option.Option<bigint> =>
  Match.value(scalar).pipe(
    Match.tag("Integral", (value) =>
      value.kind === kind ? Option.some(value.value) : narrowIntegral(value.value, kind, mode)
    ),
    Match.tag("Floating", (value) => truncateFloating(value.value, kind, mode)),
    Match.tag("Text", (value) => parseIntegral(value.value, kind)),
    Match.orElse(() => Option.none<bigint>())
  )

const widen = (value: number, kind: FloatingKind, mode: NarrowingMode): Option.Option<number> =>
  kind === "float" ? toFloat(value, mode) : Option.some(value)

const toFloating = (scalar: Scalar, kind: FloatingKind, mode: NarrowingMode): Option.Option<number> =>
  Match.value(scalar).pipe(
    Match.tag("Floating", (value) => value.kind === kind ? Option.some(value.value) : widen(value.value, kind, mode)),
    Match.tag("Integral", (value) => widen(Number(value.value), kind, mode)),
    Match.tag("Text", (value) =>
      pipe(
        parseFloating(value.value),
        Option.flatMap((parsed) => widen(parsed, kind, mode))
      )),
    Match.orElse(() => Option.none<number>())
  )

/** Signed 8-bit integer, wrapped or parsed from a literal in -128..127. */
export const coerceByte = (value: unknown, mode: NarrowingMode = defaultNarrowing): Option.Option<number> =>
  Option.map(toIntegral(classify(value), "byte", mode), Number)

export const coerceShort = (value: unknown, mode: NarrowingMode = defaultNarrowing): Option.Option<number> =>
  Option.map(toIntegral(classify(value), "short", mode), Number)

/**
 * Signed 32-bit integer.
 *
 * - `42`, `"42"`, `"+42"` → `Some(42)`
 * - `3.9` → `Some(3)` (truncated, never rounded)
 * - `"42.5"`, `"4e1"`, `true` → `None`
 */
export const coerceInteger = (value: unknown, mode: NarrowingMode = defaultNarrowing): Option.Option<number> =>
  Option.map(toIntegral(classify(value), "int", mode), Number)

/** Signed 64-bit integer as a bigint. */
export const coerceLong = (value: unknown, mode: NarrowingMode = defaultNarrowing): Option.Option<bigint> =>
  toIntegral(classify(value), "long", mode)

/** Nearest 32-bit float; string literals are parsed as doubles first. */
export const coerceFloat = (value: unknown, mode: NarrowingMode = defaultNarrowing): Option.Option<number> =>
  toFloating(classify(value), "float", mode)

export const coerceDouble = (value: unknown, mode: NarrowingMode = defaultNarrowing): Option.Option<number> =>
  toFloating(classify(value), "double", mode)

/**
 * A single UTF-16 code unit: a stored char box, or a string of length exactly 1.
 */
export const coerceChar = (value: unknown): Option.Option<string> =>
  Match.value(classify(value)).pipe(
    Match.tag("Char", (scalar) => Option.some(scalar.value)),
    Match.tag("Text", (scalar) => scalar.value.length === 1 ? Option.some(scalar.value) : Option.none()),
    Match.orElse(() => Option.none<string>())
  )

/**
 * Booleans as stored, or the strings "true"/"false" in any letter case.
 * No other string ("yes", "1", " true") is accepted.
 */
export const coerceBoolean = (value: unknown): Option.Option<boolean> =>
  Match.value(classify(value)).pipe(
    Match.tag("Bool", (scalar) => Option.some(scalar.value)),
    Match.tag("Text", (scalar) => {
      const lowered = scalar.value.toLowerCase()
      if (lowered === "true") {
        return Option.some(true)
      }
      return lowered === "false" ? Option.some(false) : Option.none()
    }),
    Match.orElse(() => Option.none<boolean>())
  )

const renderOpaque = (value: unknown): string =>
  pipe(
    encodeJson(value),
    Either.getOrElse(() => String(value))
  )

/**
 * Display form of any present value; None only for null or undefined.
 *
 * Containers render as their JSON text, floats in their shortest form.
 */
export const coerceString = (value: unknown): Option.Option<string> =>
  Match.value(classify(value)).pipe(
    Match.tag("Absent", () => Option.none<string>()),
    Match.tag("Text", (scalar) => Option.some(scalar.value)),
    Match.tag("Char", (scalar) => Option.some(scalar.value)),
    Match.tag("Integral", (scalar) => Option.some(scalar.value.toString())),
    Match.tag("Floating", (scalar) =>
      Option.some(scalar.kind === "float" ? formatFloat(scalar.value) : String(scalar.value))),
    Match.tag("Bool", (scalar) => Option.some(String(scalar.value))),
    Match.tag("Opaque", (scalar) => Option.some(renderOpaque(scalar.value))),
    Match.exhaustive
  )

/**
 * Coerce to a target chosen at run time, e.g. from a CLI flag.
 *
 * @pure true
 */
export const coerceAs = (
  target: TargetType,
  value: unknown,
  mode: NarrowingMode = defaultNarrowing
): Option.Option<CoercedValue> =>
  Match.value(target).pipe(
    Match.when("byte", () => coerceByte(value, mode)),
    Match.when("short", () => coerceShort(value, mode)),
    Match.when("integer", () => coerceInteger(value, mode)),
    Match.when("long", () => coerceLong(value, mode)),
    Match.when("float", () => coerceFloat(value, mode)),
    Match.when("double", () => coerceDouble(value, mode)),
    Match.when("char", () => coerceChar(value)),
    Match.when("string", () => coerceString(value)),
    Match.when("boolean", () => coerceBoolean(value)),
    Match.exhaustive
  )

export const isTargetType = (value: string): value is TargetType =>
  targetTypes.some((target) => target === value)
