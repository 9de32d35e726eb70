import * as Data from "effect/Data"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { InvalidArgument } from "./errors.js"
import { invalidArgument } from "./errors.js"
import type { NumericKind } from "./numeric.js"
import { defaultNarrowing, truncateFloating } from "./numeric.js"

// CHANGE: boxes for the native subtypes a JSON number cannot name
// WHY: callers may store a byte, short, int, float or char before encoding
// REF: req-native-1
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a box always holds a value already representable in its kind
// COMPLEXITY: O(1)/O(1)

/** A number tagged with the native kind it was stored as. */
export class NativeNumber extends Data.TaggedClass("NativeNumber")<{
  readonly kind: NumericKind
  readonly value: number
}> {}

/** A single UTF-16 code unit, distinct from a one-character string. */
export class NativeChar extends Data.TaggedClass("NativeChar")<{
  readonly value: string
}> {}

const castIntegral = (value: number, kind: "byte" | "short" | "int"): number =>
  Number(Option.getOrElse(truncateFloating(value, kind, defaultNarrowing), () => 0n))

export const byte = (value: number): NativeNumber => new NativeNumber({ kind: "byte", value: castIntegral(value, "byte") })

export const short = (value: number): NativeNumber =>
  new NativeNumber({ kind: "short", value: castIntegral(value, "short") })

export const int = (value: number): NativeNumber => new NativeNumber({ kind: "int", value: castIntegral(value, "int") })

export const float = (value: number): NativeNumber => new NativeNumber({ kind: "float", value: Math.fround(value) })

export const double = (value: number): NativeNumber => new NativeNumber({ kind: "double", value })

/** 64-bit integers are plain bigints, wrapped to the signed 64-bit range. */
export const long = (value: number | bigint): bigint =>
  typeof value === "bigint"
    ? BigInt.asIntN(64, value)
    : Option.getOrElse(truncateFloating(value, "long", defaultNarrowing), () => 0n)

export const char = (value: string): Either.Either<NativeChar, InvalidArgument> =>
  value.length === 1
    ? Either.right(new NativeChar({ value }))
    : Either.left(invalidArgument(`char requires exactly one UTF-16 code unit, got ${value.length}`))
