import { NativeChar, NativeNumber } from "./native.js"
import type { FloatingKind, IntegralKind } from "./numeric.js"
import { isIntegralKind, wrapIntegral } from "./numeric.js"

// CHANGE: classify stored values once into a closed variant before coercing
// WHY: coercion rules pattern-match on the variant instead of probing typeof at every step
// REF: req-scalar-1
// FORMAT THEOREM: ∀v: classify(v) is exactly one Scalar member
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Integral values are exact; Floating values are JS doubles
// COMPLEXITY: O(1)/O(1)

export type Scalar =
  | { readonly _tag: "Text"; readonly value: string }
  | { readonly _tag: "Char"; readonly value: string }
  | { readonly _tag: "Integral"; readonly kind: IntegralKind; readonly value: bigint }
  | { readonly _tag: "Floating"; readonly kind: FloatingKind; readonly value: number }
  | { readonly _tag: "Bool"; readonly value: boolean }
  | { readonly _tag: "Absent" }
  | { readonly _tag: "Opaque"; readonly value: unknown }

const INT_MIN = -2_147_483_648
const INT_MAX = 2_147_483_647

const classifyNumber = (value: number): Scalar => {
  if (!Number.isSafeInteger(value)) {
    return { _tag: "Floating", kind: "double", value }
  }
  const kind: IntegralKind = value >= INT_MIN && value <= INT_MAX ? "int" : "long"
  return { _tag: "Integral", kind, value: BigInt(value) }
}

// A box built directly with a fraction or a non-finite value reads as the double it holds.
const classifyNative = (value: NativeNumber): Scalar => {
  const kind = value.kind
  if (!isIntegralKind(kind)) {
    return { _tag: "Floating", kind, value: value.value }
  }
  if (!Number.isSafeInteger(value.value)) {
    return { _tag: "Floating", kind: "double", value: value.value }
  }
  return { _tag: "Integral", kind, value: wrapIntegral(BigInt(value.value), kind) }
}

/**
 * Classify a dynamically typed stored value.
 *
 * Safe-integer numbers count as integral (`int` when they fit 32 bits),
 * every other number as a double. Bigints are longs, or doubles past 64 bits.
 *
 * @pure true
 * @complexity O(1)
 */
export const classify = (value: unknown): Scalar => {
  if (value === null || value === undefined) {
    return { _tag: "Absent" }
  }
  if (typeof value === "string") {
    return { _tag: "Text", value }
  }
  if (typeof value === "boolean") {
    return { _tag: "Bool", value }
  }
  if (typeof value === "number") {
    return classifyNumber(value)
  }
  if (typeof value === "bigint") {
    return BigInt.asIntN(64, value) === value
      ? { _tag: "Integral", kind: "long", value }
      : { _tag: "Floating", kind: "double", value: Number(value) }
  }
  if (value instanceof NativeNumber) {
    return classifyNative(value)
  }
  if (value instanceof NativeChar) {
    return { _tag: "Char", value: value.value }
  }
  return { _tag: "Opaque", value }
}
