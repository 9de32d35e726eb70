import * as Option from "effect/Option"

// CHANGE: numeric narrowing, widening and literal parsing for typed reads
// WHY: JSON keeps only "integer-ish" and "double-ish" numbers, callers ask for byte..double
// REF: req-coerce-numeric-1
// FORMAT THEOREM: ∀v,k: truncate-mode narrow(v,k) is total; strict-mode narrow(v,k) = Some(x) → x = trunc(v)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: integral results always fit the two's-complement range of their kind
// COMPLEXITY: O(1) per conversion, O(n) per parse

export type IntegralKind = "byte" | "short" | "int" | "long"
export type FloatingKind = "float" | "double"
export type NumericKind = IntegralKind | FloatingKind

/**
 * How an out-of-range numeric conversion behaves.
 * `truncate` wraps or saturates like a native cast; `strict` reports absence.
 */
export type NarrowingMode = "truncate" | "strict"

export const defaultNarrowing: NarrowingMode = "truncate"

const bitWidth: Readonly<Record<IntegralKind, number>> = {
  byte: 8,
  short: 16,
  int: 32,
  long: 64
}

export const isIntegralKind = (kind: NumericKind): kind is IntegralKind =>
  kind === "byte" || kind === "short" || kind === "int" || kind === "long"

const minOf = (bits: number): bigint => -(1n << BigInt(bits - 1))
const maxOf = (bits: number): bigint => (1n << BigInt(bits - 1)) - 1n

const fitsIn = (value: bigint, kind: IntegralKind): boolean => BigInt.asIntN(bitWidth[kind], value) === value

// NaN → 0, ±∞ and out-of-range values clamp to the bounds of a `bits`-wide integer
const saturate = (value: number, bits: number): bigint => {
  if (Number.isNaN(value)) {
    return 0n
  }
  const max = maxOf(bits)
  const min = minOf(bits)
  if (value >= Number(max)) {
    return max
  }
  if (value <= Number(min)) {
    return min
  }
  return BigInt(Math.trunc(value))
}

/** Two's-complement wrap into the range of `kind`. */
export const wrapIntegral = (value: bigint, kind: IntegralKind): bigint => BigInt.asIntN(bitWidth[kind], value)

/**
 * Convert an integral value to a (possibly narrower) integral kind.
 *
 * @pure true
 * @invariant truncate mode keeps the low bits of the two's-complement representation
 */
export const narrowIntegral = (
  value: bigint,
  kind: IntegralKind,
  mode: NarrowingMode
): Option.Option<bigint> => {
  const wrapped = wrapIntegral(value, kind)
  if (mode === "strict" && wrapped !== value) {
    return Option.none()
  }
  return Option.some(wrapped)
}

/**
 * Convert a floating value to an integral kind, dropping the fraction.
 * long and int saturate; short and byte saturate to int first, then wrap.
 *
 * @pure true
 * @invariant the fraction is always dropped toward zero, in both modes
 */
export const truncateFloating = (
  value: number,
  kind: IntegralKind,
  mode: NarrowingMode
): Option.Option<bigint> => {
  if (mode === "strict") {
    if (!Number.isFinite(value)) {
      return Option.none()
    }
    const truncated = BigInt(Math.trunc(value))
    return fitsIn(truncated, kind) ? Option.some(truncated) : Option.none()
  }
  if (kind === "long") {
    return Option.some(saturate(value, 64))
  }
  return Option.some(BigInt.asIntN(bitWidth[kind], saturate(value, 32)))
}

/**
 * Round a double to the nearest 32-bit float.
 *
 * @pure true
 * @invariant strict mode rejects a finite double that overflows to an infinite float
 */
export const toFloat = (value: number, mode: NarrowingMode): Option.Option<number> => {
  const rounded = Math.fround(value)
  if (mode === "strict" && Number.isFinite(value) && !Number.isFinite(rounded)) {
    return Option.none()
  }
  return Option.some(rounded)
}

const integerLiteral = /^[+-]?\d+$/u
const floatingLiteral = /^[+-]?(?:NaN|Infinity|(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?)$/u

/**
 * Parse a base-10 signed integer literal that fits `kind`.
 * Out-of-range literals are a parse failure, never wrapped.
 *
 * @pure true
 */
export const parseIntegral = (text: string, kind: IntegralKind): Option.Option<bigint> => {
  if (!integerLiteral.test(text)) {
    return Option.none()
  }
  const parsed = BigInt(text)
  return fitsIn(parsed, kind) ? Option.some(parsed) : Option.none()
}

/**
 * Parse a decimal or scientific literal (also `NaN` and `Infinity`).
 * Surrounding whitespace is ignored.
 *
 * @pure true
 */
export const parseFloating = (text: string): Option.Option<number> => {
  const trimmed = text.trim()
  return floatingLiteral.test(trimmed) ? Option.some(Number(trimmed)) : Option.none()
}

/**
 * Shortest decimal rendering that reads back as the same 32-bit float,
 * so `float(1.1)` prints as "1.1" rather than "1.100000023841858".
 *
 * @pure true
 * @complexity O(1)
 */
export const formatFloat = (value: number): string => {
  if (!Number.isFinite(value)) {
    return String(value)
  }
  for (let precision = 1; precision <= 9; precision++) {
    const candidate = Number(value.toPrecision(precision))
    if (Math.fround(candidate) === value) {
      return String(candidate)
    }
  }
  return String(value)
}
