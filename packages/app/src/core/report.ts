import * as Option from "effect/Option"

import type { CoercedValue, TargetType } from "./coerce.js"
import { targetTypes } from "./coerce.js"
import type { JsonMap } from "./json-map.js"
import { formatFloat } from "./numeric.js"

// CHANGE: build coercion tables and render output formats
// WHY: keep CLI output pure and deterministic
// REF: req-report-1
// FORMAT THEOREM: ∀m: rows(inspect(m)) follow m's key order
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: every row lists every target type, in targetTypes order
// COMPLEXITY: O(n · |targetTypes|)

export interface Coercion {
  readonly target: TargetType
  readonly value: Option.Option<CoercedValue>
}

export interface InspectionRow {
  readonly key: string
  readonly coercions: ReadonlyArray<Coercion>
}

const ABSENT = "-"

/**
 * Coerce every key of a map to every target type.
 *
 * @pure true
 * @complexity O(n · |targetTypes|)
 */
export const inspectMap = <V>(map: JsonMap<V>): ReadonlyArray<InspectionRow> =>
  Array.from(map.keys(), (key) => ({
    key,
    coercions: targetTypes.map((target) => ({ target, value: map.getAs(key, target) }))
  }))

/** Text form of a coerced value; floats print in their shortest form. */
export const renderCoerced = (target: TargetType, value: CoercedValue): string =>
  target === "float" && typeof value === "number" ? formatFloat(value) : String(value)

type JsonScalar = string | number | boolean | null

const toJsonScalar = (target: TargetType, value: Option.Option<CoercedValue>): JsonScalar => {
  if (Option.isNone(value)) {
    return null
  }
  const coerced = value.value
  if (typeof coerced === "bigint") {
    return coerced.toString()
  }
  if (typeof coerced === "number") {
    return Number.isFinite(coerced) ? Number(renderCoerced(target, coerced)) : String(coerced)
  }
  return coerced
}

const renderOption = (target: TargetType, value: Option.Option<CoercedValue>): string =>
  Option.match(value, {
    onNone: () => ABSENT,
    onSome: (coerced) => renderCoerced(target, coerced)
  })

const TARGET_WIDTH = Math.max(...targetTypes.map((target) => target.length))

/**
 * Render an inspection as an indented, human-readable table.
 *
 * @pure true
 * @invariant absent coercions print as "-"
 */
export const renderHumanInspection = (rows: ReadonlyArray<InspectionRow>): string => {
  if (rows.length === 0) {
    return "(no keys)"
  }
  return rows
    .flatMap((row) => [
      `${row.key}:`,
      ...row.coercions.map((coercion) =>
        `  ${coercion.target.padEnd(TARGET_WIDTH)} ${renderOption(coercion.target, coercion.value)}`
      )
    ])
    .join("\n")
}

/**
 * Render an inspection as JSON: longs as decimal strings, absent values as null.
 *
 * @pure true
 */
export const renderJsonInspection = (rows: ReadonlyArray<InspectionRow>): string => {
  const payload: Record<string, Record<string, JsonScalar>> = {}
  for (const row of rows) {
    const coercions: Record<string, JsonScalar> = {}
    for (const coercion of row.coercions) {
      coercions[coercion.target] = toJsonScalar(coercion.target, coercion.value)
    }
    payload[row.key] = coercions
  }
  return JSON.stringify(payload, null, 2)
}

/** Output of a single `get`, in text or JSON form. */
export const renderGetResult = (
  target: TargetType,
  value: Option.Option<CoercedValue>,
  json: boolean
): string =>
  json
    ? JSON.stringify({ type: target, value: toJsonScalar(target, value) })
    : renderOption(target, value)
