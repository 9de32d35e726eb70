// CHANGE: introduce the JSON domain type produced by the codec
// WHY: decoded documents are trees of primitive leaves under arrays and objects
// REF: req-json-1
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Json is closed under array/object nesting with primitive leaves; bigint leaves hold 64-bit integers
// COMPLEXITY: O(1)/O(1)

export type Json =
  | null
  | boolean
  | number
  | bigint
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export type JsonObject = { readonly [key: string]: Json }

export const isJsonObject = (value: Json): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value)

/** Build an object in entry order; every key, `__proto__` included, becomes an own property. */
export const jsonObjectFromEntries = (entries: Iterable<readonly [string, Json]>): JsonObject => {
  const result: Record<string, Json> = {}
  for (const [key, value] of entries) {
    Object.defineProperty(result, key, { value, enumerable: true, writable: true, configurable: true })
  }
  return result
}
