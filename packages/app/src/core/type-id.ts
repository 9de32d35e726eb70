import * as Predicate from "effect/Predicate"

// Brand under which a JsonMap exposes its backing Map to the codec and equality helpers.
export const JsonMapTypeId: unique symbol = Symbol.for("typed-json-map/JsonMap")

export type JsonMapTypeId = typeof JsonMapTypeId

/** The Map behind a plain Map or a branded JsonMap; undefined for anything else. */
export const backingMapOf = (value: object): Map<unknown, unknown> | undefined => {
  if (value instanceof Map) {
    return value
  }
  if (!Predicate.hasProperty(value, JsonMapTypeId)) {
    return undefined
  }
  const delegate = value[JsonMapTypeId]
  return delegate instanceof Map ? delegate : undefined
}
