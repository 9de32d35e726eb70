import * as Equal from "effect/Equal"
import { pipe } from "effect/Function"
import * as Hash from "effect/Hash"

import { backingMapOf } from "./type-id.js"

// CHANGE: structural equality and hashing over stored value trees
// WHY: maps compare key/value-wise regardless of insertion order
// REF: req-equality-1
// FORMAT THEOREM: ∀a,b: structuralEquals(a,b) → structuralHash(a) = structuralHash(b)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: map and object hashes are independent of entry order
// COMPLEXITY: O(n) in the size of the tree

const isPlainObject = (value: object): boolean => {
  const prototype: unknown = Object.getPrototypeOf(value)
  return prototype === Object.prototype || prototype === null
}

const mapsEqual = (left: Map<unknown, unknown>, right: Map<unknown, unknown>): boolean => {
  if (left.size !== right.size) {
    return false
  }
  for (const [key, value] of left) {
    if (!right.has(key) || !structuralEquals(value, right.get(key))) {
      return false
    }
  }
  return true
}

const arraysEqual = (left: ReadonlyArray<unknown>, right: ReadonlyArray<unknown>): boolean =>
  left.length === right.length && left.every((value, index) => structuralEquals(value, right[index]))

const recordsEqual = (left: object, right: object): boolean =>
  mapsEqual(new Map<unknown, unknown>(Object.entries(left)), new Map<unknown, unknown>(Object.entries(right)))

/**
 * Deep equality: maps, arrays and plain objects compare by content,
 * Equal implementors through their own protocol, everything else by `Object.is`.
 *
 * @pure true
 * @complexity O(n)
 */
export const structuralEquals = (left: unknown, right: unknown): boolean => {
  if (Object.is(left, right)) {
    return true
  }
  if (typeof left !== "object" || typeof right !== "object" || left === null || right === null) {
    return false
  }
  const leftMap = backingMapOf(left)
  const rightMap = backingMapOf(right)
  if (leftMap !== undefined || rightMap !== undefined) {
    return leftMap !== undefined && rightMap !== undefined && mapsEqual(leftMap, rightMap)
  }
  if (Equal.isEqual(left) || Equal.isEqual(right)) {
    return Equal.equals(left, right)
  }
  if (Array.isArray(left) || Array.isArray(right)) {
    return Array.isArray(left) && Array.isArray(right) && arraysEqual(left, right)
  }
  return isPlainObject(left) && isPlainObject(right) && recordsEqual(left, right)
}

const hashEntries = (entries: Iterable<readonly [unknown, unknown]>, seed: number): number => {
  let sum = 0
  for (const [key, value] of entries) {
    sum = (sum + (structuralHash(key) ^ structuralHash(value))) | 0
  }
  return pipe(Hash.string(seed === 0 ? "map" : "object"), Hash.combine(sum), Hash.optimize)
}

/**
 * Hash consistent with {@link structuralEquals}.
 *
 * @pure true
 * @complexity O(n)
 */
export const structuralHash = (value: unknown): number => {
  if (typeof value !== "object" || value === null) {
    return Hash.hash(value)
  }
  const backing = backingMapOf(value)
  if (backing !== undefined) {
    return hashEntries(backing, 0)
  }
  if (Equal.isEqual(value)) {
    return Hash.hash(value)
  }
  if (Array.isArray(value)) {
    let hash = Hash.string("array")
    for (const entry of value) {
      hash = pipe(hash, Hash.combine(structuralHash(entry)))
    }
    return Hash.optimize(hash)
  }
  return isPlainObject(value) ? hashEntries(Object.entries(value), 1) : Hash.hash(value)
}
