import * as Either from "effect/Either"
import { pipe } from "effect/Function"
import * as Match from "effect/Match"
import jsonc from "jsonc-parser"
import type { Node, ParseError } from "jsonc-parser"

import type { DecodeError, EncodeError } from "./errors.js"
import { decodeError, encodeError } from "./errors.js"
import type { Json, JsonObject } from "./json.js"
import { jsonObjectFromEntries } from "./json.js"
import { NativeChar, NativeNumber } from "./native.js"
import { formatFloat } from "./numeric.js"
import { backingMapOf } from "./type-id.js"

// CHANGE: JSON text <-> tree codec over an ordered, literal-preserving syntax tree
// WHY: the typed map only ever sees validated Json trees with an object root
// REF: req-codec-1
// FORMAT THEOREM: ∀t: decode(t) = Right(o) → o is a JsonObject; ∀v: encode(v) = Right(s) → decode(s) is Right
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: members keep document order; integer literals beyond ±2^53 within 64 bits decode as bigint
// COMPLEXITY: O(n) in the size of the tree

// Ordered intermediate form shared by both directions; objects are member lists, never records.
type Tree =
  | null
  | boolean
  | number
  | bigint
  | string
  | { readonly _tag: "List"; readonly items: ReadonlyArray<Tree> }
  | { readonly _tag: "Members"; readonly members: ReadonlyArray<readonly [string, Tree]> }

export interface EncodeOptions {
  /** Spaces per indentation level; compact output when omitted or 0. */
  readonly indent?: number
}

const parseOptions = { disallowComments: true, allowTrailingComma: false, allowEmptyContent: false }

const integerLiteral = /^-?\d+$/u

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER)
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER)

const isSafe = (value: bigint): boolean => value >= MIN_SAFE && value <= MAX_SAFE

// Integer literals that a double would round keep their digits as a 64-bit bigint.
const numberFromLiteral = (literal: string): number | bigint => {
  if (!integerLiteral.test(literal)) {
    return Number(literal)
  }
  const value = BigInt(literal)
  return isSafe(value) || BigInt.asIntN(64, value) !== value ? Number(literal) : value
}

const malformed = (node: Node): DecodeError => decodeError(`Malformed ${node.type} at offset ${node.offset}`)

const fromNodes = (nodes: ReadonlyArray<Node>, text: string): Either.Either<Array<Tree>, DecodeError> => {
  const items: Array<Tree> = []
  for (const node of nodes) {
    const item = fromNode(node, text)
    if (Either.isLeft(item)) {
      return Either.left(item.left)
    }
    items.push(item.right)
  }
  return Either.right(items)
}

const membersOf = (
  node: Node,
  text: string
): Either.Either<Array<readonly [string, Tree]>, DecodeError> => {
  const members: Array<readonly [string, Tree]> = []
  for (const property of node.children ?? []) {
    const [keyNode, valueNode] = property.children ?? []
    const key: unknown = keyNode?.value
    if (typeof key !== "string" || valueNode === undefined) {
      return Either.left(malformed(property))
    }
    const value = fromNode(valueNode, text)
    if (Either.isLeft(value)) {
      return Either.left(value.left)
    }
    members.push([key, value.right])
  }
  return Either.right(members)
}

const fromNode = (node: Node, text: string): Either.Either<Tree, DecodeError> => {
  const value: unknown = node.value
  return Match.value(node.type).pipe(
    Match.when("null", () => Either.right(null)),
    Match.when("boolean", () => typeof value === "boolean" ? Either.right(value) : Either.left(malformed(node))),
    Match.when("string", () => typeof value === "string" ? Either.right(value) : Either.left(malformed(node))),
    Match.when("number", () => Either.right(numberFromLiteral(text.slice(node.offset, node.offset + node.length)))),
    Match.when("array", () =>
      Either.map(fromNodes(node.children ?? [], text), (items): Tree => ({ _tag: "List", items }))),
    Match.when("object", () => Either.map(membersOf(node, text), (members): Tree => ({ _tag: "Members", members }))),
    Match.when("property", () => Either.left(malformed(node))),
    Match.exhaustive
  )
}

const toJsonMember = ([key, value]: readonly [string, Tree]): readonly [string, Json] => [key, toJsonValue(value)]

const toJsonValue = (tree: Tree): Json => {
  if (tree === null || typeof tree !== "object") {
    return tree
  }
  return tree._tag === "List"
    ? tree.items.map(toJsonValue)
    : jsonObjectFromEntries(tree.members.map(toJsonMember))
}

const parseRootMembers = (text: string): Either.Either<ReadonlyArray<readonly [string, Tree]>, DecodeError> => {
  const errors: Array<ParseError> = []
  const root = jsonc.parseTree(text, errors, parseOptions)
  const first = errors[0]
  if (first !== undefined) {
    return Either.left(decodeError(`${jsonc.printParseErrorCode(first.error)} at offset ${first.offset}`))
  }
  if (root === undefined) {
    return Either.left(decodeError("Empty document"))
  }
  if (root.type !== "object") {
    return Either.left(decodeError(`Expected an object at the document root, got ${root.type}`))
  }
  return membersOf(root, text)
}

/**
 * Decode JSON text whose root is an object into its members, in document order.
 * A `__proto__` member is an ordinary key; a repeated key keeps its first position and its last value.
 *
 * @pure true
 * @complexity O(n)
 */
export const decodeEntries = (text: string): Either.Either<ReadonlyArray<readonly [string, Json]>, DecodeError> =>
  Either.map(parseRootMembers(text), (members) => members.map(toJsonMember))

/**
 * Decode JSON text whose root is an object.
 *
 * @param text - JSON document text.
 * @returns The root object, or a DecodeError for malformed text or a non-object root.
 *
 * @pure true
 * @invariant Right values are JsonObject
 * @complexity O(n)
 */
export const decodeJson = (text: string): Either.Either<JsonObject, DecodeError> =>
  Either.map(decodeEntries(text), jsonObjectFromEntries)

const identifier = /^[A-Za-z_$][\w$]*$/u

const childPath = (path: string, key: string): string =>
  identifier.test(key) ? `${path}.${key}` : `${path}[${JSON.stringify(key)}]`

const isPlainObject = (value: object): boolean => {
  const prototype: unknown = Object.getPrototypeOf(value)
  return prototype === Object.prototype || prototype === null
}

const encodeNumber = (value: number, path: string): Either.Either<Tree, EncodeError> =>
  Number.isFinite(value)
    ? Either.right(value)
    : Either.left(encodeError(path, `${value} is not representable in JSON`))

const encodeNative = (value: NativeNumber, path: string): Either.Either<Tree, EncodeError> =>
  value.kind === "float" && Number.isFinite(value.value)
    ? Either.right(Number(formatFloat(value.value)))
    : encodeNumber(value.value, path)

const encodeEntries = (
  entries: Iterable<readonly [unknown, unknown]>,
  path: string,
  seen: Set<object>
): Either.Either<Tree, EncodeError> => {
  const members: Array<readonly [string, Tree]> = []
  for (const [key, entry] of entries) {
    if (typeof key !== "string") {
      return Either.left(encodeError(path, `map key of type ${typeof key} is not a string`))
    }
    const encoded = toTree(entry, childPath(path, key), seen)
    if (Either.isLeft(encoded)) {
      return encoded
    }
    members.push([key, encoded.right])
  }
  return Either.right<Tree>({ _tag: "Members", members })
}

const encodeArray = (
  values: ReadonlyArray<unknown>,
  path: string,
  seen: Set<object>
): Either.Either<Tree, EncodeError> => {
  const items: Array<Tree> = []
  for (const [index, entry] of values.entries()) {
    const encoded = toTree(entry, `${path}[${index}]`, seen)
    if (Either.isLeft(encoded)) {
      return encoded
    }
    items.push(encoded.right)
  }
  return Either.right<Tree>({ _tag: "List", items })
}

const encodeObject = (value: object, path: string, seen: Set<object>): Either.Either<Tree, EncodeError> => {
  if (value instanceof NativeNumber) {
    return encodeNative(value, path)
  }
  if (value instanceof NativeChar) {
    return Either.right(value.value)
  }
  if (seen.has(value)) {
    return Either.left(encodeError(path, "cyclic reference"))
  }
  seen.add(value)
  const backing = backingMapOf(value)
  const encoded = Array.isArray(value)
    ? encodeArray(value, path, seen)
    : backing !== undefined
    ? encodeEntries(backing, path, seen)
    : isPlainObject(value)
    ? encodeEntries(Object.entries(value), path, seen)
    : Either.left(encodeError(path, `instance of ${value.constructor.name} is not representable in JSON`))
  seen.delete(value)
  return encoded
}

const toTree = (value: unknown, path: string, seen: Set<object>): Either.Either<Tree, EncodeError> => {
  if (value === null || typeof value === "string" || typeof value === "boolean" || typeof value === "bigint") {
    return Either.right(value)
  }
  if (typeof value === "number") {
    return encodeNumber(value, path)
  }
  if (typeof value === "object") {
    return encodeObject(value, path, seen)
  }
  return Either.left(encodeError(path, `${typeof value} is not representable in JSON`))
}

// Same layout as JSON.stringify(value, null, indent); bigints are written as their digits.
const writeTree = (tree: Tree, indent: string, depth: string): string => {
  if (typeof tree === "bigint") {
    return tree.toString()
  }
  if (tree === null || typeof tree !== "object") {
    return JSON.stringify(tree)
  }
  const inner = depth + indent
  const separator = indent === "" ? ":" : ": "
  const list = tree._tag === "List"
  const open = list ? "[" : "{"
  const close = list ? "]" : "}"
  const parts = tree._tag === "List"
    ? tree.items.map((item) => writeTree(item, indent, inner))
    : tree.members.map(([key, value]) => `${JSON.stringify(key)}${separator}${writeTree(value, indent, inner)}`)
  if (parts.length === 0) {
    return `${open}${close}`
  }
  return indent === ""
    ? `${open}${parts.join(",")}${close}`
    : `${open}\n${inner}${parts.join(`,\n${inner}`)}\n${depth}${close}`
}

/**
 * Normalize a value tree into Json: maps become objects, native boxes become numbers or strings.
 *
 * @pure true
 * @invariant Left carries the JSON path of the first unrepresentable value
 * @complexity O(n)
 */
export const normalizeJson = (value: unknown): Either.Either<Json, EncodeError> =>
  Either.map(toTree(value, "$", new Set()), toJsonValue)

/**
 * Encode a value tree as JSON text, keeping Map insertion order.
 *
 * @param value - Tree of JSON-compatible values, maps and native boxes.
 * @param options - Output formatting.
 * @returns JSON text or an EncodeError.
 *
 * @pure true
 * @invariant decodeJson(encodeJson(m)) restores every canonical leaf of an object root m
 * @complexity O(n)
 */
export const encodeJson = (
  value: unknown,
  options: EncodeOptions = {}
): Either.Either<string, EncodeError> =>
  pipe(
    toTree(value, "$", new Set()),
    Either.map((tree) => writeTree(tree, " ".repeat(options.indent ?? 0), ""))
  )
