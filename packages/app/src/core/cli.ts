import { Match } from "effect"
import * as Either from "effect/Either"

import type { TargetType } from "./coerce.js"
import { isTargetType, targetTypes } from "./coerce.js"
import type { NarrowingMode } from "./numeric.js"

// CHANGE: implement deterministic CLI parsing for typed-json-map
// WHY: keep argv decoding pure and testable at the boundary
// REF: req-cli-parse-1
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands ∧ args.file ≠ undefined
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and positional arguments are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "get" | "inspect" | "format"

export interface CliArgs {
  readonly command: CliCommand
  readonly file: string
  readonly key: string | undefined
  readonly target: TargetType
  readonly narrowing: NarrowingMode | undefined
  readonly indent: number | undefined
  readonly configPath: string | undefined
  readonly configExplicit: boolean
  readonly json: boolean
  readonly silent: boolean
  readonly verbose: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

export const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-")

const MAX_INDENT = 10

type DraftArgs = Omit<CliArgs, "file"> & { readonly file: string | undefined }

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("get", () => Either.right<CliCommand>("get")),
    Match.when("inspect", () => Either.right<CliCommand>("inspect")),
    Match.when("format", () => Either.right<CliCommand>("format")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const parseNarrowing = (value: string): Either.Either<NarrowingMode, CliError> =>
  value === "truncate" || value === "strict"
    ? Either.right(value)
    : Either.left(cliError(`Invalid narrowing mode: ${value} (expected truncate or strict)`))

const parseIndent = (value: string): Either.Either<number, CliError> => {
  const parsed = /^\d+$/u.test(value) ? Number(value) : Number.NaN
  if (Number.isNaN(parsed) || parsed > MAX_INDENT) {
    return Either.left(cliError(`Invalid indent: ${value} (expected 0..${MAX_INDENT})`))
  }
  return Either.right(parsed)
}

const parseTarget = (value: string): Either.Either<TargetType, CliError> =>
  isTargetType(value)
    ? Either.right(value)
    : Either.left(cliError(`Unknown type: ${value} (expected one of ${targetTypes.join(", ")})`))

const defaultArgs = (command: CliCommand): DraftArgs => ({
  command,
  file: undefined,
  key: undefined,
  target: "string",
  narrowing: undefined,
  indent: undefined,
  configPath: undefined,
  configExplicit: false,
  json: false,
  silent: false,
  verbose: false
})

type ParsedFlag = Either.Either<{ readonly next: DraftArgs; readonly consumed: number }, CliError>

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const setParsedFlag = (next: DraftArgs, consumed: number): ParsedFlag => Either.right({ next, consumed })

const parseValueFlag = (
  flagName: string,
  current: DraftArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: DraftArgs, value: string) => Either.Either<DraftArgs, CliError>
): ParsedFlag =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (value) =>
    Either.map(update(current, value), (next) => ({
      next,
      consumed: inlineValue === undefined ? 2 : 1
    })))

type FlagParser = (
  current: DraftArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => ParsedFlag

const flagParsers: Record<string, FlagParser> = {
  json: (current) => setParsedFlag({ ...current, json: true }, 1),
  silent: (current) => setParsedFlag({ ...current, silent: true }, 1),
  verbose: (current) => setParsedFlag({ ...current, verbose: true }, 1),
  strict: (current) => setParsedFlag({ ...current, narrowing: "strict" }, 1),
  file: (current, inlineValue, nextValue) =>
    parseValueFlag("file", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, file: value })),
  key: (current, inlineValue, nextValue) =>
    parseValueFlag("key", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, key: value })),
  as: (current, inlineValue, nextValue) =>
    parseValueFlag("as", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseTarget(value), (target) => ({ ...args, target }))),
  narrowing: (current, inlineValue, nextValue) =>
    parseValueFlag("narrowing", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseNarrowing(value), (narrowing) => ({ ...args, narrowing }))),
  indent: (current, inlineValue, nextValue) =>
    parseValueFlag("indent", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseIndent(value), (indent) => ({ ...args, indent }))),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) =>
      Either.right({ ...args, configPath: value, configExplicit: true }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: DraftArgs
): ParsedFlag => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const body = raw.slice(2)
  const separator = body.indexOf("=")
  const name = separator === -1 ? body : body.slice(0, separator)
  const inlineValue = separator === -1 ? undefined : body.slice(separator + 1)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

interface ParsedCommand {
  readonly command: CliCommand
  readonly startIndex: number
}

const parseCommandFromArgs = (
  rawArgs: ReadonlyArray<string>
): Either.Either<ParsedCommand, CliError> => {
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.right<ParsedCommand>({ command: "inspect", startIndex: 0 })
  }
  return Either.map(parseCommand(first), (command) => ({ command, startIndex: 1 }))
}

const parseFlags = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: DraftArgs
): Either.Either<DraftArgs, CliError> => {
  let args = initial
  let index = startIndex
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      return Either.left(cliError(`Unexpected positional argument: ${current}`))
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

const finalizeArgs = (draft: DraftArgs): Either.Either<CliArgs, CliError> => {
  const file = draft.file
  if (file === undefined) {
    return Either.left(cliError("Missing required flag --file"))
  }
  if (draft.command === "get" && draft.key === undefined) {
    return Either.left(cliError("Missing required flag --key for get"))
  }
  return Either.right({ ...draft, file })
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to inspect when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  return Either.flatMap(
    parseCommandFromArgs(rawArgs),
    (parsed) => Either.flatMap(parseFlags(rawArgs, parsed.startIndex, defaultArgs(parsed.command)), finalizeArgs)
  )
}
