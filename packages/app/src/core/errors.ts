import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify the error algebra of the typed map and its CLI
// WHY: structural failures are values with stable tags; coercion misses are Option.none
// REF: req-errors-1
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type DecodeError = { readonly _tag: "DecodeError"; readonly message: string }
export type EncodeError = {
  readonly _tag: "EncodeError"
  readonly path: string
  readonly message: string
}
export type InvalidArgument = { readonly _tag: "InvalidArgument"; readonly message: string }
export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }

export type AppError =
  | CliError
  | DecodeError
  | EncodeError
  | InvalidArgument
  | ConfigError
  | FileError

export const decodeError = (message: string): DecodeError => ({
  _tag: "DecodeError",
  message
})

export const encodeError = (path: string, message: string): EncodeError => ({
  _tag: "EncodeError",
  path,
  message
})

export const invalidArgument = (message: string): InvalidArgument => ({
  _tag: "InvalidArgument",
  message
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

/**
 * Render any application error as a single diagnostic line.
 *
 * @pure true
 * @invariant output starts with the error kind
 */
export const renderAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.when({ _tag: "CliError" }, (value) => `Invalid arguments: ${value.message}`),
    Match.when({ _tag: "DecodeError" }, (value) => `Cannot decode JSON: ${value.message}`),
    Match.when({ _tag: "EncodeError" }, (value) => `Cannot encode JSON at ${value.path}: ${value.message}`),
    Match.when({ _tag: "InvalidArgument" }, (value) => `Invalid argument: ${value.message}`),
    Match.when({ _tag: "ConfigError" }, (value) => `Invalid config: ${value.message}`),
    Match.when({ _tag: "FileError" }, (value) => `File error: ${value.message}`),
    Match.exhaustive
  )
