import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path } from "@effect/platform/Path"
import type { Path as PathService } from "@effect/platform/Path"
import { Effect, Match } from "effect"
import * as Logger from "effect/Logger"
import * as LogLevel from "effect/LogLevel"
import * as Option from "effect/Option"

import type { CliArgs } from "../core/cli.js"
import { cliError, parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { defaultConfigFileName, resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { inspectMap, renderGetResult, renderHumanInspection, renderJsonInspection } from "../core/report.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readDocument } from "../shell/document.js"
import { fromEither } from "../shell/from-either.js"

// CHANGE: orchestrate CLI commands with functional core + imperative shell
// WHY: single entrypoint with typed errors and deterministic output
// REF: req-program-1
// FORMAT THEOREM: ∀cmd: run(cmd) returns exitCode ∈ {0, 2} or fails with AppError
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem | Path>
// INVARIANT: output emitted at most once
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly output: string
  readonly exitCode: number
}

type ProgramEnv = FileSystemService | PathService

const EXIT_ABSENT = 2

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const emitOutput = (result: ProgramResult, silent: boolean): Effect.Effect<void> =>
  silent ? Effect.void : writeStdout(result.output)

const handleGet = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const key = cli.key
    if (key === undefined) {
      return yield* _(Effect.fail(cliError("Missing required flag --key for get")))
    }
    const map = yield* _(readDocument(cli.file, { narrowing: config.narrowing }))
    const value = map.getAs(key, cli.target)
    if (Option.isNone(value)) {
      yield* _(Effect.logDebug(`${key} is missing or not coercible to ${cli.target}`))
    }
    return {
      output: renderGetResult(cli.target, value, cli.json),
      exitCode: Option.isSome(value) ? 0 : EXIT_ABSENT
    }
  })

const handleInspect = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const map = yield* _(readDocument(cli.file, { narrowing: config.narrowing }))
    const rows = inspectMap(map)
    return {
      output: cli.json ? renderJsonInspection(rows) : renderHumanInspection(rows),
      exitCode: 0
    }
  })

const handleFormat = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const map = yield* _(readDocument(cli.file, { narrowing: config.narrowing }))
    const text = yield* _(fromEither(map.toText({ indent: config.indent })))
    return { output: text, exitCode: 0 }
  })

const executeCommand = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Match.value(cli.command).pipe(
    Match.when("get", () => handleGet(cli, config)),
    Match.when("inspect", () => handleInspect(cli, config)),
    Match.when("format", () => handleFormat(cli, config)),
    Match.exhaustive
  )

const runParsed = (cli: CliArgs): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const path = yield* _(Path)
    const configPath = cli.configPath ?? path.join(path.dirname(cli.file), defaultConfigFileName)
    const fileConfig = yield* _(loadConfigFile(configPath, cli.configExplicit))
    const config = resolveConfig(cli, fileConfig)
    yield* _(Effect.logDebug(`narrowing=${config.narrowing} indent=${config.indent}`))
    const result = yield* _(executeCommand(cli, config))
    yield* _(emitOutput(result, cli.silent))
    return result
  })

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with rendered output and exit code.
 *
 * @pure false
 * @effect FileSystem, Path, Console
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, ProgramEnv> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const level = cli.verbose ? LogLevel.Debug : LogLevel.Info
    return yield* _(runParsed(cli).pipe(Logger.withMinimumLogLevel(level)))
  })
