import type { CliArgs } from "./cli.js"
import type { NarrowingMode } from "./numeric.js"
import { defaultNarrowing } from "./numeric.js"

// CHANGE: define config merging rules and defaults
// WHY: CLI flags override the config file, which overrides defaults
// REF: req-config-merge-1
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved indent is a non-negative integer
// COMPLEXITY: O(1)/O(1)

export const defaultConfigFileName = ".typed-json-map.json"

export const defaultIndent = 2

export interface FileConfig {
  readonly narrowing?: NarrowingMode
  readonly indent?: number
}

export interface ResolvedConfig {
  readonly narrowing: NarrowingMode
  readonly indent: number
}

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .typed-json-map.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  narrowing: cli.narrowing ?? fileConfig?.narrowing ?? defaultNarrowing,
  indent: cli.indent ?? fileConfig?.indent ?? defaultIndent
})
