import type { CliArgs } from "./cli.js"
import type { ParseOptions } from "./combinator.js"
import { defaultParseOptions } from "./combinator.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved maxDepth ≥ 1
// COMPLEXITY: O(1)/O(1)

export const defaultConfigPath = "./.json-value-parser.json"

// upper bounds shared by CLI flags and the config file schema
export const maxIndent = 32
export const maxDepthLimit = 256

export interface FileConfig {
  readonly indent?: number
  readonly strict?: boolean
  readonly maxDepth?: number
}

export interface ResolvedConfig {
  readonly indent: number
  readonly strict: boolean
  readonly parse: ParseOptions
}

const defaultIndent = 2

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .json-value-parser.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @invariant a maxDepth of 0 is raised to 1 so a top-level container can parse
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  indent: cli.indent ?? fileConfig?.indent ?? defaultIndent,
  strict: cli.strict ?? fileConfig?.strict ?? false,
  parse: {
    maxDepth: Math.max(1, cli.maxDepth ?? fileConfig?.maxDepth ?? defaultParseOptions.maxDepth)
  }
})
