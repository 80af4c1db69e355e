import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for the CLI tool
// WHY: provide typed failures for program flow and exit codes
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }

export type AppError =
  | CliError
  | ConfigError
  | FileError

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const describeAppError = (error: AppError): string => `${error._tag}: ${error.message}`
