import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { defaultConfigPath, resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { parse, parseDocument } from "../core/grammar.js"
import { locate } from "../core/location.js"
import { formatParseError } from "../core/parse-error.js"
import { renderValue } from "../core/render.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readSourceFile } from "../shell/source-file.js"

// CHANGE: orchestrate the CLI with functional core + imperative shell
// WHY: read one document, parse it, and report the tree or the failure
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: run(argv) returns exitCode ∈ {0,1,2}
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: the parser is never invoked without readable input
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly exitCode: number
  readonly stdout: string
  readonly stderr: string
}

export const usage = "Usage: json-value-parser [file path]"

const usageResult: ProgramResult = { exitCode: 2, stdout: usage, stderr: "" }

const writeTo = (stream: NodeJS.WriteStream, payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    if (payload.length > 0) {
      stream.write(payload.endsWith("\n") ? payload : `${payload}\n`)
    }
  })

const emitResult = (result: ProgramResult, silent: boolean): Effect.Effect<void> =>
  silent
    ? Effect.void
    : Effect.zipRight(writeTo(process.stdout, result.stdout), writeTo(process.stderr, result.stderr))

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const trailingWarning = (source: string, offset: number): string => {
  if (offset >= source.length) {
    return ""
  }
  const { column, line } = locate(source, offset)
  return `warning: ${source.length - offset} trailing characters ignored from ${line}:${column}`
}

/**
 * Parse a document and build the program output.
 *
 * @param source - Whole document text.
 * @param config - Resolved configuration.
 * @returns Exit code 0 with the rendered tree, or 1 with a diagnostic.
 *
 * @pure true
 * @invariant strict mode never ignores trailing input
 * @complexity O(n)
 */
export const evaluateSource = (source: string, config: ResolvedConfig): ProgramResult => {
  if (config.strict) {
    return Either.match(parseDocument(source, config.parse), {
      onLeft: (error) => ({ exitCode: 1, stdout: "", stderr: formatParseError(source, error) }),
      onRight: (value) => ({ exitCode: 0, stdout: renderValue(value, config.indent), stderr: "" })
    })
  }
  return Either.match(parse(source, config.parse), {
    onLeft: (error) => ({ exitCode: 1, stdout: "", stderr: formatParseError(source, error) }),
    onRight: (outcome) => ({
      exitCode: 0,
      stdout: renderValue(outcome.value, config.indent),
      stderr: trailingWarning(source, outcome.offset)
    })
  })
}

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with what was written and the exit code.
 *
 * @pure false
 * @effect FileSystem, stdout, stderr
 * @invariant usage is printed instead of parsing when the file is missing
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const fileConfig = yield* _(loadConfigFile(cli.configPath ?? defaultConfigPath, cli.configPathExplicit))
    const config = resolveConfig(cli, fileConfig)
    const source = cli.file === undefined ? undefined : yield* _(readSourceFile(cli.file))
    const result = source === undefined ? usageResult : evaluateSource(source, config)
    yield* _(emitResult(result, cli.silent))
    return result
  })
