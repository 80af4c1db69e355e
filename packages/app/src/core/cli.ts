import * as Either from "effect/Either"

import { maxDepthLimit, maxIndent } from "./config.js"

// CHANGE: implement deterministic CLI parsing for json-value-parser
// WHY: keep argv decoding pure and testable at the boundary
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.file is the only positional
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected
// COMPLEXITY: O(n) where n = argv length

export interface CliArgs {
  readonly file: string | undefined
  readonly indent: number | undefined
  readonly strict: boolean | undefined
  readonly maxDepth: number | undefined
  readonly configPath: string | undefined
  readonly configPathExplicit: boolean
  readonly silent: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-") && value.length > 1

const parseBoolean = (value: string): Either.Either<boolean, CliError> => {
  if (value === "true" || value === "1") {
    return Either.right(true)
  }
  if (value === "false" || value === "0") {
    return Either.right(false)
  }
  return Either.left(cliError(`Invalid boolean value: ${value}`))
}

const parseCount = (flagName: string, value: string, max: number): Either.Either<number, CliError> => {
  if (!/^\d+$/u.test(value)) {
    return Either.left(cliError(`Invalid value for --${flagName}: ${value}`))
  }
  const count = Number.parseInt(value, 10)
  return count > max
    ? Either.left(cliError(`Invalid value for --${flagName}: ${value} (at most ${max})`))
    : Either.right(count)
}

const defaultArgs: CliArgs = {
  file: undefined,
  indent: undefined,
  strict: undefined,
  maxDepth: undefined,
  configPath: undefined,
  configPathExplicit: false,
  silent: false
}

interface ParsedFlag {
  readonly next: CliArgs
  readonly consumed: number
}

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

const parseValueFlag = <A>(
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  decode: (raw: string) => Either.Either<A, CliError>,
  update: (args: CliArgs, value: A) => CliArgs
): Either.Either<ParsedFlag, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (raw) =>
    Either.map(decode(raw), (value) => ({
      next: update(current, value),
      consumed: inlineValue === undefined ? 2 : 1
    })))

const parseOptionalBooleanFlag = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: boolean) => CliArgs
): Either.Either<ParsedFlag, CliError> => {
  // a bare `--strict` must not swallow the file path that follows it
  const nextIsBoolean = nextValue === "true" || nextValue === "false"
  const useNext = inlineValue === undefined && nextIsBoolean
  const resolved = inlineValue ?? (nextIsBoolean ? nextValue : "true")
  return Either.map(parseBoolean(resolved), (value) => ({
    next: update(current, value),
    consumed: useNext ? 2 : 1
  }))
}

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<ParsedFlag, CliError>

const asString = (raw: string): Either.Either<string, CliError> => Either.right(raw)

const flagParsers: Record<string, FlagParser> = {
  silent: (current) => Either.right({ next: { ...current, silent: true }, consumed: 1 }),
  strict: (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      strict: value
    })),
  indent: (current, inlineValue, nextValue) =>
    parseValueFlag(
      "indent",
      current,
      inlineValue,
      nextValue,
      (raw) => parseCount("indent", raw, maxIndent),
      (args, value) => ({ ...args, indent: value })
    ),
  "max-depth": (current, inlineValue, nextValue) =>
    parseValueFlag(
      "max-depth",
      current,
      inlineValue,
      nextValue,
      (raw) => parseCount("max-depth", raw, maxDepthLimit),
      (args, value) => ({ ...args, maxDepth: value })
    ),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, asString, (args, value) => ({
      ...args,
      configPath: value,
      configPathExplicit: true
    }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<ParsedFlag, CliError> => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const [name = "", inlineValue] = raw.slice(2).split("=", 2)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

const parsePositional = (
  raw: string,
  current: CliArgs
): Either.Either<ParsedFlag, CliError> =>
  current.file === undefined
    ? Either.right({ next: { ...current, file: raw }, consumed: 1 })
    : Either.left(cliError(`Unexpected positional argument: ${raw}`))

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant at most one positional (the file path) is accepted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  let args = defaultArgs
  let index = 0
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    const parsed = isFlag(current)
      ? parseFlag(current, rawArgs[index + 1], args)
      : parsePositional(current, args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}
