import { Match } from "effect"
import * as Either from "effect/Either"

// CHANGE: deterministic CLI parsing for cargo-manifest
// WHY: keep CLI decoding pure and testable at the boundary
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "show" | "set-version" | "metadata"

export interface CliArgs {
  readonly command: CliCommand
  readonly projectDir: string
  readonly configPath: string | undefined
  readonly configPathExplicit: boolean
  readonly cargo: string | undefined
  readonly outputPath: string | undefined
  readonly version: string | undefined
  readonly json: boolean | undefined
  readonly silent: boolean
  readonly verbose: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-")

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("show", () => Either.right<CliCommand>("show")),
    Match.when("set-version", () => Either.right<CliCommand>("set-version")),
    Match.when("metadata", () => Either.right<CliCommand>("metadata")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  projectDir: ".",
  configPath: undefined,
  configPathExplicit: false,
  cargo: undefined,
  outputPath: undefined,
  version: undefined,
  json: undefined,
  silent: false,
  verbose: false
})

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

type FlagResult = Either.Either<{ readonly next: CliArgs; readonly consumed: number }, CliError>

const setParsedFlag = (next: CliArgs, consumed: number): FlagResult => Either.right({ next, consumed })

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => CliArgs
): FlagResult =>
  Either.map(readFlagValue(flagName, inlineValue, nextValue), (value) => ({
    next: update(current, value),
    consumed: inlineValue === undefined ? 2 : 1
  }))

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => FlagResult

const flagParsers: Record<string, FlagParser> = {
  json: (current) => setParsedFlag({ ...current, json: true }, 1),
  silent: (current) => setParsedFlag({ ...current, silent: true }, 1),
  verbose: (current) => setParsedFlag({ ...current, verbose: true }, 1),
  project: (current, inlineValue, nextValue) =>
    parseValueFlag("project", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      projectDir: value
    })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      configPath: value,
      configPathExplicit: true
    })),
  cargo: (current, inlineValue, nextValue) =>
    parseValueFlag("cargo", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      cargo: value
    })),
  output: (current, inlineValue, nextValue) =>
    parseValueFlag("output", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      outputPath: value
    })),
  to: (current, inlineValue, nextValue) =>
    parseValueFlag("to", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      version: value
    }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): FlagResult => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const separator = raw.indexOf("=")
  const name = separator === -1 ? raw.slice(2) : raw.slice(2, separator)
  const inlineValue = separator === -1 ? undefined : raw.slice(separator + 1)
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
    return Either.right({ command: "show", startIndex: 0 })
  }
  return Either.map(parseCommand(first), (command) => ({ command, startIndex: 1 }))
}

const parseFlags = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
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

const checkCommandFlags = (args: CliArgs): Either.Either<CliArgs, CliError> => {
  if (args.command === "set-version" && args.version === undefined) {
    return Either.left(cliError("set-version requires --to <version>"))
  }
  if (args.command !== "set-version" && (args.version !== undefined || args.outputPath !== undefined)) {
    return Either.left(cliError(`--to and --output only apply to set-version`))
  }
  return Either.right(args)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to show when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  return Either.flatMap(parseCommandFromArgs(rawArgs), (parsed) =>
    Either.flatMap(
      parseFlags(rawArgs, parsed.startIndex, defaultArgs(parsed.command)),
      checkCommandFlags
    ))
}
