import * as Command from "@effect/platform/Command"
import type { CommandExecutor } from "@effect/platform/CommandExecutor"
import type { PlatformError } from "@effect/platform/Error"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Stream from "effect/Stream"

import type { ExternalToolError } from "../core/errors.js"
import { externalToolError } from "../core/errors.js"

// CHANGE: run an external tool and capture its output with Effect CommandExecutor
// WHY: the metadata bridge needs stdout and the exit code of one invocation
// REF: req-command-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: capture(c) = Right(o) → o.exitCode ∈ ℕ
// PURITY: SHELL
// EFFECT: Effect<CapturedOutput, ExternalToolError, CommandExecutor>
// INVARIANT: stdout and stderr are drained before the exit code is read
// COMPLEXITY: O(n) where n = bytes written by the tool

interface WordState {
  readonly words: ReadonlyArray<string>
  readonly word: string | undefined
  readonly quote: "\"" | "'" | undefined
  readonly escaped: boolean
}

const appendChar = (state: WordState, char: string): WordState => ({
  ...state,
  word: (state.word ?? "") + char,
  escaped: false
})

const stepWord = (state: WordState, char: string): WordState => {
  if (state.escaped) {
    return appendChar(state, char)
  }
  if (char === "\\" && state.quote !== "'") {
    return { ...state, escaped: true }
  }
  if (state.quote !== undefined) {
    return char === state.quote ? { ...state, quote: undefined } : appendChar(state, char)
  }
  if (char === "\"" || char === "'") {
    return { ...state, quote: char, word: state.word ?? "" }
  }
  if (char.trim().length === 0) {
    return state.word === undefined ? state : { ...state, words: [...state.words, state.word], word: undefined }
  }
  return appendChar(state, char)
}

/** A configured tool command line, split into the program and its leading arguments. */
export interface ToolInvocation {
  readonly program: string
  readonly leading: ReadonlyArray<string>
}

/**
 * Split a configured tool command line such as `cargo +nightly` into words.
 * Quotes group words; a backslash outside single quotes takes the next
 * character literally.
 *
 * @pure true
 * @invariant Left when a quote is left open or no program is named
 * @complexity O(n)
 */
export const parseToolCommand = (commandLine: string): Either.Either<ToolInvocation, ExternalToolError> => {
  const initial: WordState = { words: [], word: undefined, quote: undefined, escaped: false }
  const state = Array.from(commandLine).reduce(stepWord, initial)
  if (state.quote !== undefined) {
    return Either.left(externalToolError(commandLine, `Unterminated quote in command: ${commandLine}`))
  }
  const pending = state.escaped ? (state.word ?? "") + "\\" : state.word
  const [program, ...leading] = pending === undefined ? state.words : [...state.words, pending]
  if (program === undefined) {
    return Either.left(externalToolError(commandLine, "empty command"))
  }
  return Either.right({ program, leading })
}

export interface CapturedOutput {
  readonly stdout: string
  readonly stderr: string
  readonly exitCode: number
}

const collectText = (stream: Stream.Stream<Uint8Array, PlatformError>): Effect.Effect<string, PlatformError> =>
  stream.pipe(
    Stream.decodeText(),
    Stream.runFold("", (acc: string, chunk: string) => acc + chunk)
  )

/**
 * Run `commandLine` followed by `args` and capture its output.
 *
 * @param commandLine - Tool invocation, possibly with leading arguments (e.g. `cargo +nightly`).
 * @param args - Arguments appended after the command line words.
 *
 * @pure false
 * @effect CommandExecutor
 * @complexity O(n)
 */
export const captureCommand = (
  commandLine: string,
  args: ReadonlyArray<string>
): Effect.Effect<CapturedOutput, ExternalToolError, CommandExecutor> =>
  Effect.gen(function*(_) {
    const { leading, program } = yield* _(parseToolCommand(commandLine))
    const command = Command.make(program, ...leading, ...args)
    return yield* _(
      Effect.scoped(
        Effect.gen(function*(_) {
          const child = yield* _(Command.start(command))
          const [stdout, stderr, exitCode] = yield* _(
            Effect.all([collectText(child.stdout), collectText(child.stderr), child.exitCode], {
              concurrency: "unbounded"
            })
          )
          return { stdout, stderr, exitCode: Number(exitCode) }
        })
      ).pipe(Effect.mapError((error) => externalToolError(commandLine, String(error))))
    )
  })
