import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger, LogLevel, Match } from "effect"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { LogLevelName, ResolvedConfig } from "../core/config.js"
import { resolveConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { render } from "../core/render.js"
import { loadConfigFile } from "../shell/config-file.js"
import { writeTextFile } from "../shell/sink.js"
import { readJsonFile } from "../shell/source.js"

// CHANGE: orchestrate format/check commands with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// QUOTE(TZ): n/a
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀mode: run(mode) returns exitCode ∈ {0,2}
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: rendered output is emitted at most once
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly output: string | undefined
  readonly exitCode: number
}

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const toLogLevel = (name: LogLevelName): LogLevel.LogLevel =>
  Match.value(name).pipe(
    Match.when("None", () => LogLevel.None),
    Match.when("Info", () => LogLevel.Info),
    Match.when("Debug", () => LogLevel.Debug),
    Match.exhaustive
  )

// a file that differs from the rendering only by one final newline counts as formatted
const isFormatted = (raw: string, rendered: string): boolean => raw === rendered || raw === `${rendered}\n`

const handleFormat = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const source = yield* _(readJsonFile(cli.input))
    const rendered = render(source.value, config.pretty)
    if (config.out !== undefined) {
      yield* _(writeTextFile(config.out, rendered))
      yield* _(Effect.logInfo(`formatted ${cli.input} -> ${config.out}`))
      return { output: undefined, exitCode: 0 }
    }
    if (config.logLevel !== "None") {
      yield* _(writeStdout(rendered))
    }
    return { output: rendered, exitCode: 0 }
  })

// check never writes; an `out` from the config file does not apply to it
const handleCheck = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const source = yield* _(readJsonFile(cli.input))
    const rendered = render(source.value, config.pretty)
    if (isFormatted(source.raw, rendered)) {
      yield* _(Effect.logInfo(`${cli.input} is formatted`))
      return { output: undefined, exitCode: 0 }
    }
    yield* _(Effect.logInfo(`${cli.input} is not formatted`))
    return { output: undefined, exitCode: 2 }
  })

const executeCommand = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Match.value(cli.command).pipe(
    Match.when("format", () => handleFormat(cli, config)),
    Match.when("check", () => handleCheck(cli, config)),
    Match.exhaustive
  )

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with rendered output (stdout mode) and exit code.
 *
 * @pure false
 * @effect FileSystem, Console
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(parseCliArgs(argv))
    const fileConfig = yield* _(loadConfigFile(cli.configPath, cli.configPathExplicit))
    const config = resolveConfig(cli, fileConfig)
    return yield* _(
      executeCommand(cli, config).pipe(
        Effect.annotateLogs("command", cli.command),
        Logger.withMinimumLogLevel(toLogLevel(config.logLevel))
      )
    )
  })
