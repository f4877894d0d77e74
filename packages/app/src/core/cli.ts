import { Match } from "effect"
import * as Either from "effect/Either"

// CHANGE: implement deterministic CLI parsing for typed-jsonify
// WHY: keep CLI decoding pure and testable at the boundary
// QUOTE(TZ): n/a
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands ∧ args.input ≠ ""
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected; check takes no --out
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "format" | "check"

export interface CliArgs {
  readonly command: CliCommand
  readonly input: string
  readonly out: string | undefined
  readonly pretty: boolean | undefined
  readonly configPath: string | undefined
  readonly configPathExplicit: boolean
  readonly verbose: boolean
  readonly silent: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

export const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const DEFAULT_CONFIG_PATH = "./.typed-jsonify.json"

const FLAG = /^--([a-z]+)(?:=(.*))?$/s

const isFlag = (value: string): boolean => value.startsWith("-")

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("format", () => Either.right<CliCommand>("format")),
    Match.when("check", () => Either.right<CliCommand>("check")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  input: "",
  out: undefined,
  pretty: undefined,
  configPath: DEFAULT_CONFIG_PATH,
  configPathExplicit: false,
  verbose: false,
  silent: false
})

const switches: Readonly<Record<string, (args: CliArgs) => CliArgs>> = {
  pretty: (args) => ({ ...args, pretty: true }),
  compact: (args) => ({ ...args, pretty: false }),
  verbose: (args) => ({ ...args, verbose: true }),
  silent: (args) => ({ ...args, silent: true })
}

const valueFlags: Readonly<Record<string, (args: CliArgs, value: string) => CliArgs>> = {
  input: (args, input) => ({ ...args, input }),
  out: (args, out) => ({ ...args, out }),
  config: (args, configPath) => ({ ...args, configPath, configPathExplicit: true })
}

interface Pending {
  readonly args: CliArgs
  readonly rest: ReadonlyArray<string>
}

// consumes one flag token, plus the following token when it carries the value
const applyFlag = (
  args: CliArgs,
  token: string,
  rest: ReadonlyArray<string>
): Either.Either<Pending, CliError> => {
  const match = FLAG.exec(token)
  if (match === null) {
    return Either.left(
      cliError(isFlag(token) ? `Unknown flag: ${token}` : `Unexpected positional argument: ${token}`)
    )
  }
  const [, name = "", inline] = match
  const toggle = switches[name]
  if (toggle !== undefined) {
    return inline === undefined
      ? Either.right({ args: toggle(args), rest })
      : Either.left(cliError(`Flag --${name} takes no value`))
  }
  const assign = valueFlags[name]
  if (assign === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  if (inline !== undefined) {
    return Either.right({ args: assign(args, inline), rest })
  }
  const [value, ...remaining] = rest
  if (value === undefined || isFlag(value)) {
    return Either.left(cliError(`Missing value for --${name}`))
  }
  return Either.right({ args: assign(args, value), rest: remaining })
}

const validate = (args: CliArgs): Either.Either<CliArgs, CliError> => {
  if (args.input.length === 0) {
    return Either.left(cliError("Missing required flag --input"))
  }
  if (args.command === "check" && args.out !== undefined) {
    return Either.left(cliError("Flag --out is not supported by check"))
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
 * @invariant command defaults to format when omitted; --input is required
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const tokens = argv.slice(2)
  const first = tokens[0]
  const explicitCommand = first !== undefined && !isFlag(first)
  const command = explicitCommand ? parseCommand(first) : Either.right<CliCommand>("format")
  if (Either.isLeft(command)) {
    return Either.left(command.left)
  }
  let pending: Pending = { args: defaultArgs(command.right), rest: explicitCommand ? tokens.slice(1) : tokens }
  while (pending.rest.length > 0) {
    const [token = "", ...rest] = pending.rest
    const next = applyFlag(pending.args, token, rest)
    if (Either.isLeft(next)) {
      return Either.left(next.left)
    }
    pending = next.right
  }
  return validate(pending.args)
}
