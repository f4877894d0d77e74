import type { CliArgs } from "./cli.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// QUOTE(TZ): n/a
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: silent wins over verbose
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly pretty?: boolean
  readonly out?: string
}

export type LogLevelName = "None" | "Info" | "Debug"

export interface ResolvedConfig {
  readonly pretty: boolean
  readonly out: string | undefined
  readonly logLevel: LogLevelName
}

const resolveLogLevel = (cli: CliArgs): LogLevelName => {
  if (cli.silent) {
    return "None"
  }
  return cli.verbose ? "Debug" : "Info"
}

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .typed-jsonify.json.
 * @returns Resolved configuration; pretty output by default.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  pretty: cli.pretty ?? fileConfig?.pretty ?? true,
  out: cli.out ?? fileConfig?.out,
  logLevel: resolveLogLevel(cli)
})
