import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for encoding, rendering IO and the CLI
// WHY: provide typed failures for program flow and exit codes
// QUOTE(TZ): n/a
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type UnsupportedKeyType = {
  readonly _tag: "UnsupportedKeyType"
  readonly keyType: string
  readonly path: string
}
export type UnsupportedShape = {
  readonly _tag: "UnsupportedShape"
  readonly shape: string
  readonly path: string
}
export type IntegerOutOfRange = {
  readonly _tag: "IntegerOutOfRange"
  readonly value: bigint
  readonly path: string
}
export type IoFailure = { readonly _tag: "IoFailure"; readonly path: string; readonly message: string }
export type ParseError = { readonly _tag: "ParseError"; readonly offset: number; readonly message: string }
export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }

export type EncodeError = UnsupportedKeyType | UnsupportedShape | IntegerOutOfRange

export type AppError =
  | CliError
  | EncodeError
  | IoFailure
  | ParseError
  | ConfigError

export const unsupportedKeyType = (keyType: string, path: string): UnsupportedKeyType => ({
  _tag: "UnsupportedKeyType",
  keyType,
  path
})

export const unsupportedShape = (shape: string, path: string): UnsupportedShape => ({
  _tag: "UnsupportedShape",
  shape,
  path
})

export const integerOutOfRange = (value: bigint, path: string): IntegerOutOfRange => ({
  _tag: "IntegerOutOfRange",
  value,
  path
})

export const ioFailure = (path: string, message: string): IoFailure => ({
  _tag: "IoFailure",
  path,
  message
})

export const parseError = (offset: number, message: string): ParseError => ({
  _tag: "ParseError",
  offset,
  message
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

/**
 * Render an AppError as a single human-readable line.
 *
 * @pure true
 * @invariant every tag produces a message prefixed with the tag name
 */
export const formatAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (value) => `CliError: ${value.message}`),
    Match.tag(
      "UnsupportedKeyType",
      (value) => `UnsupportedKeyType at ${value.path}: mapping keys must be strings, got ${value.keyType}`
    ),
    Match.tag("UnsupportedShape", (value) => `UnsupportedShape at ${value.path}: cannot encode ${value.shape}`),
    Match.tag(
      "IntegerOutOfRange",
      (value) => `IntegerOutOfRange at ${value.path}: ${value.value.toString()} does not fit 64 bits`
    ),
    Match.tag("IoFailure", (value) => `IoFailure: ${value.path}: ${value.message}`),
    Match.tag("ParseError", (value) => `ParseError at offset ${value.offset}: ${value.message}`),
    Match.tag("ConfigError", (value) => `ConfigError: ${value.message}`),
    Match.exhaustive
  )
