import { Match } from "effect"
import * as Either from "effect/Either"

import type { Encodable } from "./encodable.js"
import { encode } from "./encode.js"
import type { EncodeError } from "./errors.js"
import type { JsonArray, JsonObject, JsonValue } from "./json-value.js"

// CHANGE: render JsonValue trees as compact or 4-space pretty JSON text
// WHY: the tree is the encoding target; text is what gets printed or persisted
// QUOTE(TZ): n/a
// REF: req-render-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: parse(render(v, false)) ≡ v for finite floats
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: compact output has no whitespace outside string literals
// COMPLEXITY: O(n) where n = output length

const INDENT = "    "

type JsonScalar = Exclude<JsonValue, JsonArray | JsonObject>

const renderFloat = (value: number): string => {
  if (!Number.isFinite(value)) {
    return "null"
  }
  if (Object.is(value, -0)) {
    return "-0.0"
  }
  const text = String(value)
  return /[.eE]/.test(text) ? text : `${text}.0`
}

const renderScalar: (value: JsonScalar) => string = Match.type<JsonScalar>().pipe(
  Match.tag("Null", () => "null"),
  Match.tag("Bool", (node) => (node.value ? "true" : "false")),
  Match.tag("Int", (node) => node.value.toString()),
  Match.tag("UInt", (node) => node.value.toString()),
  Match.tag("Float", (node) => renderFloat(node.value)),
  Match.tag("String", (node) => JSON.stringify(node.value)),
  Match.exhaustive
)

const renderCompact = (value: JsonValue): string => {
  switch (value._tag) {
    case "Array":
      return `[${value.items.map(renderCompact).join(",")}]`
    case "Object": {
      const members = [...value.entries].map(([key, item]) => `${JSON.stringify(key)}:${renderCompact(item)}`)
      return `{${members.join(",")}}`
    }
    default:
      return renderScalar(value)
  }
}

const renderPretty = (value: JsonValue, depth: number): string => {
  const outer = INDENT.repeat(depth)
  const inner = outer + INDENT
  switch (value._tag) {
    case "Array": {
      if (value.items.length === 0) {
        return "[]"
      }
      const lines = value.items.map((item) => inner + renderPretty(item, depth + 1))
      return `[\n${lines.join(",\n")}\n${outer}]`
    }
    case "Object": {
      if (value.entries.size === 0) {
        return "{}"
      }
      const lines = [...value.entries].map(([key, item]) =>
        `${inner}${JSON.stringify(key)}: ${renderPretty(item, depth + 1)}`
      )
      return `{\n${lines.join(",\n")}\n${outer}}`
    }
    default:
      return renderScalar(value)
  }
}

/**
 * Render a JSON tree as text.
 *
 * @param value - Tree to render.
 * @param pretty - One value per line with 4-space indentation when true.
 * @returns JSON text without a trailing newline.
 *
 * @pure true
 * @invariant integral floats keep a fractional part ("1.0") so they reparse as Float
 * @complexity O(n)
 */
export const render = (value: JsonValue, pretty = true): string =>
  pretty ? renderPretty(value, 0) : renderCompact(value)

/**
 * Encode then render in one step.
 *
 * @pure true
 * @complexity O(n)
 */
export const toJsonString = <A extends Encodable>(
  value: A,
  pretty = true
): Either.Either<string, EncodeError> => Either.map(encode(value), (tree) => render(tree, pretty))
