import * as Either from "effect/Either"

import type { ParseError } from "./errors.js"
import { parseError } from "./errors.js"
import type { JsonValue } from "./json-value.js"
import { makeArray, makeBool, makeFloat, makeInteger, makeNull, makeObject, makeString } from "./json-value.js"

// CHANGE: read JSON text into a JsonValue tree with integer/float distinction
// WHY: JSON.parse folds every number into a double and loses 64-bit integers
// QUOTE(TZ): n/a
// REF: req-parse-1
// SOURCE: https://www.rfc-editor.org/rfc/rfc8259
// FORMAT THEOREM: ∀s: parse(s) = Right(v) → s is RFC 8259 JSON text
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: integer literals become Int or UInt by range; a number that does not fit is rejected
// COMPLEXITY: O(n) where n = text length

interface Cursor {
  readonly text: string
  offset: number
}

type Parsed<A> = Either.Either<A, ParseError>

export const MAX_DEPTH = 512

const NUMBER = /-?(?:0|[1-9]\d*)(\.\d+)?([eE][+-]?\d+)?/y
const HEX4 = /^[0-9a-fA-F]{4}$/

const ESCAPES: ReadonlyMap<string, string> = new Map([
  ["\"", "\""],
  ["\\", "\\"],
  ["/", "/"],
  ["b", "\b"],
  ["f", "\f"],
  ["n", "\n"],
  ["r", "\r"],
  ["t", "\t"]
])

const fail = (cursor: Cursor, message: string): Parsed<never> => Either.left(parseError(cursor.offset, message))

const peek = (cursor: Cursor): string => cursor.text.charAt(cursor.offset)

const describeChar = (char: string): string => (char === "" ? "end of input" : JSON.stringify(char))

const skipWhitespace = (cursor: Cursor): void => {
  while (" \t\n\r".includes(peek(cursor)) && cursor.offset < cursor.text.length) {
    cursor.offset += 1
  }
}

const expectChar = (cursor: Cursor, char: string): Parsed<void> => {
  skipWhitespace(cursor)
  if (peek(cursor) !== char) {
    return fail(cursor, `Expected ${JSON.stringify(char)} but found ${describeChar(peek(cursor))}`)
  }
  cursor.offset += 1
  return Either.right(undefined)
}

const parseLiteral = (cursor: Cursor, word: string, value: JsonValue): Parsed<JsonValue> => {
  if (!cursor.text.startsWith(word, cursor.offset)) {
    return fail(cursor, `Invalid literal, expected ${word}`)
  }
  cursor.offset += word.length
  return Either.right(value)
}

const outOfRange = (offset: number, literal: string): Parsed<never> =>
  Either.left(parseError(offset, `Number out of range: ${literal}`))

// a float literal must stay finite, and a non-zero mantissa must not underflow to 0
const parseFloatLiteral = (offset: number, literal: string): Parsed<JsonValue> => {
  const value = Number(literal)
  const mantissa = literal.split(/[eE]/)[0] ?? ""
  if (!Number.isFinite(value) || (value === 0 && /[1-9]/.test(mantissa))) {
    return outOfRange(offset, literal)
  }
  return Either.right(makeFloat(value))
}

const parseNumber = (cursor: Cursor): Parsed<JsonValue> => {
  const start = cursor.offset
  NUMBER.lastIndex = start
  const match = NUMBER.exec(cursor.text)
  if (match === null) {
    return fail(cursor, "Invalid number")
  }
  const literal = match[0]
  cursor.offset += literal.length
  if (match[1] !== undefined || match[2] !== undefined) {
    return parseFloatLiteral(start, literal)
  }
  const integer = makeInteger(BigInt(literal))
  return Either.isRight(integer) ? Either.right(integer.right) : outOfRange(start, literal)
}

const parseString = (cursor: Cursor): Parsed<string> => {
  cursor.offset += 1
  let result = ""
  while (cursor.offset < cursor.text.length) {
    const char = peek(cursor)
    if (char === "\"") {
      cursor.offset += 1
      return Either.right(result)
    }
    if (char === "\\") {
      const escape = cursor.text.charAt(cursor.offset + 1)
      if (escape === "u") {
        const hex = cursor.text.slice(cursor.offset + 2, cursor.offset + 6)
        if (!HEX4.test(hex)) {
          return fail(cursor, "Invalid unicode escape")
        }
        result += String.fromCharCode(Number.parseInt(hex, 16))
        cursor.offset += 6
        continue
      }
      const decoded = ESCAPES.get(escape)
      if (decoded === undefined) {
        return fail(cursor, `Invalid escape ${describeChar(escape)}`)
      }
      result += decoded
      cursor.offset += 2
      continue
    }
    if (char.charCodeAt(0) < 0x20) {
      return fail(cursor, "Unescaped control character in string")
    }
    result += char
    cursor.offset += 1
  }
  return fail(cursor, "Unterminated string")
}

const parseArray = (cursor: Cursor, depth: number): Parsed<JsonValue> => {
  cursor.offset += 1
  const items: Array<JsonValue> = []
  skipWhitespace(cursor)
  if (peek(cursor) === "]") {
    cursor.offset += 1
    return Either.right(makeArray(items))
  }
  while (true) {
    const item = parseValue(cursor, depth)
    if (Either.isLeft(item)) {
      return item
    }
    items.push(item.right)
    skipWhitespace(cursor)
    const next = peek(cursor)
    cursor.offset += 1
    if (next === "]") {
      return Either.right(makeArray(items))
    }
    if (next !== ",") {
      cursor.offset -= 1
      return fail(cursor, `Expected "," or "]" but found ${describeChar(next)}`)
    }
  }
}

const parseObject = (cursor: Cursor, depth: number): Parsed<JsonValue> => {
  cursor.offset += 1
  const entries = new Map<string, JsonValue>()
  skipWhitespace(cursor)
  if (peek(cursor) === "}") {
    cursor.offset += 1
    return Either.right(makeObject(entries))
  }
  while (true) {
    skipWhitespace(cursor)
    if (peek(cursor) !== "\"") {
      return fail(cursor, `Expected string key but found ${describeChar(peek(cursor))}`)
    }
    const key = parseString(cursor)
    if (Either.isLeft(key)) {
      return Either.left(key.left)
    }
    const colon = expectChar(cursor, ":")
    if (Either.isLeft(colon)) {
      return Either.left(colon.left)
    }
    const value = parseValue(cursor, depth)
    if (Either.isLeft(value)) {
      return value
    }
    entries.set(key.right, value.right)
    skipWhitespace(cursor)
    const next = peek(cursor)
    cursor.offset += 1
    if (next === "}") {
      return Either.right(makeObject(entries))
    }
    if (next !== ",") {
      cursor.offset -= 1
      return fail(cursor, `Expected "," or "}" but found ${describeChar(next)}`)
    }
  }
}

const parseValue = (cursor: Cursor, depth: number): Parsed<JsonValue> => {
  skipWhitespace(cursor)
  const char = peek(cursor)
  if ((char === "{" || char === "[") && depth >= MAX_DEPTH) {
    return fail(cursor, `Maximum nesting depth of ${MAX_DEPTH} exceeded`)
  }
  switch (char) {
    case "{":
      return parseObject(cursor, depth + 1)
    case "[":
      return parseArray(cursor, depth + 1)
    case "\"":
      return Either.map(parseString(cursor), makeString)
    case "t":
      return parseLiteral(cursor, "true", makeBool(true))
    case "f":
      return parseLiteral(cursor, "false", makeBool(false))
    case "n":
      return parseLiteral(cursor, "null", makeNull())
    default:
      if (char === "-" || (char >= "0" && char <= "9")) {
        return parseNumber(cursor)
      }
      return fail(cursor, `Unexpected ${describeChar(char)}`)
  }
}

/**
 * Parse JSON text into a JsonValue tree.
 *
 * @param text - Complete JSON document.
 * @returns JsonValue or ParseError with the offending character offset.
 *   Numbers that would lose their value (wider than 64 bits, non-finite,
 *   underflowing) and nesting deeper than MAX_DEPTH are errors.
 *
 * @pure true
 * @invariant duplicate keys keep the first position and the last value
 * @complexity O(n)
 */
export const parseJsonText = (text: string): Parsed<JsonValue> => {
  const cursor: Cursor = { text, offset: 0 }
  const value = parseValue(cursor, 0)
  if (Either.isLeft(value)) {
    return value
  }
  skipWhitespace(cursor)
  if (cursor.offset !== text.length) {
    return fail(cursor, `Unexpected trailing ${describeChar(peek(cursor))}`)
  }
  return value
}
