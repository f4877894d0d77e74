import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { Encodable } from "./encodable.js"
import { isHeterogeneous, isJsonizable, isPlainRecord } from "./encodable.js"
import type { EnumMember } from "./enumeration.js"
import { isEnumMember } from "./enumeration.js"
import type { EncodeError } from "./errors.js"
import { unsupportedKeyType, unsupportedShape } from "./errors.js"
import type { JsonValue } from "./json-value.js"
import {
  isJsonValue,
  makeArray,
  makeBool,
  makeFloat,
  makeInt,
  makeInteger,
  makeNull,
  makeObject,
  makeString
} from "./json-value.js"

// CHANGE: implement the precedence-ordered encoding dispatcher
// WHY: one recursive entry point turns any encodable value into a JsonValue tree
// QUOTE(TZ): n/a
// REF: req-encode-1
// SOURCE: n/a
// FORMAT THEOREM: ∀xs: encode(xs) = Array(map(encode, xs)); encode(null) = Null
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: first matching rule wins; children go through the same entry point
// COMPLEXITY: O(n) where n = number of reachable values

type Encoded<A> = Either.Either<A, EncodeError>

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/

export const keyPath = (path: string, key: string): string =>
  IDENTIFIER.test(key) ? `${path}.${key}` : `${path}[${JSON.stringify(key)}]`

const indexPath = (path: string, index: number): string => `${path}[${index}]`

// hook errors are reported relative to the hook's owner
export const rebase = (error: EncodeError, path: string): EncodeError => ({
  ...error,
  path: path + error.path.slice(1)
})

const describeShape = (value: object): string => {
  const proto: unknown = Object.getPrototypeOf(value)
  if (
    typeof proto === "object" &&
    proto !== null &&
    "constructor" in proto &&
    typeof proto.constructor === "function" &&
    proto.constructor.name.length > 0
  ) {
    return proto.constructor.name
  }
  return "object"
}

const describeKey = (key: unknown): string => {
  if (key === null) {
    return "null"
  }
  return typeof key === "object" ? describeShape(key) : typeof key
}

const encodeAll = (
  values: ReadonlyArray<unknown>,
  path: string
): Encoded<ReadonlyArray<JsonValue>> => {
  const items: Array<JsonValue> = []
  for (const [index, value] of values.entries()) {
    const encoded = encodeAt(value, indexPath(path, index))
    if (Either.isLeft(encoded)) {
      return Either.left(encoded.left)
    }
    items.push(encoded.right)
  }
  return Either.right(items)
}

const encodeEntries = (
  entries: Iterable<readonly [string, unknown]>,
  path: string
): Encoded<JsonValue> => {
  const result: Array<readonly [string, JsonValue]> = []
  for (const [key, value] of entries) {
    const encoded = encodeAt(value, keyPath(path, key))
    if (Either.isLeft(encoded)) {
      return Either.left(encoded.left)
    }
    result.push([key, encoded.right])
  }
  return Either.right(makeObject(result))
}

const encodeMap = (map: ReadonlyMap<unknown, unknown>, path: string): Encoded<JsonValue> => {
  const entries: Array<readonly [string, unknown]> = []
  for (const [key, value] of map) {
    if (typeof key !== "string") {
      return Either.left(unsupportedKeyType(describeKey(key), path))
    }
    entries.push([key, value])
  }
  return encodeEntries(entries, path)
}

const encodeEnumMember = (member: EnumMember, path: string): Encoded<JsonValue> =>
  Option.match(member.enumeration.nameOf(member.value), {
    onNone: () => Either.left(unsupportedShape(`${member.enumeration.name}(${String(member.value)})`, path)),
    onSome: (name) => Either.right(makeString(name))
  })

const encodeNumber = (value: number): JsonValue =>
  Number.isSafeInteger(value) ? makeInt(BigInt(value)) : makeFloat(value)

const encodeObject = (value: object | null, path: string): Encoded<JsonValue> => {
  if (value === null) {
    return Either.right(makeNull())
  }
  if (isEnumMember(value)) {
    return encodeEnumMember(value, path)
  }
  if (Array.isArray(value)) {
    return Either.map(encodeAll(value, path), makeArray)
  }
  if (isHeterogeneous(value)) {
    return Either.map(encodeAll(value.values, path), makeArray)
  }
  if (value instanceof Map) {
    return encodeMap(value, path)
  }
  if (isJsonizable(value)) {
    return Either.mapLeft(value.convertToJson(), (error) => rebase(error, path))
  }
  if (isPlainRecord(value)) {
    return encodeEntries(Object.entries(value), path)
  }
  return Either.left(unsupportedShape(describeShape(value), path))
}

const encodeAt = (value: unknown, path: string): Encoded<JsonValue> => {
  if (isJsonValue(value)) {
    return Either.right(value)
  }
  switch (typeof value) {
    case "boolean":
      return Either.right(makeBool(value))
    case "string":
      return Either.right(makeString(value))
    case "number":
      return Either.right(encodeNumber(value))
    case "bigint":
      return makeInteger(value, path)
    case "undefined":
      return Either.right(makeNull())
    case "object":
      return encodeObject(value, path)
    default:
      return Either.left(unsupportedShape(typeof value, path))
  }
}

/**
 * Encode a value of any runtime shape.
 *
 * @param value - Arbitrary input.
 * @returns JsonValue, or UnsupportedShape for values outside the encodable universe.
 *
 * @pure true
 * @invariant Map keys are checked before any entry is encoded
 * @complexity O(n)
 */
export const encodeUnknown = (value: unknown): Encoded<JsonValue> => encodeAt(value, "$")

/**
 * Encode a statically encodable value into a JsonValue tree.
 *
 * Rule precedence: JsonValue identity, boolean, string, number (Float unless
 * a safe integer), integer (Int, then UInt above the signed range), enum
 * member by name, array, heterogeneous group, string-keyed mapping,
 * Jsonizable hook. `null`/`undefined` encode as Null before any iteration or
 * hook call. Cyclic structures are unsupported and exhaust the stack.
 * `NaN` and `±Infinity` encode as Float but render as `null`, so they do not
 * survive a render/parse round trip.
 *
 * @pure true
 * @complexity O(n)
 */
export const encode = <A extends Encodable>(value: A): Encoded<JsonValue> => encodeUnknown(value)
