import * as Either from "effect/Either"

import type { IntegerOutOfRange } from "./errors.js"
import { integerOutOfRange } from "./errors.js"

// CHANGE: introduce a tagged JSON value tree as the single encoding target
// WHY: keep integer/unsigned/float distinctions that plain JS numbers lose
// QUOTE(TZ): n/a
// REF: req-json-value-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v ∈ JsonValue: v._tag ∈ {Null,Bool,Int,UInt,Float,String,Array,Object}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Int ∈ [-2^63, 2^63), UInt ∈ [0, 2^64), Object keys are unique
// COMPLEXITY: O(1)/O(1) per node

export const JsonValueTypeId: unique symbol = Symbol.for("typed-jsonify/JsonValue")
export type JsonValueTypeId = typeof JsonValueTypeId

interface Node<Tag extends string> {
  readonly [JsonValueTypeId]: JsonValueTypeId
  readonly _tag: Tag
}

export interface JsonNull extends Node<"Null"> {}

export interface JsonBool extends Node<"Bool"> {
  readonly value: boolean
}

export interface JsonInt extends Node<"Int"> {
  readonly value: bigint
}

export interface JsonUInt extends Node<"UInt"> {
  readonly value: bigint
}

export interface JsonFloat extends Node<"Float"> {
  readonly value: number
}

export interface JsonString extends Node<"String"> {
  readonly value: string
}

export interface JsonArray extends Node<"Array"> {
  readonly items: ReadonlyArray<JsonValue>
}

export interface JsonObject extends Node<"Object"> {
  readonly entries: ReadonlyMap<string, JsonValue>
}

export type JsonValue =
  | JsonNull
  | JsonBool
  | JsonInt
  | JsonUInt
  | JsonFloat
  | JsonString
  | JsonArray
  | JsonObject

export type JsonValueTag = JsonValue["_tag"]

export const INT_MIN = -(2n ** 63n)
export const INT_MAX = 2n ** 63n - 1n
export const UINT_MAX = 2n ** 64n - 1n

const nullNode: JsonNull = { [JsonValueTypeId]: JsonValueTypeId, _tag: "Null" }

export const makeNull = (): JsonNull => nullNode

export const makeBool = (value: boolean): JsonBool => ({
  [JsonValueTypeId]: JsonValueTypeId,
  _tag: "Bool",
  value
})

export const makeInt = (value: bigint): JsonInt => ({
  [JsonValueTypeId]: JsonValueTypeId,
  _tag: "Int",
  value
})

export const makeUInt = (value: bigint): JsonUInt => ({
  [JsonValueTypeId]: JsonValueTypeId,
  _tag: "UInt",
  value
})

export const makeFloat = (value: number): JsonFloat => ({
  [JsonValueTypeId]: JsonValueTypeId,
  _tag: "Float",
  value
})

export const makeString = (value: string): JsonString => ({
  [JsonValueTypeId]: JsonValueTypeId,
  _tag: "String",
  value
})

export const makeArray = (items: Iterable<JsonValue>): JsonArray => ({
  [JsonValueTypeId]: JsonValueTypeId,
  _tag: "Array",
  items: [...items]
})

export const makeObject = (
  entries: Iterable<readonly [string, JsonValue]>
): JsonObject => ({
  [JsonValueTypeId]: JsonValueTypeId,
  _tag: "Object",
  entries: new Map(entries)
})

/**
 * Pick the narrowest integer variant for a bigint.
 *
 * @returns Int inside the signed range, UInt above it, IntegerOutOfRange otherwise.
 *
 * @pure true
 * @invariant UInt is produced only for values > INT_MAX
 */
export const makeInteger = (
  value: bigint,
  path = "$"
): Either.Either<JsonInt | JsonUInt, IntegerOutOfRange> => {
  if (value >= INT_MIN && value <= INT_MAX) {
    return Either.right(makeInt(value))
  }
  if (value > INT_MAX && value <= UINT_MAX) {
    return Either.right(makeUInt(value))
  }
  return Either.left(integerOutOfRange(value, path))
}

export const isJsonValue = (value: unknown): value is JsonValue =>
  typeof value === "object" && value !== null && JsonValueTypeId in value

const floatEquals = (left: number, right: number): boolean =>
  left === right || (Number.isNaN(left) && Number.isNaN(right))

const arrayEquals = (
  left: ReadonlyArray<JsonValue>,
  right: ReadonlyArray<JsonValue>
): boolean =>
  left.length === right.length && left.every((item, index) => {
    const other = right[index]
    return other !== undefined && equals(item, other)
  })

const objectEquals = (
  left: ReadonlyMap<string, JsonValue>,
  right: ReadonlyMap<string, JsonValue>
): boolean => {
  if (left.size !== right.size) {
    return false
  }
  for (const [key, item] of left) {
    const other = right.get(key)
    if (other === undefined || !equals(item, other)) {
      return false
    }
  }
  return true
}

/**
 * Structural equality over JSON trees.
 *
 * Int and UInt compare by numeric value: text rendering drops the
 * distinction, so `UInt(3)` reads back as `Int(3)`.
 *
 * @pure true
 * @invariant Object entry order does not affect the result
 * @complexity O(n) where n = number of nodes
 */
export const equals = (left: JsonValue, right: JsonValue): boolean => {
  switch (left._tag) {
    case "Null":
      return right._tag === "Null"
    case "Bool":
      return right._tag === "Bool" && right.value === left.value
    case "Int":
    case "UInt":
      return (right._tag === "Int" || right._tag === "UInt") && right.value === left.value
    case "String":
      return right._tag === "String" && right.value === left.value
    case "Float":
      return right._tag === "Float" && floatEquals(left.value, right.value)
    case "Array":
      return right._tag === "Array" && arrayEquals(left.items, right.items)
    case "Object":
      return right._tag === "Object" && objectEquals(left.entries, right.entries)
  }
}

export const JsonValue = {
  null: makeNull,
  bool: makeBool,
  int: makeInt,
  uint: makeUInt,
  integer: makeInteger,
  float: makeFloat,
  string: makeString,
  array: makeArray,
  object: makeObject,
  is: isJsonValue,
  equals
} as const
