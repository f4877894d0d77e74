import type * as Either from "effect/Either"

import type { EnumMember } from "./enumeration.js"
import type { EncodeError } from "./errors.js"
import type { JsonValue } from "./json-value.js"

// CHANGE: describe the universe of values the encoder accepts
// WHY: keep the extension contract structural and checked at compile time
// QUOTE(TZ): n/a
// REF: req-encodable-1
// SOURCE: n/a
// FORMAT THEOREM: ∀a: a ∈ Encodable → encode(a) ∈ Right ∪ {IntegerOutOfRange}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Jsonizable is a capability, not a base class
// COMPLEXITY: O(1)/O(1)

/**
 * A user-defined aggregate that supplies its own JSON form.
 *
 * The encoder calls `convertToJson` exactly once per encode of the value and
 * embeds the result verbatim. An absent owner (`null`/`undefined`) never
 * reaches the hook.
 */
export interface Jsonizable {
  convertToJson(): Either.Either<JsonValue, EncodeError>
}

export const HeterogeneousTypeId: unique symbol = Symbol.for("typed-jsonify/Heterogeneous")
export type HeterogeneousTypeId = typeof HeterogeneousTypeId

export interface Heterogeneous {
  readonly [HeterogeneousTypeId]: HeterogeneousTypeId
  readonly values: ReadonlyArray<Encodable>
}

export interface EncodableRecord {
  readonly [key: string]: Encodable
}

export type Encodable =
  | JsonValue
  | boolean
  | string
  | number
  | bigint
  | EnumMember
  | null
  | undefined
  | ReadonlyArray<Encodable>
  | Heterogeneous
  | ReadonlyMap<string, Encodable>
  | EncodableRecord
  | Jsonizable

/**
 * Bundle several differently typed values so they encode as one JSON array.
 *
 * @example heterogeneous(1, "hi", 0.4) encodes as [1,"hi",0.4]
 */
export const heterogeneous = (...values: ReadonlyArray<Encodable>): Heterogeneous => ({
  [HeterogeneousTypeId]: HeterogeneousTypeId,
  values
})

export const isHeterogeneous = (value: object): value is Heterogeneous => HeterogeneousTypeId in value

export const isJsonizable = (value: object): value is Jsonizable =>
  "convertToJson" in value && typeof value.convertToJson === "function"

export const isPlainRecord = (value: object): value is Readonly<Record<string, unknown>> => {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}
