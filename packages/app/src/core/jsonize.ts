import * as Either from "effect/Either"

import type { Encodable } from "./encodable.js"
import { encode, keyPath, rebase } from "./encode.js"
import type { EncodeError } from "./errors.js"
import type { JsonObject, JsonValue } from "./json-value.js"
import { makeObject } from "./json-value.js"

// CHANGE: provide a minimal field-selection helper for Jsonizable types
// WHY: user aggregates need a one-line convertToJson over their chosen fields
// QUOTE(TZ): n/a
// REF: req-jsonize-1
// SOURCE: n/a
// FORMAT THEOREM: ∀o,fs: keys(jsonizeFields(o, fs)) = fs
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: object entries follow the order of `fields`
// COMPLEXITY: O(n) where n = encoded size of the selected fields

/**
 * Encode the listed fields of `owner` as a JSON object.
 *
 * Only fields whose type is encodable can be listed.
 *
 * @example
 * class Point implements Jsonizable {
 *   constructor(readonly x: number, readonly y: number) {}
 *   convertToJson() { return jsonizeFields(this, ["x", "y"]) }
 * }
 */
export const jsonizeFields = <K extends string, A extends { readonly [P in K]: Encodable }>(
  owner: A,
  fields: ReadonlyArray<K>
): Either.Either<JsonObject, EncodeError> => {
  const entries: Array<readonly [string, JsonValue]> = []
  for (const field of fields) {
    const encoded = encode(owner[field])
    if (Either.isLeft(encoded)) {
      return Either.left(rebase(encoded.left, keyPath("$", field)))
    }
    entries.push([field, encoded.right])
  }
  return Either.right(makeObject(entries))
}
