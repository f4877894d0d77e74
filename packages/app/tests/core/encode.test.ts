import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import type { Jsonizable } from "../../src/core/encodable.js"
import { heterogeneous } from "../../src/core/encodable.js"
import { encode, encodeUnknown } from "../../src/core/encode.js"
import { makeEnumeration } from "../../src/core/enumeration.js"
import { unsupportedKeyType } from "../../src/core/errors.js"
import type { JsonValue as JsonValueType } from "../../src/core/json-value.js"
import { JsonValue } from "../../src/core/json-value.js"
import { jsonizeFields } from "../../src/core/jsonize.js"

enum Category {
  one,
  two
}

enum Shade {
  Light = "light-shade",
  Dark = "dark-shade"
}

enum Priority {
  high = 9,
  low = 1,
  normal = 5
}

enum Alias {
  first = 1,
  second = 1
}

const CategoryJson = makeEnumeration("Category", Category)
const ShadeJson = makeEnumeration("Shade", Shade)
const PriorityJson = makeEnumeration("Priority", Priority)
const AliasJson = makeEnumeration("Alias", Alias)

class Foo implements Jsonizable {
  constructor(readonly i: number, readonly a: ReadonlyArray<string>) {}

  convertToJson() {
    return jsonizeFields(this, ["i", "a"])
  }
}

class Opaque {
  readonly id = 1
}

const expectEncoded = (result: Either.Either<JsonValueType, unknown>, expected: JsonValueType): void => {
  expect(Either.isRight(result)).toBe(true)
  if (Either.isRight(result)) {
    expect(JsonValue.equals(result.right, expected)).toBe(true)
  }
}

const expectFailure = (result: Either.Either<unknown, unknown>, expected: unknown): void => {
  expect(Either.isLeft(result)).toBe(true)
  if (Either.isLeft(result)) {
    expect(result.left).toEqual(expected)
  }
}

const ints = (...values: ReadonlyArray<bigint>) => JsonValue.array(values.map((value) => JsonValue.int(value)))

describe("encode primitives", () => {
  it.effect("encodes booleans as Bool", () =>
    Effect.sync(() => {
      expectEncoded(encode(false), JsonValue.bool(false))
      expectEncoded(encode(true), JsonValue.bool(true))
    }))

  it.effect("encodes strings as String", () =>
    Effect.sync(() => {
      expectEncoded(encode("bork"), JsonValue.string("bork"))
    }))

  it.effect("encodes safe integers as Int and other numbers as Float", () =>
    Effect.sync(() => {
      expectEncoded(encode(41), JsonValue.int(41n))
      expectEncoded(encode(-4), JsonValue.int(-4n))
      expectEncoded(encode(4.1), JsonValue.float(4.1))
      expectEncoded(encode(2 ** 53), JsonValue.float(2 ** 53))
      expectEncoded(encode(Number.POSITIVE_INFINITY), JsonValue.float(Number.POSITIVE_INFINITY))
    }))

  it.effect("encodes bigints as Int or UInt by range", () =>
    Effect.sync(() => {
      expectEncoded(encode(-(2n ** 63n)), JsonValue.int(-(2n ** 63n)))
      expectEncoded(encode(2n ** 63n - 1n), JsonValue.int(2n ** 63n - 1n))
      expectEncoded(encode(2n ** 63n), JsonValue.uint(2n ** 63n))
      expectEncoded(encode(2n ** 64n - 1n), JsonValue.uint(2n ** 64n - 1n))
    }))

  it.effect("fails on bigints wider than 64 bits", () =>
    Effect.sync(() => {
      expectFailure(encode([1n, 2n ** 64n]), { _tag: "IntegerOutOfRange", value: 2n ** 64n, path: "$[1]" })
    }))

  it.effect("returns an existing tree unchanged", () =>
    Effect.sync(() => {
      const tree = JsonValue.uint(5n)
      const result = encode(tree)
      expect(Either.isRight(result) && result.right).toBe(tree)
    }))

  it.effect("encodes null and undefined as Null", () =>
    Effect.sync(() => {
      expectEncoded(encode(null), JsonValue.null())
      expectEncoded(encode(undefined), JsonValue.null())
    }))
})

describe("encode enums", () => {
  it.effect("uses member names for numeric enums", () =>
    Effect.sync(() => {
      expectEncoded(encode(CategoryJson.member(Category.one)), JsonValue.string("one"))
      expectEncoded(encode(CategoryJson.member(Category.two)), JsonValue.string("two"))
    }))

  it.effect("uses member names, not values, for string enums", () =>
    Effect.sync(() => {
      expectEncoded(encode(ShadeJson.member(Shade.Light)), JsonValue.string("Light"))
      expectEncoded(encode(ShadeJson.member(Shade.Dark)), JsonValue.string("Dark"))
    }))

  it.effect("resolves every member regardless of value order", () =>
    Effect.sync(() => {
      const members: ReadonlyArray<readonly [Priority, string]> = [
        [Priority.high, "high"],
        [Priority.low, "low"],
        [Priority.normal, "normal"]
      ]
      for (const [value, name] of members) {
        expectEncoded(encode(PriorityJson.member(value)), JsonValue.string(name))
      }
      expect(PriorityJson.names).toEqual(["high", "low", "normal"])
    }))

  it.effect("resolves aliased values to the first declared name", () =>
    Effect.sync(() => {
      expectEncoded(encode(AliasJson.member(Alias.second)), JsonValue.string("first"))
    }))

  it.effect("encodes enum members inside containers", () =>
    Effect.sync(() => {
      expectEncoded(
        encode([CategoryJson.member(Category.two), CategoryJson.member(Category.one)]),
        JsonValue.array([JsonValue.string("two"), JsonValue.string("one")])
      )
    }))
})

describe("encode non-finite numbers", () => {
  it.effect("keeps NaN and infinities as Float", () =>
    Effect.sync(() => {
      const result = encode([Number.NaN, Number.NEGATIVE_INFINITY])
      expect(Either.isRight(result)).toBe(true)
      if (Either.isRight(result) && result.right._tag === "Array") {
        expect(result.right.items.map((item) => item._tag)).toEqual(["Float", "Float"])
      }
    }))
})

describe("encode sequences", () => {
  it.effect("encodes arrays element by element in order", () =>
    Effect.sync(() => {
      expectEncoded(encode([1, 2, 3]), ints(1n, 2n, 3n))
      expectEncoded(encode([[1], [2, 3]]), JsonValue.array([ints(1n), ints(2n, 3n)]))
    }))

  it.effect("encodes an absent sequence as Null and an empty one as Array", () =>
    Effect.sync(() => {
      const absent: ReadonlyArray<number> | null = null
      expectEncoded(encode(absent), JsonValue.null())
      expectEncoded(encode([]), JsonValue.array([]))
    }))

  it.effect("encodes heterogeneous groups positionally", () =>
    Effect.sync(() => {
      expectEncoded(
        encode(heterogeneous(1, "hi", 0.4)),
        JsonValue.array([JsonValue.int(1n), JsonValue.string("hi"), JsonValue.float(0.4)])
      )
    }))
})

describe("encode mappings", () => {
  it.effect("encodes string-keyed records as Object", () =>
    Effect.sync(() => {
      const result = encode({ a: 1, b: 2, c: 3 })
      expectEncoded(
        result,
        JsonValue.object([["a", JsonValue.int(1n)], ["b", JsonValue.int(2n)], ["c", JsonValue.int(3n)]])
      )
      if (Either.isRight(result) && result.right._tag === "Object") {
        expect([...result.right.entries.keys()]).toEqual(["a", "b", "c"])
      }
    }))

  it.effect("encodes string-keyed maps as Object", () =>
    Effect.sync(() => {
      const map = new Map<string, ReadonlyArray<boolean>>([["x", [true]], ["y", []]])
      expectEncoded(
        encode(map),
        JsonValue.object([["x", JsonValue.array([JsonValue.bool(true)])], ["y", JsonValue.array([])]])
      )
    }))

  it.effect("encodes an absent mapping as Null", () =>
    Effect.sync(() => {
      const absent: ReadonlyMap<string, number> | null = null
      expectEncoded(encode(absent), JsonValue.null())
      expectEncoded(encode({ inner: absent }), JsonValue.object([["inner", JsonValue.null()]]))
    }))

  it.effect("rejects non-string map keys before visiting entries", () =>
    Effect.sync(() => {
      const map = new Map<unknown, unknown>([["ok", Symbol("never-encoded")], [7, "x"]])
      expectFailure(encodeUnknown({ lookup: map }), { _tag: "UnsupportedKeyType", keyType: "number", path: "$.lookup" })
    }))
})

describe("encode user types", () => {
  it.effect("encodes a Jsonizable aggregate through its hook", () =>
    Effect.sync(() => {
      expectEncoded(
        encode(new Foo(12, ["a", "b"])),
        JsonValue.object([
          ["i", JsonValue.int(12n)],
          ["a", JsonValue.array([JsonValue.string("a"), JsonValue.string("b")])]
        ])
      )
    }))

  it.effect("calls the hook exactly once per encode", () =>
    Effect.sync(() => {
      let calls = 0
      const counted: Jsonizable = {
        convertToJson: () => {
          calls += 1
          return Either.right(JsonValue.string("counted"))
        }
      }
      expectEncoded(encode([counted]), JsonValue.array([JsonValue.string("counted")]))
      expect(calls).toBe(1)
    }))

  it.effect("short-circuits absent owners to Null", () =>
    Effect.sync(() => {
      const owner: Foo | null = null
      expectEncoded(encode({ owner }), JsonValue.object([["owner", JsonValue.null()]]))
    }))

  it.effect("reports hook failures at the owner's path", () =>
    Effect.sync(() => {
      const broken: Jsonizable = {
        convertToJson: () => Either.left(unsupportedKeyType("number", "$.ids"))
      }
      expectFailure(encode({ inner: broken }), { _tag: "UnsupportedKeyType", keyType: "number", path: "$.inner.ids" })
    }))
})

describe("jsonizeFields", () => {
  it.effect("keeps the listed fields in order", () =>
    Effect.sync(() => {
      const result = jsonizeFields({ z: true, y: "kept", x: 1 }, ["y", "z"])
      expectEncoded(result, JsonValue.object([["y", JsonValue.string("kept")], ["z", JsonValue.bool(true)]]))
      if (Either.isRight(result)) {
        expect([...result.right.entries.keys()]).toEqual(["y", "z"])
      }
    }))

  it.effect("reports field errors with bracketed paths for non-identifier keys", () =>
    Effect.sync(() => {
      expectFailure(
        jsonizeFields({ "a b": [1n, 2n ** 64n] }, ["a b"]),
        { _tag: "IntegerOutOfRange", value: 2n ** 64n, path: "$[\"a b\"][1]" }
      )
      expectFailure(
        encode({ outer: { convertToJson: () => jsonizeFields({ n: 2n ** 64n }, ["n"]) } }),
        { _tag: "IntegerOutOfRange", value: 2n ** 64n, path: "$.outer.n" }
      )
    }))
})

describe("encodeUnknown", () => {
  it.effect("rejects functions with their path", () =>
    Effect.sync(() => {
      expectFailure(encodeUnknown({ a: [1, () => 1] }), { _tag: "UnsupportedShape", shape: "function", path: "$.a[1]" })
    }))

  it.effect("names class instances without a hook", () =>
    Effect.sync(() => {
      expectFailure(encodeUnknown(new Opaque()), { _tag: "UnsupportedShape", shape: "Opaque", path: "$" })
      expectFailure(
        encodeUnknown({ "a b": [new Date(0)] }),
        { _tag: "UnsupportedShape", shape: "Date", path: "$[\"a b\"][0]" }
      )
    }))
})
