import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { encode } from "../../src/core/encode.js"
import { JsonValue } from "../../src/core/json-value.js"
import { parseJsonText } from "../../src/core/parse.js"
import { writeJson, writeJsonFile } from "../../src/shell/sink.js"
import { readJsonFile } from "../../src/shell/source.js"
import { provideNodeContext, withTempDir } from "../app/test-helpers.js"

const ints = (...values: ReadonlyArray<bigint>) => JsonValue.array(values.map((value) => JsonValue.int(value)))

describe("writeJsonFile", () => {
  it.effect("writes pretty text that reads back as the same tree", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const target = path.join(tempDir, "numbers.json")
        const tree = yield* _(encode([1, 2, 3]))
        yield* _(writeJsonFile(target, tree))

        const text = yield* _(fs.readFileString(target))
        expect(text).toBe("[\n    1,\n    2,\n    3\n]")
        const reparsed = parseJsonText(text)
        expect(Either.isRight(reparsed) && JsonValue.equals(reparsed.right, ints(1n, 2n, 3n))).toBe(true)
      })
    ).pipe(provideNodeContext))

  it.effect("overwrites an existing file", () =>
    withTempDir(({ fs, writeFixture }) =>
      Effect.gen(function*(_) {
        const target = yield* _(writeFixture("existing.json", "{\"stale\": \"contents that are longer\"}"))
        yield* _(writeJsonFile(target, JsonValue.bool(true)))
        expect(yield* _(fs.readFileString(target))).toBe("true")
      })
    ).pipe(provideNodeContext))

  it.effect("fails with IoFailure when the directory is missing", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const target = path.join(tempDir, "missing", "out.json")
        const error = yield* _(Effect.flip(writeJsonFile(target, JsonValue.null())))
        expect(error._tag).toBe("IoFailure")
        expect(error.path).toBe(target)
      })
    ).pipe(provideNodeContext))
})

describe("writeJson", () => {
  it.effect("encodes before writing", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const target = path.join(tempDir, "record.json")
        yield* _(writeJson(target, { a: 1, b: ["x"] }))
        const source = yield* _(readJsonFile(target))
        expect(source.raw).toBe("{\n    \"a\": 1,\n    \"b\": [\n        \"x\"\n    ]\n}")
      })
    ).pipe(provideNodeContext))

  it.effect("leaves the file untouched when encoding fails", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const target = path.join(tempDir, "never.json")
        const error = yield* _(Effect.flip(writeJson(target, [2n ** 64n])))
        expect(error._tag).toBe("IntegerOutOfRange")
        expect(yield* _(fs.exists(target))).toBe(false)
      })
    ).pipe(provideNodeContext))
})

describe("readJsonFile", () => {
  it.effect("fails with ParseError on malformed text", () =>
    withTempDir(({ writeFixture }) =>
      Effect.gen(function*(_) {
        const target = yield* _(writeFixture("broken.json", "[1,"))
        const error = yield* _(Effect.flip(readJsonFile(target)))
        expect(error).toEqual({ _tag: "ParseError", offset: 3, message: "Unexpected end of input" })
      })
    ).pipe(provideNodeContext))
})
