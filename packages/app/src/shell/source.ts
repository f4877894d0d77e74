import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { IoFailure, ParseError } from "../core/errors.js"
import { ioFailure } from "../core/errors.js"
import type { JsonValue } from "../core/json-value.js"
import { parseJsonText } from "../core/parse.js"

// CHANGE: read JSON documents from disk as JsonValue trees
// WHY: the CLI formats and checks files through the same tree the encoder builds
// QUOTE(TZ): n/a
// REF: req-source-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p: readJsonFile(p) = parse(read(p))
// PURITY: SHELL
// EFFECT: Effect<JsonSource, IoFailure | ParseError, FileSystem>
// INVARIANT: raw text is returned alongside the tree
// COMPLEXITY: O(n)

export interface JsonSource {
  readonly raw: string
  readonly value: JsonValue
}

export const readTextFile = (path: string): Effect.Effect<string, IoFailure, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    return yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => ioFailure(path, error.message)))
    )
  })

export const readJsonFile = (
  path: string
): Effect.Effect<JsonSource, IoFailure | ParseError, FileSystemService> =>
  Effect.gen(function*(_) {
    const raw = yield* _(readTextFile(path))
    const value = yield* _(parseJsonText(raw))
    return { raw, value }
  })
