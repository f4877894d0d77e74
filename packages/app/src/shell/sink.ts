import type { PlatformError } from "@effect/platform/Error"
import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { Encodable } from "../core/encodable.js"
import { encode } from "../core/encode.js"
import type { EncodeError, IoFailure } from "../core/errors.js"
import { ioFailure } from "../core/errors.js"
import type { JsonValue } from "../core/json-value.js"
import { render } from "../core/render.js"

// CHANGE: persist rendered JSON through the platform FileSystem service
// WHY: isolate the single IO step behind a typed error channel
// QUOTE(TZ): n/a
// REF: req-sink-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p,v: writeJsonFile(p, v); read(p) = render(v, true)
// PURITY: SHELL
// EFFECT: Effect<void, IoFailure, FileSystem>
// INVARIANT: one write per call, no retry, no atomic replace
// COMPLEXITY: O(n)

const mapIoFailure = (path: string) => (error: PlatformError): IoFailure => ioFailure(path, error.message)

/**
 * Create or truncate `path` and write `text` to it.
 *
 * @pure false
 * @effect FileSystem
 */
export const writeTextFile = (
  path: string,
  text: string
): Effect.Effect<void, IoFailure, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    yield* _(fs.writeFileString(path, text).pipe(Effect.mapError(mapIoFailure(path))))
    yield* _(
      Effect.logDebug("wrote json").pipe(Effect.annotateLogs({ path, bytes: Buffer.byteLength(text) }))
    )
  })

/**
 * Render `value` in pretty mode and write it to `path`.
 *
 * @pure false
 * @effect FileSystem
 * @invariant a failed write may leave a truncated file
 */
export const writeJsonFile = (
  path: string,
  value: JsonValue
): Effect.Effect<void, IoFailure, FileSystemService> => writeTextFile(path, render(value, true))

/**
 * Encode `value` and write it to `path`; an encode failure leaves the file untouched.
 *
 * @pure false
 * @effect FileSystem
 */
export const writeJson = <A extends Encodable>(
  path: string,
  value: A
): Effect.Effect<void, EncodeError | IoFailure, FileSystemService> =>
  Effect.flatMap(encode(value), (tree) => writeJsonFile(path, tree))
