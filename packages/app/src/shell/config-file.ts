import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"

import type { FileConfig } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError, ioFailure } from "../core/errors.js"

// CHANGE: decode .typed-jsonify.json with schema validation
// WHY: keep boundary data typed and reject invalid config early
// QUOTE(TZ): n/a
// REF: req-config-file-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: missing config yields undefined unless the path was explicit
// COMPLEXITY: O(n)

const RawConfigSchema = S.partial(
  S.Struct({
    pretty: S.Boolean,
    out: S.String
  })
)

const ConfigSchema = S.parseJson(RawConfigSchema)

export const decodeConfig = (raw: string): Effect.Effect<FileConfig, AppError> =>
  pipe(
    S.decodeUnknown(ConfigSchema)(raw),
    Effect.map((config) => ({
      ...(config.pretty === undefined ? {} : { pretty: config.pretty }),
      ...(config.out === undefined ? {} : { out: config.out })
    })),
    Effect.mapError((error) => configError(TreeFormatter.formatErrorSync(error)))
  )

export const loadConfigFile = (
  path: string | undefined,
  explicit: boolean
): Effect.Effect<FileConfig | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    if (path === undefined) {
      return
    }
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => ioFailure(path, error.message)))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(ioFailure(path, "Config file not found")))
      }
      yield* _(Effect.logDebug("no config file").pipe(Effect.annotateLogs("path", path)))
      return
    }
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => ioFailure(path, error.message)))
    )
    const decoded = yield* _(decodeConfig(contents))
    yield* _(Effect.logDebug("loaded config file").pipe(Effect.annotateLogs("path", path)))
    return decoded
  })
