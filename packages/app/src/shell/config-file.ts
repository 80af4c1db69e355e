import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"

import type { FileConfig } from "../core/config.js"
import { maxDepthLimit, maxIndent } from "../core/config.js"
import type { AppError } from "../core/errors.js"
import { configError, fileError } from "../core/errors.js"

// CHANGE: decode .json-value-parser.json with schema validation
// WHY: keep boundary data typed and reject invalid config early
// REF: req-config-file-1
// SOURCE: n/a
// FORMAT THEOREM: ∀c: decode(c) = Right(cfg) → cfg fields have correct types
// PURITY: SHELL
// EFFECT: Effect<FileConfig | undefined, AppError, FileSystem>
// INVARIANT: missing implicit config yields undefined
// COMPLEXITY: O(n)

const RawConfigSchema = S.partial(
  S.Struct({
    indent: S.Int.pipe(S.between(0, maxIndent)),
    strict: S.Boolean,
    maxDepth: S.Int.pipe(S.between(1, maxDepthLimit))
  })
)

const ConfigSchema = S.parseJson(RawConfigSchema)

export const decodeConfig = (raw: string): Effect.Effect<FileConfig, AppError> =>
  pipe(
    S.decodeUnknown(ConfigSchema)(raw),
    Effect.map((config) => ({
      ...(config.indent === undefined ? {} : { indent: config.indent }),
      ...(config.strict === undefined ? {} : { strict: config.strict }),
      ...(config.maxDepth === undefined ? {} : { maxDepth: config.maxDepth })
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
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      if (explicit) {
        return yield* _(Effect.fail(fileError(`Config file not found: ${path}`)))
      }
      return
    }
    const contents = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    return yield* _(decodeConfig(contents))
  })
