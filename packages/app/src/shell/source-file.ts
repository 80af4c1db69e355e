import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"

// CHANGE: read the document to parse through the platform file system
// WHY: the parser only ever sees text that is already in memory
// REF: req-source-io-1
// SOURCE: n/a
// PURITY: SHELL
// EFFECT: Effect<string | undefined, AppError, FileSystem>
// INVARIANT: a path that is not a readable file yields undefined
// COMPLEXITY: O(n)

/**
 * Read a whole file as UTF-8 text.
 *
 * @param path - Path given on the command line.
 * @returns File contents, or undefined when the path does not name a file.
 *
 * @pure false
 * @effect FileSystem
 */
export const readSourceFile = (
  path: string
): Effect.Effect<string | undefined, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const exists = yield* _(
      fs.exists(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (!exists) {
      return
    }
    const info = yield* _(
      fs.stat(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    if (info.type !== "File") {
      return
    }
    return yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
  })
