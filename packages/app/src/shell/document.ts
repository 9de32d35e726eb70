import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"

import type { AppError } from "../core/errors.js"
import { fileError } from "../core/errors.js"
import type { Json } from "../core/json.js"
import { JsonMap } from "../core/json-map.js"
import type { JsonMapOptions } from "../core/json-map.js"
import { fromEither } from "./from-either.js"

// CHANGE: read a JSON document from disk into a JsonMap
// WHY: isolate filesystem IO from the pure codec and adapter
// REF: req-document-io-1
// PURITY: SHELL
// EFFECT: Effect<JsonMap<Json>, AppError, FileSystem>
// INVARIANT: decode failures surface as DecodeError, never as an empty map
// COMPLEXITY: O(n)

export const readDocument = (
  path: string,
  options: JsonMapOptions
): Effect.Effect<JsonMap<Json>, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const raw = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    const map = yield* _(fromEither(JsonMap.parse(raw, options)))
    yield* _(Effect.logDebug(`Decoded ${path}: ${map.size} top-level keys`))
    return map
  })
