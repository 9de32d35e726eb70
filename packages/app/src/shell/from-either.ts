import * as Effect from "effect/Effect"
import type * as Either from "effect/Either"

/** Lift a pure Either result into an Effect failing with its Left. */
export const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)
