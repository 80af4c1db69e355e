import * as Either from "effect/Either"

export const expectRight = <A, E>(either: Either.Either<A, E>): A => {
  if (Either.isLeft(either)) {
    throw new Error(`expected Right, got Left: ${JSON.stringify(either.left)}`)
  }
  return either.right
}

export const expectLeft = <A, E>(either: Either.Either<A, E>): E => {
  if (Either.isRight(either)) {
    throw new Error(`expected Left, got Right: ${JSON.stringify(either.right)}`)
  }
  return either.left
}
