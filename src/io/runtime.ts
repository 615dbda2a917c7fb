/**
 * Effect platform layer and runner
 *
 * All file-system access goes through the @effect/platform services provided
 * by the Node.js layer. `runWithPlatform` is the single place Effect
 * programs are turned back into Promises.
 */

import type { FileSystem, Path } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Effect, Either } from "effect";

/**
 * Services a file program may ask for
 */
export type PlatformServices = FileSystem.FileSystem | Path.Path;

/**
 * Get the Effect platform layer providing FileSystem and Path
 */
export function getPlatform() {
  return NodeContext.layer;
}

/**
 * Run a file-system program and return its result
 *
 * Expected failures are rethrown as-is instead of being wrapped in a fiber
 * failure, so callers can `instanceof` the errors the program mapped to.
 */
export async function runWithPlatform<A, E>(
  program: Effect.Effect<A, E, PlatformServices>
): Promise<A> {
  const result = await Effect.runPromise(
    program.pipe(Effect.either, Effect.provide(getPlatform()))
  );
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}
