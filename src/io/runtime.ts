/**
 * Effect platform layer for file I/O
 *
 * Effect programs in this package require platform services (FileSystem,
 * Path); the Promise-based entry points provide them here.
 */

import { NodeContext } from "@effect/platform-node";
import { Effect, Either } from "effect";

/**
 * Platform layer providing FileSystem, Path, and the other Node services
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run a platform-dependent program and settle with its value
 *
 * Failures reject with the program's own typed error rather than a fiber
 * failure wrapper, so callers can `instanceof` check them.
 */
export async function runWithPlatform<A, E>(
  program: Effect.Effect<A, E, NodeContext.NodeContext>
): Promise<A> {
  const result = await Effect.runPromise(
    Effect.either(program.pipe(Effect.provide(getPlatform())))
  );
  if (Either.isLeft(result)) throw result.left;
  return result.right;
}
