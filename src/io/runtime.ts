/**
 * Effect platform layer selection
 *
 * All file system access goes through @effect/platform services. This module
 * supplies the Node.js layer and runs programs against it as Promises.
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit } from "effect";

/**
 * Get the Effect platform layer providing FileSystem, Path and friends
 */
export function getPlatform() {
  return NodeContext.layer;
}

/**
 * Run an Effect program on the platform layer
 *
 * Failures are rethrown as the original error value rather than wrapped in a
 * fiber failure, so `instanceof` checks on library errors keep working.
 *
 * @example
 * ```typescript
 * const text = await runWithPlatform(
 *   Effect.gen(function* () {
 *     const fs = yield* FileSystem.FileSystem;
 *     return yield* fs.readFileString("proteins.fasta");
 *   })
 * );
 * ```
 */
export async function runWithPlatform<A, E>(
  program: Effect.Effect<A, E, NodeContext.NodeContext>
): Promise<A> {
  const exit = await Effect.runPromiseExit(program.pipe(Effect.provide(getPlatform())));
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}
