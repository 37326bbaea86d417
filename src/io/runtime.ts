/**
 * Effect platform layer and program runners
 *
 * Effect programs stay internal to the library. Public functions run them
 * through the helpers here, which rethrow the original failure rather than
 * Effect's wrapper so callers can match on the library's error classes.
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit } from "effect";

/**
 * Layer providing FileSystem, Path and the other platform services
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run a fully provided program, rejecting with the squashed failure
 *
 * @example
 * ```typescript
 * const size = await runPromise(program.pipe(Effect.provide(getPlatform())));
 * ```
 */
export async function runPromise<A, E>(program: Effect.Effect<A, E>): Promise<A> {
  const exit = await Effect.runPromiseExit(program);
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}

/**
 * Synchronous counterpart of runPromise for programs without async steps
 */
export function runSync<A, E>(program: Effect.Effect<A, E>): A {
  const exit = Effect.runSyncExit(program);
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}
