/**
 * Synchronous execution of Effect programs
 *
 * The codec's public API is synchronous, so the scoped file helpers run their
 * Effect programs with `Effect.runSyncExit` and rethrow the failure itself
 * rather than Effect's `FiberFailure` wrapper.
 */

import { Cause, Effect, Exit } from "effect";

/**
 * Run a synchronous Effect, returning its value or throwing its error
 */
export function runSyncOrThrow<A, E>(program: Effect.Effect<A, E>): A {
  const exit = Effect.runSyncExit(program);
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}
