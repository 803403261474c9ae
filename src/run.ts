/**
 * @module
 * The chain walker behind `Effect.perform`, and the drivers built on top of
 * it.
 *
 * A perform is a walk over a virtual list of steps: step 0 runs the resolved
 * handler, the remaining steps are the effect's continuation pairs in the
 * order they were attached. Each step sees only the outcome of the step
 * before it. The walk stays synchronous until some step produces a future;
 * at that point every pair that has not run yet is attached to the future and
 * the future is returned.
 */

import { errAsync, ResultAsync } from 'neverthrow';
import type { Effect } from './effect';
import { Fault, toFault, unwrapFault } from './errors';
import type { HandlerTable } from './handlers';
import { isPerformable, isThenable, type ContinuationPair, type Future } from './types';

/** The result of one step: a value, or a captured raw error. */
type Outcome =
  | { readonly ok: true; readonly value: unknown }
  | { readonly ok: false; readonly error: unknown };

const identity = (value: unknown): unknown => value;

/**
 * Calls a single callback, capturing anything it throws. A thrown `Fault` is
 * unwrapped so the raw error keeps flowing down the chain.
 */
function attempt<T>(callback: (argument: T) => unknown, argument: T): Outcome {
  try {
    return { ok: true, value: callback(argument) };
  } catch (error) {
    return { ok: false, error: unwrapFault(error) };
  }
}

/**
 * Resolves a nested effect in place. An `Effect` is performed against the same
 * table; a future gets a continuation that applies this same rule to whatever
 * it resolves to. Anything else is returned unchanged.
 *
 * A nested effect that fails, including with `NoEffectHandlerError`, fails the
 * step that returned it: the error goes to the outer chain's next error-side
 * continuation, which may recover from it.
 */
export function chainNested(value: unknown, handlers: HandlerTable): unknown {
  if (isThenable(value)) {
    return value.then((resolved) => chainNested(resolved, handlers));
  }
  if (isPerformable(value)) {
    return value.perform(handlers);
  }
  return value;
}

/** Applies the nested-effect rule to a successful outcome. */
function settle(outcome: Outcome, handlers: HandlerTable): Outcome {
  if (!outcome.ok) {
    return outcome;
  }
  return attempt((value) => chainNested(value, handlers), outcome.value);
}

/** Invokes an error-side callback with a `Fault` built from a future's rejection. */
function recoverAsync(callback: (fault: Fault) => unknown, reason: unknown): unknown {
  try {
    return callback(new Fault(unwrapFault(reason), 'async'));
  } catch (error) {
    throw unwrapFault(error);
  }
}

/**
 * Moves the pairs that have not run yet onto `future`, in order. An absent
 * success side becomes a pass-through; an absent error side lets the
 * rejection propagate. The returned future rejects with the raw error, never
 * with a `Fault`.
 */
function handOff(
  future: Future<unknown>,
  remaining: readonly ContinuationPair[],
  handlers: HandlerTable,
): Future<unknown> {
  handlers.logger.debug(`[perform] handing off ${remaining.length} continuation(s) to a future`);
  const composed = remaining.reduce<Future<unknown>>((chained, pair) => {
    const { success, error } = pair;
    return chained.then(
      success ? (value) => chainNested(success(value), handlers) : identity,
      error ? (reason) => chainNested(recoverAsync(error, reason), handlers) : undefined,
    );
  }, future);
  return composed.then(identity, (reason) => {
    throw unwrapFault(reason);
  });
}

/**
 * Runs `performer` as step 0 and then `callbacks` in attachment order.
 *
 * Returns the final value, or the future the walk handed off to. If the walk
 * finishes synchronously on the error side, the raw error is thrown.
 */
export function walkChain(
  performer: () => unknown,
  callbacks: readonly ContinuationPair[],
  handlers: HandlerTable,
): unknown {
  const steps: readonly ContinuationPair[] = [{ success: performer }, ...callbacks];
  let outcome: Outcome = { ok: true, value: undefined };

  for (let index = 0; index < steps.length; index++) {
    const { success, error } = steps[index];
    let next: Outcome;
    if (outcome.ok) {
      if (!success) continue;
      next = attempt(success, outcome.value);
    } else {
      if (!error) continue;
      next = attempt(error, toFault(outcome.error, 'sync'));
    }

    outcome = settle(next, handlers);
    if (outcome.ok && isThenable(outcome.value)) {
      return handOff(outcome.value, steps.slice(index + 1), handlers);
    }
  }

  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.value;
}

// =================================================================
// Drivers
// =================================================================

/**
 * Performs an effect and always returns a `Promise`, whether the chain
 * finished synchronously or handed off to a future. A synchronous failure,
 * including `NoEffectHandlerError`, becomes a rejection.
 *
 * @example
 * ```typescript
 * const user = await performAsync(fetchUser('u-1'), handlers);
 * ```
 */
export function performAsync<A>(effect: Effect<A, object>, handlers: HandlerTable): Promise<A> {
  return new Promise<A>((resolve) => resolve(effect.perform(handlers)));
}

/**
 * Performs an effect without ever throwing or rejecting. Failures come back
 * as an `Err` holding a `Fault`, with `origin` telling whether the chain
 * failed synchronously or through a future.
 *
 * @example
 * ```typescript
 * const result = await performResult(loadConfig(), handlers);
 * if (result.isErr()) {
 *   console.error('Could not load config:', result.error.message);
 * }
 * ```
 */
export function performResult<A>(effect: Effect<A, object>, handlers: HandlerTable): ResultAsync<A, Fault> {
  let performed: A | PromiseLike<A>;
  try {
    performed = effect.perform(handlers);
  } catch (error) {
    return errAsync(toFault(error, 'sync'));
  }
  return ResultAsync.fromPromise(new Promise<A>((resolve) => resolve(performed)), (error) => toFault(error, 'async'));
}
