/**
 * @module
 * Fan-out of several effects into one.
 */

import { Effect, type EffectResult } from './effect';
import type { HandlerTable } from './handlers';
import { performAsync } from './run';
import { serialize, type SerializedEffect } from './serialize';
import type { DescribableIntent, SelfPerformingIntent } from './types';

export interface SerializedParallelEffects {
  readonly kind: 'ParallelEffects';
  readonly effects: readonly SerializedEffect[];
}

/**
 * An intent asking for several effects to be performed together and their
 * results gathered in input order.
 *
 * The default implementation starts every child against the same handler
 * table and combines them with `Promise.all`. It is fail-fast: the aggregate
 * rejects with the first child failure, although every child has already been
 * started. A child that throws synchronously becomes a rejected promise, so
 * it cannot stop the children after it from starting.
 *
 * Register a handler for `ParallelEffects` to use a different strategy
 * (a worker pool, sequential execution in tests, ...).
 */
export class ParallelEffects implements SelfPerformingIntent, DescribableIntent {
  readonly effects: readonly Effect<unknown, object>[];

  constructor(effects: Iterable<Effect<unknown, object>>) {
    this.effects = Object.freeze([...effects]);
  }

  performEffect(handlers: HandlerTable): Promise<unknown[]> {
    handlers.logger.debug(`[parallel] starting ${this.effects.length} child effect(s)`);
    return Promise.all(this.effects.map((effect) => performAsync(effect, handlers)));
  }

  describe(): SerializedParallelEffects {
    return {
      kind: 'ParallelEffects',
      effects: this.effects.map((effect) => serialize(effect)),
    };
  }
}

/** The aggregate result of a tuple (or array) of effects. */
export type ParallelResults<T extends readonly Effect<unknown, object>[]> = {
  -readonly [K in keyof T]: EffectResult<T[K]>;
};

/**
 * Combines several effects into one whose result is the list of their
 * results, in the same order as the input.
 *
 * @example
 * ```typescript
 * const both = parallel([wrap<User>(new GetUser('u-1')), wrap<Post[]>(new ListPosts('u-1'))]);
 * const [user, posts] = await performAsync(both, handlers);
 * ```
 */
export function parallel<const T extends readonly Effect<unknown, object>[]>(
  effects: T,
): Effect<ParallelResults<T>, ParallelEffects> {
  return Effect.wrap<ParallelResults<T>, ParallelEffects>(new ParallelEffects(effects));
}
