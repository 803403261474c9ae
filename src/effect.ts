/**
 * @module
 * The `Effect` wrapper: one intent plus an ordered, immutable list of
 * continuation pairs. Building and combining effects has no side effects;
 * nothing is looked up or run until `perform` is called.
 */

import type { Fault } from './errors';
import { resolvePerformer, type HandlerTable } from './handlers';
import { walkChain } from './run';
import { EFFECT_TAG, intentConstructor, type ContinuationPair, type Future, type Performable } from './types';

/**
 * What a handler or continuation may return: a plain value, an effect to be
 * performed in place, or a future of either.
 */
export type Step<B> = B | Effect<B, object> | Future<B | Effect<B, object>>;

export type SuccessCallback<A, B> = (value: A) => Step<B>;
export type ErrorCallback<B> = (fault: Fault) => Step<B>;

/**
 * Wraps an intent together with the continuations to run after it.
 *
 * `A` is the result type the caller declares for the effect; the engine does
 * not check it against the handler that ends up performing the intent.
 *
 * @template A The declared result type.
 * @template I The intent type.
 */
export class Effect<A = unknown, I extends object = object> implements Performable {
  readonly [EFFECT_TAG] = true as const;
  readonly intent: I;
  readonly callbacks: readonly ContinuationPair[];

  private constructor(intent: I, callbacks: readonly ContinuationPair[]) {
    this.intent = intent;
    this.callbacks = Object.freeze([...callbacks]);
  }

  /** Wraps an intent with an empty continuation list. */
  static wrap<A = unknown, I extends object = object>(intent: I): Effect<A, I> {
    return new Effect<A, I>(intent, []);
  }

  /** Builds an effect from an intent and an existing continuation list. */
  static withCallbacks<A = unknown, I extends object = object>(
    intent: I,
    callbacks: readonly ContinuationPair[],
  ): Effect<A, I> {
    return new Effect<A, I>(intent, callbacks);
  }

  /**
   * Returns a new effect with one more continuation pair. `this` is not
   * changed. Either side may be `undefined`, in which case outcomes for that
   * side pass through this pair untouched.
   */
  on<B = A, C = B>(
    success: SuccessCallback<A, B> | undefined,
    error: ErrorCallback<C> | undefined,
  ): Effect<B | C, I> {
    return Effect.withCallbacks<B | C, I>(this.intent, [...this.callbacks, { success, error }]);
  }

  /** Runs `callback` with the result when the previous step succeeded. */
  onSuccess<B>(callback: SuccessCallback<A, B>): Effect<B, I> {
    return this.on<B, B>(callback, undefined);
  }

  /**
   * Runs `callback` with a `Fault` when the previous step failed. Returning
   * normally recovers; throwing (including re-throwing the fault) keeps the
   * chain on the error side.
   */
  onError<C>(callback: ErrorCallback<C>): Effect<A | C, I> {
    return this.on<A, C>(undefined, callback);
  }

  /** Runs `callback` with the result or the `Fault`, whichever occurred. */
  after<B>(callback: (outcome: A | Fault) => Step<B>): Effect<B, I> {
    return this.on<B, B>(callback, callback);
  }

  /**
   * Performs the intent and runs the continuation chain.
   *
   * The intent's exact class is looked up in `handlers` first; failing that,
   * the intent's own `performEffect(handlers)` is used. Returns the final
   * value, or a future when any step handed off to one. A failure nobody
   * recovered from is thrown (or rejects the returned future) as the raw
   * error.
   *
   * @throws {NoEffectHandlerError} When the intent cannot be dispatched.
   */
  perform(handlers: HandlerTable): A | PromiseLike<A> {
    const performer = resolvePerformer(this.intent, handlers);
    // The declared result type is not verified against the handler.
    return walkChain(performer, this.callbacks, handlers) as A | PromiseLike<A>;
  }

  toString(): string {
    return `Effect(${intentConstructor(this.intent)?.name || 'Object'}, ${this.callbacks.length} callback(s))`;
  }
}

/**
 * Wraps an intent in an `Effect`.
 *
 * @example
 * ```typescript
 * class Sleep { constructor(readonly ms: number) {} }
 *
 * const nap = wrap<void>(new Sleep(100)).onSuccess(() => 'rested');
 * ```
 */
export function wrap<A = unknown, I extends object = object>(intent: I): Effect<A, I> {
  return Effect.wrap<A, I>(intent);
}

export function isEffect(value: unknown): value is Effect<unknown, object> {
  return value instanceof Effect;
}

/** Extracts the declared result type of an `Effect`. */
export type EffectResult<E> = E extends Effect<infer A, object> ? A : never;
