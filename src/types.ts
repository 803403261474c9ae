/**
 * @module
 * Shared contracts used across the engine: the logger, the optional
 * capabilities an intent may expose, the continuation pair stored on an
 * `Effect`, and the guards the chain walker uses to recognise futures and
 * nested effects.
 */

import type { HandlerTable } from './handlers';
import type { Fault } from './errors';

// =================================================================
// Section 1: Logging
// =================================================================

/**
 * Logger interface for dispatch logging.
 * Compatible with common logging libraries like winston, pino, console, etc.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * A no-op logger that discards all log messages.
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

// =================================================================
// Section 2: Intent capabilities
// =================================================================

/**
 * An intent that carries a default implementation of itself. It is used only
 * when the handler table has no entry for the intent's class.
 */
export interface SelfPerformingIntent {
  performEffect(handlers: HandlerTable): unknown;
}

/** An intent that can produce a debugging representation of itself. */
export interface DescribableIntent {
  describe(): unknown;
}

/**
 * The intent's runtime type: the constructor found on its prototype. An own
 * `constructor` field on the intent is ignored.
 */
export function intentConstructor(intent: object): Function | undefined {
  const proto: unknown = Object.getPrototypeOf(intent);
  if (typeof proto !== 'object' || proto === null) {
    return undefined;
  }
  return typeof proto.constructor === 'function' ? proto.constructor : undefined;
}

export function isSelfPerforming(intent: object): intent is SelfPerformingIntent {
  return 'performEffect' in intent && typeof intent.performEffect === 'function';
}

export function isDescribable(intent: object): intent is DescribableIntent {
  return 'describe' in intent && typeof intent.describe === 'function';
}

// =================================================================
// Section 3: Continuations, futures and nested effects
// =================================================================

/**
 * One entry of an effect's continuation list. Either side may be absent, in
 * which case the outcome flows past this pair unchanged.
 *
 * The sides are declared with method syntax so that typed callbacks
 * (`(value: number) => string`) can be stored in the erased list.
 */
export interface ContinuationPair {
  success?(value: unknown): unknown;
  error?(fault: Fault): unknown;
}

/**
 * Any value the engine treats as an asynchronous future. `then(onFulfilled)`
 * attaches a success continuation, `then(onFulfilled, onRejected)` attaches
 * both sides at once.
 */
export type Future<T> = PromiseLike<T>;

export function isThenable(value: unknown): value is Future<unknown> {
  if (value === null || (typeof value !== 'object' && typeof value !== 'function')) {
    return false;
  }
  return 'then' in value && typeof value.then === 'function';
}

/**
 * Brand carried by every `Effect`. Using `Symbol.for()` keeps detection
 * working when several copies of the library are loaded.
 */
export const EFFECT_TAG = Symbol.for('intentful.effect');

/** The part of an `Effect` the chain walker needs to resolve nested effects. */
export interface Performable {
  readonly [EFFECT_TAG]: true;
  perform(handlers: HandlerTable): unknown;
}

export function isPerformable(value: unknown): value is Performable {
  return (
    typeof value === 'object' &&
    value !== null &&
    EFFECT_TAG in value &&
    value[EFFECT_TAG] === true &&
    'perform' in value &&
    typeof value.perform === 'function'
  );
}
