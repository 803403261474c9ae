/**
 * @module
 * Failure types for effect dispatch. Synchronous throws and future
 * rejections are both delivered to error-side continuations as a `Fault`.
 */

import { intentConstructor } from './types';

// =================================================================
// Section 1: Dispatch errors
// =================================================================

/**
 * Thrown by `Effect.perform` when the handler table has no entry for the
 * intent's class and the intent does not implement `performEffect`.
 */
export class NoEffectHandlerError extends Error {
  constructor(public readonly intent: unknown) {
    super(`No effect handler found for intent of type "${intentTypeName(intent)}". Register one with 'createHandlers().with()' or implement 'performEffect' on the intent.`);
    this.name = 'NoEffectHandlerError';
    Object.setPrototypeOf(this, NoEffectHandlerError.prototype);
  }
}

/**
 * Returns the class name of an intent, or its `typeof` for values that have
 * no usable constructor.
 */
export function intentTypeName(intent: unknown): string {
  if (typeof intent === 'object' && intent !== null) {
    return intentConstructor(intent)?.name || 'Object';
  }
  return typeof intent;
}

// =================================================================
// Section 2: Canonical fault
// =================================================================

/** Where a fault was captured. */
export type FaultOrigin = 'sync' | 'async';

/**
 * The single shape handed to every error-side continuation.
 *
 * `error` is the raw value: whatever was thrown, or the rejection reason of a
 * future. Re-throwing a `Fault` from an error callback propagates its raw
 * `error`, never the wrapper.
 */
export class Fault {
  public readonly _tag = 'Fault' as const;

  constructor(
    public readonly error: unknown,
    public readonly origin: FaultOrigin,
  ) {}

  /** The error's message, or its string form for non-`Error` values. */
  get message(): string {
    return this.error instanceof Error ? this.error.message : String(this.error);
  }

  /** Throws the raw error. */
  raise(): never {
    throw this.error;
  }
}

export function isFault(value: unknown): value is Fault {
  return value instanceof Fault;
}

/** Wraps a raw error, leaving an existing `Fault` untouched. */
export function toFault(error: unknown, origin: FaultOrigin): Fault {
  return isFault(error) ? error : new Fault(error, origin);
}

/** Recovers the raw error from a value that may be a `Fault`. */
export function unwrapFault(error: unknown): unknown {
  return isFault(error) ? error.error : error;
}
