/**
 * @module
 * Debug helpers that turn an effect tree into plain data without performing
 * anything.
 */

import { serialize as toSource } from 'seroval';
import type { Effect } from './effect';
import { isDescribable, type ContinuationPair } from './types';

export interface SerializedEffect {
  readonly kind: 'Effect';
  /** The intent's `describe()` output, or the intent itself. */
  readonly intent: unknown;
  readonly callbacks: readonly ContinuationPair[];
}

/**
 * Produces an inspection-friendly structure for an effect. Intents that
 * implement `describe()` (such as `ParallelEffects`) control their own
 * representation, which is how nested effects get serialized.
 */
export function serialize(effect: Effect<unknown, object>): SerializedEffect {
  const { intent } = effect;
  return {
    kind: 'Effect',
    intent: isDescribable(intent) ? intent.describe() : intent,
    callbacks: effect.callbacks,
  };
}

function functionLabel(fn: Function): string {
  return `[Function ${fn.name || 'anonymous'}]`;
}

/**
 * Projects a value onto data that `seroval` can always render: functions
 * become labels, class instances become plain objects with a `type` field and
 * references back to an ancestor become `'[Circular]'`.
 */
export function toPlain(value: unknown, seen: WeakSet<object> = new WeakSet()): unknown {
  if (typeof value === 'function') {
    return functionLabel(value);
  }
  if (typeof value === 'symbol') {
    return value.toString();
  }
  if (typeof value !== 'object' || value === null) {
    return value;
  }
  if (seen.has(value)) {
    return '[Circular]';
  }
  seen.add(value);

  try {
    if (Array.isArray(value)) {
      return value.map((item) => toPlain(item, seen));
    }

    const plain: Record<string, unknown> = {};
    const ctor = value.constructor;
    if (ctor && ctor !== Object) {
      plain.type = ctor.name;
    }
    for (const [key, entry] of Object.entries(value)) {
      plain[key] = toPlain(entry, seen);
    }
    return plain;
  } finally {
    // Only ancestors count as circular; shared siblings are rendered in full.
    seen.delete(value);
  }
}

/**
 * Renders an effect tree as a JavaScript source string, for logging and
 * debugging. The output can be read back with `seroval`'s `deserialize`.
 */
export function printEffect(effect: Effect<unknown, object>): string {
  return toSource(toPlain(serialize(effect)));
}
