/**
 * @module
 * Helpers for unit-testing code that returns effects. Inspect `effect.intent`
 * to check what the code asked for, then use these to drive the continuation
 * chain with a result of your choosing, without any real handler.
 *
 * @example
 * ```typescript
 * const eff = loadGreeting('ada');
 * expect(eff.intent).toEqual(new ReadFile('greetings/ada.txt'));
 * expect(resolveEffect(eff, 'hello')).toBe('HELLO');
 * ```
 */

import type { Effect } from './effect';
import { createHandlers, type HandlerTable } from './handlers';
import { walkChain } from './run';

/**
 * Runs the continuation chain of `effect` as if its handler had returned
 * `value`. Nested effects returned by callbacks are performed against
 * `handlers` (an empty table by default).
 */
export function resolveEffect(
  effect: Effect<unknown, object>,
  value: unknown,
  handlers: HandlerTable = createHandlers(),
): unknown {
  return walkChain(() => value, effect.callbacks, handlers);
}

/**
 * Runs the continuation chain of `effect` as if its handler had thrown
 * `error`.
 */
export function failEffect(
  effect: Effect<unknown, object>,
  error: unknown,
  handlers: HandlerTable = createHandlers(),
): unknown {
  return walkChain(() => {
    throw error;
  }, effect.callbacks, handlers);
}
