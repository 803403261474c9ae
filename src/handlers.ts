/**
 * @module
 * The handler table: an immutable registry mapping intent classes to the
 * functions that perform them. Tables are passed explicitly to
 * `Effect.perform` and threaded through every nested perform, so they also
 * carry the logger used during dispatch.
 *
 * @example
 * ```typescript
 * class ReadFile { constructor(readonly path: string) {} }
 *
 * const handlers = createHandlers({ logger: console })
 *   .with(ReadFile, (intent) => fs.readFile(intent.path, 'utf8'));
 *
 * const contents = await wrap<string>(new ReadFile('notes.txt')).perform(handlers);
 * ```
 */

import { NoEffectHandlerError, intentTypeName } from './errors';
import { intentConstructor, isSelfPerforming, noopLogger, type Logger } from './types';

/** A class whose instances are intents. */
export type IntentClass<I extends object> = new (...args: never[]) => I;

/**
 * Performs one intent. May return a plain value, another `Effect`, or a
 * future; throwing is treated as a failure of the effect.
 */
export type Handler<I extends object> = (intent: I) => unknown;

/**
 * Stored form of a handler. Method syntax lets a `Handler<I>` be stored here;
 * lookup by exact class guarantees it only ever sees instances of `I`.
 */
interface HandlerEntry {
  perform(intent: object): unknown;
}

export interface HandlerTableOptions {
  /** Receives debug output about dispatch. Defaults to `noopLogger`. */
  logger?: Logger;
}

export class HandlerTable {
  private constructor(
    private readonly entries: ReadonlyMap<unknown, HandlerEntry>,
    public readonly logger: Logger,
  ) {}

  static empty(options: HandlerTableOptions = {}): HandlerTable {
    return new HandlerTable(new Map(), options.logger ?? noopLogger);
  }

  /**
   * Returns a new table where intents whose class is exactly `type` are
   * performed by `handler`. A previous entry for the same class is replaced.
   */
  with<I extends object>(type: IntentClass<I>, handler: Handler<I>): HandlerTable {
    const entry: HandlerEntry = { perform: handler };
    const entries = new Map(this.entries);
    entries.set(type, entry);
    return new HandlerTable(entries, this.logger);
  }

  /**
   * Returns a new table containing the entries of both tables. Entries from
   * `other` win; the logger of `this` is kept.
   */
  merge(other: HandlerTable): HandlerTable {
    return new HandlerTable(new Map([...this.entries, ...other.entries]), this.logger);
  }

  /** Returns a copy of this table that logs through `logger`. */
  withLogger(logger: Logger): HandlerTable {
    return new HandlerTable(this.entries, logger);
  }

  has(type: IntentClass<object>): boolean {
    return this.entries.has(type);
  }

  /** Looks up the entry for the intent's exact class. Subclasses do not match. */
  get(intent: object): ((intent: object) => unknown) | undefined {
    const entry = this.entries.get(intentConstructor(intent));
    return entry ? (target) => entry.perform(target) : undefined;
  }

  get size(): number {
    return this.entries.size;
  }
}

/** Creates an empty handler table. */
export function createHandlers(options: HandlerTableOptions = {}): HandlerTable {
  return HandlerTable.empty(options);
}

/**
 * Resolves how an intent will be performed: the table entry for its class
 * first, then the intent's own `performEffect`.
 *
 * @throws {NoEffectHandlerError} When neither exists.
 */
export function resolvePerformer(intent: object, handlers: HandlerTable): () => unknown {
  const handler = handlers.get(intent);
  if (handler) {
    handlers.logger.debug(`[perform] dispatching ${intentTypeName(intent)} to table handler`);
    return () => handler(intent);
  }
  if (isSelfPerforming(intent)) {
    handlers.logger.debug(`[perform] dispatching ${intentTypeName(intent)} to its own performEffect`);
    return () => intent.performEffect(handlers);
  }
  throw new NoEffectHandlerError(intent);
}
