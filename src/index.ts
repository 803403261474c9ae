/**
 * @module
 * The main entry point for the library. Describe side effects as inert intent
 * values wrapped in an `Effect`, attach continuations, and perform the result
 * once at the edge of your program with a handler table.
 */

// Effect wrapper and combinators
export * from './effect';

// Chain walker and drivers (performAsync, performResult)
export * from './run';

// Handler tables and dispatch
export * from './handlers';

// Fault and dispatch errors
export * from './errors';

// Fan-out of several effects
export * from './parallel';

// Debug serialization
export * from './serialize';

// Shared contracts and logging
export * from './types';
