/**
 * @switchyard/observability: logging and event sinks for bus sessions.
 *
 * Re-exports every observer implementation and the factory registry.
 */

export { ConsoleObserver } from './console-observer.js';
export type { LogLevel } from '@switchyard/core';

export { FileObserver } from './file-observer.js';
export type { FileObserverOptions } from './file-observer.js';

export { MultiObserver } from './multi-observer.js';
export { NoopObserver } from './noop-observer.js';

export { createObserver, OBSERVER_NAMES } from './registry.js';
