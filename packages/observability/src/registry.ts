/**
 * Observer registry: builds the session observer from the `observability`
 * section of the switchyard config.
 */

import { ConfigError } from '@switchyard/core';
import type { IObserver, LogLevel, ObservabilitySection } from '@switchyard/core';

import { ConsoleObserver } from './console-observer.js';
import { FileObserver } from './file-observer.js';
import { MultiObserver } from './multi-observer.js';
import { NoopObserver } from './noop-observer.js';

type ObserverBuilder = (section: ObservabilitySection, logLevel: LogLevel) => IObserver;

const BUILDERS = new Map<string, ObserverBuilder>([
  ['console', (_section, logLevel) => new ConsoleObserver(logLevel)],
  [
    'file',
    (section) =>
      new FileObserver({
        ...(section.logPath ? { filePath: section.logPath } : {}),
        ...(section.maxLogSize ? { maxBytes: section.maxLogSize } : {}),
      }),
  ],
  ['noop', () => new NoopObserver()],
]);

/** Observer names accepted in `observability.observers`. */
export const OBSERVER_NAMES: readonly string[] = [...BUILDERS.keys()];

/**
 * Build the observer for a session. `logLevel` is the bus log level and
 * gates console output. Nothing listed gives a NoopObserver; several names
 * are combined in a MultiObserver; a name listed twice is built once.
 *
 * @throws {ConfigError} for an observer name that is not registered
 */
export function createObserver(section: ObservabilitySection, logLevel: LogLevel = 'error'): IObserver {
  const names = [...new Set(section.observers)];

  const observers = names.map((name) => {
    const build = BUILDERS.get(name);
    if (!build) {
      throw new ConfigError(`Unknown observer "${name}"; expected one of ${OBSERVER_NAMES.join(', ')}`, {
        field: 'observability.observers',
      });
    }
    return build(section, logLevel);
  });

  if (observers.length === 0) return new NoopObserver();
  return observers.length === 1 && observers[0] ? observers[0] : new MultiObserver(observers);
}
