/**
 * @switchyard/transport: transport implementations for the bus session.
 *
 * All transports implement the ITransport interface from @switchyard/core.
 */

export { MqttTransport, MqttTransportClient, buildMqttOptions } from './mqtt-transport.js';
export type { MqttConnectOptions } from './mqtt-transport.js';

export { MemoryTransport, MemoryTransportClient, MemoryBroker } from './memory-transport.js';
export type { MemoryBrokerOptions, PublishedMessage, PublishHook } from './memory-transport.js';

export { matchTopic, isValidTopicFilter, isValidTopicName } from './topic.js';

// Re-export transport types from core for convenience
export type { ITransport, ITransportClient, TransportOptions, TransportEvent } from '@switchyard/core';

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

import type { ITransport } from '@switchyard/core';
import { MqttTransport } from './mqtt-transport.js';
import { MemoryTransport } from './memory-transport.js';

/**
 * Create a transport by name.
 * Throws if the transport name is unknown.
 */
export function createTransport(name: string): ITransport {
  switch (name) {
    case 'mqtt':
      return new MqttTransport();
    case 'memory':
      return new MemoryTransport();
    default:
      throw new Error(`Unknown transport: "${name}". Supported: mqtt, memory`);
  }
}
