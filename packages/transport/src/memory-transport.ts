/**
 * MemoryTransport: in-process broker for tests and local wiring.
 *
 * Behaves like a QoS 1 broker without a network: connections are confirmed
 * asynchronously, deliveries are asynchronous, filters follow MQTT matching.
 * The broker can refuse to confirm connections, fail publishes, inject
 * messages from outside and report every publish to hooks, which is how
 * tests write responders.
 */

import { TransportError, generateId } from '@switchyard/core';
import type {
  ITransport,
  ITransportClient,
  PublishAck,
  QoS,
  SubscribeAck,
  TransportEvent,
  TransportEventHandler,
  TransportOptions,
} from '@switchyard/core';
import { isValidTopicFilter, isValidTopicName, matchTopic } from './topic.js';

const TRANSPORT_ID = 'memory';

export interface PublishedMessage {
  clientId: string;
  topic: string;
  payload: Buffer;
  qos: QoS;
}

export type PublishHook = (message: PublishedMessage) => void;

export interface MemoryBrokerOptions {
  /** When false, clients start but never see a `connected` event. Default: true. */
  confirmConnections?: boolean;
}

// ---------------------------------------------------------------------------
// MemoryBroker
// ---------------------------------------------------------------------------

export class MemoryBroker {
  confirmConnections: boolean;

  /** Every successful publish, in order. */
  readonly published: PublishedMessage[] = [];

  /** Options of every client started against this broker, in order. */
  readonly connections: TransportOptions[] = [];

  private readonly clients = new Set<MemoryTransportClient>();
  private readonly hooks = new Set<PublishHook>();
  private publishFailure: Error | null = null;

  constructor(options: MemoryBrokerOptions = {}) {
    this.confirmConnections = options.confirmConnections ?? true;
  }

  get clientCount(): number {
    return this.clients.size;
  }

  /** Make every publish reject with `error` until called again with null. */
  failPublishes(error: Error | null): void {
    this.publishFailure = error;
  }

  onPublish(hook: PublishHook): () => void {
    this.hooks.add(hook);
    return () => {
      this.hooks.delete(hook);
    };
  }

  /** Deliver a message as if some other client had published it. */
  inject(topic: string, payload: Buffer | string): void {
    this.route(topic, typeof payload === 'string' ? Buffer.from(payload, 'utf8') : payload);
  }

  subscribers(topic: string): number {
    let count = 0;
    for (const client of this.clients) {
      if (client.matches(topic)) count++;
    }
    return count;
  }

  // -----------------------------------------------------------------------
  // Client-facing
  // -----------------------------------------------------------------------

  attach(client: MemoryTransportClient, options: TransportOptions): void {
    this.clients.add(client);
    this.connections.push(options);
  }

  detach(client: MemoryTransportClient): void {
    this.clients.delete(client);
  }

  accept(message: PublishedMessage): void {
    if (this.publishFailure) {
      throw this.publishFailure;
    }
    this.published.push(message);
    for (const hook of this.hooks) {
      hook(message);
    }
    this.route(message.topic, message.payload);
  }

  private route(topic: string, payload: Buffer): void {
    for (const client of this.clients) {
      if (client.matches(topic)) {
        client.deliver(topic, payload);
      }
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryTransportClient
// ---------------------------------------------------------------------------

export class MemoryTransportClient implements ITransportClient {
  readonly transport = TRANSPORT_ID;
  readonly clientId: string;

  private readonly handlers = new Set<TransportEventHandler>();
  private readonly filters = new Set<string>();
  private connected = false;
  private closed = false;

  constructor(
    private readonly broker: MemoryBroker,
    options: TransportOptions,
  ) {
    this.clientId = options.clientId ?? `memory_${generateId()}`;
    broker.attach(this, options);

    if (broker.confirmConnections) {
      setTimeout(() => {
        if (this.closed) return;
        this.connected = true;
        this.emit({ type: 'connected' });
      }, 0);
    }
  }

  get isConnected(): boolean {
    return this.connected;
  }

  onEvent(handler: TransportEventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  async subscribe(topic: string, qos: QoS): Promise<SubscribeAck> {
    this.ensureConnected();
    if (!isValidTopicFilter(topic)) {
      throw new TransportError(`Invalid topic filter "${topic}"`, TRANSPORT_ID, { topic });
    }
    this.filters.add(topic);
    return { topic, qos };
  }

  async unsubscribe(topic: string): Promise<void> {
    this.ensureConnected();
    this.filters.delete(topic);
  }

  async publish(topic: string, payload: Buffer, qos: QoS): Promise<PublishAck> {
    this.ensureConnected();
    if (!isValidTopicName(topic)) {
      throw new TransportError(`Invalid topic name "${topic}"`, TRANSPORT_ID, { topic });
    }
    this.broker.accept({ clientId: this.clientId, topic, payload, qos });
    return { topic, qos };
  }

  async disconnect(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.connected = false;
    this.filters.clear();
    this.broker.detach(this);
    this.emit({ type: 'closed' });
  }

  matches(topic: string): boolean {
    if (!this.connected) return false;
    for (const filter of this.filters) {
      if (matchTopic(filter, topic)) return true;
    }
    return false;
  }

  deliver(topic: string, payload: Buffer): void {
    queueMicrotask(() => {
      if (!this.connected) return;
      this.emit({ type: 'message', topic, payload });
    });
  }

  private ensureConnected(): void {
    if (!this.connected) {
      throw new TransportError('Client is not connected', TRANSPORT_ID, { clientId: this.clientId });
    }
  }

  private emit(event: TransportEvent): void {
    for (const handler of this.handlers) {
      handler(event);
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryTransport
// ---------------------------------------------------------------------------

export class MemoryTransport implements ITransport {
  readonly id = TRANSPORT_ID;

  constructor(readonly broker: MemoryBroker = new MemoryBroker()) {}

  startLink(options: TransportOptions): MemoryTransportClient {
    return new MemoryTransportClient(this.broker, options);
  }
}
