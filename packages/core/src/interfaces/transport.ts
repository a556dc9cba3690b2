/**
 * ITransport: pub/sub transport contract
 *
 * A transport starts clients. `startLink` returns at once with a client that
 * is not yet connected; the client later emits a `connected` event. Messages
 * for subscribed topics arrive as `message` events.
 */

/**
 * Delivery guarantee for subscribe and publish. Level 1 is "at least once,
 * sender blocks for acknowledgment".
 */
export type QoS = 0 | 1 | 2;

export interface TransportTlsOptions {
  verify: 'peer' | 'none';
  caCertPath: string;
  crlCheck: boolean;
  /** PEM revocation list consulted when `crlCheck` is on. */
  crlPath?: string;
}

export interface TransportOptions {
  /** Network address; textual names are resolved before reaching the transport. */
  host: string;
  port: number;
  username: string;
  password: string;
  clientId?: string;
  tls?: TransportTlsOptions;
  /** Name the broker certificate is checked against when `host` is an address. */
  servername?: string;
  reconnectPeriodMs?: number;
}

export interface SubscribeAck {
  topic: string;
  qos: QoS;
}

export interface PublishAck {
  topic: string;
  qos: QoS;
  messageId?: number;
}

export type TransportEvent =
  | { type: 'connected' }
  | { type: 'message'; topic: string; payload: Buffer }
  | { type: 'reconnecting' }
  | { type: 'offline' }
  | { type: 'error'; error: Error }
  | { type: 'closed' };

export type TransportEventHandler = (event: TransportEvent) => void;

export interface ITransportClient {
  /** Id of the transport that started this client (e.g. "mqtt"). */
  readonly transport: string;

  /** Register an event handler. Returns a function that removes it. */
  onEvent(handler: TransportEventHandler): () => void;
  subscribe(topic: string, qos: QoS): Promise<SubscribeAck>;
  unsubscribe(topic: string): Promise<void>;
  publish(topic: string, payload: Buffer, qos: QoS): Promise<PublishAck>;
  disconnect(): Promise<void>;
}

export interface ITransport {
  readonly id: string;

  startLink(options: TransportOptions): ITransportClient;
}
