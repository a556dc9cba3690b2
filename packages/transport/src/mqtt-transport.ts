/**
 * MqttTransport: transport over an MQTT 3.1.1/5 broker via the `mqtt` client.
 *
 * `startLink` hands back a client whose connection is still being
 * established; the `connect` event of the underlying client becomes our
 * `connected` event. Reconnection is left to the `mqtt` client.
 */

import { readFileSync } from 'node:fs';
import type { ConnectionOptions } from 'node:tls';
import { connect, type IClientOptions, type MqttClient } from 'mqtt';
import { TransportError } from '@switchyard/core';
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

const TRANSPORT_ID = 'mqtt';

/** Grant value a broker returns for a refused subscription. */
const SUBACK_FAILURE = 128;

const DEFAULT_RECONNECT_PERIOD_MS = 1000;

/** `crl` and `servername` are forwarded to `tls.connect` along with the rest of the options. */
export type MqttConnectOptions = IClientOptions & Pick<ConnectionOptions, 'crl' | 'servername'>;

/**
 * Translate transport options into `mqtt.connect` options, reading TLS
 * material from disk.
 */
export function buildMqttOptions(options: TransportOptions): MqttConnectOptions {
  const mqttOptions: MqttConnectOptions = {
    host: options.host,
    port: options.port,
    protocol: options.tls ? 'mqtts' : 'mqtt',
    username: options.username,
    password: options.password,
    clean: true,
    reconnectPeriod: options.reconnectPeriodMs ?? DEFAULT_RECONNECT_PERIOD_MS,
  };

  if (options.clientId) {
    mqttOptions.clientId = options.clientId;
  }

  if (options.tls) {
    mqttOptions.ca = readFileSync(options.tls.caCertPath);
    mqttOptions.rejectUnauthorized = options.tls.verify === 'peer';
    if (options.servername) {
      mqttOptions.servername = options.servername;
    }
    if (options.tls.crlCheck) {
      if (!options.tls.crlPath) {
        throw new TransportError('CRL checking is enabled but no CRL path was given', TRANSPORT_ID, {
          host: options.host,
        });
      }
      mqttOptions.crl = readFileSync(options.tls.crlPath);
    }
  }

  return mqttOptions;
}

function toQoS(value: number): QoS | null {
  return value === 0 || value === 1 || value === 2 ? value : null;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// MqttTransportClient
// ---------------------------------------------------------------------------

export class MqttTransportClient implements ITransportClient {
  readonly transport = TRANSPORT_ID;

  private readonly handlers = new Set<TransportEventHandler>();

  constructor(private readonly client: MqttClient) {
    client.on('connect', () => this.emit({ type: 'connected' }));
    client.on('message', (topic: string, payload: Buffer) => this.emit({ type: 'message', topic, payload }));
    client.on('reconnect', () => this.emit({ type: 'reconnecting' }));
    client.on('offline', () => this.emit({ type: 'offline' }));
    client.on('error', (error: Error) => this.emit({ type: 'error', error }));
    client.on('close', () => this.emit({ type: 'closed' }));
  }

  onEvent(handler: TransportEventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  async subscribe(topic: string, qos: QoS): Promise<SubscribeAck> {
    let grants;
    try {
      grants = await this.client.subscribeAsync(topic, { qos });
    } catch (err) {
      throw new TransportError(`Subscribe to "${topic}" failed: ${errorMessage(err)}`, TRANSPORT_ID, { topic });
    }

    const grant = grants.find((g) => g.topic === topic) ?? grants[0];
    const granted = grant && grant.qos !== SUBACK_FAILURE ? toQoS(grant.qos) : null;
    if (granted === null) {
      throw new TransportError(`Broker refused subscription to "${topic}"`, TRANSPORT_ID, { topic });
    }
    return { topic, qos: granted };
  }

  async unsubscribe(topic: string): Promise<void> {
    try {
      await this.client.unsubscribeAsync(topic);
    } catch (err) {
      throw new TransportError(`Unsubscribe from "${topic}" failed: ${errorMessage(err)}`, TRANSPORT_ID, { topic });
    }
  }

  async publish(topic: string, payload: Buffer, qos: QoS): Promise<PublishAck> {
    const packet = await this.client.publishAsync(topic, payload, { qos });
    const messageId =
      packet !== undefined && 'messageId' in packet && typeof packet.messageId === 'number'
        ? packet.messageId
        : undefined;
    return messageId === undefined ? { topic, qos } : { topic, qos, messageId };
  }

  async disconnect(): Promise<void> {
    await this.client.endAsync();
  }

  private emit(event: TransportEvent): void {
    for (const handler of this.handlers) {
      handler(event);
    }
  }
}

// ---------------------------------------------------------------------------
// MqttTransport
// ---------------------------------------------------------------------------

export class MqttTransport implements ITransport {
  readonly id = TRANSPORT_ID;

  startLink(options: TransportOptions): MqttTransportClient {
    let mqttOptions: MqttConnectOptions;
    try {
      mqttOptions = buildMqttOptions(options);
    } catch (err) {
      throw new TransportError(`Could not load TLS material: ${errorMessage(err)}`, TRANSPORT_ID, {
        host: options.host,
        port: options.port,
      });
    }
    return new MqttTransportClient(connect(mqttOptions));
  }
}
