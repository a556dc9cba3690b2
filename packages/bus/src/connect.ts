/**
 * connect(): establish a bus session.
 *
 * Resolves the broker host, merges the internal service identity and TLS
 * settings into the transport options, starts the transport client and
 * waits for it to report `connected`. Only then is a session id generated,
 * the private reply address subscribed and the Session returned.
 */

import { lookup } from 'node:dns/promises';
import { isIP } from 'node:net';
import { ConnectTimeoutError, SwitchyardError, TransportError, generateId } from '@switchyard/core';
import type {
  BusConfig,
  ICredentialProvider,
  IObserver,
  ITransport,
  ITransportClient,
  TransportOptions,
} from '@switchyard/core';
import { EnvelopeCodec } from '@switchyard/envelope';
import { ConsoleObserver } from '@switchyard/observability';
import { MqttTransport } from '@switchyard/transport';

import { BUS_QOS, Session } from './session.js';
import { buildTlsOptions } from './tls.js';

/** Reserved broker username that marks infrastructure connections. */
export const INTERNAL_USERNAME = 'SWITCHYARD_INTERNAL';

export const REPLY_PREFIX = 'switchyard/call/reply';

export const DEFAULT_CONNECT_TIMEOUT_MS = 5000;

export type HostResolver = (host: string) => Promise<string>;

export interface ConnectOptions {
  credentials: ICredentialProvider;
  /** Default: MqttTransport. */
  transport?: ITransport;
  /** Default: ConsoleObserver at the configured log level. */
  observer?: IObserver;
  /** Default: system DNS lookup. */
  resolveHost?: HostResolver;
  /** Overrides `connectTimeoutMs` from the config. */
  timeoutMs?: number;
}

export function replyAddressFor(sessionId: string): string {
  return `${REPLY_PREFIX}/${sessionId}`;
}

/** Literal addresses pass through; names go to the system resolver. */
export async function resolveWithDns(host: string): Promise<string> {
  if (isIP(host) !== 0) {
    return host;
  }
  const { address } = await lookup(host);
  return address;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function waitForConnected(client: ITransportClient, timeoutMs: number, config: BusConfig): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    let lastError: Error | undefined;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const detach = client.onEvent((event) => {
      if (event.type === 'connected') {
        clearTimeout(timer);
        detach();
        resolve();
      } else if (event.type === 'error') {
        lastError = event.error;
      }
    });

    timer = setTimeout(() => {
      detach();
      reject(
        new ConnectTimeoutError(`Connection to ${config.host}:${config.port} not established within ${timeoutMs}ms`, {
          host: config.host,
          port: config.port,
          timeoutMs,
          ...(lastError ? { lastError: lastError.message } : {}),
        }),
      );
    }, timeoutMs);
  });
}

async function shutdown(client: ITransportClient, observer: IObserver): Promise<void> {
  try {
    await client.disconnect();
  } catch (err) {
    observer.onError(err instanceof Error ? err : new Error(String(err)), { phase: 'connect-cleanup' });
  }
}

/**
 * Open a session on the bus.
 *
 * @throws {ConnectTimeoutError} the transport did not report `connected` in time
 * @throws {TransportError} the host could not be resolved, or the reply address subscription failed
 */
export async function connect(config: BusConfig, options: ConnectOptions): Promise<Session> {
  const observer = options.observer ?? new ConsoleObserver(config.logLevel ?? 'error');
  const transport = options.transport ?? new MqttTransport();
  const resolveHost = options.resolveHost ?? resolveWithDns;
  const timeoutMs = options.timeoutMs ?? config.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;

  let address: string;
  try {
    address = await resolveHost(config.host);
  } catch (err) {
    throw new TransportError(`Could not resolve host "${config.host}": ${errorMessage(err)}`, transport.id, {
      host: config.host,
    });
  }

  const transportOptions: TransportOptions = {
    host: address,
    port: config.port,
    username: INTERNAL_USERNAME,
    password: await options.credentials.getPassword(),
  };
  const tls = buildTlsOptions(config, observer);
  if (tls) {
    transportOptions.tls = tls;
    if (isIP(config.host) === 0) {
      transportOptions.servername = config.host;
    }
  }

  observer.onConnection({ type: 'connecting', host: config.host, port: config.port, timestamp: new Date() });
  const client = transport.startLink(transportOptions);

  try {
    await waitForConnected(client, timeoutMs, config);
  } catch (err) {
    observer.onConnection({ type: 'timeout', host: config.host, port: config.port, timestamp: new Date() });
    await shutdown(client, observer);
    throw err;
  }

  const id = generateId();
  const session = new Session({
    id,
    replyAddress: replyAddressFor(id),
    client,
    codec: new EnvelopeCodec({ signingKey: config.signingKey }),
    observer,
    host: config.host,
    port: config.port,
    callTimeoutMs: config.callTimeoutMs,
    messageSizeThreshold: config.messageSizeThreshold,
  });

  try {
    await client.subscribe(session.replyAddress, BUS_QOS);
  } catch (err) {
    await shutdown(client, observer);
    if (err instanceof SwitchyardError) throw err;
    throw new TransportError(
      `Subscribe to reply address "${session.replyAddress}" failed: ${errorMessage(err)}`,
      transport.id,
      { topic: session.replyAddress },
    );
  }

  observer.onConnection({
    type: 'connected',
    host: config.host,
    port: config.port,
    sessionId: id,
    timestamp: new Date(),
  });
  observer.onSessionStart(session.meta);
  return session;
}
