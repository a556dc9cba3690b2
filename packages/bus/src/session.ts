/**
 * Session: one connection to the bus with its own private reply address.
 *
 * Sessions are produced by `connect()`. A session publishes envelopes,
 * runs the call protocol (flush stale replies, publish, wait for the reply
 * or time out), sends casts and replies, and hands messages arriving on
 * other subscribed topics to `onMessage` handlers.
 */

import {
  CallTimeoutError,
  DecodeError,
  PublishError,
  RemoteError,
  SessionClosedError,
  generateId,
} from '@switchyard/core';
import type {
  CallOutcome,
  IObserver,
  ITransportClient,
  JsonObject,
  PublishAck,
  QoS,
  SessionMeta,
  SessionStats,
  SubscribeAck,
  TransportEvent,
} from '@switchyard/core';
import { createCall, createCast, createErrorReply, createReply } from '@switchyard/envelope';
import type { CallEnvelope, Envelope, EnvelopeCodec, ReplyEnvelope } from '@switchyard/envelope';

import { CallQueue } from './call-queue.js';
import { ReplyMailbox } from './reply-mailbox.js';
import type { ReplyDecision } from './reply-mailbox.js';

/** At least once; the sender waits for the broker's acknowledgment. */
export const BUS_QOS: QoS = 1;

export const DEFAULT_CALL_TIMEOUT_MS = 5000;

export interface SessionInit {
  id: string;
  replyAddress: string;
  client: ITransportClient;
  codec: EnvelopeCodec;
  observer: IObserver;
  host: string;
  port: number;
  callTimeoutMs?: number;
  messageSizeThreshold?: number;
}

export interface PublishOptions {
  /** Encoded size above which a warning is logged. The publish still goes out. */
  threshold?: number;
}

/** Result handed to `Session.reply`. */
export type ReplyResult = { payload: JsonObject } | { error: string; code?: string };

/** Handler for envelopes arriving on subscribed topics other than the reply address. */
export type MessageHandler = (envelope: Envelope, topic: string) => void | Promise<void>;

type Counters = Omit<SessionStats, 'duration'>;

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function isSignatureFailure(error: DecodeError): boolean {
  return error.context?.['reason'] === 'signature';
}

function outcomeOf(error: Error): CallOutcome {
  if (error instanceof CallTimeoutError) return 'timed_out';
  if (error instanceof PublishError) return 'publish_failed';
  if (error instanceof DecodeError) return 'decode_failed';
  if (error instanceof RemoteError) return 'remote_error';
  if (error instanceof SessionClosedError) return 'closed';
  return 'publish_failed';
}

export class Session {
  readonly id: string;
  readonly replyAddress: string;

  private readonly client: ITransportClient;
  private readonly codec: EnvelopeCodec;
  private readonly observer: IObserver;
  private readonly host: string;
  private readonly port: number;
  private readonly callTimeoutMs: number;
  private readonly messageSizeThreshold: number | undefined;

  private readonly mailbox = new ReplyMailbox();
  private readonly calls = new CallQueue();
  private readonly handlers = new Set<MessageHandler>();
  private readonly detachTransport: () => void;
  private readonly startedAt = new Date();
  private readonly counters: Counters = {
    calls: 0,
    casts: 0,
    timeouts: 0,
    published: 0,
    received: 0,
    staleReplies: 0,
    errors: 0,
  };

  private online = true;
  private closed = false;

  constructor(init: SessionInit) {
    this.id = init.id;
    this.replyAddress = init.replyAddress;
    this.client = init.client;
    this.codec = init.codec;
    this.observer = init.observer;
    this.host = init.host;
    this.port = init.port;
    this.callTimeoutMs = init.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.messageSizeThreshold = init.messageSizeThreshold;
    this.detachTransport = this.client.onEvent((event) => this.handleTransportEvent(event));
  }

  // -----------------------------------------------------------------------
  // State
  // -----------------------------------------------------------------------

  /** False after disconnect, or while the transport is offline. */
  get isConnected(): boolean {
    return !this.closed && this.online;
  }

  get meta(): SessionMeta {
    return {
      sessionId: this.id,
      replyAddress: this.replyAddress,
      host: this.host,
      port: this.port,
      transport: this.client.transport,
      startedAt: this.startedAt,
    };
  }

  get stats(): SessionStats {
    return { duration: Date.now() - this.startedAt.getTime(), ...this.counters };
  }

  // -----------------------------------------------------------------------
  // Subscriptions
  // -----------------------------------------------------------------------

  async subscribe(topic: string): Promise<SubscribeAck> {
    this.ensureOpen();
    return this.client.subscribe(topic, BUS_QOS);
  }

  async unsubscribe(topic: string): Promise<void> {
    this.ensureOpen();
    await this.client.unsubscribe(topic);
  }

  /** Register a handler for inbound envelopes. Returns a function that removes it. */
  onMessage(handler: MessageHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  // -----------------------------------------------------------------------
  // Publishing
  // -----------------------------------------------------------------------

  /**
   * Encode and publish an envelope, resolving once the broker acknowledges.
   *
   * @throws {PublishError} when the transport rejects the publish
   */
  async publish(envelope: Envelope, topic: string, options: PublishOptions = {}): Promise<PublishAck> {
    this.ensureOpen();
    const bytes = this.codec.encode(envelope);

    const threshold = options.threshold ?? this.messageSizeThreshold;
    if (threshold !== undefined && bytes.length > threshold) {
      this.observer.onOversizedMessage({ sessionId: this.id, topic, size: bytes.length, threshold });
    }

    let ack: PublishAck;
    try {
      ack = await this.client.publish(topic, bytes, BUS_QOS);
    } catch (err) {
      this.counters.errors++;
      if (err instanceof PublishError) throw err;
      const reason = toError(err).message;
      throw new PublishError(`Publish to "${topic}" failed: ${reason}`, topic, { reason });
    }

    this.counters.published++;
    this.observer.onMessage({
      sessionId: this.id,
      direction: 'outbound',
      topic,
      size: bytes.length,
      timestamp: new Date(),
    });
    return ack;
  }

  /**
   * Invoke `endpoint` on the service listening at `topic` and wait for its reply.
   *
   * Calls on one session run one after another in the order they were made.
   * The request is built from a copy of `payload` taken at once, so later
   * changes to the object do not reach the wire.
   *
   * @throws {PublishError} the request could not be published; no wait happens
   * @throws {CallTimeoutError} no reply within `timeoutMs`
   * @throws {DecodeError} the reply could not be decoded
   * @throws {RemoteError} the service answered with an error
   * @throws {SessionClosedError} the session was disconnected
   */
  async call(
    topic: string,
    endpoint: string,
    payload: JsonObject,
    timeoutMs: number = this.callTimeoutMs,
  ): Promise<JsonObject> {
    this.ensureOpen();
    const correlationId = generateId();
    const request = createCall({
      sender: this.replyAddress,
      endpoint,
      payload: structuredClone(payload),
      correlationId,
    });
    return this.calls.run(() => this.performCall(topic, request, correlationId, timeoutMs));
  }

  /** One-way request: publish and return without waiting for any reply. */
  async cast(topic: string, endpoint: string, payload: JsonObject): Promise<PublishAck> {
    this.ensureOpen();
    const started = Date.now();
    this.counters.casts++;
    try {
      const ack = await this.publish(createCast({ endpoint, payload }), topic);
      this.observer.onCast({ sessionId: this.id, topic, endpoint, duration: Date.now() - started });
      return ack;
    } catch (err) {
      this.observer.onCast({
        sessionId: this.id,
        topic,
        endpoint,
        duration: Date.now() - started,
        error: toError(err),
      });
      throw err;
    }
  }

  /** Answer a call received through `onMessage`. */
  async reply(request: CallEnvelope, result: ReplyResult): Promise<PublishAck> {
    const envelope: ReplyEnvelope =
      'error' in result
        ? createErrorReply(result.error, { code: result.code, correlationId: request.correlationId })
        : createReply(result.payload, request.correlationId);
    return this.publish(envelope, request.sender);
  }

  // -----------------------------------------------------------------------
  // Teardown
  // -----------------------------------------------------------------------

  /**
   * Close the transport connection. A call waiting for its reply rejects with
   * SessionClosedError, as does every later operation. Calling it again is a
   * no-op.
   */
  async disconnect(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.mailbox.close(new SessionClosedError(`Session ${this.id} was disconnected`, { sessionId: this.id }));
    try {
      await this.client.disconnect();
    } finally {
      this.detachTransport();
      this.handlers.clear();
      this.observer.onSessionEnd(this.meta, this.stats);
    }
  }

  // -----------------------------------------------------------------------
  // Call protocol
  // -----------------------------------------------------------------------

  private async performCall(
    topic: string,
    request: CallEnvelope,
    correlationId: string,
    timeoutMs: number,
  ): Promise<JsonObject> {
    this.ensureOpen();
    const { endpoint } = request;
    const started = Date.now();
    this.counters.calls++;

    const flushed = this.mailbox.flush();
    if (flushed > 0) {
      this.counters.staleReplies += flushed;
      this.observer.onStaleReply({ sessionId: this.id, reason: 'flushed', count: flushed });
    }

    try {
      await this.publish(request, topic);
      const result = await this.mailbox.wait(
        timeoutMs,
        (bytes) => this.decideReply(bytes, endpoint, correlationId),
        () => new CallTimeoutError(`No reply from "${endpoint}" within ${timeoutMs}ms`, endpoint, { topic, timeoutMs }),
      );
      this.reportCall(topic, endpoint, 'completed', started);
      return result;
    } catch (err) {
      const error = toError(err);
      const outcome = outcomeOf(error);
      if (outcome === 'timed_out') {
        this.counters.timeouts++;
      } else if (outcome === 'decode_failed' || outcome === 'remote_error') {
        this.counters.errors++;
      }
      this.reportCall(topic, endpoint, outcome, started, error);
      throw error;
    }
  }

  private decideReply(bytes: Buffer, endpoint: string, correlationId: string): ReplyDecision<JsonObject> {
    let reply: ReplyEnvelope;
    try {
      reply = this.codec.decodeAs('reply', bytes);
    } catch (err) {
      const error = err instanceof DecodeError ? err : new DecodeError(toError(err).message, 'reply');
      this.reportDecodeFailure(error, this.replyAddress);
      return { type: 'reject', error };
    }

    if (reply.correlationId !== undefined && reply.correlationId !== correlationId) {
      this.counters.staleReplies++;
      this.observer.onStaleReply({ sessionId: this.id, reason: 'correlation_mismatch', count: 1 });
      return { type: 'discard' };
    }

    if (reply.status === 'error') {
      const context = reply.error.code === undefined ? undefined : { remoteCode: reply.error.code };
      return { type: 'reject', error: new RemoteError(reply.error.message, endpoint, context) };
    }
    return { type: 'resolve', value: reply.payload };
  }

  private reportCall(topic: string, endpoint: string, outcome: CallOutcome, started: number, error?: Error): void {
    this.observer.onCall({
      sessionId: this.id,
      topic,
      endpoint,
      outcome,
      duration: Date.now() - started,
      ...(error ? { error } : {}),
    });
  }

  // -----------------------------------------------------------------------
  // Inbound traffic
  // -----------------------------------------------------------------------

  private handleTransportEvent(event: TransportEvent): void {
    switch (event.type) {
      case 'message':
        this.counters.received++;
        this.observer.onMessage({
          sessionId: this.id,
          direction: 'inbound',
          topic: event.topic,
          size: event.payload.length,
          timestamp: new Date(),
        });
        if (event.topic === this.replyAddress) {
          this.mailbox.deliver(event.payload);
        } else {
          this.dispatch(event.topic, event.payload);
        }
        break;
      case 'connected':
        this.online = true;
        this.reportConnection('connected');
        break;
      case 'reconnecting':
        this.reportConnection('reconnecting');
        break;
      case 'offline':
        this.online = false;
        this.reportConnection('offline');
        break;
      case 'closed':
        this.online = false;
        this.reportConnection('closed');
        break;
      case 'error':
        this.counters.errors++;
        this.observer.onError(event.error, { sessionId: this.id });
        break;
    }
  }

  private dispatch(topic: string, payload: Buffer): void {
    if (this.handlers.size === 0) return;

    let envelope: Envelope;
    try {
      envelope = this.codec.decode(payload);
    } catch (err) {
      const error = err instanceof DecodeError ? err : new DecodeError(toError(err).message);
      this.counters.errors++;
      this.reportDecodeFailure(error, topic);
      this.observer.onError(error, { sessionId: this.id, topic });
      return;
    }

    for (const handler of this.handlers) {
      try {
        const pending = handler(envelope, topic);
        if (pending) {
          void pending.catch((err: unknown) => this.reportHandlerError(err, topic));
        }
      } catch (err) {
        this.reportHandlerError(err, topic);
      }
    }
  }

  private reportHandlerError(err: unknown, topic: string): void {
    this.counters.errors++;
    this.observer.onError(toError(err), { sessionId: this.id, topic, phase: 'handler' });
  }

  private reportDecodeFailure(error: DecodeError, topic: string): void {
    if (isSignatureFailure(error)) {
      this.observer.onSecurityEvent({
        type: 'signature_rejected',
        details: { sessionId: this.id, topic, reason: error.message },
        timestamp: new Date(),
      });
    }
  }

  private reportConnection(type: 'connected' | 'reconnecting' | 'offline' | 'closed'): void {
    this.observer.onConnection({
      type,
      host: this.host,
      port: this.port,
      sessionId: this.id,
      timestamp: new Date(),
    });
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new SessionClosedError(`Session ${this.id} is disconnected`, { sessionId: this.id });
    }
  }
}
