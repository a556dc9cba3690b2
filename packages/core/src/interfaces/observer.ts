/**
 * IObserver: observability contract
 *
 * Structured events for every bus operation: session lifecycle, connection
 * state, calls, casts, raw traffic, stale replies, size warnings, security
 * downgrades and errors.
 */

export interface SessionMeta {
  sessionId: string;
  replyAddress: string;
  host: string;
  port: number;
  transport: string;
  startedAt: Date;
}

export interface SessionStats {
  duration: number;
  calls: number;
  casts: number;
  timeouts: number;
  published: number;
  received: number;
  staleReplies: number;
  errors: number;
}

export interface ConnectionEvent {
  type: 'connecting' | 'connected' | 'timeout' | 'reconnecting' | 'offline' | 'closed';
  host: string;
  port: number;
  sessionId?: string;
  timestamp: Date;
}

export type CallOutcome =
  | 'completed'
  | 'timed_out'
  | 'publish_failed'
  | 'decode_failed'
  | 'remote_error'
  | 'closed';

export interface CallEvent {
  sessionId: string;
  topic: string;
  endpoint: string;
  outcome: CallOutcome;
  duration: number;
  error?: Error;
}

export interface CastEvent {
  sessionId: string;
  topic: string;
  endpoint: string;
  duration: number;
  error?: Error;
}

export interface BusMessageEvent {
  sessionId: string;
  direction: 'inbound' | 'outbound';
  topic: string;
  size: number;
  timestamp: Date;
}

export interface StaleReplyEvent {
  sessionId: string;
  reason: 'flushed' | 'correlation_mismatch';
  count: number;
}

export interface OversizedMessageEvent {
  sessionId: string;
  topic: string;
  size: number;
  threshold: number;
}

export interface SecurityEvent {
  type: 'tls_unverified' | 'signature_rejected';
  details: Record<string, unknown>;
  timestamp: Date;
}

export interface IObserver {
  onSessionStart(meta: SessionMeta): void;
  onSessionEnd(meta: SessionMeta, stats: SessionStats): void;
  onConnection(event: ConnectionEvent): void;
  onCall(event: CallEvent): void;
  onCast(event: CastEvent): void;
  onMessage(event: BusMessageEvent): void;
  onStaleReply(event: StaleReplyEvent): void;
  onOversizedMessage(event: OversizedMessageEvent): void;
  onSecurityEvent(event: SecurityEvent): void;
  onError(error: Error, context: Record<string, unknown>): void;
  flush?(): Promise<void>;
}
