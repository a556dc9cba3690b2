/**
 * NoopObserver: silent observer that discards all events.
 *
 * Used when the config lists no observers.
 */

import type {
  IObserver,
  SessionMeta,
  SessionStats,
  ConnectionEvent,
  CallEvent,
  CastEvent,
  BusMessageEvent,
  StaleReplyEvent,
  OversizedMessageEvent,
  SecurityEvent,
} from '@switchyard/core';

export class NoopObserver implements IObserver {
  onSessionStart(_meta: SessionMeta): void {
    // intentionally empty
  }

  onSessionEnd(_meta: SessionMeta, _stats: SessionStats): void {
    // intentionally empty
  }

  onConnection(_event: ConnectionEvent): void {
    // intentionally empty
  }

  onCall(_event: CallEvent): void {
    // intentionally empty
  }

  onCast(_event: CastEvent): void {
    // intentionally empty
  }

  onMessage(_event: BusMessageEvent): void {
    // intentionally empty
  }

  onStaleReply(_event: StaleReplyEvent): void {
    // intentionally empty
  }

  onOversizedMessage(_event: OversizedMessageEvent): void {
    // intentionally empty
  }

  onSecurityEvent(_event: SecurityEvent): void {
    // intentionally empty
  }

  onError(_error: Error, _context: Record<string, unknown>): void {
    // intentionally empty
  }

  async flush(): Promise<void> {
    // intentionally empty
  }
}
