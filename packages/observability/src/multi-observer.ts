/**
 * MultiObserver: fan-out observer that delegates to multiple child observers.
 *
 * Every IObserver method is forwarded to each child. Errors thrown by
 * individual children are caught and logged to stderr so that a single
 * broken observer never takes down a session.
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

export class MultiObserver implements IObserver {
  private readonly children: IObserver[];

  constructor(children: IObserver[]) {
    this.children = [...children];
  }

  // ---- helpers ------------------------------------------------------------

  private safely(fn: (child: IObserver) => void): void {
    for (const child of this.children) {
      try {
        fn(child);
      } catch (err) {
        console.error('[MultiObserver] child observer threw:', err);
      }
    }
  }

  // ---- IObserver ----------------------------------------------------------

  onSessionStart(meta: SessionMeta): void {
    this.safely((c) => c.onSessionStart(meta));
  }

  onSessionEnd(meta: SessionMeta, stats: SessionStats): void {
    this.safely((c) => c.onSessionEnd(meta, stats));
  }

  onConnection(event: ConnectionEvent): void {
    this.safely((c) => c.onConnection(event));
  }

  onCall(event: CallEvent): void {
    this.safely((c) => c.onCall(event));
  }

  onCast(event: CastEvent): void {
    this.safely((c) => c.onCast(event));
  }

  onMessage(event: BusMessageEvent): void {
    this.safely((c) => c.onMessage(event));
  }

  onStaleReply(event: StaleReplyEvent): void {
    this.safely((c) => c.onStaleReply(event));
  }

  onOversizedMessage(event: OversizedMessageEvent): void {
    this.safely((c) => c.onOversizedMessage(event));
  }

  onSecurityEvent(event: SecurityEvent): void {
    this.safely((c) => c.onSecurityEvent(event));
  }

  onError(error: Error, context: Record<string, unknown>): void {
    this.safely((c) => c.onError(error, context));
  }

  async flush(): Promise<void> {
    const results = this.children.map(async (child) => {
      try {
        await child.flush?.();
      } catch (err) {
        console.error('[MultiObserver] flush error in child observer:', err);
      }
    });
    await Promise.all(results);
  }
}
