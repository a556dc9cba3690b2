import { vi } from 'vitest';
import { MultiObserver } from './multi-observer.js';
import type { IObserver, SessionMeta, SessionStats, StaleReplyEvent } from '@switchyard/core';

function makeMockObserver(): IObserver {
  return {
    onSessionStart: vi.fn(),
    onSessionEnd: vi.fn(),
    onConnection: vi.fn(),
    onCall: vi.fn(),
    onCast: vi.fn(),
    onMessage: vi.fn(),
    onStaleReply: vi.fn(),
    onOversizedMessage: vi.fn(),
    onSecurityEvent: vi.fn(),
    onError: vi.fn(),
    flush: vi.fn(async () => {}),
  };
}

function makeMeta(): SessionMeta {
  return {
    sessionId: 'sess-1',
    replyAddress: 'switchyard/call/reply/sess-1',
    host: 'localhost',
    port: 1883,
    transport: 'memory',
    startedAt: new Date(),
  };
}

function makeStats(): SessionStats {
  return {
    duration: 1000,
    calls: 1,
    casts: 0,
    timeouts: 0,
    published: 1,
    received: 1,
    staleReplies: 0,
    errors: 0,
  };
}

describe('MultiObserver', () => {
  let child1: IObserver;
  let child2: IObserver;
  let multi: MultiObserver;

  beforeEach(() => {
    child1 = makeMockObserver();
    child2 = makeMockObserver();
    multi = new MultiObserver([child1, child2]);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('forwards session lifecycle to all children', () => {
    const meta = makeMeta();
    const stats = makeStats();
    multi.onSessionStart(meta);
    multi.onSessionEnd(meta, stats);
    for (const child of [child1, child2]) {
      expect(child.onSessionStart).toHaveBeenCalledWith(meta);
      expect(child.onSessionEnd).toHaveBeenCalledWith(meta, stats);
    }
  });

  it('forwards stale reply events', () => {
    const event: StaleReplyEvent = { sessionId: 'sess-1', reason: 'flushed', count: 2 };
    multi.onStaleReply(event);
    expect(child1.onStaleReply).toHaveBeenCalledWith(event);
    expect(child2.onStaleReply).toHaveBeenCalledWith(event);
  });

  it('forwards errors with context', () => {
    const err = new Error('boom');
    multi.onError(err, { topic: 't' });
    expect(child2.onError).toHaveBeenCalledWith(err, { topic: 't' });
  });

  it('keeps going when a child throws', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const broken = makeMockObserver();
    vi.mocked(broken.onCall).mockImplementation(() => {
      throw new Error('broken child');
    });
    const healthy = makeMockObserver();
    const fanout = new MultiObserver([broken, healthy]);

    fanout.onCall({
      sessionId: 'sess-1',
      topic: 't',
      endpoint: 'e',
      outcome: 'completed',
      duration: 1,
    });

    expect(healthy.onCall).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith(
      '[MultiObserver] child observer threw:',
      expect.any(Error),
    );
  });

  it('flushes every child and tolerates flush failures', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failing: IObserver = {
      ...makeMockObserver(),
      flush: vi.fn(async () => {
        throw new Error('disk full');
      }),
    };
    multi = new MultiObserver([failing, child2]);

    await multi.flush();

    expect(child2.flush).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('copies the children array', () => {
    const children = [child1];
    const fanout = new MultiObserver(children);
    children.push(child2);
    fanout.onConnection({ type: 'connected', host: 'h', port: 1, timestamp: new Date() });
    expect(child2.onConnection).not.toHaveBeenCalled();
  });
});
