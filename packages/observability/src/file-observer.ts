/**
 * FileObserver: appends every event as one JSON line.
 *
 * When the file would grow past `maxBytes` it is renamed to `<file>.1`
 * (replacing any previous rotation) and a fresh file is started.
 */

import { appendFileSync, existsSync, mkdirSync, renameSync, statSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
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

export interface FileObserverOptions {
  /** Default: ~/.switchyard/logs/bus.jsonl */
  filePath?: string;
  /** Default: 10 MiB. */
  maxBytes?: number;
}

const DEFAULT_MAX_BYTES = 10 * 1024 * 1024;

function serializeError(error: Error | undefined): Record<string, unknown> | undefined {
  if (!error) return undefined;
  const code = 'code' in error ? error.code : undefined;
  return { name: error.name, message: error.message, ...(code !== undefined ? { code } : {}) };
}

export class FileObserver implements IObserver {
  readonly filePath: string;
  private readonly maxBytes: number;

  constructor(options: FileObserverOptions = {}) {
    this.filePath = options.filePath ?? join(homedir(), '.switchyard', 'logs', 'bus.jsonl');
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
    mkdirSync(dirname(this.filePath), { recursive: true });
  }

  private append(event: string, fields: Record<string, unknown>): void {
    const line = `${JSON.stringify({ ts: new Date().toISOString(), event, ...fields })}\n`;
    if (existsSync(this.filePath) && statSync(this.filePath).size + Buffer.byteLength(line) > this.maxBytes) {
      renameSync(this.filePath, `${this.filePath}.1`);
    }
    appendFileSync(this.filePath, line);
  }

  onSessionStart(meta: SessionMeta): void {
    this.append('session_start', { ...meta });
  }

  onSessionEnd(meta: SessionMeta, stats: SessionStats): void {
    this.append('session_end', { sessionId: meta.sessionId, ...stats });
  }

  onConnection(event: ConnectionEvent): void {
    this.append('connection', { ...event });
  }

  onCall(event: CallEvent): void {
    this.append('call', { ...event, error: serializeError(event.error) });
  }

  onCast(event: CastEvent): void {
    this.append('cast', { ...event, error: serializeError(event.error) });
  }

  onMessage(event: BusMessageEvent): void {
    this.append('message', { ...event });
  }

  onStaleReply(event: StaleReplyEvent): void {
    this.append('stale_reply', { ...event });
  }

  onOversizedMessage(event: OversizedMessageEvent): void {
    this.append('oversized_message', { ...event });
  }

  onSecurityEvent(event: SecurityEvent): void {
    this.append('security', { ...event });
  }

  onError(error: Error, context: Record<string, unknown>): void {
    this.append('error', { error: serializeError(error), context });
  }

  async flush(): Promise<void> {
    // Writes are synchronous; nothing is buffered.
  }
}
