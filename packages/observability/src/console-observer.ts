/**
 * ConsoleObserver: structured console logging with ANSI color coding.
 *
 * Formats bus events as human-readable console output, respecting the
 * configured log level. Calls include duration and outcome, traffic lines
 * include byte size, and security events include severity.
 */

import type {
  IObserver,
  LogLevel,
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

// ---------------------------------------------------------------------------
// ANSI escape codes
// ---------------------------------------------------------------------------

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';

const FG = {
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
} as const;

// ---------------------------------------------------------------------------
// Log-level gate
// ---------------------------------------------------------------------------

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const CONNECTION_LEVEL: Record<ConnectionEvent['type'], LogLevel> = {
  connecting: 'debug',
  connected: 'info',
  timeout: 'info',
  reconnecting: 'warn',
  offline: 'warn',
  closed: 'info',
};

const CALL_LEVEL: Record<CallEvent['outcome'], LogLevel> = {
  completed: 'debug',
  timed_out: 'warn',
  publish_failed: 'error',
  decode_failed: 'error',
  remote_error: 'warn',
  closed: 'warn',
};

// ---------------------------------------------------------------------------
// Security event severity mapping
// ---------------------------------------------------------------------------

const SECURITY_SEVERITY: Record<SecurityEvent['type'], 'low' | 'medium' | 'high' | 'critical'> = {
  tls_unverified: 'medium',
  signature_rejected: 'high',
};

const SEVERITY_COLOR: Record<string, string> = {
  low: FG.gray,
  medium: FG.yellow,
  high: FG.red,
  critical: `${BOLD}${FG.red}`,
};

// ---------------------------------------------------------------------------
// ConsoleObserver
// ---------------------------------------------------------------------------

export class ConsoleObserver implements IObserver {
  private readonly minLevel: number;

  constructor(logLevel: LogLevel = 'info') {
    this.minLevel = LEVEL_RANK[logLevel];
  }

  // ---- helpers ------------------------------------------------------------

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= this.minLevel;
  }

  private timestamp(): string {
    return new Date().toISOString();
  }

  private tag(label: string, color: string): string {
    return `${color}${BOLD}[${label}]${RESET}`;
  }

  private formatDuration(ms: number): string {
    if (ms < 1000) return `${ms.toFixed(0)}ms`;
    return `${(ms / 1000).toFixed(2)}s`;
  }

  private write(level: LogLevel, line: string): void {
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
  }

  // ---- IObserver ----------------------------------------------------------

  onSessionStart(meta: SessionMeta): void {
    if (!this.shouldLog('info')) return;
    console.log(
      `${DIM}${this.timestamp()}${RESET} ${this.tag('SESSION', FG.cyan)} ${FG.green}started${RESET}` +
        ` ${DIM}sid=${RESET}${meta.sessionId}` +
        ` ${DIM}bus=${RESET}${meta.host}:${meta.port}` +
        ` ${DIM}transport=${RESET}${meta.transport}` +
        ` ${DIM}reply=${RESET}${meta.replyAddress}`,
    );
  }

  onSessionEnd(meta: SessionMeta, stats: SessionStats): void {
    if (!this.shouldLog('info')) return;
    console.log(
      `${DIM}${this.timestamp()}${RESET} ${this.tag('SESSION', FG.cyan)} ${FG.yellow}ended${RESET}` +
        ` ${DIM}sid=${RESET}${meta.sessionId}` +
        ` ${DIM}duration=${RESET}${this.formatDuration(stats.duration)}` +
        ` ${DIM}calls=${RESET}${stats.calls}` +
        ` ${DIM}casts=${RESET}${stats.casts}` +
        ` ${DIM}timeouts=${RESET}${stats.timeouts}` +
        ` ${DIM}published=${RESET}${stats.published}` +
        ` ${DIM}received=${RESET}${stats.received}` +
        ` ${DIM}stale=${RESET}${stats.staleReplies}` +
        ` ${DIM}errors=${RESET}${stats.errors}`,
    );
  }

  onConnection(event: ConnectionEvent): void {
    const level = CONNECTION_LEVEL[event.type];
    if (!this.shouldLog(level)) return;
    const label = event.type === 'timeout' ? 'Connection not established' : event.type;
    const color = event.type === 'connected' ? FG.green : level === 'warn' ? FG.yellow : FG.white;
    this.write(
      level,
      `${DIM}${this.timestamp()}${RESET} ${this.tag('CONN', FG.blue)} ${color}${label}${RESET}` +
        ` ${DIM}bus=${RESET}${event.host}:${event.port}` +
        (event.sessionId ? ` ${DIM}sid=${RESET}${event.sessionId}` : ''),
    );
  }

  onCall(event: CallEvent): void {
    const level = CALL_LEVEL[event.outcome];
    if (!this.shouldLog(level)) return;
    const ok = event.outcome === 'completed';
    this.write(
      level,
      `${DIM}${this.timestamp()}${RESET} ${this.tag('CALL', FG.magenta)} ${ok ? FG.green : FG.red}${event.outcome}${RESET}` +
        ` ${BOLD}${event.endpoint}${RESET}` +
        ` ${DIM}topic=${RESET}${event.topic}` +
        ` ${DIM}duration=${RESET}${this.formatDuration(event.duration)}` +
        (event.error ? ` ${DIM}error=${RESET}${event.error.message}` : ''),
    );
  }

  onCast(event: CastEvent): void {
    const level: LogLevel = event.error ? 'error' : 'debug';
    if (!this.shouldLog(level)) return;
    this.write(
      level,
      `${DIM}${this.timestamp()}${RESET} ${this.tag('CAST', FG.magenta)} ${event.error ? `${FG.red}FAIL` : `${FG.green}OK`}${RESET}` +
        ` ${BOLD}${event.endpoint}${RESET}` +
        ` ${DIM}topic=${RESET}${event.topic}` +
        (event.error ? ` ${DIM}error=${RESET}${event.error.message}` : ''),
    );
  }

  onMessage(event: BusMessageEvent): void {
    if (!this.shouldLog('debug')) return;
    const arrow = event.direction === 'inbound' ? `${FG.green}>>>${RESET}` : `${FG.yellow}<<<${RESET}`;
    console.log(
      `${DIM}${this.timestamp()}${RESET} ${this.tag('MSG', FG.white)} ${arrow}` +
        ` ${DIM}topic=${RESET}${event.topic}` +
        ` ${DIM}len=${RESET}${event.size}`,
    );
  }

  onStaleReply(event: StaleReplyEvent): void {
    if (!this.shouldLog('debug')) return;
    console.log(
      `${DIM}${this.timestamp()}${RESET} ${this.tag('STALE', FG.gray)} discarded ${event.count}` +
        ` ${DIM}reason=${RESET}${event.reason}` +
        ` ${DIM}sid=${RESET}${event.sessionId}`,
    );
  }

  /** Not gated by the log level. */
  onOversizedMessage(event: OversizedMessageEvent): void {
    console.warn(
      `${DIM}${this.timestamp()}${RESET} ${this.tag('SIZE', FG.yellow)} Message potentially too long (${event.size} bytes)` +
        ` ${DIM}topic=${RESET}${event.topic}` +
        ` ${DIM}threshold=${RESET}${event.threshold}`,
    );
  }

  onSecurityEvent(event: SecurityEvent): void {
    if (!this.shouldLog('warn')) return;
    const severity = SECURITY_SEVERITY[event.type] ?? 'medium';
    const color = SEVERITY_COLOR[severity] ?? FG.yellow;
    console.warn(
      `${DIM}${this.timestamp()}${RESET} ${this.tag('SECURITY', FG.red)} ${color}[${severity.toUpperCase()}]${RESET}` +
        ` ${BOLD}${event.type}${RESET}` +
        ` ${DIM}details=${RESET}${JSON.stringify(event.details)}`,
    );
  }

  onError(error: Error, context: Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    const ctx = Object.keys(context).length > 0 ? ` ${DIM}ctx=${RESET}${JSON.stringify(context)}` : '';
    console.error(
      `${DIM}${this.timestamp()}${RESET} ${this.tag('ERROR', FG.red)} ${BOLD}${error.name}${RESET}: ${error.message}${ctx}`,
    );
  }

  async flush(): Promise<void> {
    // Console output is unbuffered; nothing to flush.
  }
}
