/**
 * Configuration shapes shared by the config loader and the bus.
 */

import type { LogLevel, TlsMode } from './levels.js';

/** Connection settings handed to `connect()`. */
export interface BusConfig {
  /** Host name or literal address of the broker. */
  host: string;
  port: number;
  /** Default: "error". */
  logLevel?: LogLevel;
  /** Default: "disabled". */
  tlsMode?: TlsMode;
  /** Required when tlsMode is not "disabled". */
  tlsCaCertPath?: string;
  tlsCrlPath?: string;
  /** Default: 5000. */
  connectTimeoutMs?: number;
  /** Default timeout for `call` when none is passed. Default: 5000. */
  callTimeoutMs?: number;
  /** Encoded size above which a publish logs a warning. */
  messageSizeThreshold?: number;
  /** HMAC key; envelopes are signed and verified when set. */
  signingKey?: string;
}

export interface BusTlsSection {
  mode: TlsMode;
  caCertPath: string;
  crlPath: string;
}

export interface BusSection {
  host: string;
  port: number;
  logLevel: LogLevel;
  tls: BusTlsSection;
  connectTimeoutMs: number;
  callTimeoutMs: number;
  messageSizeThreshold?: number;
  signingKey: string;
}

export interface ObservabilitySection {
  observers: string[];
  logPath?: string;
  maxLogSize?: number;
}

/** Contents of ~/.switchyard/config.json after defaults are applied. */
export interface SwitchyardConfig {
  bus: BusSection;
  observability: ObservabilitySection;
}
