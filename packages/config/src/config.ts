/**
 * Configuration loading for switchyard.
 *
 * Reads ~/.switchyard/config.json, deep-merges it over the defaults,
 * resolves ${VAR} references from the environment and validates the result.
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { ConfigError } from '@switchyard/core';
import type { BusConfig, LogLevel, SwitchyardConfig, TlsMode } from '@switchyard/core';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class ConfigLoadError extends ConfigError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.name = 'ConfigLoadError';
  }
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export function getSwitchyardDir(): string {
  return resolve(homedir(), '.switchyard');
}

export function getConfigPath(): string {
  return join(getSwitchyardDir(), 'config.json');
}

export function getLogsDir(): string {
  return join(getSwitchyardDir(), 'logs');
}

export function configExists(): boolean {
  return existsSync(getConfigPath());
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export function getDefaultConfig(): SwitchyardConfig {
  return {
    bus: {
      host: '127.0.0.1',
      port: 1883,
      logLevel: 'error',
      tls: {
        mode: 'disabled',
        caCertPath: '',
        crlPath: '',
      },
      connectTimeoutMs: 5000,
      callTimeoutMs: 5000,
      signingKey: '${SWITCHYARD_SIGNING_KEY}',
    },
    observability: {
      observers: ['console'],
    },
  };
}

// ---------------------------------------------------------------------------
// Merge and environment resolution
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Nested objects merge; arrays and scalars from `override` replace. */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = result[key];
    result[key] = isRecord(existing) && isRecord(value) ? deepMerge(existing, value) : value;
  }
  return result;
}

const ENV_REF = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/** Replace ${VAR} in every string; unset variables become empty strings. */
export function resolveEnvVars(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_REF, (_match, name: string) => process.env[name] ?? '');
  }
  if (Array.isArray(value)) {
    return value.map(resolveEnvVars);
  }
  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = resolveEnvVars(inner);
    }
    return out;
  }
  return value;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const TLS_MODES: readonly TlsMode[] = ['disabled', 'verify-peer', 'verify-none'];

function invalid(field: string, requirement: string): ConfigLoadError {
  return new ConfigLoadError(`Invalid config: ${field} ${requirement}`, { field });
}

function readSection(obj: Record<string, unknown>, key: string, field: string): Record<string, unknown> {
  const value = obj[key];
  if (!isRecord(value)) throw invalid(field, 'must be an object');
  return value;
}

function readString(obj: Record<string, unknown>, key: string, field: string, nonEmpty = false): string {
  const value = obj[key];
  if (typeof value !== 'string') throw invalid(field, 'must be a string');
  if (nonEmpty && value.trim() === '') throw invalid(field, 'must not be empty');
  return value;
}

function readInteger(
  obj: Record<string, unknown>,
  key: string,
  field: string,
  min: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
    throw invalid(field, max === Number.MAX_SAFE_INTEGER ? `must be an integer >= ${min}` : `must be an integer between ${min} and ${max}`);
  }
  return value;
}

function readEnum<T extends string>(obj: Record<string, unknown>, key: string, field: string, allowed: readonly T[]): T {
  const value = obj[key];
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) throw invalid(field, `must be one of: ${allowed.join(', ')}`);
  return match;
}

function validate(raw: Record<string, unknown>): SwitchyardConfig {
  const bus = readSection(raw, 'bus', 'bus');
  const tls = readSection(bus, 'tls', 'bus.tls');
  const observability = readSection(raw, 'observability', 'observability');

  const observers = observability['observers'];
  if (!Array.isArray(observers) || !observers.every((name): name is string => typeof name === 'string')) {
    throw invalid('observability.observers', 'must be an array of strings');
  }

  const config: SwitchyardConfig = {
    bus: {
      host: readString(bus, 'host', 'bus.host', true),
      port: readInteger(bus, 'port', 'bus.port', 1, 65535),
      logLevel: readEnum(bus, 'logLevel', 'bus.logLevel', LOG_LEVELS),
      tls: {
        mode: readEnum(tls, 'mode', 'bus.tls.mode', TLS_MODES),
        caCertPath: readString(tls, 'caCertPath', 'bus.tls.caCertPath'),
        crlPath: readString(tls, 'crlPath', 'bus.tls.crlPath'),
      },
      connectTimeoutMs: readInteger(bus, 'connectTimeoutMs', 'bus.connectTimeoutMs', 1),
      callTimeoutMs: readInteger(bus, 'callTimeoutMs', 'bus.callTimeoutMs', 1),
      signingKey: readString(bus, 'signingKey', 'bus.signingKey'),
    },
    observability: {
      observers,
    },
  };

  if (bus['messageSizeThreshold'] !== undefined) {
    config.bus.messageSizeThreshold = readInteger(bus, 'messageSizeThreshold', 'bus.messageSizeThreshold', 1);
  }
  if (observability['logPath'] !== undefined) {
    config.observability.logPath = readString(observability, 'logPath', 'observability.logPath', true);
  }
  if (observability['maxLogSize'] !== undefined) {
    config.observability.maxLogSize = readInteger(observability, 'maxLogSize', 'observability.maxLogSize', 1);
  }

  return config;
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export interface LoadConfigOptions {
  /** Default: ~/.switchyard/config.json */
  configPath?: string;
}

/**
 * Load the configuration. A missing file yields the defaults.
 *
 * @throws {ConfigLoadError} on unreadable JSON or an invalid field
 */
export function loadConfig(options: LoadConfigOptions = {}): SwitchyardConfig {
  const configPath = options.configPath ?? getConfigPath();

  let user: Record<string, unknown> = {};
  if (existsSync(configPath)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(configPath, 'utf8'));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigLoadError(`Failed to parse ${configPath}: ${reason}`, { path: configPath });
    }
    if (!isRecord(parsed)) {
      throw new ConfigLoadError(`${configPath} must contain a JSON object`, { path: configPath });
    }
    user = parsed;
  }

  const resolved = resolveEnvVars(deepMerge({ ...getDefaultConfig() }, user));
  if (!isRecord(resolved)) {
    throw new ConfigLoadError('Configuration did not resolve to an object');
  }
  return validate(resolved);
}

/** Connection settings for `connect()`; empty paths and keys are left out. */
export function toBusConfig(config: SwitchyardConfig): BusConfig {
  const { bus } = config;
  const busConfig: BusConfig = {
    host: bus.host,
    port: bus.port,
    logLevel: bus.logLevel,
    tlsMode: bus.tls.mode,
    connectTimeoutMs: bus.connectTimeoutMs,
    callTimeoutMs: bus.callTimeoutMs,
  };
  if (bus.tls.caCertPath) busConfig.tlsCaCertPath = bus.tls.caCertPath;
  if (bus.tls.crlPath) busConfig.tlsCrlPath = bus.tls.crlPath;
  if (bus.messageSizeThreshold !== undefined) busConfig.messageSizeThreshold = bus.messageSizeThreshold;
  if (bus.signingKey) busConfig.signingKey = bus.signingKey;
  return busConfig;
}
