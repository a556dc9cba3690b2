/**
 * connectWithDefaults(): connect using ~/.switchyard/config.json, the
 * password from SWITCHYARD_MQ_PASSWORD, the configured observers and MQTT.
 */

import type { BusConfig, ICredentialProvider, IObserver, ITransport } from '@switchyard/core';
import { EnvCredentialProvider, loadConfig, toBusConfig } from '@switchyard/config';
import { createObserver } from '@switchyard/observability';
import { MqttTransport } from '@switchyard/transport';

import { connect } from './connect.js';
import type { HostResolver } from './connect.js';
import type { Session } from './session.js';

export interface ConnectDefaultsOverrides {
  configPath?: string;
  /** Applied over the loaded bus settings. */
  bus?: Partial<BusConfig>;
  transport?: ITransport;
  credentials?: ICredentialProvider;
  observer?: IObserver;
  resolveHost?: HostResolver;
}

export async function connectWithDefaults(overrides: ConnectDefaultsOverrides = {}): Promise<Session> {
  const config = loadConfig({ configPath: overrides.configPath });
  const busConfig: BusConfig = { ...toBusConfig(config), ...overrides.bus };

  const observer = overrides.observer ?? createObserver(config.observability, busConfig.logLevel);

  return connect(busConfig, {
    credentials: overrides.credentials ?? new EnvCredentialProvider(),
    transport: overrides.transport ?? new MqttTransport(),
    observer,
    resolveHost: overrides.resolveHost,
  });
}
