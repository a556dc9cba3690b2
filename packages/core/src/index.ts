/**
 * @switchyard/core: shared contracts for the switchyard packages.
 *
 * Interfaces for transports, observers and credential providers, the error
 * hierarchy, JSON payload types and id generation. No runtime dependencies.
 */

export * from './errors/index.js';
export * from './types/json.js';
export * from './utils/id.js';

export type {
  QoS,
  TransportTlsOptions,
  TransportOptions,
  SubscribeAck,
  PublishAck,
  TransportEvent,
  TransportEventHandler,
  ITransportClient,
  ITransport,
} from './interfaces/transport.js';

export type {
  SessionMeta,
  SessionStats,
  ConnectionEvent,
  CallOutcome,
  CallEvent,
  CastEvent,
  BusMessageEvent,
  StaleReplyEvent,
  OversizedMessageEvent,
  SecurityEvent,
  IObserver,
} from './interfaces/observer.js';

export type { ICredentialProvider } from './interfaces/credentials.js';

export type { LogLevel, TlsMode } from './types/levels.js';

export type {
  BusConfig,
  BusTlsSection,
  BusSection,
  ObservabilitySection,
  SwitchyardConfig,
} from './types/config.js';
