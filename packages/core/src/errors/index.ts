/**
 * Error hierarchy for switchyard.
 *
 * Every failure surfaced by the library is a SwitchyardError carrying a
 * stable `code` and an optional context record. Subclasses that concern a
 * specific transport, topic or endpoint merge that name into the context.
 */

export class SwitchyardError extends Error {
  readonly code: string;
  readonly context?: Readonly<Record<string, unknown>>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'SwitchyardError';
    this.code = code;
    this.context = context;
  }
}

/** The transport never confirmed a logical connection within the bound. */
export class ConnectTimeoutError extends SwitchyardError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONNECT_TIMEOUT', context);
    this.name = 'ConnectTimeoutError';
  }
}

export class TransportError extends SwitchyardError {
  readonly transport: string;

  constructor(message: string, transport: string, context?: Record<string, unknown>) {
    super(message, 'TRANSPORT_ERROR', { ...context, transport });
    this.name = 'TransportError';
    this.transport = transport;
  }
}

/** TLS was requested without a CA certificate. Reported, never thrown. */
export class TlsConfigError extends SwitchyardError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'TLS_CONFIG_ERROR', context);
    this.name = 'TlsConfigError';
  }
}

export class PublishError extends SwitchyardError {
  readonly topic: string;

  constructor(message: string, topic: string, context?: Record<string, unknown>) {
    super(message, 'PUBLISH_ERROR', { ...context, topic });
    this.name = 'PublishError';
    this.topic = topic;
  }
}

export class CallTimeoutError extends SwitchyardError {
  readonly endpoint: string;

  constructor(message: string, endpoint: string, context?: Record<string, unknown>) {
    super(message, 'CALL_TIMEOUT', { ...context, endpoint });
    this.name = 'CallTimeoutError';
    this.endpoint = endpoint;
  }
}

export class DecodeError extends SwitchyardError {
  readonly kind?: string;

  constructor(message: string, kind?: string, context?: Record<string, unknown>) {
    super(message, 'DECODE_ERROR', kind === undefined ? context : { ...context, kind });
    this.name = 'DecodeError';
    this.kind = kind;
  }
}

/** The remote side answered a call with an error reply. */
export class RemoteError extends SwitchyardError {
  readonly endpoint: string;

  constructor(message: string, endpoint: string, context?: Record<string, unknown>) {
    super(message, 'REMOTE_ERROR', { ...context, endpoint });
    this.name = 'RemoteError';
    this.endpoint = endpoint;
  }
}

export class SessionClosedError extends SwitchyardError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SESSION_CLOSED', context);
    this.name = 'SessionClosedError';
  }
}

export class ConfigError extends SwitchyardError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}
