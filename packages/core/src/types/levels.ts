export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type TlsMode = 'disabled' | 'verify-peer' | 'verify-none';
