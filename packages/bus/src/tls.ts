/**
 * TLS settings for the transport, derived from the connect configuration.
 */

import { TlsConfigError } from '@switchyard/core';
import type { BusConfig, IObserver, TransportTlsOptions } from '@switchyard/core';

/**
 * Build transport TLS options, or undefined for a plain connection.
 *
 * TLS requested without a CA certificate path is reported to the observer
 * as a TlsConfigError and the connection goes ahead without TLS. Without a
 * CRL path the connection uses TLS but revocation is not checked, which is
 * reported the same way.
 */
export function buildTlsOptions(config: BusConfig, observer: IObserver): TransportTlsOptions | undefined {
  const mode = config.tlsMode ?? 'disabled';
  if (mode === 'disabled') {
    return undefined;
  }

  if (!config.tlsCaCertPath) {
    observer.onError(
      new TlsConfigError(`TLS mode "${mode}" requires a CA certificate path; connecting without TLS`, {
        tlsMode: mode,
        host: config.host,
        port: config.port,
      }),
      { phase: 'connect' },
    );
    return undefined;
  }

  if (mode === 'verify-none') {
    observer.onSecurityEvent({
      type: 'tls_unverified',
      details: { host: config.host, port: config.port },
      timestamp: new Date(),
    });
  }

  const verify = mode === 'verify-peer' ? 'peer' : 'none';
  if (!config.tlsCrlPath) {
    observer.onError(
      new TlsConfigError(`TLS mode "${mode}" checks revocation only with a CRL path; connecting without CRL checks`, {
        tlsMode: mode,
        host: config.host,
        port: config.port,
      }),
      { phase: 'connect' },
    );
    return { verify, caCertPath: config.tlsCaCertPath, crlCheck: false };
  }

  return { verify, caCertPath: config.tlsCaCertPath, crlCheck: true, crlPath: config.tlsCrlPath };
}
