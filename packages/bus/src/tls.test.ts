import { vi } from 'vitest';
import { TlsConfigError } from '@switchyard/core';
import type { IObserver } from '@switchyard/core';
import { buildTlsOptions } from './tls.js';

function makeObserver(): IObserver {
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
  };
}

describe('buildTlsOptions', () => {
  it('returns undefined when TLS is disabled or unset', () => {
    const observer = makeObserver();
    expect(buildTlsOptions({ host: 'h', port: 1883 }, observer)).toBeUndefined();
    expect(buildTlsOptions({ host: 'h', port: 1883, tlsMode: 'disabled', tlsCaCertPath: '/ca.pem' }, observer)).toBeUndefined();
    expect(observer.onError).not.toHaveBeenCalled();
  });

  it('reports a missing CA path and falls back to a plain connection', () => {
    const observer = makeObserver();

    const tls = buildTlsOptions({ host: 'h', port: 8883, tlsMode: 'verify-peer' }, observer);

    expect(tls).toBeUndefined();
    const [error, context] = vi.mocked(observer.onError).mock.calls[0] ?? [];
    expect(error).toBeInstanceOf(TlsConfigError);
    expect(error?.message).toBe('TLS mode "verify-peer" requires a CA certificate path; connecting without TLS');
    expect(context).toEqual({ phase: 'connect' });
  });

  it('verifies the peer with CRL checking in verify-peer mode', () => {
    const observer = makeObserver();

    const tls = buildTlsOptions(
      { host: 'h', port: 8883, tlsMode: 'verify-peer', tlsCaCertPath: '/etc/ca.pem', tlsCrlPath: '/etc/crl.pem' },
      observer,
    );

    expect(tls).toEqual({ verify: 'peer', caCertPath: '/etc/ca.pem', crlCheck: true, crlPath: '/etc/crl.pem' });
    expect(observer.onSecurityEvent).not.toHaveBeenCalled();
  });

  it('reports a missing CRL path and connects without revocation checks', () => {
    const observer = makeObserver();

    const tls = buildTlsOptions({ host: 'h', port: 8883, tlsMode: 'verify-peer', tlsCaCertPath: '/etc/ca.pem' }, observer);

    expect(tls).toEqual({ verify: 'peer', caCertPath: '/etc/ca.pem', crlCheck: false });
    const [error, context] = vi.mocked(observer.onError).mock.calls[0] ?? [];
    expect(error).toBeInstanceOf(TlsConfigError);
    expect(error?.message).toBe(
      'TLS mode "verify-peer" checks revocation only with a CRL path; connecting without CRL checks',
    );
    expect(context).toEqual({ phase: 'connect' });
  });

  it('skips verification in verify-none mode and raises a security event', () => {
    const observer = makeObserver();

    const tls = buildTlsOptions(
      { host: 'h', port: 8883, tlsMode: 'verify-none', tlsCaCertPath: '/etc/ca.pem', tlsCrlPath: '/etc/crl.pem' },
      observer,
    );

    expect(tls).toEqual({ verify: 'none', caCertPath: '/etc/ca.pem', crlCheck: true, crlPath: '/etc/crl.pem' });
    expect(observer.onSecurityEvent).toHaveBeenCalledWith(
      expect.objectContaining({ type: 'tls_unverified', details: { host: 'h', port: 8883 } }),
    );
  });
});
