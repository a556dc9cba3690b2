/**
 * HMAC-SHA256 envelope signatures over a canonical JSON rendering (object
 * keys sorted at every depth), so a signature survives a parse/stringify
 * round trip on the receiving side.
 */

import { createHmac, timingSafeEqual } from 'node:crypto';

export function canonicalize(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalize(item)).join(',')}]`;
  }
  if (typeof value === 'object' && value !== null) {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`).join(',')}}`;
  }
  return JSON.stringify(value);
}

export class EnvelopeSigner {
  constructor(private readonly key: string) {}

  sign(body: Record<string, unknown>): string {
    return createHmac('sha256', this.key).update(canonicalize(body)).digest('hex');
  }

  verify(body: Record<string, unknown>, signature: string): boolean {
    const expected = Buffer.from(this.sign(body), 'hex');
    const actual = Buffer.from(signature, 'hex');
    return expected.length === actual.length && timingSafeEqual(expected, actual);
  }
}
