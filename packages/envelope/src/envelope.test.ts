/**
 * Envelope tests: constructors, guards, codec validation, signing.
 */

import { DecodeError } from '@switchyard/core';
import {
  createCall,
  createCast,
  createReply,
  createErrorReply,
  isCall,
  isCast,
  isReply,
} from './envelope.js';
import { EnvelopeCodec } from './codec.js';
import { EnvelopeSigner, canonicalize } from './signing.js';

// ---------------------------------------------------------------------------
// Constructors and guards
// ---------------------------------------------------------------------------

describe('envelope constructors', () => {
  it('builds a call envelope with a correlation id', () => {
    const call = createCall({
      sender: 'switchyard/call/reply/abc',
      endpoint: 'ping',
      payload: { n: 1 },
      correlationId: 'c-1',
    });
    expect(call).toEqual({
      kind: 'call',
      sender: 'switchyard/call/reply/abc',
      endpoint: 'ping',
      payload: { n: 1 },
      correlationId: 'c-1',
    });
  });

  it('omits correlationId when not given', () => {
    const call = createCall({ sender: 's', endpoint: 'e', payload: {} });
    expect('correlationId' in call).toBe(false);
  });

  it('freezes envelopes', () => {
    expect(Object.isFrozen(createCast({ endpoint: 'log', payload: {} }))).toBe(true);
    expect(Object.isFrozen(createReply({ ok: true }))).toBe(true);
  });

  it('builds error replies with optional code', () => {
    expect(createErrorReply('boom', { code: 'E_FAIL' })).toEqual({
      kind: 'reply',
      status: 'error',
      error: { message: 'boom', code: 'E_FAIL' },
    });
    expect(createErrorReply('boom').error).toEqual({ message: 'boom' });
  });

  it('guards discriminate by kind', () => {
    const cast = createCast({ endpoint: 'log', payload: {} });
    expect(isCast(cast)).toBe(true);
    expect(isCall(cast)).toBe(false);
    expect(isReply(createReply({}))).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Codec
// ---------------------------------------------------------------------------

describe('EnvelopeCodec', () => {
  const codec = new EnvelopeCodec();

  it('encodes to a UTF-8 JSON object keyed by kind', () => {
    const bytes = codec.encode(createCast({ endpoint: 'log', payload: { line: 'hi' } }));
    expect(JSON.parse(bytes.toString('utf8'))).toEqual({
      kind: 'cast',
      endpoint: 'log',
      payload: { line: 'hi' },
    });
  });

  it('decodes each kind by its wire tag', () => {
    const call = createCall({ sender: 'r/1', endpoint: 'sum', payload: { a: 1, b: 2 } });
    expect(codec.decode(codec.encode(call))).toEqual(call);
    expect(codec.decode(codec.encode(createCast({ endpoint: 'x', payload: {} }))).kind).toBe('cast');
  });

  it('preserves reply payloads across decode and re-encode', () => {
    const payloads = [
      {},
      { text: 'héllo ✓', nested: { list: [1, 'two', null, { deep: true }] } },
      { count: -12.5, flags: [true, false], empty: '' },
    ];
    for (const payload of payloads) {
      const bytes = Buffer.from(JSON.stringify({ kind: 'reply', status: 'ok', payload }));
      const decoded = codec.decodeAs('reply', bytes);
      const again = codec.decodeAs('reply', codec.encode(decoded));
      expect(again).toEqual({ kind: 'reply', status: 'ok', payload });
    }
  });

  it('decodes error replies', () => {
    const bytes = codec.encode(createErrorReply('nope', { code: 'E_DENIED', correlationId: 'c-9' }));
    expect(codec.decodeAs('reply', bytes)).toEqual({
      kind: 'reply',
      status: 'error',
      error: { message: 'nope', code: 'E_DENIED' },
      correlationId: 'c-9',
    });
  });

  it('accepts string input', () => {
    const decoded = codec.decode('{"kind":"cast","endpoint":"e","payload":{}}');
    expect(decoded).toEqual({ kind: 'cast', endpoint: 'e', payload: {} });
  });

  it('rejects invalid JSON with DecodeError', () => {
    expect(() => codec.decode(Buffer.from('not json{'))).toThrow(DecodeError);
  });

  it('rejects non-object JSON', () => {
    expect(() => codec.decode('[1,2]')).toThrow('envelope must be a JSON object');
  });

  it('rejects unknown kinds', () => {
    expect(() => codec.decode('{"kind":"shout"}')).toThrow('envelope has an unknown kind');
  });

  it('rejects a kind other than the expected one', () => {
    const bytes = codec.encode(createCast({ endpoint: 'e', payload: {} }));
    expect(() => codec.decodeAs('reply', bytes)).toThrow('expected a reply envelope');
  });

  it('rejects a call without sender', () => {
    try {
      codec.decode('{"kind":"call","endpoint":"e","payload":{}}');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DecodeError);
      expect(err instanceof DecodeError && err.message).toBe('call envelope is missing "sender"');
      expect(err instanceof DecodeError && err.context).toEqual({ field: 'sender', kind: 'call' });
    }
  });

  it('rejects array payloads', () => {
    expect(() => codec.decode('{"kind":"cast","endpoint":"e","payload":[1]}')).toThrow(
      'cast envelope payload must be an object',
    );
  });

  it('rejects replies with unknown status', () => {
    expect(() => codec.decodeAs('reply', '{"kind":"reply","status":"maybe"}')).toThrow(
      'reply envelope has an unknown status',
    );
  });

  it('rejects error replies without a message', () => {
    expect(() => codec.decodeAs('reply', '{"kind":"reply","status":"error","error":{}}')).toThrow(
      'reply envelope error must carry a message',
    );
  });

  it('rejects non-string correlation ids', () => {
    expect(() =>
      codec.decodeAs('reply', '{"kind":"reply","status":"ok","payload":{},"correlationId":7}'),
    ).toThrow('reply envelope correlationId must be a string');
  });

  it('ignores signatures when no key is configured', () => {
    const decoded = codec.decode('{"kind":"cast","endpoint":"e","payload":{},"signature":"ab"}');
    expect(decoded).toEqual({ kind: 'cast', endpoint: 'e', payload: {} });
  });
});

// ---------------------------------------------------------------------------
// Signing
// ---------------------------------------------------------------------------

describe('signing', () => {
  it('canonicalize sorts keys at every depth', () => {
    expect(canonicalize({ b: 1, a: { d: [2, { z: 1, y: 0 }], c: null } })).toBe(
      '{"a":{"c":null,"d":[2,{"y":0,"z":1}]},"b":1}',
    );
  });

  it('canonicalize skips undefined fields', () => {
    expect(canonicalize({ a: undefined, b: 'x' })).toBe('{"b":"x"}');
  });

  it('signer verifies its own signatures and rejects others', () => {
    const signer = new EnvelopeSigner('test-secret');
    const body = { kind: 'cast', endpoint: 'e', payload: {} };
    const signature = signer.sign(body);
    expect(signature).toMatch(/^[0-9a-f]{64}$/);
    expect(signer.verify({ payload: {}, endpoint: 'e', kind: 'cast' }, signature)).toBe(true);
    expect(new EnvelopeSigner('other-secret').verify(body, signature)).toBe(false);
    expect(signer.verify(body, 'abcd')).toBe(false);
  });

  it('signed codec round-trips envelopes', () => {
    const codec = new EnvelopeCodec({ signingKey: 'test-secret' });
    expect(codec.signed).toBe(true);
    const call = createCall({ sender: 'r/1', endpoint: 'ping', payload: { x: [1, 2] } });
    const bytes = codec.encode(call);
    expect(typeof JSON.parse(bytes.toString('utf8')).signature).toBe('string');
    expect(codec.decode(bytes)).toEqual(call);
  });

  it('signed codec rejects unsigned input', () => {
    const codec = new EnvelopeCodec({ signingKey: 'test-secret' });
    const unsigned = new EnvelopeCodec().encode(createCast({ endpoint: 'e', payload: {} }));
    try {
      codec.decode(unsigned);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DecodeError);
      expect(err instanceof DecodeError && err.message).toBe('envelope is not signed');
      expect(err instanceof DecodeError && err.context).toEqual({ reason: 'signature' });
    }
  });

  it('signed codec rejects tampered input', () => {
    const codec = new EnvelopeCodec({ signingKey: 'test-secret' });
    const wire = JSON.parse(codec.encode(createCast({ endpoint: 'e', payload: { n: 1 } })).toString('utf8'));
    wire.payload.n = 2;
    expect(() => codec.decode(JSON.stringify(wire))).toThrow('envelope signature does not match');
  });

  it('an empty signing key disables signing', () => {
    expect(new EnvelopeCodec({ signingKey: '' }).signed).toBe(false);
  });
});
