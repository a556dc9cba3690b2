/**
 * EnvelopeCodec: JSON wire format for call, cast and reply envelopes.
 *
 * Each kind has its own reader; `decodeAs` selects the reader by the kind the
 * caller expects, `decode` by the `kind` field on the wire. With a signing
 * key every encoded envelope carries a `signature` field and decoding
 * rejects input whose signature is missing or wrong.
 */

import { DecodeError, isJsonObject } from '@switchyard/core';
import type { JsonObject } from '@switchyard/core';
import {
  createCall,
  createCast,
  createErrorReply,
  createReply,
  type CallEnvelope,
  type CastEnvelope,
  type Envelope,
  type EnvelopeKind,
  type EnvelopeOf,
  type ReplyEnvelope,
} from './envelope.js';
import { EnvelopeSigner } from './signing.js';

export interface EnvelopeCodecOptions {
  /** Shared secret for HMAC signatures. Empty or absent disables signing. */
  signingKey?: string;
}

type WireRecord = Record<string, unknown>;

// ---------------------------------------------------------------------------
// Per-kind readers
// ---------------------------------------------------------------------------

function requireString(raw: WireRecord, field: string, kind: EnvelopeKind): string {
  const value = raw[field];
  if (typeof value !== 'string' || value.length === 0) {
    throw new DecodeError(`${kind} envelope is missing "${field}"`, kind, { field });
  }
  return value;
}

function requirePayload(raw: WireRecord, kind: EnvelopeKind): JsonObject {
  const payload = raw['payload'];
  if (!isJsonObject(payload)) {
    throw new DecodeError(`${kind} envelope payload must be an object`, kind, { field: 'payload' });
  }
  return payload;
}

function optionalCorrelation(raw: WireRecord, kind: EnvelopeKind): string | undefined {
  const value = raw['correlationId'];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new DecodeError(`${kind} envelope correlationId must be a string`, kind, {
      field: 'correlationId',
    });
  }
  return value;
}

function readCall(raw: WireRecord): CallEnvelope {
  return createCall({
    sender: requireString(raw, 'sender', 'call'),
    endpoint: requireString(raw, 'endpoint', 'call'),
    payload: requirePayload(raw, 'call'),
    correlationId: optionalCorrelation(raw, 'call'),
  });
}

function readCast(raw: WireRecord): CastEnvelope {
  return createCast({
    endpoint: requireString(raw, 'endpoint', 'cast'),
    payload: requirePayload(raw, 'cast'),
  });
}

function readReply(raw: WireRecord): ReplyEnvelope {
  const correlationId = optionalCorrelation(raw, 'reply');
  switch (raw['status']) {
    case 'ok':
      return createReply(requirePayload(raw, 'reply'), correlationId);
    case 'error': {
      const error = raw['error'];
      if (!isJsonObject(error) || typeof error['message'] !== 'string') {
        throw new DecodeError('reply envelope error must carry a message', 'reply', { field: 'error' });
      }
      const code = error['code'];
      return createErrorReply(error['message'], {
        code: typeof code === 'string' ? code : undefined,
        correlationId,
      });
    }
    default:
      throw new DecodeError('reply envelope has an unknown status', 'reply', { field: 'status' });
  }
}

const READERS: { [K in EnvelopeKind]: (raw: WireRecord) => EnvelopeOf<K> } = {
  call: readCall,
  cast: readCast,
  reply: readReply,
};

function isEnvelopeKind(value: unknown): value is EnvelopeKind {
  return value === 'call' || value === 'cast' || value === 'reply';
}

// ---------------------------------------------------------------------------
// EnvelopeCodec
// ---------------------------------------------------------------------------

export class EnvelopeCodec {
  private readonly signer: EnvelopeSigner | null;

  constructor(options: EnvelopeCodecOptions = {}) {
    this.signer = options.signingKey ? new EnvelopeSigner(options.signingKey) : null;
  }

  get signed(): boolean {
    return this.signer !== null;
  }

  encode(envelope: Envelope): Buffer {
    const body: WireRecord = { ...envelope };
    if (this.signer) {
      body['signature'] = this.signer.sign(body);
    }
    return Buffer.from(JSON.stringify(body), 'utf8');
  }

  decode(bytes: Buffer | string): Envelope {
    const raw = this.parse(bytes);
    const kind = raw['kind'];
    if (!isEnvelopeKind(kind)) {
      throw new DecodeError('envelope has an unknown kind', undefined, { field: 'kind' });
    }
    switch (kind) {
      case 'call':
        return READERS.call(raw);
      case 'cast':
        return READERS.cast(raw);
      case 'reply':
        return READERS.reply(raw);
    }
  }

  decodeAs<K extends EnvelopeKind>(kind: K, bytes: Buffer | string): EnvelopeOf<K> {
    const raw = this.parse(bytes, kind);
    if (raw['kind'] !== kind) {
      throw new DecodeError(`expected a ${kind} envelope`, kind, { received: raw['kind'] });
    }
    const reader = READERS[kind];
    return reader(raw);
  }

  private parse(bytes: Buffer | string, kind?: EnvelopeKind): WireRecord {
    let parsed: unknown;
    try {
      parsed = JSON.parse(typeof bytes === 'string' ? bytes : bytes.toString('utf8'));
    } catch (err) {
      throw new DecodeError('envelope is not valid JSON', kind, {
        reason: err instanceof Error ? err.message : String(err),
      });
    }
    if (!isJsonObject(parsed)) {
      throw new DecodeError('envelope must be a JSON object', kind);
    }

    const { signature, ...body } = parsed;
    if (!this.signer) {
      return body;
    }
    if (typeof signature !== 'string') {
      throw new DecodeError('envelope is not signed', kind, { reason: 'signature' });
    }
    if (!this.signer.verify(body, signature)) {
      throw new DecodeError('envelope signature does not match', kind, { reason: 'signature' });
    }
    return body;
  }
}
