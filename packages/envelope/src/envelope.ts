/**
 * @module envelope
 *
 * The three wire envelope kinds. Every envelope is a discriminated union
 * member keyed on `kind`; constructors return frozen objects so an envelope
 * is never mutated after it is built.
 */

import type { JsonObject } from '@switchyard/core';

/** Synchronous request: the receiver answers on `sender`. */
export interface CallEnvelope {
  readonly kind: 'call';
  readonly sender: string;
  readonly endpoint: string;
  readonly payload: JsonObject;
  /** Echoed by replies so a waiting caller can tell its reply from a late one. */
  readonly correlationId?: string;
}

/** One-way request. No reply address. */
export interface CastEnvelope {
  readonly kind: 'cast';
  readonly endpoint: string;
  readonly payload: JsonObject;
}

export interface ReplyOk {
  readonly kind: 'reply';
  readonly status: 'ok';
  readonly payload: JsonObject;
  readonly correlationId?: string;
}

export interface ReplyFailure {
  readonly kind: 'reply';
  readonly status: 'error';
  readonly error: { readonly message: string; readonly code?: string };
  readonly correlationId?: string;
}

export type ReplyEnvelope = ReplyOk | ReplyFailure;

export type Envelope = CallEnvelope | CastEnvelope | ReplyEnvelope;

export type EnvelopeKind = Envelope['kind'];

export type EnvelopeOf<K extends EnvelopeKind> = Extract<Envelope, { kind: K }>;

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export function createCall(fields: {
  sender: string;
  endpoint: string;
  payload: JsonObject;
  correlationId?: string;
}): CallEnvelope {
  const envelope: CallEnvelope = {
    kind: 'call',
    sender: fields.sender,
    endpoint: fields.endpoint,
    payload: fields.payload,
    ...(fields.correlationId !== undefined ? { correlationId: fields.correlationId } : {}),
  };
  return Object.freeze(envelope);
}

export function createCast(fields: { endpoint: string; payload: JsonObject }): CastEnvelope {
  const envelope: CastEnvelope = { kind: 'cast', endpoint: fields.endpoint, payload: fields.payload };
  return Object.freeze(envelope);
}

export function createReply(payload: JsonObject, correlationId?: string): ReplyOk {
  const envelope: ReplyOk = {
    kind: 'reply',
    status: 'ok',
    payload,
    ...(correlationId !== undefined ? { correlationId } : {}),
  };
  return Object.freeze(envelope);
}

export function createErrorReply(
  message: string,
  options: { code?: string; correlationId?: string } = {},
): ReplyFailure {
  const envelope: ReplyFailure = {
    kind: 'reply',
    status: 'error',
    error: options.code !== undefined ? { message, code: options.code } : { message },
    ...(options.correlationId !== undefined ? { correlationId: options.correlationId } : {}),
  };
  return Object.freeze(envelope);
}

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

export function isCall(envelope: Envelope): envelope is CallEnvelope {
  return envelope.kind === 'call';
}

export function isCast(envelope: Envelope): envelope is CastEnvelope {
  return envelope.kind === 'cast';
}

export function isReply(envelope: Envelope): envelope is ReplyEnvelope {
  return envelope.kind === 'reply';
}
