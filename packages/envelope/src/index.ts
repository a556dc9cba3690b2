/**
 * @switchyard/envelope: wire envelopes and their codec.
 */

export {
  createCall,
  createCast,
  createReply,
  createErrorReply,
  isCall,
  isCast,
  isReply,
} from './envelope.js';
export type {
  CallEnvelope,
  CastEnvelope,
  ReplyOk,
  ReplyFailure,
  ReplyEnvelope,
  Envelope,
  EnvelopeKind,
  EnvelopeOf,
} from './envelope.js';

export { EnvelopeCodec } from './codec.js';
export type { EnvelopeCodecOptions } from './codec.js';

export { EnvelopeSigner, canonicalize } from './signing.js';
