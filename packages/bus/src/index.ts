/**
 * @switchyard/bus: synchronous request/reply sessions over pub/sub.
 */

export {
  connect,
  resolveWithDns,
  replyAddressFor,
  INTERNAL_USERNAME,
  REPLY_PREFIX,
  DEFAULT_CONNECT_TIMEOUT_MS,
} from './connect.js';
export type { ConnectOptions, HostResolver } from './connect.js';

export { connectWithDefaults } from './defaults.js';
export type { ConnectDefaultsOverrides } from './defaults.js';

export { Session, BUS_QOS, DEFAULT_CALL_TIMEOUT_MS } from './session.js';
export type { SessionInit, PublishOptions, ReplyResult, MessageHandler } from './session.js';

export { ReplyMailbox, DEFAULT_MAILBOX_LIMIT } from './reply-mailbox.js';
export type { ReplyDecision } from './reply-mailbox.js';

export { CallQueue } from './call-queue.js';
export { buildTlsOptions } from './tls.js';
