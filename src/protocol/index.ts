/**
 * Protocol layer exports for mailprobe
 */

export {
  parseTaggedResponse,
  isResponseStatus,
  isTaggedResponse,
  isUntaggedResponse,
  isContinuationResponse,
  scanImapResponse,
  scanSmtpReply,
  topLevelLines,
  type ImapScanResult,
  type SmtpScanResult
} from './parser.js';

export { ProtocolSession, type Framing, type PollingOptions } from './session.js';
export { ImapSession, type ImapSessionOptions } from './imap-session.js';
export { SmtpSession } from './smtp-session.js';

export * from './facts.js';
