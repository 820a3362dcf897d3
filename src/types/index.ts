/**
 * Type exports for mailprobe
 */

// Connection and session options
export type {
  TlsOptions,
  ConnectionOptions,
  ResolvedConnectionOptions,
  SessionOptions
} from './config.js';

// Mailbox types
export type { MailboxMessage } from './mailbox.js';

// Protocol types
export type {
  ProtocolKind,
  ResponseStatus,
  TaggedResponse,
  TaggedExchange,
  SmtpReply,
  TranscriptEvent
} from './protocol.js';

// Scenario results
export type {
  ScenarioState,
  StepStatus,
  StepError,
  StepOutcome,
  ScenarioResult
} from './scenario.js';

// Error types
export {
  HarnessError,
  ConnectionError,
  WriteError,
  ConnectionClosedError,
  TimeoutError,
  ProtocolViolationError,
  AssertionFailure,
  NotFoundError,
  ConfigError,
  toError
} from './errors.js';

export type { ErrorSource } from './errors.js';
