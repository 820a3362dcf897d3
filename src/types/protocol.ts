/**
 * Protocol types for mailprobe
 */

/**
 * Protocol spoken over a session
 */
export type ProtocolKind = 'SMTP' | 'IMAP';

/**
 * IMAP completion status
 */
export type ResponseStatus = 'OK' | 'NO' | 'BAD';

/**
 * Tagged completion line from an IMAP server
 */
export interface TaggedResponse {
  /** Command tag */
  tag: string;
  /** Response status */
  status: ResponseStatus;
  /** Response text */
  text: string;
}

/**
 * One correlated IMAP command/response exchange
 */
export interface TaggedExchange {
  /** Tag the command was issued with */
  tag: string;
  /** Command as sent, without the tag */
  command: string;
  /** Completion status */
  status: ResponseStatus;
  /** Completion text after the status */
  text: string;
  /** Full response text, untagged lines and completion line included */
  response: string;
  /** Response bytes as received; literal lengths count these, not decoded characters */
  raw: Buffer;
}

/**
 * SMTP reply, possibly spanning several `NNN-` lines
 */
export interface SmtpReply {
  /** Three-digit status code of the final line */
  code: number;
  /** Text of each line with the code and separator removed */
  lines: string[];
  /** Lines joined with a space */
  text: string;
  /** Raw reply as received */
  raw: string;
}

/**
 * Transcript entry emitted by sessions
 */
export interface TranscriptEvent {
  protocol: ProtocolKind;
  direction: 'sent' | 'received';
  data: string;
}
