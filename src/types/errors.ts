/**
 * Error types for mailprobe
 */

/**
 * Error source categories
 */
export type ErrorSource =
  | 'connection'
  | 'write'
  | 'closed'
  | 'timeout'
  | 'protocol'
  | 'assertion'
  | 'not-found'
  | 'config';

/**
 * Base harness error class
 */
export class HarnessError extends Error {
  /** Error code */
  code: string;
  /** Error source category */
  source: ErrorSource;
  /** Last command sent before the error (if applicable) */
  command?: string;
  /** Raw server response (if applicable) */
  response?: string;

  constructor(message: string, code: string, source: ErrorSource) {
    super(message);
    this.name = 'HarnessError';
    this.code = code;
    this.source = source;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Endpoint could not be reached
 */
export class ConnectionError extends HarnessError {
  override source: 'connection' = 'connection';
  /** Server host */
  host: string;
  /** Server port */
  port: number;

  constructor(message: string, host: string, port: number, cause?: Error) {
    super(message, 'CONNECTION_ERROR', 'connection');
    this.name = 'ConnectionError';
    this.host = host;
    this.port = port;
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * A command line could not be written to the socket
 */
export class WriteError extends HarnessError {
  override source: 'write' = 'write';

  constructor(message: string, command?: string, cause?: Error) {
    super(message, 'WRITE_ERROR', 'write');
    this.name = 'WriteError';
    this.command = command;
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * The peer closed the connection while a response was expected
 */
export class ConnectionClosedError extends HarnessError {
  override source: 'closed' = 'closed';

  constructor(message: string, response?: string) {
    super(message, 'CONNECTION_CLOSED', 'closed');
    this.name = 'ConnectionClosedError';
    this.response = response;
  }
}

/**
 * No matching response arrived within the time budget
 */
export class TimeoutError extends HarnessError {
  override source: 'timeout' = 'timeout';
  /** Operation that timed out */
  operation: string;
  /** Timeout duration in milliseconds */
  timeoutMs: number;

  constructor(message: string, operation: string, timeoutMs: number, response?: string) {
    super(message, 'TIMEOUT_ERROR', 'timeout');
    this.name = 'TimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
    this.response = response;
  }
}

/**
 * Tag mismatch or malformed server response
 */
export class ProtocolViolationError extends HarnessError {
  override source: 'protocol' = 'protocol';
  /** Raw data that violated the protocol */
  rawData: string;

  constructor(message: string, rawData: string, command?: string) {
    super(message, 'PROTOCOL_VIOLATION', 'protocol');
    this.name = 'ProtocolViolationError';
    this.rawData = rawData;
    this.response = rawData;
    this.command = command;
  }
}

/**
 * An expected fact did not match the observed one
 */
export class AssertionFailure extends HarnessError {
  override source: 'assertion' = 'assertion';
  expected: string;
  observed: string;

  constructor(expected: string, observed: string) {
    super(`Expected ${expected}, observed ${observed}`, 'ASSERTION_FAILED', 'assertion');
    this.name = 'AssertionFailure';
    this.expected = expected;
    this.observed = observed;
  }
}

/**
 * Mailbox directory or message absent
 */
export class NotFoundError extends HarnessError {
  override source: 'not-found' = 'not-found';
  /** Every path that was tried */
  paths: string[];

  constructor(message: string, paths: string[]) {
    super(message, 'NOT_FOUND', 'not-found');
    this.name = 'NotFoundError';
    this.paths = paths;
  }
}

/**
 * Invalid harness configuration
 */
export class ConfigError extends HarnessError {
  override source: 'config' = 'config';
  /** One line per invalid setting */
  issues: string[];

  constructor(message: string, issues: string[]) {
    super(message, 'CONFIG_ERROR', 'config');
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Normalizes anything thrown into an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
