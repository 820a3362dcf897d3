/**
 * Protocol session base
 *
 * Owns one LineConnection and implements the polling loop shared by the
 * IMAP and SMTP sessions: pull chunks with `receive` until a framing
 * function reports a complete response, or fail once the command budget
 * (or the scenario deadline) runs out.
 *
 * @packageDocumentation
 */

import { EventEmitter } from 'events';
import { LineConnection } from '../transport/connection.js';
import type { SessionOptions } from '../types/config.js';
import type { ProtocolKind, TranscriptEvent } from '../types/protocol.js';
import {
  HarnessError,
  ProtocolViolationError,
  TimeoutError
} from '../types/errors.js';

const DEFAULT_COMMAND_TIMEOUT = 10000;
const DEFAULT_POLL_INTERVAL = 250;
const DEFAULT_MAX_CHUNK = 65536;

/**
 * Outcome of running a framing function over buffered bytes
 */
export type Framing<T> =
  | { done: true; value: T; end: number }
  | { done: false; violation?: { line: string; reason: string } };

/**
 * Tuning knobs for the polling loop
 */
export interface PollingOptions {
  commandTimeout: number;
  pollInterval: number;
  maxChunkBytes: number;
}

export function resolvePolling(options: SessionOptions): PollingOptions {
  return {
    commandTimeout: options.commandTimeout ?? DEFAULT_COMMAND_TIMEOUT,
    pollInterval: options.pollInterval ?? DEFAULT_POLL_INTERVAL,
    maxChunkBytes: options.maxChunkBytes ?? DEFAULT_MAX_CHUNK
  };
}

export abstract class ProtocolSession extends EventEmitter {
  abstract readonly protocol: ProtocolKind;

  protected readonly connection: LineConnection;
  protected readonly polling: PollingOptions;
  private carry: Buffer = Buffer.alloc(0);
  private busy = false;
  private _lastCommand?: string;
  private _lastResponse?: string;

  constructor(connection: LineConnection, polling: PollingOptions) {
    super();
    this.connection = connection;
    this.polling = polling;
  }

  /**
   * Last command line written, with secrets redacted
   */
  get lastCommand(): string | undefined {
    return this._lastCommand;
  }

  /**
   * Raw text of the last complete (or partial, on failure) response
   */
  get lastResponse(): string | undefined {
    return this._lastResponse;
  }

  get isOpen(): boolean {
    return this.connection.isConnected;
  }

  get host(): string {
    return this.connection.host;
  }

  get port(): number {
    return this.connection.port;
  }

  /**
   * Runs one exchange; exchanges on a session never overlap
   */
  protected async exclusive<T>(label: string, fn: () => Promise<T>): Promise<T> {
    if (this.busy) {
      throw new ProtocolViolationError(
        `Cannot start "${label}" while another ${this.protocol} exchange is in flight`,
        '',
        label
      );
    }
    this.busy = true;
    try {
      return await fn();
    } finally {
      this.busy = false;
    }
  }

  /**
   * Writes a command line (CRLF appended)
   * @param display - what to record in the transcript instead of `line`
   */
  protected async writeLine(line: string, display: string = line): Promise<void> {
    this._lastCommand = display;
    this._lastResponse = undefined;
    this.record('sent', display);
    await this.connection.send(line);
  }

  /**
   * Writes a payload unchanged
   */
  protected async writePayload(data: string, display: string): Promise<void> {
    this._lastCommand = display;
    this._lastResponse = undefined;
    this.record('sent', display);
    await this.connection.sendRaw(data);
  }

  /**
   * Polls the connection until `frame` reports a complete response
   *
   * @throws TimeoutError once `timeout` or the deadline has elapsed
   * @throws ProtocolViolationError when `frame` reports a violation
   * @throws ConnectionClosedError when the peer closes first
   */
  protected async readFramed<T>(
    frame: (buffer: Buffer) => Framing<T>,
    operation: string,
    timeout: number = this.polling.commandTimeout
  ): Promise<T> {
    const started = Date.now();
    let buffer = this.carry;
    this.carry = Buffer.alloc(0);

    for (;;) {
      const framed = frame(buffer);
      if (framed.done) {
        this.carry = buffer.subarray(framed.end);
        const text = buffer.toString('utf8', 0, framed.end);
        this._lastResponse = text;
        this.record('received', text);
        return framed.value;
      }

      const partial = buffer.toString('utf8');
      if (framed.violation) {
        this._lastResponse = partial;
        this.record('received', partial);
        throw new ProtocolViolationError(
          `${this.protocol} protocol violation: ${framed.violation.reason}`,
          partial,
          this._lastCommand
        );
      }

      const remaining = timeout - (Date.now() - started);
      const wait = Math.min(this.polling.pollInterval, remaining, this.connection.timeLeft);
      if (remaining <= 0 || this.connection.timeLeft <= 0) {
        this._lastResponse = partial;
        throw new TimeoutError(
          remaining <= 0
            ? `No complete response to ${operation} within ${timeout}ms`
            : `Scenario deadline passed while waiting for ${operation}`,
          operation,
          timeout,
          partial
        );
      }

      try {
        const chunk = await this.connection.receiveBytes(this.polling.maxChunkBytes, wait);
        buffer = Buffer.concat([buffer, chunk]);
      } catch (err) {
        if (err instanceof TimeoutError) {
          // Nothing arrived during this poll; the loop re-checks the budget
          continue;
        }
        this._lastResponse = partial;
        if (err instanceof HarnessError) {
          err.command ??= this._lastCommand;
          err.response ??= partial;
        }
        throw err;
      }
    }
  }

  private record(direction: TranscriptEvent['direction'], data: string): void {
    const event: TranscriptEvent = { protocol: this.protocol, direction, data };
    this.emit('transcript', event);
  }

  /**
   * Close the underlying connection. Safe to call more than once.
   */
  async close(): Promise<void> {
    await this.connection.close();
  }
}
