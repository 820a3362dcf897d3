/**
 * IMAP Session
 *
 * Tag generation and response correlation over a LineConnection. Every
 * command gets a fresh tag (A001, A002, ...) and the exchange completes
 * only when a line starting with that exact tag arrives.
 *
 * @packageDocumentation
 */

import { LineConnection } from '../transport/connection.js';
import { CommandBuilder, type FetchItems } from '../commands/builder.js';
import { scanImapResponse } from './parser.js';
import { ProtocolSession, resolvePolling, type Framing, type PollingOptions } from './session.js';
import type { SessionOptions } from '../types/config.js';
import type { TaggedExchange } from '../types/protocol.js';

/**
 * Options specific to IMAP sessions
 */
export interface ImapSessionOptions extends SessionOptions {
  /** Letter(s) prefixed to every tag (default: "A") */
  tagPrefix?: string;
}

function frameGreeting(buffer: Buffer): Framing<string> {
  const lf = buffer.indexOf(0x0a);
  if (lf === -1) {
    return { done: false };
  }
  const line = buffer.toString('utf8', 0, lf).replace(/\r$/, '');
  if (!/^\* (OK|PREAUTH)\b/i.test(line)) {
    return {
      done: false,
      violation: { line, reason: `unexpected greeting "${line}"` }
    };
  }
  return { done: true, value: line, end: lf + 1 };
}

export class ImapSession extends ProtocolSession {
  readonly protocol = 'IMAP' as const;

  private tagCounter = 0;
  private readonly tagPrefix: string;
  private _greeting?: string;

  constructor(connection: LineConnection, polling: PollingOptions, tagPrefix = 'A') {
    super(connection, polling);
    this.tagPrefix = tagPrefix;
  }

  /**
   * Connect, read the greeting and return a ready session
   *
   * The connection is closed again if the greeting is missing or invalid.
   */
  static async open(options: ImapSessionOptions): Promise<ImapSession> {
    const connection = await LineConnection.open(options);
    const session = new ImapSession(connection, resolvePolling(options), options.tagPrefix);
    try {
      await session.readGreeting();
    } catch (err) {
      await session.close();
      throw err;
    }
    return session;
  }

  /**
   * Server greeting line, once read
   */
  get greeting(): string | undefined {
    return this._greeting;
  }

  /**
   * Number of tags issued so far
   */
  get issuedCount(): number {
    return this.tagCounter;
  }

  /**
   * Generate a unique command tag
   * Tags are in format: A001, A002, etc.
   */
  generateTag(): string {
    this.tagCounter++;
    return `${this.tagPrefix}${this.tagCounter.toString().padStart(3, '0')}`;
  }

  /**
   * Read the untagged greeting sent on connect
   * @throws ProtocolViolationError unless it is `* OK` or `* PREAUTH`
   */
  async readGreeting(): Promise<string> {
    return this.exclusive('greeting', async () => {
      this._greeting = await this.readFramed(frameGreeting, 'greeting');
      return this._greeting;
    });
  }

  /**
   * Issue a command and wait for its tagged completion
   *
   * NO and BAD completions are returned, not thrown: callers turn them
   * into facts. Untagged lines received before the completion stay in
   * `response`.
   *
   * @throws TimeoutError if no completion arrives within the command timeout
   * @throws ProtocolViolationError on a foreign tag or malformed completion
   */
  async issue(command: string, options?: { timeout?: number }): Promise<TaggedExchange> {
    return this.exclusive(command, async () => {
      const tag = this.generateTag();
      const display = `${tag} ${CommandBuilder.redactLogin(command)}`;

      await this.writeLine(`${tag} ${command}`, display);

      const frame = (buffer: Buffer): Framing<TaggedExchange> => {
        const scan = scanImapResponse(buffer, tag);
        if (scan.violation) {
          return { done: false, violation: scan.violation };
        }
        if (!scan.complete || !scan.completion) {
          return { done: false };
        }
        return {
          done: true,
          end: scan.end,
          value: {
            tag,
            command: CommandBuilder.redactLogin(command),
            status: scan.completion.status,
            text: scan.completion.text,
            response: buffer.toString('utf8', 0, scan.end),
            raw: Buffer.from(buffer.subarray(0, scan.end))
          }
        };
      };

      return this.readFramed(frame, `${tag} ${command.split(' ', 1)[0]}`, options?.timeout);
    });
  }

  login(user: string, password: string): Promise<TaggedExchange> {
    return this.issue(CommandBuilder.login(user, password));
  }

  select(mailbox = 'INBOX'): Promise<TaggedExchange> {
    return this.issue(CommandBuilder.select(mailbox));
  }

  fetch(sequence: number | string, items: FetchItems = 'BODY[]'): Promise<TaggedExchange> {
    return this.issue(CommandBuilder.fetch(sequence, items));
  }

  list(reference = '', pattern = '*'): Promise<TaggedExchange> {
    return this.issue(CommandBuilder.list(reference, pattern));
  }

  capability(): Promise<TaggedExchange> {
    return this.issue(CommandBuilder.capability());
  }

  noop(): Promise<TaggedExchange> {
    return this.issue(CommandBuilder.noop());
  }

  /**
   * LOGOUT and close the connection
   */
  async logout(): Promise<TaggedExchange> {
    try {
      return await this.issue(CommandBuilder.logout());
    } finally {
      await this.close();
    }
  }
}
