/**
 * SMTP Session
 *
 * Raw SMTP over a LineConnection: reads the greeting, sends one command
 * at a time and collects each (possibly multi-line) reply.
 *
 * @packageDocumentation
 */

import { LineConnection } from '../transport/connection.js';
import { SmtpCommands } from '../commands/builder.js';
import { scanSmtpReply } from './parser.js';
import { ProtocolSession, resolvePolling, type Framing } from './session.js';
import type { SessionOptions } from '../types/config.js';
import type { SmtpReply } from '../types/protocol.js';
import { ProtocolViolationError } from '../types/errors.js';

function frameReply(buffer: Buffer): Framing<SmtpReply> {
  const scan = scanSmtpReply(buffer);
  if (scan.violation) {
    return { done: false, violation: scan.violation };
  }
  if (!scan.complete || !scan.reply) {
    return { done: false };
  }
  return { done: true, value: scan.reply, end: scan.end };
}

export class SmtpSession extends ProtocolSession {
  readonly protocol = 'SMTP' as const;

  private _greeting?: SmtpReply;

  /**
   * Connect and read the 220 greeting
   * @throws ProtocolViolationError if the greeting is not 220
   */
  static async open(options: SessionOptions): Promise<SmtpSession> {
    const connection = await LineConnection.open(options);
    const session = new SmtpSession(connection, resolvePolling(options));
    try {
      const greeting = await session.readGreeting();
      if (greeting.code !== 220) {
        throw new ProtocolViolationError(
          `Unexpected SMTP greeting ${greeting.code}`,
          greeting.raw
        );
      }
    } catch (err) {
      await session.close();
      throw err;
    }
    return session;
  }

  get greeting(): SmtpReply | undefined {
    return this._greeting;
  }

  async readGreeting(): Promise<SmtpReply> {
    return this.exclusive('greeting', async () => {
      this._greeting = await this.readFramed(frameReply, 'greeting');
      return this._greeting;
    });
  }

  /**
   * Send a command line and read its reply
   */
  async command(line: string, options?: { timeout?: number }): Promise<SmtpReply> {
    return this.exclusive(line, async () => {
      await this.writeLine(line);
      return this.readFramed(frameReply, line.split(' ', 1)[0], options?.timeout);
    });
  }

  ehlo(name: string): Promise<SmtpReply> {
    return this.command(SmtpCommands.ehlo(name));
  }

  mailFrom(address: string): Promise<SmtpReply> {
    return this.command(SmtpCommands.mailFrom(address));
  }

  rcptTo(address: string): Promise<SmtpReply> {
    return this.command(SmtpCommands.rcptTo(address));
  }

  /**
   * Run the DATA phase for `message`
   *
   * @returns the reply that ends the transaction: the final reply after
   * the terminating dot, or the DATA reply itself when it is not 354
   */
  async data(message: string, options?: { timeout?: number }): Promise<SmtpReply> {
    const ready = await this.command(SmtpCommands.data(), options);
    if (ready.code !== 354) {
      return ready;
    }

    const payload = SmtpCommands.dataPayload(message);
    return this.exclusive('message', async () => {
      await this.writePayload(payload, `[message, ${Buffer.byteLength(payload)} bytes]`);
      return this.readFramed(frameReply, 'end of data', options?.timeout);
    });
  }

  /**
   * QUIT and close the connection
   */
  async quit(): Promise<SmtpReply> {
    try {
      return await this.command(SmtpCommands.quit());
    } finally {
      await this.close();
    }
  }
}
