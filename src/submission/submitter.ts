/**
 * Message submitters
 *
 * Two ways to hand a message to the SMTP server under test: the raw
 * submitter speaks the protocol line by line over an SmtpSession, the
 * library submitter goes through nodemailer.
 *
 * @packageDocumentation
 */

import nodemailer from 'nodemailer';
import { SmtpSession } from '../protocol/smtp-session.js';
import { composeMessage, type OutboundMessage } from './message.js';
import type { SessionOptions } from '../types/config.js';
import type { SmtpReply } from '../types/protocol.js';

/**
 * Outcome of one submission
 */
export interface SubmissionReceipt {
  /** Whether the server accepted the message for delivery */
  accepted: boolean;
  /** SMTP code of the final reply, when known */
  code?: number;
  /** Final server reply text */
  response: string;
}

export interface Submitter {
  readonly kind: 'raw' | 'library';
  submit(message: OutboundMessage): Promise<SubmissionReceipt>;
}

export interface SubmitterOptions extends SessionOptions {
  /** Name announced in EHLO */
  ehloName: string;
}

function receiptFrom(reply: SmtpReply): SubmissionReceipt {
  return { accepted: reply.code === 250, code: reply.code, response: reply.raw };
}

/**
 * Submits with raw SMTP commands: EHLO, MAIL FROM, RCPT TO, DATA, QUIT
 */
export class RawSubmitter implements Submitter {
  readonly kind = 'raw' as const;
  private readonly options: SubmitterOptions;

  constructor(options: SubmitterOptions) {
    this.options = options;
  }

  async submit(message: OutboundMessage): Promise<SubmissionReceipt> {
    const session = await SmtpSession.open(this.options);
    try {
      const envelope = [
        () => session.ehlo(this.options.ehloName),
        () => session.mailFrom(message.from),
        () => session.rcptTo(message.to)
      ];
      // Stop at the first refusal
      for (const command of envelope) {
        const reply = await command();
        if (reply.code >= 400) {
          return { ...receiptFrom(reply), accepted: false };
        }
      }
      const final = await session.data(composeMessage(message));
      await session.quit();
      return receiptFrom(final);
    } finally {
      await session.close();
    }
  }
}

/**
 * Submits through nodemailer's SMTP transport
 */
export class LibrarySubmitter implements Submitter {
  readonly kind = 'library' as const;
  private readonly options: SubmitterOptions;

  constructor(options: SubmitterOptions) {
    this.options = options;
  }

  async submit(message: OutboundMessage): Promise<SubmissionReceipt> {
    const timeout = this.options.commandTimeout ?? 10000;
    const transport = nodemailer.createTransport({
      host: this.options.host,
      port: this.options.port,
      secure: this.options.tls ?? false,
      name: this.options.ehloName,
      connectionTimeout: this.options.connTimeout ?? 10000,
      greetingTimeout: timeout,
      socketTimeout: timeout,
      tls: { rejectUnauthorized: this.options.tlsOptions?.rejectUnauthorized ?? true }
    });

    try {
      const info = await transport.sendMail({
        envelope: { from: message.from, to: [message.to] },
        raw: composeMessage(message)
      });
      const code = /^(\d{3})/.exec(info.response);
      return {
        accepted: info.accepted.length > 0 && info.rejected.length === 0,
        code: code ? parseInt(code[1], 10) : undefined,
        response: info.response
      };
    } finally {
      transport.close();
    }
  }
}

export function createSubmitter(kind: 'raw' | 'library', options: SubmitterOptions): Submitter {
  return kind === 'raw' ? new RawSubmitter(options) : new LibrarySubmitter(options);
}
