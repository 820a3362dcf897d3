/**
 * Scenario Context
 *
 * Per-run resources: the sessions a scenario opens, its deadline, the
 * facts it records and the last command/response pair used for failure
 * diagnostics. Nothing here outlives one scenario run.
 *
 * @packageDocumentation
 */

import { ImapSession } from '../protocol/imap-session.js';
import { SmtpSession } from '../protocol/smtp-session.js';
import type { ProtocolSession } from '../protocol/session.js';
import type { FactValue } from '../protocol/facts.js';
import { MailboxInspector } from '../mailbox/inspector.js';
import { createSubmitter, type Submitter } from '../submission/submitter.js';
import type { Endpoint, HarnessConfig } from '../config/config.js';
import type { SessionOptions } from '../types/config.js';
import type { TranscriptEvent } from '../types/protocol.js';
import type { Logger } from '../logging/logger.js';
import { toError } from '../types/errors.js';

/**
 * Last command and its response; `response` stays undefined until
 * something arrives
 */
export interface LastExchange {
  command?: string;
  response?: string;
}

export class ScenarioContext {
  readonly config: HarnessConfig;
  readonly logger: Logger;
  /** Epoch ms after which no further I/O is attempted */
  readonly deadline: number;
  readonly inspector: MailboxInspector;

  private readonly sessions = new Set<ProtocolSession>();
  private readonly facts = new Map<string, FactValue>();
  private last: LastExchange = {};

  constructor(config: HarnessConfig, logger: Logger, now: number = Date.now()) {
    this.config = config;
    this.logger = logger;
    this.deadline = now + config.timeouts.scenario;
    this.inspector = new MailboxInspector({
      root: config.maildir.root,
      fallbackRoot: config.maildir.fallbackRoot,
      subdirectory: config.maildir.subdirectory
    });
  }

  /**
   * Milliseconds until the deadline, never negative
   */
  remaining(): number {
    return Math.max(0, this.deadline - Date.now());
  }

  get lastExchange(): LastExchange {
    return { ...this.last };
  }

  /**
   * Record a non-protocol action (e.g. a maildir read) as the last exchange
   */
  note(command: string, response?: string): void {
    this.last = { command, response };
  }

  record(name: string, value: FactValue): void {
    this.facts.set(name, value);
  }

  factSummary(): Record<string, FactValue> {
    return Object.fromEntries(this.facts);
  }

  sessionOptions(endpoint: Endpoint): SessionOptions {
    return {
      host: endpoint.host,
      port: endpoint.port,
      tls: endpoint.tls,
      tlsOptions: { rejectUnauthorized: this.config.tlsRejectUnauthorized },
      connTimeout: this.config.timeouts.connect,
      commandTimeout: this.config.timeouts.command,
      pollInterval: this.config.timeouts.pollInterval,
      deadline: this.deadline
    };
  }

  async openImap(): Promise<ImapSession> {
    this.note(`connect imap ${this.config.imap.host}:${this.config.imap.port}`);
    const session = await ImapSession.open(this.sessionOptions(this.config.imap));
    this.track(session);
    if (session.greeting) {
      this.note(this.last.command ?? 'connect', session.greeting);
    }
    return session;
  }

  async openSmtp(): Promise<SmtpSession> {
    this.note(`connect smtp ${this.config.smtp.host}:${this.config.smtp.port}`);
    const session = await SmtpSession.open(this.sessionOptions(this.config.smtp));
    this.track(session);
    if (session.greeting) {
      this.note(this.last.command ?? 'connect', session.greeting.raw);
    }
    return session;
  }

  /**
   * Submitter for the configured mode, bound to this run's deadline
   */
  submitter(mode: 'raw' | 'library' = this.config.submitMode): Submitter {
    return createSubmitter(mode, {
      ...this.sessionOptions(this.config.smtp),
      ehloName: this.config.mail.ehloName
    });
  }

  /**
   * Close every session this run opened. Failures are logged, not thrown.
   */
  async closeAll(): Promise<void> {
    const sessions = [...this.sessions];
    this.sessions.clear();
    const results = await Promise.allSettled(sessions.map(session => session.close()));
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.warn('Failed to close session', { error: toError(result.reason) });
      }
    }
  }

  get openSessions(): number {
    return [...this.sessions].filter(session => session.isOpen).length;
  }

  private track(session: ProtocolSession): void {
    this.sessions.add(session);
    session.on('transcript', (event: TranscriptEvent) => {
      if (event.direction === 'sent') {
        this.last = { command: `${event.protocol} ${event.data}` };
      } else {
        this.last = { ...this.last, response: event.data };
      }
      this.logger.debug(
        `${event.protocol} ${event.direction === 'sent' ? 'C:' : 'S:'} ${event.data.trimEnd()}`
      );
    });
  }
}
