/**
 * Built-in scenarios
 *
 * Each scenario builds fresh step state per run, so running one twice
 * never shares sessions or subjects between runs.
 *
 * @packageDocumentation
 */

import type { ImapSession } from '../protocol/imap-session.js';
import type { SmtpSession } from '../protocol/smtp-session.js';
import {
  approximateMessageCount,
  authenticationResults,
  capabilities,
  containsToken,
  fetchedSequenceNumbers,
  hasBye,
  listedMailboxes,
  messageCount,
  type AuthenticationResults
} from '../protocol/facts.js';
import { headerValues } from '../mime/header-parser.js';
import { composeMessage, formatTimestamp, type OutboundMessage } from '../submission/message.js';
import type { SubmissionReceipt } from '../submission/submitter.js';
import type { MailboxMessage } from '../types/mailbox.js';
import type { SmtpReply, TaggedExchange } from '../types/protocol.js';
import { HarnessError } from '../types/errors.js';
import { step, type Scenario, type ScenarioStep } from './step.js';
import type { ScenarioContext } from './context.js';

export const ROUNDTRIP_SUBJECT_PREFIX = 'E2E Test Email';
export const BODY_MARKER = 'full stack is working';
export const AUTH_SUBJECT = 'SPF/DKIM Test Email';

const ROUNDTRIP_BODY = [
  'This message was sent by the mailprobe end-to-end check.',
  '',
  `If you can read this, the ${BODY_MARKER}!`
].join('\n');

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Value left by an earlier step; missing only if step order is broken
 */
function required<T>(value: T | undefined, what: string): T {
  if (value === undefined) {
    throw new HarnessError(`No ${what} from an earlier step`, 'MISSING_STATE', 'assertion');
  }
  return value;
}

/**
 * Text following the first `{n}` literal marker of a FETCH response
 */
export function literalText(response: string): string {
  const marker = /\{\d+\}\r?\n/.exec(response);
  return marker ? response.slice(marker.index + marker[0].length) : '';
}

function showExchange(exchange: TaggedExchange): string {
  return `${exchange.tag} ${exchange.status}${exchange.text ? ` ${exchange.text}` : ''}`;
}

function showReply(reply: SmtpReply): string {
  const last = reply.lines[reply.lines.length - 1] ?? '';
  return `${reply.code}${last ? ` ${last}` : ''}`;
}

/**
 * `* OK` greeting on a new IMAP session
 */
function imapConnect(state: { imap?: ImapSession }, name = 'imap-connect'): ScenarioStep {
  return step({
    name,
    description: 'Open an IMAP connection and read the greeting',
    expected: 'untagged OK greeting',
    action: async ctx => {
      state.imap = await ctx.openImap();
      return state.imap.greeting ?? '';
    },
    check: greeting => /^\* (OK|PREAUTH)\b/i.test(greeting)
  });
}

function imapLogin(state: { imap?: ImapSession }, name = 'imap-login'): ScenarioStep {
  return step({
    name,
    description: 'LOGIN with the configured credentials',
    expected: 'tagged OK',
    action: ctx => {
      const { user, password } = ctx.config.credentials;
      return required(state.imap, 'IMAP session').login(user, password);
    },
    check: exchange => exchange.status === 'OK',
    show: showExchange
  });
}

function imapLogout(
  state: { imap?: ImapSession },
  options: { name?: string; requireBye?: boolean } = {}
): ScenarioStep {
  return step({
    name: options.name ?? 'imap-logout',
    description: 'LOGOUT and close the connection',
    expected: options.requireBye ? 'untagged BYE and tagged OK' : 'tagged OK',
    action: async () => {
      const exchange = await required(state.imap, 'IMAP session').logout();
      state.imap = undefined;
      return exchange;
    },
    check: exchange =>
      exchange.status === 'OK' && (!options.requireBye || hasBye(exchange.raw)),
    show: exchange =>
      options.requireBye && !hasBye(exchange.raw)
        ? `${showExchange(exchange)} without BYE`
        : showExchange(exchange)
  });
}

function smtpCommand(
  state: { smtp?: SmtpSession },
  name: string,
  description: string,
  codes: number[],
  send: (smtp: SmtpSession, ctx: ScenarioContext) => Promise<SmtpReply>
): ScenarioStep {
  return step({
    name,
    description,
    expected: `reply ${codes.join(' or ')}`,
    action: ctx => send(required(state.smtp, 'SMTP session'), ctx),
    check: reply => codes.includes(reply.code),
    show: showReply
  });
}

/**
 * Raw SMTP submission, then the same message read back over IMAP
 */
export const smtpToImapRoundtrip: Scenario = {
  name: 'smtp-to-imap-roundtrip',
  description: 'Submit a message with raw SMTP and read it back over IMAP',
  steps() {
    const state: {
      subject: string;
      smtp?: SmtpSession;
      imap?: ImapSession;
      count?: number;
      fetched?: string;
    } = { subject: `${ROUNDTRIP_SUBJECT_PREFIX} - ${formatTimestamp(new Date())}` };

    return [
      step({
        name: 'smtp-connect',
        description: 'Open an SMTP connection and read the greeting',
        expected: 'reply 220',
        action: async ctx => {
          state.smtp = await ctx.openSmtp();
          return required(state.smtp.greeting, 'SMTP greeting');
        },
        check: reply => reply.code === 220,
        show: showReply
      }),
      smtpCommand(state, 'smtp-ehlo', 'Introduce the client with EHLO', [250],
        (smtp, ctx) => smtp.ehlo(ctx.config.mail.ehloName)),
      smtpCommand(state, 'smtp-mail-from', 'Declare the envelope sender', [250],
        (smtp, ctx) => smtp.mailFrom(ctx.config.mail.from)),
      smtpCommand(state, 'smtp-rcpt-to', 'Declare the envelope recipient', [250, 251],
        (smtp, ctx) => smtp.rcptTo(ctx.config.mail.to)),
      step({
        name: 'smtp-data',
        description: 'Send the message with DATA and the terminating dot',
        expected: 'reply 250 after the message',
        action: ctx => {
          const message: OutboundMessage = {
            from: ctx.config.mail.from,
            to: ctx.config.mail.to,
            subject: state.subject,
            body: ROUNDTRIP_BODY
          };
          ctx.record('subject', state.subject);
          return required(state.smtp, 'SMTP session').data(composeMessage(message));
        },
        check: reply => reply.code === 250,
        show: showReply
      }),
      smtpCommand(state, 'smtp-quit', 'End the SMTP session', [221],
        async smtp => {
          const reply = await smtp.quit();
          state.smtp = undefined;
          return reply;
        }),
      imapConnect(state),
      imapLogin(state),
      step({
        name: 'imap-select',
        description: 'SELECT INBOX until it holds at least one message',
        expected: 'tagged OK with EXISTS >= 1',
        action: async ctx => {
          const imap = required(state.imap, 'IMAP session');
          const until = Date.now() + ctx.config.timeouts.delivery;
          let exchange = await imap.select();
          let count = messageCount(exchange.raw) ?? 0;
          while (exchange.status === 'OK' && count < 1 && Date.now() < until) {
            await delay(ctx.config.timeouts.pollInterval);
            exchange = await imap.select();
            count = messageCount(exchange.raw) ?? 0;
          }
          state.count = count;
          ctx.record('messageCount', count);
          return { status: exchange.status, count };
        },
        check: fact => fact.status === 'OK' && fact.count >= 1,
        show: fact => `${fact.status}, EXISTS ${fact.count}`
      }),
      step({
        name: 'imap-fetch-subject',
        description: 'FETCH the newest message and look for the exact subject',
        expected: 'Subject header matching the submitted subject',
        action: async ctx => {
          const imap = required(state.imap, 'IMAP session');
          let count = required(state.count, 'message count');
          const until = Date.now() + ctx.config.timeouts.delivery;
          let exchange = await imap.fetch(count);
          // Another message may have landed after ours; re-SELECT picks up the new EXISTS
          while (!containsToken(exchange.response, state.subject) && Date.now() < until) {
            await delay(ctx.config.timeouts.pollInterval);
            count = messageCount((await imap.select()).raw) ?? count;
            exchange = await imap.fetch(count);
          }
          state.fetched = exchange.response;
          return headerValues(literalText(exchange.response), 'subject')[0];
        },
        check: subject => subject === state.subject,
        show: subject => subject === undefined ? 'no Subject header' : `Subject: ${subject}`
      }),
      step({
        name: 'imap-fetch-body',
        description: 'Check the fetched message body for the marker text',
        expected: `body containing "${BODY_MARKER}"`,
        action: async () => containsToken(required(state.fetched, 'fetched message'), BODY_MARKER),
        check: found => found,
        show: found => found ? 'marker present' : 'marker missing'
      }),
      imapLogout(state)
    ];
  }
};

/**
 * A rejected LOGIN must leave the session unauthenticated and leave no
 * trace that stops a later valid LOGIN
 */
export const imapInvalidLogin: Scenario = {
  name: 'imap-invalid-login',
  description: 'Reject a bad password and stay unauthenticated',
  steps() {
    const state: { imap?: ImapSession } = {};

    return [
      imapConnect(state),
      step({
        name: 'imap-login-invalid',
        description: 'LOGIN with the invalid password',
        expected: 'tagged NO',
        action: async ctx => {
          const { user, invalidPassword } = ctx.config.credentials;
          const exchange = await required(state.imap, 'IMAP session').login(user, invalidPassword);
          ctx.record('invalidLoginStatus', exchange.status);
          return exchange;
        },
        check: exchange => exchange.status === 'NO',
        show: showExchange
      }),
      step({
        name: 'imap-select-unauthenticated',
        description: 'SELECT INBOX without being logged in',
        expected: 'tagged NO or BAD',
        action: async ctx => {
          const exchange = await required(state.imap, 'IMAP session').select();
          ctx.record('unauthenticatedSelectStatus', exchange.status);
          return exchange;
        },
        check: exchange => exchange.status === 'NO' || exchange.status === 'BAD',
        show: showExchange
      }),
      imapLogout(state),
      imapConnect(state, 'imap-reconnect'),
      imapLogin(state, 'imap-login-valid'),
      imapLogout(state, { name: 'imap-logout-valid' })
    ];
  }
};

/**
 * Delivered message must carry SPF/DKIM verdicts in Authentication-Results
 */
export const authenticationResultsScenario: Scenario = {
  name: 'authentication-results',
  description: 'Submit a message and check the delivered copy for SPF/DKIM results',
  steps() {
    const state: { since?: Date; delivered?: MailboxMessage; results?: AuthenticationResults } = {};

    return [
      step<SubmissionReceipt>({
        name: 'submit',
        description: 'Submit a message to the authentication recipient',
        expected: 'message accepted with 250',
        action: ctx => {
          state.since = new Date();
          const submitter = ctx.submitter();
          ctx.note(`${submitter.kind} submission to ${ctx.config.mail.authRecipient}`);
          return submitter.submit({
            from: ctx.config.mail.from,
            to: ctx.config.mail.authRecipient,
            subject: AUTH_SUBJECT,
            body: 'Checks that the server records SPF and DKIM verdicts.',
            date: state.since
          });
        },
        check: receipt => receipt.accepted,
        show: receipt => receipt.response
      }),
      step({
        name: 'maildir-delivery',
        description: 'Wait for the newest file in the recipient maildir',
        expected: 'a message file created after submission',
        action: async ctx => {
          const recipient = ctx.config.mail.authRecipient;
          ctx.note(`read maildir ${ctx.inspector.directoriesFor(recipient).join(' or ')}`);
          state.delivered = await ctx.inspector.waitForMessage(recipient, {
            since: required(state.since, 'submission time'),
            timeout: ctx.config.timeouts.delivery,
            pollInterval: ctx.config.timeouts.pollInterval
          });
          ctx.note(`read ${state.delivered.path}`, state.delivered.content);
          ctx.record('deliveredFile', state.delivered.path);
          return state.delivered.path;
        },
        check: path => path.length > 0
      }),
      step({
        name: 'authentication-results-header',
        description: 'Look for an Authentication-Results header',
        expected: 'Authentication-Results header present',
        action: async () => {
          state.results = authenticationResults(required(state.delivered, 'delivered message').content);
          return state.results;
        },
        check: results => results.present,
        show: results => results.header ?? 'no Authentication-Results header'
      }),
      step({
        name: 'spf-dkim-results',
        description: 'Read the SPF and DKIM verdicts from the header',
        expected: 'spf= and/or dkim= result',
        action: async ctx => {
          const results = required(state.results, 'authentication results');
          if (results.spf) ctx.record('spf', results.spf);
          if (results.dkim) ctx.record('dkim', results.dkim);
          if (results.dmarc) ctx.record('dmarc', results.dmarc);
          return results;
        },
        check: results => results.spf !== undefined || results.dkim !== undefined,
        show: results => `spf=${results.spf ?? 'missing'} dkim=${results.dkim ?? 'missing'}`
      })
    ];
  }
};

/**
 * Greeting, CAPABILITY, NOOP and LOGOUT without logging in
 */
export const imapSmoke: Scenario = {
  name: 'imap-smoke',
  description: 'Basic IMAP commands that need no login',
  steps() {
    const state: { imap?: ImapSession } = {};

    return [
      imapConnect(state),
      step({
        name: 'imap-capability',
        description: 'Ask for the server capabilities',
        expected: 'tagged OK listing IMAP4rev1',
        action: async ctx => {
          const exchange = await required(state.imap, 'IMAP session').capability();
          const caps = capabilities(exchange.raw);
          ctx.record('capabilities', caps.join(' '));
          return { status: exchange.status, caps };
        },
        check: fact => fact.status === 'OK' && fact.caps.includes('IMAP4REV1'),
        show: fact => `${fact.status} ${fact.caps.join(' ') || '(no capabilities)'}`
      }),
      step({
        name: 'imap-noop',
        description: 'NOOP',
        expected: 'tagged OK',
        action: () => required(state.imap, 'IMAP session').noop(),
        check: exchange => exchange.status === 'OK',
        show: showExchange
      }),
      imapLogout(state, { requireBye: true })
    ];
  }
};

/**
 * Authenticated walk through SELECT, FETCH of every message and LIST
 */
export const imapFullFlow: Scenario = {
  name: 'imap-full-flow',
  description: 'LOGIN, SELECT, FETCH 1:*, LIST and LOGOUT on one session',
  steps() {
    const state: { imap?: ImapSession } = {};

    return [
      imapConnect(state),
      imapLogin(state),
      step({
        name: 'imap-select',
        description: 'SELECT INBOX',
        expected: 'tagged OK',
        action: async ctx => {
          const exchange = await required(state.imap, 'IMAP session').select();
          const count = messageCount(exchange.raw);
          if (count !== undefined) ctx.record('messageCount', count);
          return exchange;
        },
        check: exchange => exchange.status === 'OK',
        show: showExchange
      }),
      step({
        name: 'imap-fetch-all',
        description: 'FETCH every message body',
        expected: 'tagged OK',
        action: async ctx => {
          const exchange = await required(state.imap, 'IMAP session').fetch('1:*');
          ctx.record('approximateMessageCount', approximateMessageCount(exchange.raw));
          ctx.record('fetchedCount', fetchedSequenceNumbers(exchange.raw).length);
          return exchange;
        },
        check: exchange => exchange.status === 'OK',
        show: showExchange
      }),
      step({
        name: 'imap-list',
        description: 'LIST all mailboxes',
        expected: 'tagged OK listing INBOX',
        action: async ctx => {
          const exchange = await required(state.imap, 'IMAP session').list();
          const names = listedMailboxes(exchange.raw);
          ctx.record('mailboxes', names.join(', '));
          return { status: exchange.status, names };
        },
        check: fact =>
          fact.status === 'OK' && fact.names.some(name => name.toUpperCase() === 'INBOX'),
        show: fact => `${fact.status} ${fact.names.join(', ') || '(no mailboxes)'}`
      }),
      imapLogout(state)
    ];
  }
};

export const SCENARIOS: readonly Scenario[] = [
  smtpToImapRoundtrip,
  imapInvalidLogin,
  authenticationResultsScenario,
  imapSmoke,
  imapFullFlow
];

export function findScenario(name: string): Scenario | undefined {
  return SCENARIOS.find(scenario => scenario.name === name);
}
