import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ImapSession } from '../../src/protocol/imap-session.js';
import type { TranscriptEvent } from '../../src/types/protocol.js';
import {
  ConnectionClosedError,
  ProtocolViolationError,
  TimeoutError
} from '../../src/types/errors.js';
import { FakeImapServer } from '../helpers/fake-imap-server.js';

const MESSAGE = 'Subject: hello\r\n\r\nA001 OK pretend completion\r\n';

describe('ImapSession', () => {
  let server: FakeImapServer;
  let port: number;
  let session: ImapSession | undefined;

  const open = async (extra: { commandTimeout?: number; tagPrefix?: string } = {}) => {
    session = await ImapSession.open({ host: '127.0.0.1', port, pollInterval: 20, ...extra });
    return session;
  };

  beforeEach(async () => {
    server = new FakeImapServer({ messages: [MESSAGE] });
    port = await server.start();
  });

  afterEach(async () => {
    await session?.close();
    session = undefined;
    await server.stop();
  });

  it('reads the greeting on open', async () => {
    const imap = await open();
    expect(imap.greeting).toBe('* OK [CAPABILITY IMAP4rev1] Fake IMAP ready');
    expect(imap.isOpen).toBe(true);
  });

  it('generates increasing zero-padded tags', async () => {
    const imap = await open();
    expect(imap.generateTag()).toBe('A001');
    expect(imap.generateTag()).toBe('A002');
    expect(imap.issuedCount).toBe(2);
  });

  it('uses a custom tag prefix', async () => {
    const imap = await open({ tagPrefix: 'T' });
    const exchange = await imap.noop();
    expect(exchange.tag).toBe('T001');
    expect(server.received[0].raw).toBe('T001 NOOP');
  });

  it('returns OK and NO completions as exchanges', async () => {
    const imap = await open();
    const bad = await imap.login('test@example.com', 'wrongpass');
    expect(bad.status).toBe('NO');
    expect(bad.text).toBe('[AUTHENTICATIONFAILED] Invalid credentials');

    const good = await imap.login('test@example.com', 'password123');
    expect(good).toMatchObject({ tag: 'A002', status: 'OK', text: 'LOGIN completed' });
    expect(good.command).toBe('LOGIN test@example.com ****');
  });

  it('keeps untagged lines in the response', async () => {
    const imap = await open();
    await imap.login('test@example.com', 'password123');
    const select = await imap.select();
    expect(select.response).toBe([
      '* FLAGS (\\Answered \\Flagged \\Deleted \\Seen \\Draft)',
      '* 1 EXISTS',
      '* 0 RECENT',
      '* OK [UIDVALIDITY 1] UIDs valid',
      'A002 OK [READ-WRITE] SELECT completed',
      ''
    ].join('\r\n'));
  });

  it('reads a literal containing a fake completion line', async () => {
    const imap = await open();
    await imap.login('test@example.com', 'password123');
    await imap.select();
    const fetch = await imap.fetch(1);
    expect(fetch.tag).toBe('A003');
    expect(fetch.text).toBe('FETCH completed');
    expect(fetch.response).toContain(MESSAGE);
    expect(fetch.raw.toString('utf8')).toBe(fetch.response);
  });

  it('redacts the password in the transcript and lastCommand', async () => {
    const imap = await open();
    const events: TranscriptEvent[] = [];
    imap.on('transcript', (event: TranscriptEvent) => events.push(event));
    await imap.login('test@example.com', 'password123');

    expect(imap.lastCommand).toBe('A001 LOGIN test@example.com ****');
    expect(events[0]).toEqual({ protocol: 'IMAP', direction: 'sent', data: 'A001 LOGIN test@example.com ****' });
    expect(events[1]).toEqual({ protocol: 'IMAP', direction: 'received', data: 'A001 OK LOGIN completed\r\n' });
  });

  it('logs out with BYE and closes', async () => {
    const imap = await open();
    const logout = await imap.logout();
    expect(logout.status).toBe('OK');
    expect(logout.response).toBe('* BYE Fake IMAP logging out\r\nA001 OK LOGOUT completed\r\n');
    expect(imap.isOpen).toBe(false);
  });

  it('times out when the completion never arrives', async () => {
    server.override = command => (command.verb === 'NOOP' ? ['* 1 EXISTS'] : undefined);
    const imap = await open({ commandTimeout: 150 });
    const attempt = imap.noop();
    await expect(attempt).rejects.toBeInstanceOf(TimeoutError);
    await expect(attempt).rejects.toMatchObject({ response: '* 1 EXISTS\r\n' });
    expect(imap.lastCommand).toBe('A001 NOOP');
    expect(imap.lastResponse).toBe('* 1 EXISTS\r\n');
  });

  it('treats a foreign tag as a protocol violation', async () => {
    server.override = command => (command.verb === 'NOOP' ? ['Z999 OK not yours'] : undefined);
    const imap = await open();
    await expect(imap.noop()).rejects.toBeInstanceOf(ProtocolViolationError);
  });

  it('rejects a second command while one is in flight', async () => {
    server.override = command => (command.verb === 'NOOP' ? [] : undefined);
    const imap = await open({ commandTimeout: 200 });
    const first = imap.noop();
    await expect(imap.capability()).rejects.toBeInstanceOf(ProtocolViolationError);
    await expect(first).rejects.toBeInstanceOf(TimeoutError);
  });

  it('rejects a greeting that is not OK or PREAUTH', async () => {
    await server.stop();
    server = new FakeImapServer({ greeting: '* BYE go away' });
    port = await server.start();
    await expect(open()).rejects.toBeInstanceOf(ProtocolViolationError);
  });

  it('reports a peer that closes mid-command', async () => {
    server.override = (command, conn) => {
      if (command.verb === 'NOOP') {
        conn.socket.end();
        return [];
      }
      return undefined;
    };
    const imap = await open();
    await expect(imap.noop()).rejects.toBeInstanceOf(ConnectionClosedError);
  });
});
