import { describe, it, expect } from 'vitest';
import {
  isContinuationResponse,
  isTaggedResponse,
  isUntaggedResponse,
  parseTaggedResponse,
  scanImapResponse,
  scanSmtpReply,
  topLevelLines
} from '../../src/protocol/parser.js';

const buf = (text: string): Buffer => Buffer.from(text, 'utf8');

describe('Line classification', () => {
  it('recognizes tagged completions', () => {
    expect(isTaggedResponse('A001 OK LOGIN completed')).toBe(true);
    expect(isTaggedResponse('A002 NO [AUTHENTICATIONFAILED] bad')).toBe(true);
    expect(isTaggedResponse('* OK ready')).toBe(false);
    expect(isTaggedResponse('+ go ahead')).toBe(false);
  });

  it('recognizes untagged and continuation lines', () => {
    expect(isUntaggedResponse('* 3 EXISTS')).toBe(true);
    expect(isUntaggedResponse('A001 OK')).toBe(false);
    expect(isContinuationResponse('+ Ready')).toBe(true);
  });

  it('parses a tagged line into tag, status and text', () => {
    expect(parseTaggedResponse('A003 ok [READ-WRITE] SELECT completed')).toEqual({
      tag: 'A003',
      status: 'OK',
      text: '[READ-WRITE] SELECT completed'
    });
    expect(parseTaggedResponse('A004 BAD')).toEqual({ tag: 'A004', status: 'BAD', text: '' });
    expect(parseTaggedResponse('A005 MAYBE later')).toBeUndefined();
  });
});

describe('scanImapResponse', () => {
  it('completes on the line carrying the tag', () => {
    const text = '* 2 EXISTS\r\n* 0 RECENT\r\nA001 OK SELECT completed\r\n';
    const scan = scanImapResponse(buf(text), 'A001');
    expect(scan.complete).toBe(true);
    expect(scan.completion).toEqual({ tag: 'A001', status: 'OK', text: 'SELECT completed' });
    expect(scan.end).toBe(Buffer.byteLength(text));
  });

  it('stops at the completion line and leaves later bytes alone', () => {
    const first = 'A001 OK done\r\n';
    const scan = scanImapResponse(buf(`${first}* BYE extra\r\n`), 'A001');
    expect(scan.complete).toBe(true);
    expect(scan.end).toBe(first.length);
  });

  it('is incomplete while the completion line is missing or partial', () => {
    expect(scanImapResponse(buf('* 1 EXISTS\r\n'), 'A001').complete).toBe(false);
    expect(scanImapResponse(buf('* 1 EXISTS\r\nA001 OK par'), 'A001').complete).toBe(false);
  });

  it('accepts bare LF line endings', () => {
    const scan = scanImapResponse(buf('* 1 EXISTS\nA001 NO nope\n'), 'A001');
    expect(scan.complete).toBe(true);
    expect(scan.completion?.status).toBe('NO');
  });

  it('skips literal payloads that contain a fake completion line', () => {
    const body = 'Subject: trap\r\n\r\nA001 OK not really\r\n';
    const text = `* 1 FETCH (BODY[] {${Buffer.byteLength(body)}}\r\n${body})\r\nA001 OK FETCH completed\r\n`;
    const scan = scanImapResponse(buf(text), 'A001');
    expect(scan.complete).toBe(true);
    expect(scan.completion?.text).toBe('FETCH completed');
    expect(scan.end).toBe(Buffer.byteLength(text));
  });

  it('waits for the rest of a literal before completing', () => {
    const text = '* 1 FETCH (BODY[] {20}\r\nonly part';
    expect(scanImapResponse(buf(text), 'A001')).toEqual({ complete: false, end: 0 });
  });

  it('counts literal sizes in bytes, not characters', () => {
    const body = 'café\r\n';
    const text = `* 1 FETCH (BODY[] {${Buffer.byteLength(body)}}\r\n${body})\r\nA007 OK done\r\n`;
    const scan = scanImapResponse(buf(text), 'A007');
    expect(scan.complete).toBe(true);
  });

  it('reports a foreign tag as a violation', () => {
    const scan = scanImapResponse(buf('* 1 EXISTS\r\nB009 OK stray\r\n'), 'A001');
    expect(scan.complete).toBe(false);
    expect(scan.violation).toEqual({
      line: 'B009 OK stray',
      reason: 'unexpected tag "B009" while waiting for A001'
    });
  });

  it('reports our tag without a status as a violation', () => {
    const scan = scanImapResponse(buf('A001 MAYBE\r\n'), 'A001');
    expect(scan.violation?.reason).toBe('completion line for A001 has no OK/NO/BAD status');
  });
});

describe('topLevelLines', () => {
  it('leaves literal payloads out', () => {
    const body = '* 99 EXISTS\r\n';
    const text = `* 1 FETCH (BODY[] {${body.length}}\r\n${body})\r\nA001 OK done\r\n`;
    expect(topLevelLines(text)).toEqual([
      `* 1 FETCH (BODY[] {${body.length}}`,
      ')',
      'A001 OK done'
    ]);
  });

  it('keeps a trailing line without a newline', () => {
    expect(topLevelLines('* OK a\r\nA001 OK b')).toEqual(['* OK a', 'A001 OK b']);
  });
});

describe('scanSmtpReply', () => {
  it('reads a single-line reply', () => {
    const scan = scanSmtpReply(buf('220 mail.test ESMTP ready\r\n'));
    expect(scan.complete).toBe(true);
    expect(scan.reply).toEqual({
      code: 220,
      lines: ['mail.test ESMTP ready'],
      text: 'mail.test ESMTP ready',
      raw: '220 mail.test ESMTP ready'
    });
  });

  it('joins multi-line replies until the space separator', () => {
    const text = '250-mail.test\r\n250-PIPELINING\r\n250 8BITMIME\r\n';
    const scan = scanSmtpReply(buf(text));
    expect(scan.complete).toBe(true);
    expect(scan.reply?.code).toBe(250);
    expect(scan.reply?.lines).toEqual(['mail.test', 'PIPELINING', '8BITMIME']);
    expect(scan.reply?.raw).toBe('250-mail.test\r\n250-PIPELINING\r\n250 8BITMIME');
    expect(scan.end).toBe(text.length);
  });

  it('accepts a bare code as a final line', () => {
    const scan = scanSmtpReply(buf('354\r\n'));
    expect(scan.reply?.code).toBe(354);
    expect(scan.reply?.text).toBe('');
  });

  it('is incomplete until the final line arrives', () => {
    expect(scanSmtpReply(buf('250-first\r\n')).complete).toBe(false);
    expect(scanSmtpReply(buf('250 partial')).complete).toBe(false);
  });

  it('flags a line without a code', () => {
    const scan = scanSmtpReply(buf('hello there\r\n'));
    expect(scan.violation?.reason).toBe('reply line does not start with a three-digit code');
  });

  it('flags a code change inside one reply', () => {
    const scan = scanSmtpReply(buf('250-one\r\n251 two\r\n'));
    expect(scan.violation?.reason).toBe('reply code changed from 250 to 251 mid-reply');
  });
});
