/**
 * Response framing
 *
 * Decides where a server response ends. IMAP responses end at the line
 * carrying the command's tag; SMTP replies end at the first status line
 * whose code is followed by a space instead of a dash.
 *
 * @packageDocumentation
 */

import type { ResponseStatus, SmtpReply, TaggedResponse } from '../types/protocol.js';

const TAGGED_LINE = /^(\S+) (OK|NO|BAD)(?:\s+(.*))?$/i;
const LITERAL_MARKER = /\{(\d+)\+?\}$/;
const SMTP_LINE = /^(\d{3})(?:([ -])(.*))?$/;

/**
 * Checks if a string is a valid response status
 */
export function isResponseStatus(value: string): value is ResponseStatus {
  return value === 'OK' || value === 'NO' || value === 'BAD';
}

/**
 * Checks if a line is a tagged response
 * Tagged responses start with a tag (e.g., "A001") followed by OK/NO/BAD
 */
export function isTaggedResponse(line: string): boolean {
  const trimmed = line.trim();
  if (isUntaggedResponse(trimmed) || isContinuationResponse(trimmed)) {
    return false;
  }
  return TAGGED_LINE.test(trimmed);
}

/**
 * Checks if a line is an untagged response ("* ...")
 */
export function isUntaggedResponse(line: string): boolean {
  return line.startsWith('*');
}

/**
 * Checks if a line is a continuation request ("+ ...")
 */
export function isContinuationResponse(line: string): boolean {
  return line.trim().startsWith('+');
}

/**
 * Parses a tagged response line
 *
 * @param line - The tagged response line (e.g., "A001 OK Success")
 * @returns The parsed line, or undefined when it is not a tagged completion
 */
export function parseTaggedResponse(line: string): TaggedResponse | undefined {
  const match = TAGGED_LINE.exec(line.trim());
  if (!match) {
    return undefined;
  }

  const status = match[2].toUpperCase();
  if (!isResponseStatus(status)) {
    return undefined;
  }

  return {
    tag: match[1],
    status,
    text: (match[3] ?? '').trim()
  };
}

/**
 * Result of scanning an IMAP response buffer for a completion line
 */
export interface ImapScanResult {
  /** Whether the completion line for the tag was found */
  complete: boolean;
  /** Parsed completion line */
  completion?: TaggedResponse;
  /** Byte offset just past the completion line (or of the scanned prefix) */
  end: number;
  /** A line that breaks the protocol, if one was found */
  violation?: { line: string; reason: string };
}

interface RawLine {
  text: string;
  next: number;
}

/**
 * Reads the line starting at `pos`, accepting CRLF or a bare LF
 */
function readLine(buffer: Buffer, pos: number): RawLine | undefined {
  const lf = buffer.indexOf(0x0a, pos);
  if (lf === -1) {
    return undefined;
  }
  const stop = lf > pos && buffer[lf - 1] === 0x0d ? lf - 1 : lf;
  return { text: buffer.toString('utf8', pos, stop), next: lf + 1 };
}

/**
 * Scans buffered IMAP response bytes for the completion line of `tag`.
 *
 * Literal payloads (`{N}` at the end of a line) are skipped byte for byte,
 * so a message body that happens to contain "A001 OK" is never mistaken
 * for the completion line. Any other tagged line is a violation.
 */
export function scanImapResponse(buffer: Buffer, tag: string): ImapScanResult {
  let pos = 0;

  for (;;) {
    const line = readLine(buffer, pos);
    if (!line) {
      return { complete: false, end: pos };
    }

    // A line ending in {N} continues after the N literal bytes, possibly
    // through further literals
    let current = line;
    let literal = LITERAL_MARKER.exec(current.text);
    while (literal) {
      const after = current.next + parseInt(literal[1], 10);
      const rest = after <= buffer.length ? readLine(buffer, after) : undefined;
      if (!rest) {
        return { complete: false, end: pos };
      }
      current = rest;
      literal = LITERAL_MARKER.exec(current.text);
    }

    pos = current.next;
    if (current !== line) {
      continue;
    }
    const text = line.text;

    if (text.length === 0 || isUntaggedResponse(text) || isContinuationResponse(text)) {
      continue;
    }

    const firstToken = text.split(' ', 1)[0];
    if (firstToken !== tag) {
      return {
        complete: false,
        end: pos,
        violation: { line: text, reason: `unexpected tag "${firstToken}" while waiting for ${tag}` }
      };
    }

    const completion = parseTaggedResponse(text);
    if (!completion) {
      return {
        complete: false,
        end: pos,
        violation: { line: text, reason: `completion line for ${tag} has no OK/NO/BAD status` }
      };
    }

    return { complete: true, completion, end: pos };
  }
}

/**
 * Top-level lines of an IMAP response. Literal payloads are left out,
 * with their announcing line kept, so body text never shows up as a
 * protocol line.
 */
export function topLevelLines(response: string | Buffer): string[] {
  // Literal lengths are byte counts, so a string is scanned as its UTF-8 bytes
  const buffer = typeof response === 'string' ? Buffer.from(response, 'utf8') : response;
  const lines: string[] = [];
  let pos = 0;

  while (pos < buffer.length) {
    const line = readLine(buffer, pos) ?? { text: buffer.toString('utf8', pos), next: buffer.length };
    lines.push(line.text);
    const literal = LITERAL_MARKER.exec(line.text);
    pos = literal ? Math.min(buffer.length, line.next + parseInt(literal[1], 10)) : line.next;
  }

  return lines;
}

/**
 * Result of scanning buffered SMTP bytes for one reply
 */
export interface SmtpScanResult {
  complete: boolean;
  reply?: SmtpReply;
  /** Byte offset just past the reply */
  end: number;
  violation?: { line: string; reason: string };
}

/**
 * Scans buffered SMTP bytes for one complete (possibly multi-line) reply
 */
export function scanSmtpReply(buffer: Buffer): SmtpScanResult {
  let pos = 0;
  const texts: string[] = [];
  const raw: string[] = [];
  let code: number | undefined;

  for (;;) {
    const line = readLine(buffer, pos);
    if (!line) {
      return { complete: false, end: 0 };
    }
    pos = line.next;

    const match = SMTP_LINE.exec(line.text);
    if (!match) {
      return {
        complete: false,
        end: pos,
        violation: { line: line.text, reason: 'reply line does not start with a three-digit code' }
      };
    }

    const lineCode = parseInt(match[1], 10);
    if (code !== undefined && lineCode !== code) {
      return {
        complete: false,
        end: pos,
        violation: { line: line.text, reason: `reply code changed from ${code} to ${lineCode} mid-reply` }
      };
    }
    code = lineCode;
    texts.push(match[3] ?? '');
    raw.push(line.text);

    if (match[2] !== '-') {
      return {
        complete: true,
        end: pos,
        reply: {
          code,
          lines: texts,
          text: texts.join(' ').trim(),
          raw: raw.join('\r\n')
        }
      };
    }
  }
}
