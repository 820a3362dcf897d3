/**
 * Response Fact Extractor
 *
 * Pure functions turning raw response text into facts. No I/O.
 *
 * @packageDocumentation
 */

import { scanImapResponse, topLevelLines } from './parser.js';
import { headerValues } from '../mime/header-parser.js';
import type { ResponseStatus } from '../types/protocol.js';

/**
 * Scalar fact recorded in scenario summaries
 */
export type FactValue = string | number | boolean;

/**
 * Response as decoded text or as the bytes received. Pass the bytes
 * (`TaggedExchange.raw`) when a literal may hold non-UTF-8 data.
 */
export type ResponseInput = string | Buffer;

function toBytes(input: ResponseInput): Buffer {
  return typeof input === 'string' ? Buffer.from(input, 'utf8') : input;
}

/**
 * Message count announced by `* <N> EXISTS`; the last such line wins.
 */
export function messageCount(text: ResponseInput): number | undefined {
  let count: number | undefined;
  for (const line of topLevelLines(text)) {
    const match = /^\* (\d+) EXISTS\s*$/i.exec(line);
    if (match) {
      count = parseInt(match[1], 10);
    }
  }
  return count;
}

/**
 * Status of the completion line for `tag`, ignoring "OK" anywhere else
 */
export function taggedStatus(text: ResponseInput, tag: string): ResponseStatus | undefined {
  const scan = scanImapResponse(toBytes(text), tag);
  return scan.complete ? scan.completion?.status : undefined;
}

/**
 * True iff the completion line for `tag` says OK
 */
export function statusOk(text: ResponseInput, tag: string): boolean {
  return taggedStatus(text, tag) === 'OK';
}

/**
 * Case-preserving substring check
 */
export function containsToken(text: string, needle: string): boolean {
  return text.includes(needle);
}

/**
 * Lines beginning with "* ", minus one, never below zero.
 *
 * An approximation: every untagged informational line (FLAGS, OK
 * [UIDVALIDITY], ...) inflates it. Use `fetchedSequenceNumbers` when an
 * exact count of FETCH items is needed.
 */
export function approximateMessageCount(text: ResponseInput): number {
  // latin1 keeps one character per byte; only line starts matter here
  const decoded = typeof text === 'string' ? text : text.toString('latin1');
  const untagged = decoded.split(/\r?\n/).filter(line => line.startsWith('* ')).length;
  return Math.max(0, untagged - 1);
}

/**
 * Sequence numbers of the `* <n> FETCH` items in a response
 */
export function fetchedSequenceNumbers(text: ResponseInput): number[] {
  const numbers: number[] = [];
  for (const line of topLevelLines(text)) {
    const match = /^\* (\d+) FETCH\b/i.exec(line);
    if (match) {
      numbers.push(parseInt(match[1], 10));
    }
  }
  return numbers;
}

/**
 * Capabilities from `* CAPABILITY ...` lines or `[CAPABILITY ...]` codes,
 * uppercased and de-duplicated
 */
export function capabilities(text: ResponseInput): string[] {
  const found = new Set<string>();
  for (const line of topLevelLines(text)) {
    const match = /^\* CAPABILITY (.+)$/i.exec(line) ?? /\[CAPABILITY ([^\]]+)\]/i.exec(line);
    if (match) {
      for (const cap of match[1].trim().split(/\s+/)) {
        found.add(cap.toUpperCase());
      }
    }
  }
  return [...found];
}

/**
 * Mailbox names from `* LIST (...) "<delim>" <name>` lines
 */
export function listedMailboxes(text: ResponseInput): string[] {
  const names: string[] = [];
  for (const line of topLevelLines(text)) {
    const match = /^\* LIST \([^)]*\) (?:"(?:[^"\\]|\\.)*"|NIL) (.+)$/i.exec(line);
    if (!match) continue;
    const raw = match[1].trim();
    const quoted = /^"((?:[^"\\]|\\.)*)"$/.exec(raw);
    names.push(quoted ? quoted[1].replace(/\\(.)/g, '$1') : raw);
  }
  return names;
}

/**
 * Whether an untagged `* BYE` line is present
 */
export function hasBye(text: ResponseInput): boolean {
  return topLevelLines(text).some(line => /^\* BYE\b/i.test(line));
}

/**
 * Three-digit code of the final line of an SMTP reply
 */
export function smtpReplyCode(text: string): number | undefined {
  const lines = text.split(/\r?\n/).filter(line => line.length > 0);
  const last = lines[lines.length - 1];
  const match = last ? /^(\d{3})(?:[ -]|$)/.exec(last) : null;
  return match ? parseInt(match[1], 10) : undefined;
}

/**
 * Facts read from `Authentication-Results:` headers
 */
export interface AuthenticationResults {
  /** Whether at least one Authentication-Results header exists */
  present: boolean;
  /** Unfolded header values, joined with "; " */
  header?: string;
  /** SPF result (e.g. "pass", "none"), lowercased */
  spf?: string;
  /** DKIM result, lowercased */
  dkim?: string;
  /** DMARC result, lowercased */
  dmarc?: string;
}

function methodResult(value: string, method: string): string | undefined {
  const match = new RegExp(`\\b${method}=([A-Za-z]+)`, 'i').exec(value);
  return match ? match[1].toLowerCase() : undefined;
}

/**
 * Extracts SPF/DKIM/DMARC results from the Authentication-Results
 * headers of a raw message. Folded continuation lines count as part of
 * the header; matching is case-insensitive.
 */
export function authenticationResults(raw: string): AuthenticationResults {
  const values = headerValues(raw, 'authentication-results');
  if (values.length === 0) {
    return { present: false };
  }
  const header = values.join('; ');
  return {
    present: true,
    header,
    spf: methodResult(header, 'spf'),
    dkim: methodResult(header, 'dkim'),
    dmarc: methodResult(header, 'dmarc')
  };
}
