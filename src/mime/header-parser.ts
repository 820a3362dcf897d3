/**
 * Message Header Parser
 *
 * Reads RFC 5322 header blocks out of raw messages, including folded
 * (multi-line) header fields.
 *
 * @packageDocumentation
 */

/**
 * Header name to values, in order of appearance. Names are lowercased.
 */
export type Headers = Map<string, string[]>;

/**
 * Returns the header block of a raw message (everything before the first
 * empty line), or the whole text when there is no body
 */
export function headerBlock(raw: string): string {
  const match = /\r?\n\r?\n/.exec(raw);
  return match ? raw.slice(0, match.index) : raw;
}

/**
 * Unfolds folded headers (RFC 5322 2.2.3)
 * Folded headers have CRLF followed by whitespace
 *
 * @param block - Raw header block with potential folding
 * @returns Unfolded header block
 */
export function unfoldHeaders(block: string): string {
  // Also handle bare LF for compatibility
  return block
    .replace(/\r\n[ \t]+/g, ' ')
    .replace(/\n[ \t]+/g, ' ');
}

/**
 * Parses a header block into name/value pairs
 *
 * @param block - Raw header block (headers separated by CRLF)
 * @returns Map of lowercased header names to their values
 */
export function parseHeaders(block: string): Headers {
  const headers: Headers = new Map();
  const lines = unfoldHeaders(block).split(/\r?\n/);

  for (const line of lines) {
    if (!line.trim()) continue;

    const colonIndex = line.indexOf(':');
    if (colonIndex <= 0) continue;

    const name = line.substring(0, colonIndex).trim().toLowerCase();
    if (/\s/.test(name)) continue;

    const value = line.substring(colonIndex + 1).trim();
    const existing = headers.get(name);
    if (existing) {
      existing.push(value);
    } else {
      headers.set(name, [value]);
    }
  }

  return headers;
}

/**
 * All values of one header in a raw message, unfolded
 */
export function headerValues(raw: string, name: string): string[] {
  return parseHeaders(headerBlock(raw)).get(name.toLowerCase()) ?? [];
}
