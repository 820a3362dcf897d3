/**
 * Command Builder
 *
 * Builds IMAP and SMTP command lines. IMAP commands are returned without
 * the tag; the session adds it when the command is issued.
 *
 * @packageDocumentation
 */

/**
 * Escapes a string for use as an IMAP astring
 * Handles quoting and escaping special characters
 */
export function escapeString(value: string): string {
  if (value.includes('"') || value.includes('\\')) {
    const escaped = value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
    return `"${escaped}"`;
  }

  if (value.includes(' ') || value.length === 0) {
    return `"${value}"`;
  }

  if (/[(){}[\]%*\x00-\x1f\x7f]/.test(value)) {
    return `"${value}"`;
  }

  return value;
}

/**
 * Message item sets accepted by FETCH helpers
 */
export type FetchItems = 'BODY[]' | 'BODY[HEADER]' | 'BODY.PEEK[]' | 'FLAGS' | 'RFC822' | string;

/**
 * CommandBuilder for IMAP commands (untagged form)
 */
export class CommandBuilder {
  static login(user: string, password: string): string {
    return `LOGIN ${escapeString(user)} ${escapeString(password)}`;
  }

  static select(mailbox: string): string {
    return `SELECT ${escapeString(mailbox)}`;
  }

  /**
   * @param sequence - sequence set such as `3` or `1:*`
   */
  static fetch(sequence: number | string, items: FetchItems = 'BODY[]'): string {
    return `FETCH ${sequence} ${items}`;
  }

  static list(reference = '', pattern = '*'): string {
    return `LIST "${reference}" "${pattern}"`;
  }

  static capability(): string {
    return 'CAPABILITY';
  }

  static noop(): string {
    return 'NOOP';
  }

  static logout(): string {
    return 'LOGOUT';
  }

  /**
   * LOGIN with the password replaced, for transcripts and diagnostics
   */
  static redactLogin(command: string): string {
    const match = /^(LOGIN\s+("(?:[^"\\]|\\.)*"|\S+)\s+).+$/i.exec(command);
    return match ? `${match[1]}****` : command;
  }
}

/**
 * SmtpCommands builds SMTP command lines and DATA payloads
 */
export class SmtpCommands {
  static ehlo(name: string): string {
    return `EHLO ${name}`;
  }

  static mailFrom(address: string): string {
    return `MAIL FROM:<${address}>`;
  }

  static rcptTo(address: string): string {
    return `RCPT TO:<${address}>`;
  }

  static data(): string {
    return 'DATA';
  }

  static quit(): string {
    return 'QUIT';
  }

  /**
   * Prepares a message for the DATA phase: normalizes line endings to
   * CRLF, doubles leading dots (RFC 5321 4.5.2) and appends the
   * terminating `.` line.
   */
  static dataPayload(message: string): string {
    const lines = message.replace(/\r\n/g, '\n').split('\n');
    if (lines.length > 0 && lines[lines.length - 1] === '') {
      lines.pop();
    }
    const stuffed = lines.map(line => (line.startsWith('.') ? `.${line}` : line));
    return `${stuffed.join('\r\n')}\r\n.\r\n`;
  }
}
