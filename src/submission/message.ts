/**
 * Outbound test messages
 */

/**
 * Message handed to a submitter
 */
export interface OutboundMessage {
  from: string;
  to: string;
  subject: string;
  body: string;
  date?: Date;
  messageId?: string;
  /** Extra header lines, without line endings */
  headers?: Record<string, string>;
}

const DAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
                'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Formats a date for the Date header (RFC 5322, always UTC)
 */
export function formatDateHeader(date: Date): string {
  return `${DAYS[date.getUTCDay()]}, ${date.getUTCDate()} ${MONTHS[date.getUTCMonth()]} ` +
    `${date.getUTCFullYear()} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:` +
    `${pad(date.getUTCSeconds())} +0000`;
}

/**
 * `YYYY-MM-DD HH:MM:SS` in UTC, used to make subjects unique per run
 */
export function formatTimestamp(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}

/**
 * Renders a message as RFC 5322 text with CRLF line endings
 */
export function composeMessage(message: OutboundMessage): string {
  const lines = [
    `From: ${message.from}`,
    `To: ${message.to}`,
    `Subject: ${message.subject}`,
    `Date: ${formatDateHeader(message.date ?? new Date())}`
  ];
  if (message.messageId) {
    lines.push(`Message-ID: <${message.messageId}>`);
  }
  for (const [name, value] of Object.entries(message.headers ?? {})) {
    lines.push(`${name}: ${value}`);
  }
  lines.push('');
  lines.push(...message.body.replace(/\r\n/g, '\n').split('\n'));
  return lines.join('\r\n');
}
