/**
 * Mailbox types for mailprobe
 */

/**
 * One delivered message read from a maildir
 */
export interface MailboxMessage {
  /** Recipient address whose mailbox holds the message */
  recipient: string;
  /** Absolute or root-relative path of the message file */
  path: string;
  /** Creation time of the file (birth time where the filesystem records it) */
  createdAt: Date;
  /** Full raw message */
  content: string;
}
