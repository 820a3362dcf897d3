/**
 * Mailbox Inspector
 *
 * Reads delivered messages straight from the maildir of the server under
 * test. Read-only: nothing is moved, flagged or deleted.
 *
 * @packageDocumentation
 */

import { readdir, readFile, stat } from 'fs/promises';
import { join } from 'path';
import type { MailboxMessage } from '../types/mailbox.js';
import { NotFoundError, TimeoutError } from '../types/errors.js';

/**
 * Where and how to look for messages
 */
export interface MailboxInspectorOptions {
  /** Primary maildir root */
  root: string;
  /** Optional second root, tried only when the primary directory is missing or empty */
  fallbackRoot?: string;
  /** Directory below `<root>/<recipient>` holding message files (default: "new") */
  subdirectory?: string;
}

interface Candidate {
  path: string;
  createdAt: number;
  modifiedAt: number;
  name: string;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

/**
 * Newer first: creation time, then modification time, then file name
 */
function compareNewestFirst(a: Candidate, b: Candidate): number {
  return (
    b.createdAt - a.createdAt ||
    b.modifiedAt - a.modifiedAt ||
    (a.name < b.name ? 1 : a.name > b.name ? -1 : 0)
  );
}

export class MailboxInspector {
  private readonly roots: string[];
  private readonly subdirectory: string;

  constructor(options: MailboxInspectorOptions) {
    this.roots = options.fallbackRoot ? [options.root, options.fallbackRoot] : [options.root];
    this.subdirectory = options.subdirectory ?? 'new';
  }

  /**
   * Directories searched for `recipient`, in order
   */
  directoriesFor(recipient: string): string[] {
    return this.roots.map(root => join(root, recipient, this.subdirectory));
  }

  /**
   * Most recently created message for `recipient`
   *
   * @throws NotFoundError if every configured directory is absent or empty
   */
  async latestMessage(recipient: string): Promise<MailboxMessage> {
    const directories = this.directoriesFor(recipient);

    for (const directory of directories) {
      const newest = await this.newestIn(directory);
      if (newest) {
        const content = await readFile(newest.path, 'utf8');
        return {
          recipient,
          path: newest.path,
          createdAt: new Date(newest.createdAt),
          content
        };
      }
    }

    throw new NotFoundError(
      `No message for ${recipient} in ${directories.join(' or ')}`,
      directories
    );
  }

  /**
   * Polls until a message created at or after `since` exists
   *
   * @throws TimeoutError if none shows up within `timeout`
   */
  async waitForMessage(
    recipient: string,
    options: { since: Date; timeout: number; pollInterval?: number }
  ): Promise<MailboxMessage> {
    const pollInterval = options.pollInterval ?? 200;
    const started = Date.now();
    let lastSeen: string | undefined;

    for (;;) {
      try {
        const message = await this.latestMessage(recipient);
        // Creation times have coarse resolution on some filesystems
        if (message.createdAt.getTime() >= options.since.getTime() - 1000) {
          return message;
        }
        lastSeen = message.path;
      } catch (err) {
        if (!(err instanceof NotFoundError)) {
          throw err;
        }
      }

      const elapsed = Date.now() - started;
      if (elapsed >= options.timeout) {
        throw new TimeoutError(
          `No new message for ${recipient} within ${options.timeout}ms` +
            (lastSeen ? ` (newest is ${lastSeen})` : ''),
          'maildir delivery',
          options.timeout
        );
      }
      await new Promise<void>(resolve => setTimeout(resolve, Math.min(pollInterval, options.timeout - elapsed)));
    }
  }

  private async newestIn(directory: string): Promise<Candidate | undefined> {
    let names: string[];
    try {
      names = await readdir(directory);
    } catch (err) {
      if (isMissing(err)) {
        return undefined;
      }
      throw err;
    }

    const candidates: Candidate[] = [];
    for (const name of names) {
      if (name.startsWith('.')) continue;
      const path = join(directory, name);
      try {
        const info = await stat(path);
        if (!info.isFile()) continue;
        candidates.push({
          path,
          name,
          createdAt: info.birthtimeMs > 0 ? info.birthtimeMs : info.ctimeMs,
          modifiedAt: info.mtimeMs
        });
      } catch (err) {
        // Delivered then moved away (e.g. to cur/) between readdir and stat
        if (!isMissing(err)) {
          throw err;
        }
      }
    }

    return candidates.sort(compareNewestFirst)[0];
  }
}
