/**
 * Harness configuration
 *
 * Everything comes from environment variables (optionally loaded from a
 * .env file) and is validated once, up front.
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../types/errors.js';
import type { LogLevel } from '../logging/logger.js';

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const port = z.coerce.number().int().min(1).max(65535);
const millis = z.coerce.number().int().positive();

const schema = z.object({
  SMTP_HOST: z.string().min(1).default('localhost'),
  SMTP_PORT: port.default(2525),
  SMTP_TLS: flag.default('false'),
  IMAP_HOST: z.string().min(1).default('localhost'),
  IMAP_PORT: port.default(1993),
  IMAP_TLS: flag.default('false'),
  TLS_REJECT_UNAUTHORIZED: flag.default('true'),

  IMAP_USER: z.string().min(1).default('test@example.com'),
  IMAP_PASSWORD: z.string().min(1).default('password123'),
  IMAP_INVALID_PASSWORD: z.string().min(1).default('wrongpass'),

  MAIL_FROM: z.string().email().default('sender@example.com'),
  MAIL_TO: z.string().email().optional(),
  AUTH_RECIPIENT: z.string().email().default('admin@delfour.co'),
  EHLO_NAME: z.string().min(1).default('test-client'),

  MAILDIR_ROOT: z.string().min(1).default('data/maildir'),
  // Local development layout where the server runs from its own checkout; "none" disables it
  MAILDIR_FALLBACK_ROOT: z.string().min(1).default('mail-rs/data/maildir'),
  MAILDIR_SUBDIR: z.string().min(1).default('new'),

  SUBMIT_MODE: z.enum(['raw', 'library']).default('library'),

  CONNECT_TIMEOUT_MS: millis.default(10000),
  COMMAND_TIMEOUT_MS: millis.default(10000),
  POLL_INTERVAL_MS: millis.default(250),
  DELIVERY_TIMEOUT_MS: millis.default(5000),
  SCENARIO_TIMEOUT_MS: millis.default(60000),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info')
});

export interface Endpoint {
  host: string;
  port: number;
  tls: boolean;
}

export interface HarnessConfig {
  smtp: Endpoint;
  imap: Endpoint;
  tlsRejectUnauthorized: boolean;
  credentials: {
    user: string;
    password: string;
    invalidPassword: string;
  };
  mail: {
    from: string;
    to: string;
    authRecipient: string;
    ehloName: string;
  };
  maildir: {
    root: string;
    fallbackRoot?: string;
    subdirectory: string;
  };
  submitMode: 'raw' | 'library';
  timeouts: {
    connect: number;
    command: number;
    pollInterval: number;
    delivery: number;
    scenario: number;
  };
  logLevel: LogLevel;
}

/**
 * Load a .env file into process.env (existing variables win)
 */
export function loadEnvFile(path?: string): void {
  const result = loadDotenv(path ? { path } : {});
  // A missing default .env is fine; an explicitly named one is not
  if (result.error && path) {
    throw new ConfigError(`Cannot read env file ${path}: ${result.error.message}`, [path]);
  }
}

/**
 * Validate environment variables into a HarnessConfig
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): HarnessConfig {
  // Empty strings mean "unset" so defaults apply
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = schema.safeParse(present);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const e = parsed.data;
  return {
    smtp: { host: e.SMTP_HOST, port: e.SMTP_PORT, tls: e.SMTP_TLS },
    imap: { host: e.IMAP_HOST, port: e.IMAP_PORT, tls: e.IMAP_TLS },
    tlsRejectUnauthorized: e.TLS_REJECT_UNAUTHORIZED,
    credentials: {
      user: e.IMAP_USER,
      password: e.IMAP_PASSWORD,
      invalidPassword: e.IMAP_INVALID_PASSWORD
    },
    mail: {
      from: e.MAIL_FROM,
      to: e.MAIL_TO ?? e.IMAP_USER,
      authRecipient: e.AUTH_RECIPIENT,
      ehloName: e.EHLO_NAME
    },
    maildir: {
      root: e.MAILDIR_ROOT,
      fallbackRoot: e.MAILDIR_FALLBACK_ROOT === 'none' ? undefined : e.MAILDIR_FALLBACK_ROOT,
      subdirectory: e.MAILDIR_SUBDIR
    },
    submitMode: e.SUBMIT_MODE,
    timeouts: {
      connect: e.CONNECT_TIMEOUT_MS,
      command: e.COMMAND_TIMEOUT_MS,
      pollInterval: e.POLL_INTERVAL_MS,
      delivery: e.DELIVERY_TIMEOUT_MS,
      scenario: e.SCENARIO_TIMEOUT_MS
    },
    logLevel: e.LOG_LEVEL
  };
}
