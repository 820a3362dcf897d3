/**
 * Connection configuration types for mailprobe
 */

/**
 * TLS/SSL options for secure connections
 */
export interface TlsOptions {
  /** Whether to reject unauthorized certificates */
  rejectUnauthorized?: boolean;
}

/**
 * Options accepted by `LineConnection.open`
 */
export interface ConnectionOptions {
  host: string;
  port: number;
  /** Whether to wrap the socket in TLS (default: false) */
  tls?: boolean;
  tlsOptions?: TlsOptions;
  /** Connection timeout in milliseconds (default: 10000) */
  connTimeout?: number;
  /** Default timeout for a single receive in milliseconds (default: 5000) */
  receiveTimeout?: number;
  /**
   * Absolute deadline (epoch milliseconds). Every receive timeout is
   * clamped so it never runs past this instant.
   */
  deadline?: number;
}

/**
 * Internal connection options with defaults applied
 */
export interface ResolvedConnectionOptions {
  host: string;
  port: number;
  tls: boolean;
  tlsOptions?: TlsOptions;
  connTimeout: number;
  receiveTimeout: number;
  deadline?: number;
}

/**
 * Options shared by the protocol sessions
 */
export interface SessionOptions extends ConnectionOptions {
  /** Upper bound for one command/response exchange (default: 10000) */
  commandTimeout?: number;
  /** Longest single wait inside the polling loop (default: 250) */
  pollInterval?: number;
  /** Largest chunk pulled from the transport per poll (default: 65536) */
  maxChunkBytes?: number;
}
