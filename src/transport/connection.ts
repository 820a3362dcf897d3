/**
 * Transport layer for mailprobe
 * Manages one TCP/TLS socket and exposes explicit send/receive primitives
 */

import { EventEmitter } from 'events';
import * as net from 'net';
import * as tls from 'tls';
import { StringDecoder } from 'string_decoder';
import type { ConnectionOptions, ResolvedConnectionOptions } from '../types/config.js';
import {
  ConnectionClosedError,
  ConnectionError,
  TimeoutError,
  WriteError
} from '../types/errors.js';

/**
 * Connection state
 */
export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'disconnecting';

/**
 * LineConnection events interface for type safety
 */
export interface LineConnectionEvents {
  data: (chunk: Buffer) => void;
  error: (err: Error) => void;
  close: () => void;
  connect: () => void;
}

const DEFAULT_CONN_TIMEOUT = 10000;
const DEFAULT_RECEIVE_TIMEOUT = 5000;
const DEFAULT_MAX_BYTES = 65536;
const FORCE_DESTROY_AFTER = 1000;

/**
 * Line-oriented connection to a mail server.
 *
 * The connection never interprets content. Incoming bytes are buffered
 * and handed out by `receive`, so callers decide where a response ends.
 */
export class LineConnection extends EventEmitter {
  private socket: net.Socket | tls.TLSSocket | null = null;
  private options: ResolvedConnectionOptions;
  private _state: ConnectionState = 'disconnected';
  private buffer: Buffer = Buffer.alloc(0);
  private decoder = new StringDecoder('utf8');
  private closeReason: Error | null = null;
  private wake: (() => void) | null = null;

  constructor(options: ConnectionOptions) {
    super();
    this.options = {
      host: options.host,
      port: options.port,
      tls: options.tls ?? false,
      tlsOptions: options.tlsOptions,
      connTimeout: options.connTimeout ?? DEFAULT_CONN_TIMEOUT,
      receiveTimeout: options.receiveTimeout ?? DEFAULT_RECEIVE_TIMEOUT,
      deadline: options.deadline
    };
  }

  /**
   * Create a connection and connect it
   * @throws ConnectionError on connection failure
   * @throws TimeoutError if connecting takes longer than `connTimeout`
   */
  static async open(options: ConnectionOptions): Promise<LineConnection> {
    const connection = new LineConnection(options);
    await connection.connect();
    return connection;
  }

  get state(): ConnectionState {
    return this._state;
  }

  get isConnected(): boolean {
    return this._state === 'connected';
  }

  get host(): string {
    return this.options.host;
  }

  get port(): number {
    return this.options.port;
  }

  /**
   * Number of received bytes not yet handed out by `receive`
   */
  get bufferedBytes(): number {
    return this.buffer.length;
  }

  /**
   * Milliseconds left before the deadline (Infinity without one)
   */
  get timeLeft(): number {
    if (this.options.deadline === undefined) {
      return Infinity;
    }
    return Math.max(0, this.options.deadline - Date.now());
  }

  /**
   * Establish the connection
   */
  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this._state !== 'disconnected') {
        reject(new ConnectionError(
          `Cannot connect: connection is ${this._state}`,
          this.options.host,
          this.options.port
        ));
        return;
      }

      this._state = 'connecting';
      this.closeReason = null;
      const connTimeout = this.clampToDeadline(this.options.connTimeout);
      let timeoutId: NodeJS.Timeout | null = null;
      let settled = false;

      const cleanup = () => {
        if (timeoutId) {
          clearTimeout(timeoutId);
          timeoutId = null;
        }
      };

      const onError = (err: Error) => {
        if (settled) return;
        settled = true;
        cleanup();
        this.socket?.destroy();
        this.socket = null;
        this._state = 'disconnected';
        reject(new ConnectionError(
          `Connection to ${this.options.host}:${this.options.port} failed: ${err.message}`,
          this.options.host,
          this.options.port,
          err
        ));
      };

      const onConnect = () => {
        if (settled) return;
        settled = true;
        cleanup();
        this._state = 'connected';
        this.setupSocketListeners();
        this.emit('connect');
        resolve();
      };

      timeoutId = setTimeout(() => {
        if (settled) return;
        settled = true;
        this.socket?.destroy();
        this.socket = null;
        this._state = 'disconnected';
        reject(new TimeoutError(
          `Connection to ${this.options.host}:${this.options.port} timed out after ${connTimeout}ms`,
          'connect',
          connTimeout
        ));
      }, connTimeout);

      if (this.options.tls) {
        const tlsOpts: tls.ConnectionOptions = {
          host: this.options.host,
          port: this.options.port,
          ...this.buildTlsOptions()
        };
        this.socket = tls.connect(tlsOpts, onConnect);
      } else {
        this.socket = net.createConnection({
          host: this.options.host,
          port: this.options.port
        }, onConnect);
      }

      this.socket.once('error', onError);
    });
  }

  /**
   * Build TLS options from configuration
   */
  private buildTlsOptions(): tls.ConnectionOptions {
    const opts: tls.ConnectionOptions = {};
    const tlsOpts = this.options.tlsOptions;

    if (tlsOpts) {
      if (tlsOpts.rejectUnauthorized !== undefined) {
        opts.rejectUnauthorized = tlsOpts.rejectUnauthorized;
      }
    }

    return opts;
  }

  /**
   * Setup socket event listeners after connection
   */
  private setupSocketListeners(): void {
    if (!this.socket) return;

    this.socket.removeAllListeners('error');

    this.socket.on('data', (chunk: Buffer) => {
      this.buffer = Buffer.concat([this.buffer, chunk]);
      this.emit('data', chunk);
      this.notify();
    });

    this.socket.on('error', (err: Error) => {
      this.closeReason = err;
      // Only forward when someone listens: an unhandled 'error' event would throw
      if (this.listenerCount('error') > 0) {
        this.emit('error', new ConnectionError(
          `Socket error: ${err.message}`,
          this.options.host,
          this.options.port,
          err
        ));
      }
      this.notify();
    });

    this.socket.on('end', () => {
      this._state = 'disconnected';
      this.notify();
    });

    this.socket.on('close', () => {
      this._state = 'disconnected';
      this.socket = null;
      this.emit('close');
      this.notify();
    });
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  /**
   * Clamp a timeout so it ends no later than the configured deadline
   */
  private clampToDeadline(timeout: number): number {
    if (this.options.deadline === undefined) {
      return timeout;
    }
    return Math.max(0, Math.min(timeout, this.options.deadline - Date.now()));
  }

  /**
   * Write a command line; CRLF is appended
   * @throws WriteError if not connected or the write fails
   */
  send(command: string): Promise<void> {
    return this.write(command + '\r\n', command);
  }

  /**
   * Write data exactly as given
   * @throws WriteError if not connected or the write fails
   */
  sendRaw(data: string | Buffer): Promise<void> {
    return this.write(data, typeof data === 'string' ? data : `<${data.length} bytes>`);
  }

  private write(data: string | Buffer, label: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = this.socket;
      if (!socket || this._state !== 'connected') {
        reject(new WriteError('Cannot send data: not connected', label));
        return;
      }

      socket.write(data, (err?: Error | null) => {
        if (err) {
          reject(new WriteError(`Write failed: ${err.message}`, label, err));
          return;
        }
        resolve();
      });
    });
  }

  /**
   * Receive up to `maxBytes` as text, waiting for data when none is buffered
   *
   * Multi-byte characters split across reads are held back until complete.
   *
   * @throws TimeoutError if nothing arrives within `timeout`
   * @throws ConnectionClosedError if the peer closed and nothing is buffered
   */
  async receive(maxBytes: number = DEFAULT_MAX_BYTES, timeout?: number): Promise<string> {
    const chunk = await this.receiveBytes(maxBytes, timeout);
    return this.decoder.write(chunk);
  }

  /**
   * Byte-level variant of `receive`
   */
  async receiveBytes(maxBytes: number = DEFAULT_MAX_BYTES, timeout?: number): Promise<Buffer> {
    if (this.buffer.length === 0) {
      await this.waitForData(timeout ?? this.options.receiveTimeout);
    }

    const size = Math.min(Math.max(1, maxBytes), this.buffer.length);
    const chunk = this.buffer.subarray(0, size);
    this.buffer = this.buffer.subarray(size);
    return chunk;
  }

  private waitForData(requested: number): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.socket || this._state !== 'connected') {
        reject(this.closedError());
        return;
      }

      const timeout = this.clampToDeadline(requested);
      if (timeout <= 0) {
        reject(new TimeoutError(
          'No data received: deadline already passed',
          'receive',
          requested
        ));
        return;
      }

      const timeoutId = setTimeout(() => {
        this.wake = null;
        reject(new TimeoutError(
          `No data received within ${timeout}ms`,
          'receive',
          timeout
        ));
      }, timeout);

      this.wake = () => {
        clearTimeout(timeoutId);
        if (this.buffer.length > 0) {
          resolve();
        } else {
          reject(this.closedError());
        }
      };
    });
  }

  private closedError(): ConnectionClosedError {
    const reason = this.closeReason ? `: ${this.closeReason.message}` : '';
    return new ConnectionClosedError(
      `Connection to ${this.options.host}:${this.options.port} is closed${reason}`
    );
  }

  /**
   * Close the connection. Safe to call any number of times.
   */
  close(): Promise<void> {
    return new Promise((resolve) => {
      const socket = this.socket;
      if (!socket || socket.destroyed) {
        this._state = 'disconnected';
        this.socket = null;
        resolve();
        return;
      }

      this._state = 'disconnecting';

      const forceId = setTimeout(() => {
        if (!socket.destroyed) {
          socket.destroy();
        }
      }, FORCE_DESTROY_AFTER);

      socket.once('close', () => {
        clearTimeout(forceId);
        this._state = 'disconnected';
        this.socket = null;
        resolve();
      });
      socket.end();
    });
  }
}
