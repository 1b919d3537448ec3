/**
 * WebSocket transport.
 *
 * Wraps a `ws` socket in a pull-style interface: messages are buffered as
 * they arrive and handed out one at a time by `receive`.
 */

import WebSocket from 'ws';
import { ConnectionError } from '@chartfeed/contracts';
import type { Logger } from '@chartfeed/logger';

/**
 * One open connection.
 */
export interface Transport {
  /** Queue a frame. Failures surface on the next `receive`. */
  send(frame: string): void;

  /**
   * Next message from the server.
   *
   * @throws {ConnectionError} On timeout, socket error or close
   */
  receive(timeoutMs: number): Promise<string>;

  close(): void;
}

export interface ConnectOptions {
  url: string;
  origin: string;
  connectTimeoutMs: number;
  logger?: Logger;
}

/**
 * Opens a transport. Rejects with ConnectionError when the socket cannot
 * be opened.
 */
export type TransportFactory = (options: ConnectOptions) => Promise<Transport>;

interface PendingReceive {
  resolve: (message: string) => void;
  reject: (error: ConnectionError) => void;
  timer: NodeJS.Timeout;
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

class WebSocketTransport implements Transport {
  private readonly inbox: string[] = [];
  private pending: PendingReceive | null = null;
  private failure: ConnectionError | null = null;

  constructor(
    private readonly socket: WebSocket,
    private readonly url: string,
    private readonly logger?: Logger
  ) {
    socket.on('message', (data: WebSocket.RawData) => {
      this.deliver(rawDataToString(data));
    });

    socket.on('error', (err: Error) => {
      this.fail(new ConnectionError(`WebSocket error: ${err.message}`, { url, cause: err.message }));
    });

    socket.on('close', (code: number, reason: Buffer) => {
      this.fail(
        new ConnectionError(`WebSocket closed: ${code} ${reason.toString()}`.trim(), {
          url,
          code,
        })
      );
    });
  }

  send(frame: string): void {
    if (this.failure) {
      return;
    }
    if (this.socket.readyState !== WebSocket.OPEN) {
      this.fail(new ConnectionError('WebSocket is not open', { url: this.url }));
      return;
    }

    this.logger?.debug('Frame sent', { bytes: Buffer.byteLength(frame, 'utf8') });
    this.socket.send(frame, (err?: Error) => {
      if (err) {
        this.fail(new ConnectionError(`WebSocket send failed: ${err.message}`, { url: this.url, cause: err.message }));
      }
    });
  }

  receive(timeoutMs: number): Promise<string> {
    const queued = this.inbox.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.pending) {
      return Promise.reject(new ConnectionError('Concurrent receive on one transport', { url: this.url }));
    }

    return new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        reject(new ConnectionError(`Read timed out after ${timeoutMs}ms`, { url: this.url, timeoutMs }));
      }, timeoutMs);
      this.pending = { resolve, reject, timer };
    });
  }

  close(): void {
    if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.close();
    }
  }

  private deliver(message: string): void {
    const waiter = this.pending;
    if (waiter) {
      this.pending = null;
      clearTimeout(waiter.timer);
      waiter.resolve(message);
      return;
    }
    this.inbox.push(message);
  }

  private fail(error: ConnectionError): void {
    if (this.failure) {
      return;
    }
    this.failure = error;

    const waiter = this.pending;
    if (waiter) {
      this.pending = null;
      clearTimeout(waiter.timer);
      waiter.reject(error);
    }
  }
}

/**
 * Opens a WebSocket with the given Origin header.
 *
 * @example
 * ```typescript
 * const transport = await connectWebSocket({
 *   url: 'wss://data.tradingview.com/socket.io/websocket',
 *   origin: 'https://data.tradingview.com',
 *   connectTimeoutMs: 5000
 * });
 * ```
 */
export const connectWebSocket: TransportFactory = ({ url, origin, connectTimeoutMs, logger }) =>
  new Promise<Transport>((resolve, reject) => {
    const socket = new WebSocket(url, { origin, handshakeTimeout: connectTimeoutMs });

    const onOpen = (): void => {
      socket.off('error', onError);
      logger?.debug('WebSocket connected', { url });
      resolve(new WebSocketTransport(socket, url, logger));
    };

    const onError = (err: Error): void => {
      socket.off('open', onOpen);
      reject(
        new ConnectionError(`Failed to connect to ${url}: ${err.message}`, {
          url,
          timeoutMs: connectTimeoutMs,
          cause: err.message,
        })
      );
    };

    socket.once('open', onOpen);
    socket.once('error', onError);
  });
