/**
 * WebSocket transport for signaling envelopes.
 *
 * Incoming binary frames are decoded eagerly and queued; `receive()` hands
 * them out one at a time with a bounded wait. Transport failures are queued
 * too, so a caller blocked in `receive()` sees them in order.
 */

import WebSocket from 'ws';
import { decodeEnvelope, encodeEnvelope, type SignalingEnvelope } from './signaling-codec.js';
import { NetworkError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface SignalingConnection {
  readonly isOpen: boolean;
  send(envelope: SignalingEnvelope): Promise<void>;
  receive(timeoutMs: number): Promise<SignalingEnvelope>;
  close(): void;
}

export interface ConnectOptions {
  timeoutMs: number;
}

export type ConnectFn = (url: string, options: ConnectOptions) => Promise<SignalingConnection>;

type Inbound = { kind: 'envelope'; envelope: SignalingEnvelope } | { kind: 'failure'; error: NetworkError };

interface Waiter {
  resolve: (item: Inbound) => void;
  timer: NodeJS.Timeout;
}

export function toBytes(data: WebSocket.RawData): Uint8Array {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return data;
}

class WebSocketConnection implements SignalingConnection {
  private readonly inbox: Inbound[] = [];
  private waiter: Waiter | undefined;
  private closed = false;

  constructor(private readonly socket: WebSocket, private readonly url: string) {
    socket.on('message', (data, isBinary) => {
      if (!isBinary) {
        this.push({ kind: 'failure', error: new NetworkError('Unexpected text frame on signaling connection') });
        return;
      }
      try {
        this.push({ kind: 'envelope', envelope: decodeEnvelope(toBytes(data)) });
      } catch (error) {
        this.push({
          kind: 'failure',
          error: error instanceof NetworkError ? error : new NetworkError(String(error))
        });
      }
    });

    socket.on('error', error => {
      logger.debug('Signaling socket error', { url: this.url, error });
      this.push({ kind: 'failure', error: new NetworkError(`Signaling transport error: ${error.message}`) });
    });

    socket.on('close', code => {
      this.closed = true;
      this.push({ kind: 'failure', error: new NetworkError(`Signaling connection closed (code ${code})`) });
    });
  }

  get isOpen(): boolean {
    return !this.closed && this.socket.readyState === WebSocket.OPEN;
  }

  async send(envelope: SignalingEnvelope): Promise<void> {
    if (!this.isOpen) {
      throw new NetworkError('Signaling connection is not open');
    }
    const frame = encodeEnvelope(envelope);
    await new Promise<void>((resolve, reject) => {
      this.socket.send(frame, { binary: true }, error => {
        if (error) {
          reject(new NetworkError(`Failed to send signaling message: ${error.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  async receive(timeoutMs: number): Promise<SignalingEnvelope> {
    const queued = this.inbox.shift();
    const item = queued ?? (await this.waitForNext(timeoutMs));
    if (item.kind === 'failure') {
      throw item.error;
    }
    return item.envelope;
  }

  close(): void {
    this.closed = true;
    if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.close();
    }
  }

  private waitForNext(timeoutMs: number): Promise<Inbound> {
    return new Promise<Inbound>(resolve => {
      const timer = setTimeout(() => {
        this.waiter = undefined;
        resolve({
          kind: 'failure',
          error: new NetworkError(`Timed out after ${timeoutMs}ms waiting for a signaling response`)
        });
      }, timeoutMs);
      this.waiter = { resolve, timer };
    });
  }

  private push(item: Inbound): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      clearTimeout(waiter.timer);
      waiter.resolve(item);
      return;
    }
    this.inbox.push(item);
  }
}

/**
 * Open a WebSocket to the signaling server. Resolves once the socket is open.
 */
export const connectWebSocket: ConnectFn = (url, options) =>
  new Promise<SignalingConnection>((resolve, reject) => {
    let socket: WebSocket;
    try {
      socket = new WebSocket(url, { handshakeTimeout: options.timeoutMs });
    } catch (error) {
      reject(new NetworkError(`Invalid signaling URL '${url}': ${error instanceof Error ? error.message : String(error)}`));
      return;
    }

    const onOpen = (): void => {
      socket.off('error', onError);
      logger.debug('Signaling socket open', { url });
      resolve(new WebSocketConnection(socket, url));
    };
    const onError = (error: Error): void => {
      socket.off('open', onOpen);
      reject(new NetworkError(`Failed to connect to signaling server ${url}: ${error.message}`));
    };

    socket.once('open', onOpen);
    socket.once('error', onError);
  });
