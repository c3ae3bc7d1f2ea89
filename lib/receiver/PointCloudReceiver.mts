/**
 * Point Cloud Receiver
 *
 * Consumer side of the stream: a WebSocket server that parses incoming
 * envelopes, hands them to a listener and answers every text frame with
 * an ACK.
 */

import { WebSocketServer, type WebSocket } from 'ws';
import { STREAM_CONFIG } from '../StreamProtocol.mjs';
import { safeParseEnvelope } from '../messaging/Envelope.mjs';
import { createLogger, type Logger } from '../logging/logger.mjs';
import type { PointCloudMessage } from '../types.mjs';

export interface ReceiverOptions {
  /** 0 picks a free port */
  port?: number;
  host?: string;
  /** Reply with ACK to every text frame (default: true) */
  ack?: boolean;
  logger?: Logger;
}

/** Callback for each valid envelope */
export type OnEnvelopeFn = (message: PointCloudMessage, clientId: number) => void;

/** Callback for frames that are not valid envelopes */
export type OnInvalidFn = (text: string, reason: string, clientId: number) => void;

export interface ReceiverStats {
  clients: number;
  envelopes: number;
  samples: number;
  invalid: number;
}

export class PointCloudReceiver {
  private readonly port: number;
  private readonly host: string | undefined;
  private readonly ack: boolean;
  private readonly logger: Logger;
  private server: WebSocketServer | null = null;
  private nextClientId = 1;

  private onEnvelope?: OnEnvelopeFn;
  private onInvalid?: OnInvalidFn;

  private envelopes = 0;
  private samples = 0;
  private invalid = 0;

  constructor(options: ReceiverOptions = {}) {
    this.port = options.port ?? STREAM_CONFIG.DEFAULTS.PORT;
    this.host = options.host;
    this.ack = options.ack ?? true;
    this.logger = options.logger ?? createLogger('Receiver');
  }

  setOnEnvelope(callback: OnEnvelopeFn): void {
    this.onEnvelope = callback;
  }

  setOnInvalid(callback: OnInvalidFn): void {
    this.onInvalid = callback;
  }

  /**
   * Start listening. Resolves with the bound port.
   */
  start(): Promise<number> {
    if (this.server) {
      return Promise.resolve(this.boundPort());
    }

    return new Promise((resolve, reject) => {
      const server = new WebSocketServer({ port: this.port, host: this.host });

      const onListenError = (err: Error) => {
        this.server = null;
        reject(err);
      };
      server.once('error', onListenError);

      server.once('listening', () => {
        server.off('error', onListenError);
        server.on('error', (err: Error) => {
          this.logger.error('Server error', { error: err.message });
        });
        this.server = server;
        const port = this.boundPort();
        this.logger.info(`WebSocket server running on port ${port}`);
        resolve(port);
      });

      server.on('connection', (socket: WebSocket) => this.handleConnection(socket));
    });
  }

  private handleConnection(socket: WebSocket): void {
    const clientId = this.nextClientId++;
    this.logger.info('Client connected', { clientId });

    socket.on('message', (data, isBinary) => {
      if (isBinary) {
        this.logger.warn('Ignoring binary frame', { clientId });
        return;
      }
      this.handleText(socket, data.toString(), clientId);
    });

    socket.on('error', (err: Error) => {
      this.logger.error('Client error', { clientId, error: err.message });
    });

    socket.on('close', () => {
      this.logger.info('Client disconnected', { clientId });
    });
  }

  private handleText(socket: WebSocket, text: string, clientId: number): void {
    const result = safeParseEnvelope(text);
    if (result.ok) {
      this.envelopes++;
      this.samples += result.message.data.length;
      this.logger.debug('Envelope received', {
        clientId,
        timestamp: result.message.timestamp,
        samples: result.message.data.length,
      });
      this.onEnvelope?.(result.message, clientId);
    } else {
      this.invalid++;
      this.logger.warn('Invalid envelope', { clientId, error: result.error.message });
      this.onInvalid?.(text, result.error.message, clientId);
    }

    if (this.ack) {
      socket.send(STREAM_CONFIG.ACK);
    }
  }

  private boundPort(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.port;
  }

  get clientCount(): number {
    return this.server?.clients.size ?? 0;
  }

  getStats(): ReceiverStats {
    return {
      clients: this.clientCount,
      envelopes: this.envelopes,
      samples: this.samples,
      invalid: this.invalid,
    };
  }

  /**
   * Close every client and stop listening
   */
  stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return Promise.resolve();
    }
    this.server = null;

    for (const client of server.clients) {
      client.close(STREAM_CONFIG.CLOSE.NORMAL, STREAM_CONFIG.CLOSE.SERVER_REASON);
    }

    return new Promise((resolve, reject) => {
      server.close((err?: Error) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
