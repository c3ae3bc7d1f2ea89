/**
 * Connection Manager for the sensor stream
 *
 * Owns the single WebSocket to the remote consumer:
 * - Connection establishment (idempotent)
 * - Disconnection that takes effect before returning
 * - State tracking and change notification
 * - Raw text writes for the Transmitter
 *
 * There is no automatic reconnection; connect() is retried by the operator.
 */

import WebSocket from 'ws';
import { ConnectionError, STREAM_CONFIG, describeError } from '../StreamProtocol.mjs';
import { createLogger, type Logger } from '../logging/logger.mjs';
import type {
  ConnectionHandle,
  ConnectionState,
  ConnectionStateChange,
} from '../types.mjs';

// Re-export types for module consumers
export type { ConnectionHandle, ConnectionState, ConnectionStateChange };

// ============================================================================
// Options
// ============================================================================

export interface ConnectionOptions {
  /** ms allowed for the opening handshake (default: 5000) */
  handshakeTimeout?: number;
  logger?: Logger;
}

// ============================================================================
// Module-specific Types (callbacks)
// ============================================================================

/** Callback for connection state change */
export type OnStateChangeFn = (change: ConnectionStateChange) => void;

/** Callback for transport errors */
export type OnConnectionErrorFn = (error: ConnectionError) => void;

/** Callback for text frames sent back by the consumer */
export type OnMessageFn = (text: string) => void;

// ============================================================================
// Helpers
// ============================================================================

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

// ============================================================================
// ConnectionManager Class
// ============================================================================

export class ConnectionManager implements ConnectionHandle {
  private ws: WebSocket | null = null;
  private state: ConnectionState = 'disconnected';
  private endpoint: string | null = null;
  private readonly handshakeTimeout: number;
  private readonly logger: Logger;

  // Pending connect() attempt, settled on open, close or disconnect()
  private opening: Promise<boolean> | null = null;
  private settleOpening: ((opened: boolean) => void) | null = null;

  private onStateChange?: OnStateChangeFn;
  private onError?: OnConnectionErrorFn;
  private onMessage?: OnMessageFn;

  constructor(options: ConnectionOptions = {}) {
    this.handshakeTimeout = options.handshakeTimeout ?? STREAM_CONFIG.TIMEOUTS.HANDSHAKE;
    this.logger = options.logger ?? createLogger('ConnectionManager');
  }

  /**
   * Set callback for state changes
   */
  setOnStateChange(callback: OnStateChangeFn): void {
    this.onStateChange = callback;
  }

  /**
   * Set callback for transport errors
   */
  setOnError(callback: OnConnectionErrorFn): void {
    this.onError = callback;
  }

  /**
   * Set callback for inbound text frames
   */
  setOnMessage(callback: OnMessageFn): void {
    this.onMessage = callback;
  }

  /**
   * Get current connection state
   */
  getState(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === 'connected';
  }

  /**
   * Endpoint of the current or most recent connection
   */
  getEndpoint(): string | null {
    return this.endpoint;
  }

  /**
   * Open the connection. Resolves true once open, false if the attempt fails
   * or is abandoned. Never rejects; failures are reported through onError.
   */
  connect(endpoint: string): Promise<boolean> {
    if (this.state === 'connected') {
      return Promise.resolve(true);
    }
    if (this.state === 'connecting' && this.opening) {
      return this.opening;
    }

    this.endpoint = endpoint;

    // Registered before listeners hear 'connecting', so a nested connect()
    // joins this attempt and a nested disconnect() settles it
    const opening = new Promise<boolean>((resolve) => {
      this.settleOpening = resolve;
    });
    this.opening = opening;
    this.setState('connecting');

    if (this.opening !== opening) {
      this.logger.info(`Connect to ${endpoint} abandoned before opening`);
      return opening;
    }

    let socket: WebSocket;
    try {
      socket = new WebSocket(endpoint, {
        handshakeTimeout: this.handshakeTimeout,
        perMessageDeflate: false,
      });
    } catch (error) {
      const connectionError = new ConnectionError(
        `Cannot open ${endpoint}: ${describeError(error)}`,
        { endpoint }
      );
      this.logger.error('Invalid endpoint', { endpoint, error: connectionError.message });
      this.resolveOpening(false);
      this.setState('disconnected');
      this.onError?.(connectionError);
      return opening;
    }

    this.ws = socket;
    this.attachListeners(socket);

    this.logger.info(`Connecting to ${endpoint}`);
    return opening;
  }

  private attachListeners(socket: WebSocket): void {
    socket.on('open', () => {
      if (this.ws !== socket) return;
      this.logger.info(`Connected to ${this.endpoint}`);
      this.setState('connected');
      this.resolveOpening(true);
    });

    socket.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
      if (this.ws !== socket || isBinary) return;
      const text = rawDataToString(data);
      this.logger.debug('From server', { text });
      this.onMessage?.(text);
    });

    socket.on('error', (err: Error) => {
      if (this.ws !== socket) return;
      this.logger.error('WebSocket error', { error: err.message });
      this.onError?.(new ConnectionError(err.message, { endpoint: this.endpoint }));
    });

    socket.on('close', (code: number, reason: Buffer) => {
      if (this.ws !== socket) return;
      const reasonStr = reason.toString() || 'No reason';
      this.logger.info(`Connection closed. Code: ${code}, Reason: ${reasonStr}`);

      this.ws = null;
      this.resolveOpening(false);
      this.setState('disconnected', { code, reason: reasonStr });
    });
  }

  private resolveOpening(opened: boolean): void {
    const settle = this.settleOpening;
    this.settleOpening = null;
    this.opening = null;
    settle?.(opened);
  }

  /**
   * Close the connection. Once this returns the state is 'disconnected' and
   * write() refuses; the close handshake completes in the background.
   */
  disconnect(): void {
    const socket = this.ws;
    if (this.state === 'disconnected' && !socket) {
      return;
    }

    this.ws = null;
    if (socket) {
      socket.removeAllListeners();
      // Late errors from the abandoned socket (e.g. closing mid-handshake)
      socket.on('error', (err: Error) => {
        this.logger.debug('Error after disconnect', { error: err.message });
      });
      socket.close(STREAM_CONFIG.CLOSE.NORMAL, STREAM_CONFIG.CLOSE.CLIENT_REASON);
    }

    this.logger.info('Disconnected');
    // Settled first: a listener may start a new attempt on 'disconnected'
    this.resolveOpening(false);
    this.setState('disconnected', {
      code: STREAM_CONFIG.CLOSE.NORMAL,
      reason: STREAM_CONFIG.CLOSE.CLIENT_REASON,
    });
  }

  /**
   * Write one text frame. Returns false without I/O unless connected.
   */
  write(text: string): boolean {
    const socket = this.ws;
    if (this.state !== 'connected' || !socket || socket.readyState !== WebSocket.OPEN) {
      return false;
    }

    socket.send(text, (err?: Error) => {
      if (err) {
        this.logger.error('Send failed', { error: err.message });
        this.onError?.(new ConnectionError(`Send failed: ${err.message}`, { endpoint: this.endpoint }));
      }
    });
    return true;
  }

  private setState(state: ConnectionState, detail: { code?: number; reason?: string } = {}): void {
    const previous = this.state;
    if (previous === state) return;
    this.state = state;
    this.onStateChange?.({ state, previous, ...detail });
  }
}
