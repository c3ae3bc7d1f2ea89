/**
 * Sensor Bridge - Facade
 *
 * Main entry point for streaming point clouds to a remote consumer. It owns
 * the connection, the transmitter, the simulated stream and the capture
 * bridge, and exposes the operator commands:
 * connect, disconnect, start/stop simulated stream, attach capture producer.
 *
 * Each instance owns exactly one connection; create one bridge per endpoint.
 */

import {
  BridgeDisposedError,
  NotConnectedError,
  STREAM_CONFIG,
} from '../StreamProtocol.mjs';
import { ConnectionManager } from '../connection/ConnectionManager.mjs';
import { Transmitter, type TransmitterStats } from '../connection/Transmitter.mjs';
import { StreamScheduler, type StreamSchedulerStats } from '../streaming/StreamScheduler.mjs';
import type { IntervalScheduler } from '../streaming/IntervalScheduler.mjs';
import type { RandomSource } from '../streaming/SampleGenerator.mjs';
import { CaptureBridge, type CaptureBridgeStats } from '../capture/CaptureBridge.mjs';
import { ListenerRegistry } from '../events/ListenerRegistry.mjs';
import { createLogger, type Logger } from '../logging/logger.mjs';
import type { EventLog } from '../logging/EventLog.mjs';
import type {
  CaptureProducer,
  ConnectionState,
  EventListener,
  SensorBridgeEvents,
  UnsubscribeFunction,
} from '../types.mjs';

// ============================================================================
// Configuration
// ============================================================================

export interface SensorBridgeConfig {
  /** Default endpoint for connect() (default: ws://localhost:8081) */
  endpoint?: string;
  /** Simulated stream cadence in ms (default: 500) */
  cadenceMs?: number;
  /** Samples per simulated batch (default: 256) */
  batchSize?: number;
  /** Opening handshake timeout in ms (default: 5000) */
  handshakeTimeout?: number;
  scheduler?: IntervalScheduler;
  random?: RandomSource;
  now?: () => number;
  logger?: Logger;
  eventLog?: EventLog;
}

export type StartStreamResult =
  | { ok: true; started: boolean }
  | { ok: false; error: NotConnectedError | BridgeDisposedError };

export interface SensorBridgeStats {
  state: ConnectionState;
  endpoint: string | null;
  transmitter: TransmitterStats;
  stream: StreamSchedulerStats;
  capture: CaptureBridgeStats;
}

// ============================================================================
// SensorBridge Class
// ============================================================================

export class SensorBridge {
  private readonly endpoint: string;
  private readonly cadenceMs: number;
  private readonly batchSize: number;
  private readonly logger: Logger;
  private readonly eventLog?: EventLog;

  // Modules
  private readonly connectionManager: ConnectionManager;
  private readonly transmitter: Transmitter;
  private readonly scheduler: StreamScheduler;
  private readonly captureBridge: CaptureBridge;
  private readonly events: ListenerRegistry<SensorBridgeEvents>;

  private disposed = false;

  constructor(config: SensorBridgeConfig = {}) {
    this.endpoint =
      config.endpoint ?? `ws://${STREAM_CONFIG.DEFAULTS.HOST}:${STREAM_CONFIG.DEFAULTS.PORT}`;
    this.cadenceMs = config.cadenceMs ?? STREAM_CONFIG.DEFAULTS.CADENCE_MS;
    this.batchSize = config.batchSize ?? STREAM_CONFIG.DEFAULTS.BATCH_SIZE;
    this.logger = config.logger ?? createLogger('SensorBridge');
    this.eventLog = config.eventLog;

    // Initialize modules
    this.connectionManager = new ConnectionManager({
      handshakeTimeout: config.handshakeTimeout,
      logger: this.logger.child('ConnectionManager'),
    });
    this.transmitter = new Transmitter(this.logger.child('Transmitter'));
    this.scheduler = new StreamScheduler(this.connectionManager, this.transmitter, {
      scheduler: config.scheduler,
      random: config.random,
      now: config.now,
      logger: this.logger.child('StreamScheduler'),
    });
    this.captureBridge = new CaptureBridge(this.connectionManager, this.transmitter, {
      now: config.now,
      logger: this.logger.child('CaptureBridge'),
    });
    this.events = new ListenerRegistry<SensorBridgeEvents>(this.logger.child('Events'));

    this.setupCallbacks();
  }

  private setupCallbacks(): void {
    this.connectionManager.setOnStateChange((change) => {
      this.eventLog?.log('state_change', { ...change });

      // A lost connection ends the simulated stream; reconnecting is explicit
      if (change.state === 'disconnected' && this.scheduler.isActive()) {
        this.stopSimulatedStream();
      }
      this.events.emit('stateChange', change);
    });

    this.connectionManager.setOnError((error) => {
      this.eventLog?.log('connection_error', { message: error.message });
      this.events.emit('connectionError', error);
    });

    this.connectionManager.setOnMessage((text) => {
      this.events.emit('serverMessage', text);
    });

    this.scheduler.setOnTickFailed((result, sampleCount) => {
      this.eventLog?.log('send_failed', { source: 'simulated', code: result.error.code });
      this.events.emit('sendFailed', { source: 'simulated', error: result.error, sampleCount });
    });

    this.captureBridge.setOnDropped((signal) => {
      this.eventLog?.log('capture_dropped', { ...signal });
      this.events.emit('captureDropped', signal);
    });

    this.captureBridge.setOnSendFailed((failure) => {
      this.eventLog?.log('send_failed', { source: failure.source, code: failure.error.code });
      this.events.emit('sendFailed', failure);
    });
  }

  // ===========================================================================
  // Public API - Events
  // ===========================================================================

  on<K extends keyof SensorBridgeEvents>(
    event: K,
    listener: EventListener<SensorBridgeEvents[K]>
  ): UnsubscribeFunction {
    return this.events.on(event, listener);
  }

  // ===========================================================================
  // Public API - Connection
  // ===========================================================================

  /**
   * Open the connection. Resolves true once connected.
   */
  async connect(endpoint: string = this.endpoint): Promise<boolean> {
    if (this.disposed) {
      this.logger.warn('connect() ignored: bridge disposed');
      return false;
    }

    this.eventLog?.log('connect', { endpoint });
    return this.connectionManager.connect(endpoint);
  }

  /**
   * Stop the simulated stream, then close the connection
   */
  disconnect(): void {
    this.stopSimulatedStream();
    if (this.connectionManager.getState() === 'disconnected') {
      return;
    }
    this.eventLog?.log('disconnect', { endpoint: this.connectionManager.getEndpoint() });
    this.connectionManager.disconnect();
  }

  state(): ConnectionState {
    return this.connectionManager.getState();
  }

  get isConnected(): boolean {
    return this.connectionManager.isConnected();
  }

  // ===========================================================================
  // Public API - Simulated Stream
  // ===========================================================================

  /**
   * Start streaming synthetic batches. Requires an open connection; starting
   * while already streaming succeeds without a second task.
   */
  startSimulatedStream(cadenceMs: number = this.cadenceMs): StartStreamResult {
    if (this.disposed) {
      return { ok: false, error: new BridgeDisposedError() };
    }

    const state = this.connectionManager.getState();
    if (state !== 'connected') {
      const error = new NotConnectedError(state, 'Connect to the stream endpoint first');
      this.logger.warn(error.message, { state });
      this.events.emit('notConnected', error);
      return { ok: false, error };
    }

    const started = this.scheduler.start(cadenceMs, this.batchSize);
    if (started) {
      this.eventLog?.log('stream_start', { cadenceMs, batchSize: this.batchSize });
      this.events.emit('streamStateChange', true);
    }
    return { ok: true, started };
  }

  stopSimulatedStream(): boolean {
    const stopped = this.scheduler.stop();
    if (stopped) {
      this.eventLog?.log('stream_stop');
      this.events.emit('streamStateChange', false);
    }
    return stopped;
  }

  isStreaming(): boolean {
    return this.scheduler.isActive();
  }

  // ===========================================================================
  // Public API - Capture
  // ===========================================================================

  attachCaptureProducer(producer: CaptureProducer): void {
    if (this.disposed) {
      throw new BridgeDisposedError();
    }
    this.captureBridge.attach(producer);
    this.eventLog?.log('capture_attach', { producer: producer.kind });
  }

  detachCaptureProducer(): boolean {
    const detached = this.captureBridge.detach();
    if (detached) {
      this.eventLog?.log('capture_detach');
    }
    return detached;
  }

  // ===========================================================================
  // Public API - Utilities
  // ===========================================================================

  getStats(): SensorBridgeStats {
    return {
      state: this.connectionManager.getState(),
      endpoint: this.connectionManager.getEndpoint(),
      transmitter: this.transmitter.getStats(),
      stream: this.scheduler.getStats(),
      capture: this.captureBridge.getStats(),
    };
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Tear down in order: simulated stream, capture producer, connection.
   * Leaves no timers and no open connection behind.
   */
  dispose(): void {
    if (this.disposed) return;

    this.stopSimulatedStream();
    this.detachCaptureProducer();
    this.disconnect();
    this.disposed = true;

    this.eventLog?.log('dispose');
    this.events.clear();
  }
}
