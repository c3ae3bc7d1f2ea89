/**
 * Sensor Stream Bridge - Shared TypeScript Interfaces
 *
 * This file contains all shared type definitions used across the library.
 * All modules should import types from here to avoid duplication.
 */

import type {
  ConnectionError,
  NotConnectedError,
  SerializationError,
} from './StreamProtocol.mjs';

// =============================================================================
// Sample / Message Types
// =============================================================================

/**
 * A single 3D point produced by a capture source.
 * Synthetic samples lie in [0, 1); capture samples are unconstrained.
 */
export interface Sample {
  x: number;
  y: number;
  z: number;
}

/** Wire discriminator for point-cloud envelopes */
export type PointCloudType = 'pointcloud';

/**
 * Timestamped batch of samples. Frozen once built by createPointCloudMessage.
 */
export interface PointCloudMessage {
  readonly type: PointCloudType;
  /** Milliseconds since epoch */
  readonly timestamp: number;
  readonly data: readonly Readonly<Sample>[];
}

// =============================================================================
// Connection Types
// =============================================================================

/**
 * Connection state machine states
 */
export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

/**
 * Payload of a connection state notification
 */
export interface ConnectionStateChange {
  state: ConnectionState;
  previous: ConnectionState;
  /** Close code, when the change came from a socket close */
  code?: number;
  reason?: string;
}

/**
 * Read/write view of the single connection, handed to Transmitter and
 * CaptureBridge. Only ConnectionManager mutates the underlying socket.
 */
export interface ConnectionHandle {
  getState(): ConnectionState;
  write(text: string): boolean;
}

// =============================================================================
// Transmission Types
// =============================================================================

export type SendFailureError = NotConnectedError | SerializationError;

/**
 * Result of a single Transmitter.send call
 */
export type SendResult =
  | { ok: true; bytes: number }
  | { ok: false; error: SendFailureError };

/** Where a batch came from */
export type BatchSource = 'simulated' | 'capture';

/**
 * Reported when a send was attempted and rejected
 */
export interface SendFailure {
  source: BatchSource;
  error: SendFailureError;
  sampleCount: number;
}

// =============================================================================
// Capture Types
// =============================================================================

export type CaptureProducerKind = 'native' | 'synthetic';

/**
 * Out-of-band locations managed by a native capture producer.
 * Opaque to the bridge.
 */
export interface CaptureDirectories {
  checkpointDirectory: string;
  imagesDirectory: string;
}

/** Callback delivering one batch of samples */
export type SampleBatchListener = (samples: readonly Sample[]) => void;

/**
 * Anything that can notify with sample batches as they become available
 */
export interface CaptureProducer {
  readonly kind: CaptureProducerKind;
  readonly directories?: CaptureDirectories;
  subscribe(listener: SampleBatchListener): UnsubscribeFunction;
}

/**
 * Operator-visible signal for a capture batch that was not sent because the
 * connection was down. Distinct from a SendFailure.
 */
export interface CaptureDropSignal {
  reason: 'not-connected';
  state: ConnectionState;
  producer: CaptureProducerKind;
  sampleCount: number;
  at: number;
}

// =============================================================================
// Event Types
// =============================================================================

/**
 * All bridge events
 */
export interface SensorBridgeEvents {
  stateChange: [change: ConnectionStateChange];
  connectionError: [error: ConnectionError];
  captureDropped: [signal: CaptureDropSignal];
  sendFailed: [failure: SendFailure];
  notConnected: [error: NotConnectedError];
  streamStateChange: [active: boolean];
  serverMessage: [text: string];
}

// =============================================================================
// Listener Types
// =============================================================================

/**
 * Unsubscribe function returned when adding listeners
 */
export type UnsubscribeFunction = () => void;

/**
 * Generic event listener
 */
export type EventListener<T extends unknown[]> = (...args: T) => void;
