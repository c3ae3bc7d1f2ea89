/**
 * Sensor Stream Protocol Constants
 *
 * This module defines the protocol constants, stream defaults and error
 * taxonomy used by the bridge and the receiver.
 */

import type { ConnectionState } from './types.mjs';

/**
 * Envelope discriminators
 */
export const MESSAGE_TYPES = {
  POINTCLOUD: 'pointcloud',
} as const;

/** Envelope discriminator values */
export type MessageTypeValue = (typeof MESSAGE_TYPES)[keyof typeof MESSAGE_TYPES];

/**
 * Stream Configuration
 */
export const STREAM_CONFIG = {
  DEFAULTS: {
    CADENCE_MS: 500,
    BATCH_SIZE: 256,
    PORT: 8081,
    HOST: 'localhost',
  },
  TIMEOUTS: {
    HANDSHAKE: 5000,
  },
  /** Largest delay setInterval honours; longer ones fire after 1 ms */
  MAX_CADENCE_MS: 2_147_483_647,
  CLOSE: {
    NORMAL: 1000,
    CLIENT_REASON: 'client disconnect',
    SERVER_REASON: 'receiver shutting down',
  },
  /** Text frame the receiver answers every message with */
  ACK: 'ACK',
} as const;

/**
 * Error Codes
 */
export const ERROR_CODES = {
  CONNECTION_FAILED: 'CONNECTION_FAILED',
  NOT_CONNECTED: 'NOT_CONNECTED',
  SERIALIZATION_FAILED: 'SERIALIZATION_FAILED',
  BRIDGE_DISPOSED: 'BRIDGE_DISPOSED',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Error Messages
 */
export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ERROR_CODES.CONNECTION_FAILED]: 'Connection to the stream endpoint failed',
  [ERROR_CODES.NOT_CONNECTED]: 'Not connected to the stream endpoint',
  [ERROR_CODES.SERIALIZATION_FAILED]: 'Point cloud message could not be serialized',
  [ERROR_CODES.BRIDGE_DISPOSED]: 'Sensor bridge has been disposed',
};

// =============================================================================
// Errors
// =============================================================================

/**
 * Base error with code and details
 */
export class StreamBridgeError extends Error {
  readonly code: ErrorCode;
  readonly details: unknown;

  constructor(code: ErrorCode, message?: string, details: unknown = null) {
    super(message ?? ERROR_MESSAGES[code]);
    this.name = 'StreamBridgeError';
    this.code = code;
    this.details = details;
  }
}

/** Open, close or transport failure. Never fatal to the bridge. */
export class ConnectionError extends StreamBridgeError {
  constructor(message?: string, details: unknown = null) {
    super(ERROR_CODES.CONNECTION_FAILED, message, details);
    this.name = 'ConnectionError';
  }
}

/** Send attempted while not connected */
export class NotConnectedError extends StreamBridgeError {
  readonly state: ConnectionState;

  constructor(state: ConnectionState, message?: string) {
    super(ERROR_CODES.NOT_CONNECTED, message, { state });
    this.name = 'NotConnectedError';
    this.state = state;
  }
}

/** Malformed sample, message or envelope */
export class SerializationError extends StreamBridgeError {
  constructor(message?: string, details: unknown = null) {
    super(ERROR_CODES.SERIALIZATION_FAILED, message, details);
    this.name = 'SerializationError';
  }
}

/** Command issued after the bridge was torn down */
export class BridgeDisposedError extends StreamBridgeError {
  constructor() {
    super(ERROR_CODES.BRIDGE_DISPOSED);
    this.name = 'BridgeDisposedError';
  }
}

/**
 * Helper function to read a message out of anything thrown
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
