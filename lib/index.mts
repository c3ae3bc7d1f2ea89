/**
 * Sensor Stream Bridge Library - Public API
 *
 * This is the main entry point for the library.
 * Import from here to access all public types and utilities.
 */

// =============================================================================
// Types (from central types.mts)
// =============================================================================
export type {
  // Samples
  Sample,
  PointCloudType,
  PointCloudMessage,
  // Connection
  ConnectionState,
  ConnectionStateChange,
  ConnectionHandle,
  // Transmission
  SendResult,
  SendFailure,
  SendFailureError,
  BatchSource,
  // Capture
  CaptureProducer,
  CaptureProducerKind,
  CaptureDirectories,
  CaptureDropSignal,
  SampleBatchListener,
  // Events
  SensorBridgeEvents,
  UnsubscribeFunction,
  EventListener,
} from './types.mjs';

// =============================================================================
// Protocol constants and errors
// =============================================================================
export {
  MESSAGE_TYPES,
  STREAM_CONFIG,
  ERROR_CODES,
  ERROR_MESSAGES,
  StreamBridgeError,
  ConnectionError,
  NotConnectedError,
  SerializationError,
  BridgeDisposedError,
  type ErrorCode,
  type MessageTypeValue,
} from './StreamProtocol.mjs';

// =============================================================================
// Messaging
// =============================================================================
export * from './messaging/index.mjs';

// =============================================================================
// Connection
// =============================================================================
export * from './connection/index.mjs';

// =============================================================================
// Streaming
// =============================================================================
export * from './streaming/index.mjs';

// =============================================================================
// Capture
// =============================================================================
export * from './capture/index.mjs';

// =============================================================================
// Bridge
// =============================================================================
export {
  SensorBridge,
  type SensorBridgeConfig,
  type SensorBridgeStats,
  type StartStreamResult,
} from './bridge/SensorBridge.mjs';

// =============================================================================
// Receiver
// =============================================================================
export {
  PointCloudReceiver,
  type ReceiverOptions,
  type ReceiverStats,
  type OnEnvelopeFn,
  type OnInvalidFn,
} from './receiver/PointCloudReceiver.mjs';

// =============================================================================
// Configuration and logging
// =============================================================================
export { loadConfig, resolveEndpoint, captureArgs, type EnvConfig } from './config/env.mjs';
export {
  createLogger,
  configureLogging,
  type Logger,
  type LoggerFunction,
  type LoggerOptions,
  type LogLevel,
} from './logging/logger.mjs';
export { EventLog, type BridgeLogEvent, type EventLogEntry } from './logging/EventLog.mjs';
