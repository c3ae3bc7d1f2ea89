/**
 * Connection - Public API
 *
 * Barrel exports for connection management.
 */

export {
  ConnectionManager,
  type ConnectionOptions,
  type ConnectionHandle,
  type ConnectionState,
  type ConnectionStateChange,
  type OnStateChangeFn,
  type OnConnectionErrorFn,
  type OnMessageFn,
} from './ConnectionManager.mjs';

export { Transmitter, type TransmitterStats } from './Transmitter.mjs';
