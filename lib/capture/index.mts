/**
 * Capture - Public API
 */

export {
  CaptureBridge,
  type CaptureBridgeOptions,
  type CaptureBridgeStats,
  type OnCaptureDroppedFn,
  type OnCaptureSendFailedFn,
} from './CaptureBridge.mjs';

export * from './producers/index.mjs';
