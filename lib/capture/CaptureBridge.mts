/**
 * Capture Bridge
 *
 * Adapts a capture producer's sample-ready notifications into Transmitter
 * calls. Batches are forwarded one-to-one with no buffering or coalescing.
 *
 * A batch that arrives while the connection is down is reported as a
 * "dropped, not connected" signal, not as a send failure.
 */

import { createPointCloudMessage } from '../messaging/Envelope.mjs';
import { createLogger, type Logger } from '../logging/logger.mjs';
import type { Transmitter } from '../connection/Transmitter.mjs';
import type {
  CaptureDropSignal,
  CaptureProducer,
  ConnectionHandle,
  Sample,
  SendFailure,
  UnsubscribeFunction,
} from '../types.mjs';

/** Callback for capture batches dropped while disconnected */
export type OnCaptureDroppedFn = (signal: CaptureDropSignal) => void;

/** Callback for capture batches the Transmitter rejected */
export type OnCaptureSendFailedFn = (failure: SendFailure) => void;

export interface CaptureBridgeOptions {
  now?: () => number;
  logger?: Logger;
}

export interface CaptureBridgeStats {
  attached: boolean;
  producer: CaptureProducer['kind'] | null;
  batchesForwarded: number;
  batchesDropped: number;
  batchesFailed: number;
}

interface Attachment {
  producer: CaptureProducer;
  unsubscribe: UnsubscribeFunction | null;
}

export class CaptureBridge {
  private readonly connection: ConnectionHandle;
  private readonly transmitter: Transmitter;
  private readonly now: () => number;
  private readonly logger: Logger;
  private attachment: Attachment | null = null;

  private onDropped?: OnCaptureDroppedFn;
  private onSendFailed?: OnCaptureSendFailedFn;

  private batchesForwarded = 0;
  private batchesDropped = 0;
  private batchesFailed = 0;

  constructor(connection: ConnectionHandle, transmitter: Transmitter, options: CaptureBridgeOptions = {}) {
    this.connection = connection;
    this.transmitter = transmitter;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger('CaptureBridge');
  }

  setOnDropped(callback: OnCaptureDroppedFn): void {
    this.onDropped = callback;
  }

  setOnSendFailed(callback: OnCaptureSendFailedFn): void {
    this.onSendFailed = callback;
  }

  /**
   * Register with a producer, replacing any producer attached before
   */
  attach(producer: CaptureProducer): void {
    this.detach();

    const attachment: Attachment = { producer, unsubscribe: null };
    this.attachment = attachment;
    try {
      attachment.unsubscribe = producer.subscribe((samples) => {
        // Ignore batches a producer delivers after it was detached
        if (this.attachment !== attachment) return;
        this.handleBatch(producer, samples);
      });
    } catch (error) {
      this.attachment = null;
      throw error;
    }

    this.logger.info(`Attached ${producer.kind} capture producer`, {
      directories: producer.directories,
    });
  }

  /**
   * Unsubscribe from the current producer. Returns false if none was attached.
   */
  detach(): boolean {
    const attachment = this.attachment;
    if (!attachment) {
      return false;
    }

    this.attachment = null;
    attachment.unsubscribe?.();
    this.logger.info(`Detached ${attachment.producer.kind} capture producer`);
    return true;
  }

  isAttached(): boolean {
    return this.attachment !== null;
  }

  private handleBatch(producer: CaptureProducer, samples: readonly Sample[]): void {
    const state = this.connection.getState();
    if (state !== 'connected') {
      this.batchesDropped++;
      const signal: CaptureDropSignal = {
        reason: 'not-connected',
        state,
        producer: producer.kind,
        sampleCount: samples.length,
        at: this.now(),
      };
      this.logger.warn('Point cloud produced but the connection is not open', {
        state,
        samples: samples.length,
      });
      this.onDropped?.(signal);
      return;
    }

    const message = createPointCloudMessage(samples, this.now());
    const result = this.transmitter.send(this.connection, message);
    if (result.ok) {
      this.batchesForwarded++;
      return;
    }

    this.batchesFailed++;
    this.onSendFailed?.({
      source: 'capture',
      error: result.error,
      sampleCount: samples.length,
    });
  }

  getStats(): CaptureBridgeStats {
    return {
      attached: this.attachment !== null,
      producer: this.attachment?.producer.kind ?? null,
      batchesForwarded: this.batchesForwarded,
      batchesDropped: this.batchesDropped,
      batchesFailed: this.batchesFailed,
    };
  }
}
