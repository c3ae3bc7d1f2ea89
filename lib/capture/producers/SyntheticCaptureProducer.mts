/**
 * Synthetic capture producer
 *
 * Stands in for a capture device when none is available: emits uniform
 * batches on an interval for as long as anyone is subscribed.
 */

import { STREAM_CONFIG } from '../../StreamProtocol.mjs';
import { generateSamples, type RandomSource } from '../../streaming/SampleGenerator.mjs';
import {
  timerScheduler,
  type CancelTask,
  type IntervalScheduler,
} from '../../streaming/IntervalScheduler.mjs';
import type {
  CaptureProducer,
  SampleBatchListener,
  UnsubscribeFunction,
} from '../../types.mjs';

export interface SyntheticCaptureOptions {
  intervalMs?: number;
  batchSize?: number;
  scheduler?: IntervalScheduler;
  random?: RandomSource;
}

export class SyntheticCaptureProducer implements CaptureProducer {
  readonly kind = 'synthetic' as const;
  private readonly intervalMs: number;
  private readonly batchSize: number;
  private readonly scheduler: IntervalScheduler;
  private readonly random: RandomSource;
  private readonly listeners = new Set<SampleBatchListener>();
  private cancel: CancelTask | null = null;

  constructor(options: SyntheticCaptureOptions = {}) {
    this.intervalMs = options.intervalMs ?? STREAM_CONFIG.DEFAULTS.CADENCE_MS;
    this.batchSize = options.batchSize ?? STREAM_CONFIG.DEFAULTS.BATCH_SIZE;
    this.scheduler = options.scheduler ?? timerScheduler;
    this.random = options.random ?? Math.random;
  }

  subscribe(listener: SampleBatchListener): UnsubscribeFunction {
    this.listeners.add(listener);
    if (!this.cancel) {
      this.cancel = this.scheduler.every(this.intervalMs, () => this.emit());
    }

    return () => {
      this.listeners.delete(listener);
      if (this.listeners.size === 0 && this.cancel) {
        this.cancel();
        this.cancel = null;
      }
    };
  }

  get isRunning(): boolean {
    return this.cancel !== null;
  }

  private emit(): void {
    const samples = generateSamples(this.batchSize, this.random);
    for (const listener of [...this.listeners]) {
      listener(samples);
    }
  }
}
