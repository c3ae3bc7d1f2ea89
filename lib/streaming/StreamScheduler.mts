/**
 * Stream Scheduler
 * Drives the synthetic point-cloud stream at a fixed cadence
 *
 * Features:
 * - Single recurring task per session (start() while active is a no-op)
 * - Each tick builds one batch and sends it through the Transmitter
 * - stop() is effective before it returns; a tick already dispatched checks
 *   the session it belongs to before sending
 */

import { STREAM_CONFIG } from '../StreamProtocol.mjs';
import { createPointCloudMessage } from '../messaging/Envelope.mjs';
import { createLogger, type Logger } from '../logging/logger.mjs';
import type { Transmitter } from '../connection/Transmitter.mjs';
import { generateSamples, type RandomSource } from './SampleGenerator.mjs';
import { timerScheduler, type CancelTask, type IntervalScheduler } from './IntervalScheduler.mjs';
import type { ConnectionHandle, SendResult } from '../types.mjs';

export interface StreamSession {
  /** Present if and only if the session is active */
  cancel: CancelTask | null;
  active: boolean;
  cadenceMs: number;
  batchSize: number;
  startedAt: number;
  ticks: number;
  framesSent: number;
}

export interface StreamSchedulerOptions {
  scheduler?: IntervalScheduler;
  random?: RandomSource;
  now?: () => number;
  logger?: Logger;
}

export type OnTickFailedFn = (result: Extract<SendResult, { ok: false }>, sampleCount: number) => void;

export interface StreamSchedulerStats {
  active: boolean;
  cadenceMs: number | null;
  batchSize: number | null;
  ticks: number;
  framesSent: number;
  durationMs: number;
}

function assertPositiveInteger(name: string, value: number, max = Number.MAX_SAFE_INTEGER): void {
  if (!Number.isInteger(value) || value <= 0 || value > max) {
    throw new RangeError(`${name} must be an integer in 1..${max}, got ${value}`);
  }
}

export class StreamScheduler {
  private session: StreamSession | null = null;
  private readonly connection: ConnectionHandle;
  private readonly transmitter: Transmitter;
  private readonly scheduler: IntervalScheduler;
  private readonly random: RandomSource;
  private readonly now: () => number;
  private readonly logger: Logger;
  private onTickFailed?: OnTickFailedFn;

  constructor(
    connection: ConnectionHandle,
    transmitter: Transmitter,
    options: StreamSchedulerOptions = {}
  ) {
    this.connection = connection;
    this.transmitter = transmitter;
    this.scheduler = options.scheduler ?? timerScheduler;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger('StreamScheduler');
  }

  /**
   * Set callback for ticks whose send was rejected
   */
  setOnTickFailed(callback: OnTickFailedFn): void {
    this.onTickFailed = callback;
  }

  /**
   * Start the recurring stream. Returns false if a session is already active.
   */
  start(
    cadenceMs: number = STREAM_CONFIG.DEFAULTS.CADENCE_MS,
    batchSize: number = STREAM_CONFIG.DEFAULTS.BATCH_SIZE
  ): boolean {
    if (this.session) {
      return false;
    }
    assertPositiveInteger('cadenceMs', cadenceMs, STREAM_CONFIG.MAX_CADENCE_MS);
    assertPositiveInteger('batchSize', batchSize);

    const session: StreamSession = {
      cancel: null,
      active: true,
      cadenceMs,
      batchSize,
      startedAt: this.now(),
      ticks: 0,
      framesSent: 0,
    };
    session.cancel = this.scheduler.every(cadenceMs, () => this.tick(session));
    this.session = session;

    this.logger.info('Stream started', { cadenceMs, batchSize });
    return true;
  }

  /**
   * Stop the recurring stream. Returns false if nothing was running.
   */
  stop(): boolean {
    const session = this.session;
    if (!session) {
      return false;
    }

    session.active = false;
    session.cancel?.();
    session.cancel = null;
    this.session = null;

    this.logger.info('Stream stopped', {
      ticks: session.ticks,
      framesSent: session.framesSent,
      durationMs: this.now() - session.startedAt,
    });
    return true;
  }

  private tick(session: StreamSession): void {
    if (!session.active) {
      return;
    }
    session.ticks++;

    const samples = generateSamples(session.batchSize, this.random);
    const message = createPointCloudMessage(samples, this.now());

    // stop() may have run while this tick was being prepared
    if (!session.active || this.session !== session) {
      return;
    }

    const result = this.transmitter.send(this.connection, message);
    if (result.ok) {
      session.framesSent++;
      return;
    }

    this.logger.debug('Tick not sent', { error: result.error.message });
    this.onTickFailed?.(result, samples.length);
  }

  isActive(): boolean {
    return this.session !== null;
  }

  /**
   * Snapshot of the current session
   */
  getSession(): Readonly<StreamSession> | null {
    return this.session ? { ...this.session } : null;
  }

  getStats(): StreamSchedulerStats {
    const session = this.session;
    return {
      active: session !== null,
      cadenceMs: session?.cadenceMs ?? null,
      batchSize: session?.batchSize ?? null,
      ticks: session?.ticks ?? 0,
      framesSent: session?.framesSent ?? 0,
      durationMs: session ? this.now() - session.startedAt : 0,
    };
  }
}
