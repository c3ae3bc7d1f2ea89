/**
 * Shared test helpers
 */

import { configureLogging, createLogger } from '../lib/logging/logger.mjs';
import { PointCloudReceiver } from '../lib/receiver/PointCloudReceiver.mjs';
import type { CancelTask, IntervalScheduler } from '../lib/streaming/IntervalScheduler.mjs';
import type { ConnectionHandle, ConnectionState, PointCloudMessage } from '../lib/types.mjs';

configureLogging({ level: 'silent' });

export const silentLogger = createLogger('test', { level: 'silent' });

// ============================================================================
// Manual interval scheduler
// ============================================================================

interface ManualTask {
  intervalMs: number;
  due: number;
  task: () => void;
}

/**
 * IntervalScheduler driven by advance() instead of real time
 */
export class ManualScheduler implements IntervalScheduler {
  private tasks = new Set<ManualTask>();
  private elapsed = 0;
  scheduled = 0;

  every(intervalMs: number, task: () => void): CancelTask {
    const entry: ManualTask = { intervalMs, due: this.elapsed + intervalMs, task };
    this.tasks.add(entry);
    this.scheduled++;
    return () => {
      this.tasks.delete(entry);
    };
  }

  get pending(): number {
    return this.tasks.size;
  }

  /** Elapsed virtual time, usable as a clock */
  now = (): number => this.elapsed;

  /** Callbacks of the tasks currently scheduled */
  callbacks(): Array<() => void> {
    return [...this.tasks].map((entry) => entry.task);
  }

  advance(ms: number): void {
    const target = this.elapsed + ms;
    for (;;) {
      let next: ManualTask | null = null;
      for (const entry of this.tasks) {
        if (entry.due <= target && (next === null || entry.due < next.due)) {
          next = entry;
        }
      }
      if (next === null) break;
      this.elapsed = next.due;
      next.due += next.intervalMs;
      next.task();
    }
    this.elapsed = target;
  }
}

// ============================================================================
// Fake connection handle
// ============================================================================

export class FakeConnection implements ConnectionHandle {
  state: ConnectionState;
  writes: string[] = [];
  refuseWrites = false;

  constructor(state: ConnectionState = 'connected') {
    this.state = state;
  }

  getState(): ConnectionState {
    return this.state;
  }

  write(text: string): boolean {
    if (this.refuseWrites) return false;
    this.writes.push(text);
    return true;
  }
}

// ============================================================================
// Sequenced random source
// ============================================================================

/**
 * Deterministic source cycling through 0, 0.25, 0.5, 0.75
 */
export function cyclingRandom(): () => number {
  let i = 0;
  return () => (i++ % 4) / 4;
}

// ============================================================================
// In-process receiver
// ============================================================================

export interface TestReceiver {
  receiver: PointCloudReceiver;
  url: string;
  messages: PointCloudMessage[];
}

export async function startReceiver(ack = true): Promise<TestReceiver> {
  const receiver = new PointCloudReceiver({ port: 0, host: '127.0.0.1', ack, logger: silentLogger });
  const messages: PointCloudMessage[] = [];
  receiver.setOnEnvelope((message) => {
    messages.push(message);
  });
  const port = await receiver.start();
  return { receiver, url: `ws://127.0.0.1:${port}`, messages };
}

/**
 * Poll until the predicate holds or the timeout elapses
 */
export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}
