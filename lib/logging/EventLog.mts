/**
 * NDJSON Event Log
 * Non-blocking append of structured operational events to a file
 */

import fs from 'node:fs';
import path from 'node:path';
import { createLogger } from './logger.mjs';

const logger = createLogger('EventLog');

export type BridgeLogEvent =
  | 'connect'
  | 'disconnect'
  | 'state_change'
  | 'connection_error'
  | 'stream_start'
  | 'stream_stop'
  | 'capture_attach'
  | 'capture_detach'
  | 'capture_dropped'
  | 'send_failed'
  | 'dispose';

export interface EventLogEntry {
  timestamp: number;
  event: BridgeLogEvent;
  data?: Record<string, unknown>;
}

const BATCH_SIZE = 100;

export class EventLog {
  private fd: number | null = null;
  private queue: string[] = [];
  private writing = false;
  private closing: Promise<void> | null = null;
  private finishClose: (() => void) | null = null;
  private readonly logPath: string;

  constructor(logPath: string) {
    this.logPath = logPath;
    this.ensureDir();
    this.open();
  }

  private ensureDir(): void {
    const dir = path.dirname(this.logPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  private open(): void {
    try {
      this.fd = fs.openSync(this.logPath, 'a');
    } catch (err) {
      logger.error('Failed to open event log', { path: this.logPath, error: String(err) });
    }
  }

  get isOpen(): boolean {
    return this.fd !== null;
  }

  log(event: BridgeLogEvent, data?: Record<string, unknown>): void {
    if (this.fd === null || this.closing) {
      return;
    }

    const entry: EventLogEntry = { timestamp: Date.now(), event, data };
    this.queue.push(JSON.stringify(entry) + '\n');

    if (!this.writing) {
      this.flush();
    }
  }

  private flush(): void {
    const fd = this.fd;
    if (fd === null || this.queue.length === 0) {
      this.writing = false;
      return;
    }

    this.writing = true;
    const batch = this.queue.splice(0, BATCH_SIZE).join('');

    fs.write(fd, batch, (err) => {
      if (err) {
        logger.error('Write error', { error: err.message });
      }
      this.writing = false;
      if (this.finishClose) {
        this.finishClose();
      } else if (this.queue.length > 0) {
        setImmediate(() => this.flush());
      }
    });
  }

  /**
   * Stop accepting events, write whatever is still queued after the write in
   * flight, and release the file.
   */
  close(): Promise<void> {
    if (this.closing) {
      return this.closing;
    }
    if (this.fd === null) {
      return Promise.resolve();
    }

    this.closing = new Promise<void>((resolve, reject) => {
      this.finishClose = () => {
        this.finishClose = null;
        try {
          this.finalize();
          resolve();
        } catch (err) {
          reject(err);
        }
      };
    });

    if (!this.writing) {
      this.finishClose?.();
    }
    return this.closing;
  }

  private finalize(): void {
    const fd = this.fd;
    if (fd === null) {
      return;
    }
    this.fd = null;
    if (this.queue.length > 0) {
      fs.writeSync(fd, this.queue.join(''));
      this.queue = [];
    }
    fs.closeSync(fd);
  }
}
