/**
 * Native-backed capture producer
 *
 * Reads newline-delimited JSON batches from a capture source, typically the
 * stdout of a native capture process. Each line is either an array of
 * samples or an object with a `data` array:
 *
 *   [{"x":0.1,"y":0.2,"z":0.3}, ...]
 *   {"data":[{"x":0.1,"y":0.2,"z":0.3}, ...]}
 */

import { spawn } from 'node:child_process';
import { createInterface, type Interface } from 'node:readline';
import type { Readable } from 'node:stream';
import { z } from 'zod';
import { sampleSchema } from '../../messaging/Envelope.mjs';
import { createLogger, type Logger } from '../../logging/logger.mjs';
import type {
  CaptureDirectories,
  CaptureProducer,
  Sample,
  SampleBatchListener,
  UnsubscribeFunction,
} from '../../types.mjs';

export interface CaptureSource {
  stream: Readable;
  close(): void;
}

export type OpenCaptureSource = () => CaptureSource;

const batchLineSchema = z.union([
  z.array(sampleSchema),
  z.object({ data: z.array(sampleSchema) }),
]);

/**
 * Parse one line of capture output. Returns null for blank or malformed lines.
 */
export function parseBatchLine(line: string): Sample[] | null {
  const trimmed = line.trim();
  if (trimmed.length === 0) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(trimmed);
  } catch {
    return null;
  }

  const result = batchLineSchema.safeParse(raw);
  if (!result.success) {
    return null;
  }
  return Array.isArray(result.data) ? result.data : result.data.data;
}

export interface LineStreamCaptureOptions {
  open: OpenCaptureSource;
  directories?: CaptureDirectories;
  logger?: Logger;
}

export class LineStreamCaptureProducer implements CaptureProducer {
  readonly kind = 'native' as const;
  readonly directories?: CaptureDirectories;
  private readonly open: OpenCaptureSource;
  private readonly logger: Logger;
  private active: { source: CaptureSource; lines: Interface } | null = null;
  private skippedLines = 0;

  constructor(options: LineStreamCaptureOptions) {
    this.open = options.open;
    this.directories = options.directories;
    this.logger = options.logger ?? createLogger('CaptureProducer');
  }

  /**
   * Opens the capture source. One subscriber at a time.
   */
  subscribe(listener: SampleBatchListener): UnsubscribeFunction {
    if (this.active) {
      throw new Error('Capture source is already subscribed');
    }

    const source = this.open();
    const lines = createInterface({ input: source.stream, crlfDelay: Infinity });
    const session = { source, lines };
    this.active = session;

    source.stream.on('error', (err: Error) => {
      this.logger.error('Capture source error', { error: err.message });
    });

    lines.on('line', (line: string) => {
      if (this.active !== session) return;
      const samples = parseBatchLine(line);
      if (samples === null) {
        if (line.trim().length > 0) {
          this.skippedLines++;
          this.logger.warn('Skipping malformed capture line', { length: line.length });
        }
        return;
      }
      listener(samples);
    });

    lines.on('close', () => {
      this.logger.debug('Capture source ended');
    });

    return () => {
      if (this.active !== session) return;
      this.active = null;
      lines.close();
      source.close();
    };
  }

  get skipped(): number {
    return this.skippedLines;
  }
}

/**
 * Source that runs a native capture command and reads its stdout.
 * The directories are handed to the process through its environment.
 */
export function spawnCaptureProcess(
  command: string,
  args: string[],
  directories: CaptureDirectories,
  logger: Logger = createLogger('CaptureProcess')
): OpenCaptureSource {
  return () => {
    const child = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'inherit'],
      env: {
        ...process.env,
        CAPTURE_CHECKPOINT_DIR: directories.checkpointDirectory,
        CAPTURE_IMAGES_DIR: directories.imagesDirectory,
      },
    });

    child.on('error', (err: Error) => {
      logger.error(`Failed to run ${command}`, { error: err.message });
    });
    child.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      logger.info(`${command} exited`, { code, signal });
    });

    return {
      stream: child.stdout,
      close: () => {
        if (child.exitCode === null && !child.killed) {
          child.kill('SIGTERM');
        }
      },
    };
  };
}
