/**
 * Capture producers
 *
 * The native-backed or synthetic variant is chosen once, when the bridge is
 * composed.
 */

import { captureArgs, type EnvConfig } from '../../config/env.mjs';
import type { Logger } from '../../logging/logger.mjs';
import type { CaptureProducer } from '../../types.mjs';
import {
  LineStreamCaptureProducer,
  spawnCaptureProcess,
} from './LineStreamCaptureProducer.mjs';
import { SyntheticCaptureProducer } from './SyntheticCaptureProducer.mjs';

export {
  LineStreamCaptureProducer,
  spawnCaptureProcess,
  parseBatchLine,
  type CaptureSource,
  type OpenCaptureSource,
  type LineStreamCaptureOptions,
} from './LineStreamCaptureProducer.mjs';

export {
  SyntheticCaptureProducer,
  type SyntheticCaptureOptions,
} from './SyntheticCaptureProducer.mjs';

type CaptureConfig = Pick<
  EnvConfig,
  | 'CAPTURE_COMMAND'
  | 'CAPTURE_ARGS'
  | 'CAPTURE_CHECKPOINT_DIR'
  | 'CAPTURE_IMAGES_DIR'
  | 'STREAM_CADENCE_MS'
  | 'STREAM_BATCH_SIZE'
>;

/**
 * Native process producer when CAPTURE_COMMAND is set, synthetic otherwise
 */
export function createCaptureProducer(config: CaptureConfig, logger?: Logger): CaptureProducer {
  if (config.CAPTURE_COMMAND) {
    const directories = {
      checkpointDirectory: config.CAPTURE_CHECKPOINT_DIR,
      imagesDirectory: config.CAPTURE_IMAGES_DIR,
    };
    return new LineStreamCaptureProducer({
      open: spawnCaptureProcess(config.CAPTURE_COMMAND, captureArgs(config), directories, logger),
      directories,
      logger,
    });
  }

  return new SyntheticCaptureProducer({
    intervalMs: config.STREAM_CADENCE_MS,
    batchSize: config.STREAM_BATCH_SIZE,
  });
}
