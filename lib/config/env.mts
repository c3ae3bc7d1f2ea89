/**
 * Environment Configuration
 * Validates the environment and derives the bridge settings from it
 */

import { z } from 'zod';
import { STREAM_CONFIG } from '../StreamProtocol.mjs';
import { createLogger } from '../logging/logger.mjs';

const logger = createLogger('Config');

const flag = z.enum(['true', 'false']).transform((v) => v === 'true');

const envSchema = z.object({
  // Remote consumer
  BRIDGE_URL: z.string().url().optional(),
  BRIDGE_HOST: z.string().min(1).default(STREAM_CONFIG.DEFAULTS.HOST),
  BRIDGE_PORT: z.coerce.number().int().min(1).max(65535).default(STREAM_CONFIG.DEFAULTS.PORT),
  HANDSHAKE_TIMEOUT_MS: z.coerce.number().int().min(100).max(60000).default(STREAM_CONFIG.TIMEOUTS.HANDSHAKE),

  // Simulated stream
  STREAM_CADENCE_MS: z.coerce.number().int().min(10).max(60000).default(STREAM_CONFIG.DEFAULTS.CADENCE_MS),
  STREAM_BATCH_SIZE: z.coerce.number().int().min(1).max(100000).default(STREAM_CONFIG.DEFAULTS.BATCH_SIZE),

  // Receiver mode
  RECEIVER_PORT: z.coerce.number().int().min(0).max(65535).default(STREAM_CONFIG.DEFAULTS.PORT),
  RECEIVER_ACK: flag.default('true'),

  // Native capture
  CAPTURE_COMMAND: z.string().min(1).optional(),
  CAPTURE_ARGS: z.string().default(''),
  CAPTURE_CHECKPOINT_DIR: z.string().default('/tmp/objectcapture-checkpoints'),
  CAPTURE_IMAGES_DIR: z.string().default('/tmp/objectcapture-images'),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  EVENT_LOG_PATH: z.string().min(1).optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function loadConfig(source: Record<string, string | undefined> = process.env): EnvConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    logger.error('Invalid environment configuration, using defaults');
    for (const issue of result.error.issues) {
      logger.error(`  ${issue.path.join('.')}: ${issue.message}`);
    }
    return envSchema.parse({});
  }

  return result.data;
}

/**
 * WebSocket endpoint of the remote consumer
 */
export function resolveEndpoint(config: Pick<EnvConfig, 'BRIDGE_URL' | 'BRIDGE_HOST' | 'BRIDGE_PORT'>): string {
  return config.BRIDGE_URL ?? `ws://${config.BRIDGE_HOST}:${config.BRIDGE_PORT}`;
}

/**
 * Split CAPTURE_ARGS on whitespace
 */
export function captureArgs(config: Pick<EnvConfig, 'CAPTURE_ARGS'>): string[] {
  return config.CAPTURE_ARGS.split(/\s+/).filter((arg) => arg.length > 0);
}
