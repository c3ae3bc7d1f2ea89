#!/usr/bin/env node
/**
 * Sensor Stream Bridge - Command Line Entry Point
 *
 *   sensor-stream-bridge            operator console for the bridge
 *   sensor-stream-bridge receive    consumer that logs and ACKs envelopes
 *
 * Settings come from the environment (and .env), see config/env.mts.
 */

import 'dotenv/config';
import { createInterface } from 'node:readline';
import { loadConfig, resolveEndpoint, type EnvConfig } from './config/env.mjs';
import { HELP, handleCommand } from './console/commands.mjs';
import { configureLogging, createLogger } from './logging/logger.mjs';
import { EventLog } from './logging/EventLog.mjs';
import { SensorBridge } from './bridge/SensorBridge.mjs';
import { PointCloudReceiver } from './receiver/PointCloudReceiver.mjs';
import { describeError } from './StreamProtocol.mjs';

const logger = createLogger('Bridge');

// ============================================================================
// Operator console
// ============================================================================

async function runConsole(config: EnvConfig): Promise<void> {
  const eventLog = config.EVENT_LOG_PATH ? new EventLog(config.EVENT_LOG_PATH) : undefined;
  const bridge = new SensorBridge({
    endpoint: resolveEndpoint(config),
    cadenceMs: config.STREAM_CADENCE_MS,
    batchSize: config.STREAM_BATCH_SIZE,
    handshakeTimeout: config.HANDSHAKE_TIMEOUT_MS,
    eventLog,
  });

  bridge.on('stateChange', (change) => {
    logger.info(`State: ${change.previous} -> ${change.state}`, {
      code: change.code,
      reason: change.reason,
    });
  });
  bridge.on('connectionError', (error) => {
    logger.error('Connection error', { error: error.message });
  });
  bridge.on('notConnected', (error) => {
    logger.warn(error.message);
  });
  bridge.on('captureDropped', (signal) => {
    logger.warn('Capture batch dropped: not connected', {
      samples: signal.sampleCount,
      producer: signal.producer,
    });
  });
  bridge.on('sendFailed', (failure) => {
    logger.debug('Send failed', { source: failure.source, error: failure.error.message });
  });
  bridge.on('serverMessage', (text) => {
    logger.debug('From server', { text });
  });

  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: '> ' });

  let closing: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    if (!closing) {
      logger.info('Shutting down...');
      bridge.dispose();
      closing = eventLog ? eventLog.close() : Promise.resolve();
      rl.close();
    }
    return closing;
  };

  rl.on('line', (line) => {
    handleCommand(bridge, config, line, logger.child('Capture'))
      .then(async (output) => {
        if (line.trim() === 'quit') {
          await shutdown();
          return;
        }
        if (output !== null) console.log(output);
        rl.prompt();
      })
      .catch((error: unknown) => {
        logger.error('Command failed', { error: describeError(error) });
        rl.prompt();
      });
  });

  await new Promise<void>((resolve) => {
    rl.once('close', () => {
      shutdown().then(resolve, (error: unknown) => {
        logger.error('Shutdown failed', { error: describeError(error) });
        resolve();
      });
    });
    process.once('SIGINT', () => rl.close());
    process.once('SIGTERM', () => rl.close());
    console.log(HELP);
    rl.prompt();
  });
}

// ============================================================================
// Receiver
// ============================================================================

async function runReceiver(config: EnvConfig): Promise<void> {
  const receiver = new PointCloudReceiver({ port: config.RECEIVER_PORT, ack: config.RECEIVER_ACK });
  receiver.setOnEnvelope((message, clientId) => {
    logger.info('From client', {
      clientId,
      timestamp: message.timestamp,
      samples: message.data.length,
    });
  });
  await receiver.start();

  await new Promise<void>((resolve) => {
    const stop = () => {
      receiver.stop().then(resolve, (error: unknown) => {
        logger.error('Receiver shutdown failed', { error: describeError(error) });
        resolve();
      });
    };
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);
  });
}

// ============================================================================
// Main
// ============================================================================

async function main(argv: string[]): Promise<void> {
  const config = loadConfig();
  configureLogging({ level: config.LOG_LEVEL });

  const [mode = 'bridge'] = argv;
  if (mode === 'receive') {
    await runReceiver(config);
  } else if (mode === 'bridge') {
    await runConsole(config);
  } else {
    logger.error(`Unknown mode: ${mode} (expected "bridge" or "receive")`);
    process.exitCode = 1;
  }
}

main(process.argv.slice(2)).catch((error: unknown) => {
  logger.error('Fatal error', { error: describeError(error) });
  process.exit(1);
});
