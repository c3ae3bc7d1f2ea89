/**
 * Unit tests for the operator console commands
 */

import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { ManualScheduler, silentLogger, startReceiver, type TestReceiver } from './helpers.mjs';
import { HELP, handleCommand } from '../lib/console/commands.mjs';
import { SensorBridge } from '../lib/bridge/SensorBridge.mjs';
import { loadConfig } from '../lib/config/env.mjs';

describe('handleCommand', () => {
  let server: TestReceiver | null = null;
  const config = loadConfig({ STREAM_CADENCE_MS: '100', STREAM_BATCH_SIZE: '4' });
  const scheduler = new ManualScheduler();
  let bridge = new SensorBridge({ scheduler, logger: silentLogger });

  afterEach(async () => {
    bridge.dispose();
    bridge = new SensorBridge({ scheduler, logger: silentLogger });
    await server?.receiver.stop();
    server = null;
  });

  it('answers locally without a connection', async () => {
    assert.equal(await handleCommand(bridge, config, '   '), null);
    assert.equal(await handleCommand(bridge, config, 'state'), 'disconnected');
    assert.equal(await handleCommand(bridge, config, 'start'), 'Connect to the stream endpoint first');
    assert.equal(await handleCommand(bridge, config, 'start abc'), 'invalid cadence: abc');
    assert.equal(await handleCommand(bridge, config, 'start 0'), 'invalid cadence: 0');
    assert.equal(await handleCommand(bridge, config, 'start 3000000000'), 'invalid cadence: 3000000000');
    assert.equal(await handleCommand(bridge, config, 'stop'), 'not streaming');
    assert.equal(await handleCommand(bridge, config, 'detach'), 'no capture attached');
    assert.equal(await handleCommand(bridge, config, 'help'), HELP);
    assert.equal(await handleCommand(bridge, config, 'quit'), 'bye');
    assert.equal(await handleCommand(bridge, config, 'jump'), `unknown command: jump\n${HELP}`);
  });

  it('runs a connect, stream and disconnect session', async () => {
    server = await startReceiver();

    assert.equal(await handleCommand(bridge, config, `connect ${server.url}`), 'connected');
    assert.equal(await handleCommand(bridge, config, 'state'), 'connected');
    assert.equal(await handleCommand(bridge, config, 'start 250'), 'streaming');
    assert.equal(await handleCommand(bridge, config, 'start'), 'already streaming');
    assert.equal(await handleCommand(bridge, config, 'start 3000000000'), 'invalid cadence: 3000000000');
    assert.equal(scheduler.scheduled, 1);
    assert.equal(await handleCommand(bridge, config, 'stop'), 'stopped');
    assert.equal(await handleCommand(bridge, config, 'attach', silentLogger), 'capture attached');
    assert.equal(await handleCommand(bridge, config, 'detach'), 'capture detached');
    assert.equal(await handleCommand(bridge, config, 'disconnect'), 'disconnected');
    assert.equal(await handleCommand(bridge, config, 'state'), 'disconnected');
  });

  it('reports a failed connect with the resulting state', async () => {
    const closed = await startReceiver();
    await closed.receiver.stop();

    assert.equal(await handleCommand(bridge, config, `connect ${closed.url}`), 'connect failed (state: disconnected)');
  });

  it('prints stats as JSON', async () => {
    const output = await handleCommand(bridge, config, 'stats');
    assert.ok(output !== null);
    const stats: unknown = JSON.parse(output);
    assert.deepEqual(stats, {
      state: 'disconnected',
      endpoint: null,
      transmitter: { messagesSent: 0, samplesSent: 0, bytesSent: 0, rejected: 0, lastSentAt: null },
      stream: { active: false, cadenceMs: null, batchSize: null, ticks: 0, framesSent: 0, durationMs: 0 },
      capture: { attached: false, producer: null, batchesForwarded: 0, batchesDropped: 0, batchesFailed: 0 },
    });
  });
});
