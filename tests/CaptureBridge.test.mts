/**
 * Unit tests for CaptureBridge
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { FakeConnection, silentLogger } from './helpers.mjs';
import { CaptureBridge } from '../lib/capture/CaptureBridge.mjs';
import { Transmitter } from '../lib/connection/Transmitter.mjs';
import { parseEnvelope } from '../lib/messaging/Envelope.mjs';
import type {
  CaptureDropSignal,
  CaptureProducer,
  Sample,
  SampleBatchListener,
  SendFailure,
  UnsubscribeFunction,
} from '../lib/types.mjs';

/**
 * Producer that emits only when told to, and keeps listeners after
 * unsubscribe so late deliveries can be simulated
 */
class ManualProducer implements CaptureProducer {
  readonly kind = 'native' as const;
  readonly listeners: SampleBatchListener[] = [];
  unsubscribed = 0;

  subscribe(listener: SampleBatchListener): UnsubscribeFunction {
    this.listeners.push(listener);
    return () => {
      this.unsubscribed++;
    };
  }

  emit(samples: readonly Sample[]): void {
    for (const listener of this.listeners) {
      listener(samples);
    }
  }
}

const batch: Sample[] = [
  { x: 1, y: 2, z: 3 },
  { x: 4, y: 5, z: 6 },
];

function setup(state: 'connected' | 'connecting' | 'disconnected' = 'connected') {
  const connection = new FakeConnection(state);
  const transmitter = new Transmitter(silentLogger);
  const bridge = new CaptureBridge(connection, transmitter, { now: () => 777, logger: silentLogger });
  const dropped: CaptureDropSignal[] = [];
  const failed: SendFailure[] = [];
  bridge.setOnDropped((signal) => dropped.push(signal));
  bridge.setOnSendFailed((failure) => failed.push(failure));
  return { connection, transmitter, bridge, dropped, failed };
}

describe('CaptureBridge', () => {
  it('forwards each batch as one message', () => {
    const { connection, bridge } = setup();
    const producer = new ManualProducer();

    bridge.attach(producer);
    producer.emit(batch);
    producer.emit(batch.slice(0, 1));

    assert.equal(connection.writes.length, 2);
    const first = parseEnvelope(connection.writes[0]);
    assert.equal(first.timestamp, 777);
    assert.deepEqual(first.data, batch);
    assert.equal(parseEnvelope(connection.writes[1]).data.length, 1);
    assert.equal(bridge.getStats().batchesForwarded, 2);
  });

  it('signals a drop instead of sending while disconnected', () => {
    const { connection, bridge, dropped, failed } = setup('disconnected');
    const producer = new ManualProducer();

    bridge.attach(producer);
    producer.emit(batch);

    assert.equal(connection.writes.length, 0);
    assert.deepEqual(dropped, [
      { reason: 'not-connected', state: 'disconnected', producer: 'native', sampleCount: 2, at: 777 },
    ]);
    assert.equal(failed.length, 0);
    assert.equal(bridge.getStats().batchesDropped, 1);
  });

  it('signals a drop while still connecting', () => {
    const { bridge, dropped } = setup('connecting');
    const producer = new ManualProducer();

    bridge.attach(producer);
    producer.emit(batch);

    assert.equal(dropped.length, 1);
    assert.equal(dropped[0].state, 'connecting');
  });

  it('reports a send failure when the write is refused', () => {
    const { connection, bridge, failed, dropped } = setup();
    connection.refuseWrites = true;
    const producer = new ManualProducer();

    bridge.attach(producer);
    producer.emit(batch);

    assert.equal(dropped.length, 0);
    assert.equal(failed.length, 1);
    assert.equal(failed[0].source, 'capture');
    assert.equal(failed[0].sampleCount, 2);
    assert.equal(failed[0].error.code, 'NOT_CONNECTED');
    assert.equal(bridge.getStats().batchesFailed, 1);
  });

  it('ignores batches delivered after detach', () => {
    const { connection, bridge } = setup();
    const producer = new ManualProducer();

    bridge.attach(producer);
    assert.equal(bridge.detach(), true);
    producer.emit(batch);

    assert.equal(producer.unsubscribed, 1);
    assert.equal(connection.writes.length, 0);
    assert.equal(bridge.isAttached(), false);
    assert.equal(bridge.detach(), false);
  });

  it('replaces the previous producer on attach', () => {
    const { connection, bridge } = setup();
    const first = new ManualProducer();
    const second = new ManualProducer();

    bridge.attach(first);
    bridge.attach(second);
    first.emit(batch);
    second.emit(batch);

    assert.equal(first.unsubscribed, 1);
    assert.equal(connection.writes.length, 1);
    assert.deepEqual(bridge.getStats(), {
      attached: true,
      producer: 'native',
      batchesForwarded: 1,
      batchesDropped: 0,
      batchesFailed: 0,
    });
  });

  it('stays detached when subscribe throws', () => {
    const { bridge } = setup();
    const producer: CaptureProducer = {
      kind: 'synthetic',
      subscribe() {
        throw new Error('device busy');
      },
    };

    assert.throws(() => bridge.attach(producer), /device busy/);
    assert.equal(bridge.isAttached(), false);
  });
});
