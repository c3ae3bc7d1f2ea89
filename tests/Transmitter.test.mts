/**
 * Unit tests for Transmitter
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { FakeConnection, silentLogger } from './helpers.mjs';
import { Transmitter } from '../lib/connection/Transmitter.mjs';
import { createPointCloudMessage } from '../lib/messaging/Envelope.mjs';
import { NotConnectedError, SerializationError } from '../lib/StreamProtocol.mjs';

describe('Transmitter', () => {
  const message = createPointCloudMessage(
    [
      { x: 0.5, y: 0.25, z: 0.75 },
      { x: 0, y: 1, z: 0.5 },
    ],
    1000
  );

  it('writes the serialized envelope when connected', () => {
    const connection = new FakeConnection('connected');
    const transmitter = new Transmitter(silentLogger);

    const result = transmitter.send(connection, message);

    const expected =
      '{"type":"pointcloud","timestamp":1000,"data":[{"x":0.5,"y":0.25,"z":0.75},{"x":0,"y":1,"z":0.5}]}';
    assert.deepEqual(connection.writes, [expected]);
    assert.deepEqual(result, { ok: true, bytes: expected.length });
    assert.deepEqual(transmitter.getStats(), {
      messagesSent: 1,
      samplesSent: 2,
      bytesSent: expected.length,
      rejected: 0,
      lastSentAt: 1000,
    });
  });

  for (const state of ['disconnected', 'connecting'] as const) {
    it(`rejects without writing while ${state}`, () => {
      const connection = new FakeConnection(state);
      const transmitter = new Transmitter(silentLogger);

      const result = transmitter.send(connection, message);

      assert.equal(result.ok, false);
      if (!result.ok) {
        assert.ok(result.error instanceof NotConnectedError);
        assert.equal(result.error.code, 'NOT_CONNECTED');
        assert.deepEqual(result.error.details, { state });
      }
      assert.equal(connection.writes.length, 0);
      assert.equal(transmitter.getStats().rejected, 1);
    });
  }

  it('returns a SerializationError for non-finite coordinates and writes nothing', () => {
    const connection = new FakeConnection('connected');
    const transmitter = new Transmitter(silentLogger);
    const bad = createPointCloudMessage([{ x: Number.NaN, y: 0, z: 0 }], 1);

    const result = transmitter.send(connection, bad);

    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.ok(result.error instanceof SerializationError);
    }
    assert.equal(connection.writes.length, 0);
    assert.equal(transmitter.getStats().messagesSent, 0);
  });

  it('reports NotConnectedError when the handle refuses the write', () => {
    const connection = new FakeConnection('connected');
    connection.refuseWrites = true;
    const transmitter = new Transmitter(silentLogger);

    const result = transmitter.send(connection, message);

    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.ok(result.error instanceof NotConnectedError);
    }
    assert.deepEqual(transmitter.getStats(), {
      messagesSent: 0,
      samplesSent: 0,
      bytesSent: 0,
      rejected: 1,
      lastSentAt: null,
    });
  });

  it('counts bytes in UTF-8 and accumulates across sends', () => {
    const connection = new FakeConnection('connected');
    const transmitter = new Transmitter(silentLogger);

    transmitter.send(connection, message);
    transmitter.send(connection, createPointCloudMessage([], 2000));

    const stats = transmitter.getStats();
    assert.equal(stats.messagesSent, 2);
    assert.equal(stats.samplesSent, 2);
    assert.equal(stats.lastSentAt, 2000);
    assert.equal(stats.bytesSent, connection.writes[0].length + connection.writes[1].length);
  });
});
