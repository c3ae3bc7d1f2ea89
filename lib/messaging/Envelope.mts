/**
 * Point Cloud Envelope
 *
 * Builds immutable point-cloud messages and converts them to and from the
 * text envelope sent over the wire:
 *
 *   {"type":"pointcloud","timestamp":1700000000000,"data":[{"x":0.1,"y":0.2,"z":0.3}]}
 */

import { z } from 'zod';
import { MESSAGE_TYPES, SerializationError, describeError } from '../StreamProtocol.mjs';
import type { PointCloudMessage, Sample } from '../types.mjs';

// ============================================================================
// Schemas
// ============================================================================

export const sampleSchema = z.object({
  x: z.number(),
  y: z.number(),
  z: z.number(),
});

export const envelopeSchema = z.object({
  type: z.literal(MESSAGE_TYPES.POINTCLOUD),
  timestamp: z.number().int(),
  data: z.array(sampleSchema),
});

export type EnvelopeParseResult =
  | { ok: true; message: PointCloudMessage }
  | { ok: false; error: SerializationError };

// ============================================================================
// Construction
// ============================================================================

/**
 * Build a frozen message from a batch of samples. The samples are copied, so
 * later mutation of the caller's array does not leak into the message.
 */
export function createPointCloudMessage(
  samples: readonly Sample[],
  timestamp: number = Date.now()
): PointCloudMessage {
  const data = Object.freeze(
    samples.map(({ x, y, z }) => Object.freeze({ x, y, z }))
  );
  return Object.freeze({
    type: MESSAGE_TYPES.POINTCLOUD,
    timestamp,
    data,
  });
}

// ============================================================================
// Serialization
// ============================================================================

/**
 * Serialize a message to its text envelope.
 * Throws SerializationError for values JSON cannot carry losslessly.
 */
export function serializeEnvelope(message: PointCloudMessage): string {
  if (!Number.isSafeInteger(message.timestamp)) {
    throw new SerializationError(`Invalid timestamp: ${message.timestamp}`, {
      timestamp: message.timestamp,
    });
  }

  const data = message.data.map((sample, index) => {
    const { x, y, z } = sample;
    if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(z)) {
      throw new SerializationError(`Non-finite coordinate in sample ${index}`, {
        index,
        sample: { x, y, z },
      });
    }
    return { x, y, z };
  });

  return JSON.stringify({
    type: message.type,
    timestamp: message.timestamp,
    data,
  });
}

/**
 * Parse a text envelope without throwing
 */
export function safeParseEnvelope(text: string): EnvelopeParseResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return {
      ok: false,
      error: new SerializationError('Envelope is not valid JSON', {
        cause: describeError(error),
      }),
    };
  }

  const result = envelopeSchema.safeParse(raw);
  if (!result.success) {
    return {
      ok: false,
      error: new SerializationError('Envelope does not match the point cloud schema', {
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      }),
    };
  }

  return {
    ok: true,
    message: createPointCloudMessage(result.data.data, result.data.timestamp),
  };
}

/**
 * Parse a text envelope, throwing SerializationError when it is malformed
 */
export function parseEnvelope(text: string): PointCloudMessage {
  const result = safeParseEnvelope(text);
  if (!result.ok) {
    throw result.error;
  }
  return result.message;
}
