/**
 * Transmitter
 *
 * Serializes point-cloud messages and writes them to the connection handle.
 * Fire-and-forget: a rejected message is dropped, never retried or buffered.
 */

import {
  NotConnectedError,
  SerializationError,
} from '../StreamProtocol.mjs';
import { serializeEnvelope } from '../messaging/Envelope.mjs';
import { createLogger, type Logger } from '../logging/logger.mjs';
import type { ConnectionHandle, PointCloudMessage, SendResult } from '../types.mjs';

export interface TransmitterStats {
  messagesSent: number;
  samplesSent: number;
  bytesSent: number;
  rejected: number;
  lastSentAt: number | null;
}

export class Transmitter {
  private readonly logger: Logger;
  private stats: TransmitterStats = {
    messagesSent: 0,
    samplesSent: 0,
    bytesSent: 0,
    rejected: 0,
    lastSentAt: null,
  };

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('Transmitter');
  }

  send(connection: ConnectionHandle, message: PointCloudMessage): SendResult {
    const state = connection.getState();
    if (state !== 'connected') {
      this.stats.rejected++;
      return { ok: false, error: new NotConnectedError(state) };
    }

    let payload: string;
    try {
      payload = serializeEnvelope(message);
    } catch (error) {
      if (!(error instanceof SerializationError)) {
        throw error;
      }
      this.stats.rejected++;
      this.logger.error('Dropping message that cannot be serialized', {
        error: error.message,
        details: error.details,
      });
      return { ok: false, error };
    }

    // The handle refuses when the socket left OPEN after the state check
    if (!connection.write(payload)) {
      this.stats.rejected++;
      return { ok: false, error: new NotConnectedError(connection.getState()) };
    }

    const bytes = Buffer.byteLength(payload, 'utf8');
    this.stats.messagesSent++;
    this.stats.samplesSent += message.data.length;
    this.stats.bytesSent += bytes;
    this.stats.lastSentAt = message.timestamp;
    this.logger.debug('SEND pointcloud', { samples: message.data.length, bytes });

    return { ok: true, bytes };
  }

  getStats(): TransmitterStats {
    return { ...this.stats };
  }
}
