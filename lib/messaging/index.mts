/**
 * Messaging - Public API
 *
 * Barrel exports for envelope construction and (de)serialization.
 */

export {
  createPointCloudMessage,
  serializeEnvelope,
  parseEnvelope,
  safeParseEnvelope,
  envelopeSchema,
  sampleSchema,
  type EnvelopeParseResult,
} from './Envelope.mjs';
