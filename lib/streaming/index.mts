/**
 * Streaming - Public API
 */

export {
  StreamScheduler,
  type StreamSession,
  type StreamSchedulerOptions,
  type StreamSchedulerStats,
  type OnTickFailedFn,
} from './StreamScheduler.mjs';

export { generateSamples, type RandomSource } from './SampleGenerator.mjs';

export {
  timerScheduler,
  type IntervalScheduler,
  type CancelTask,
} from './IntervalScheduler.mjs';
