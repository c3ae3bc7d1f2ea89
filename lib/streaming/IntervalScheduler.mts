/**
 * Interval Scheduler
 *
 * Periodic work is scheduled through this seam so that every recurring task
 * is represented by an explicit cancel handle rather than a bare timer id.
 */

/** Cancels a scheduled recurring task. Safe to call more than once. */
export type CancelTask = () => void;

export interface IntervalScheduler {
  every(intervalMs: number, task: () => void): CancelTask;
}

/**
 * Scheduler backed by setInterval/clearInterval
 */
export const timerScheduler: IntervalScheduler = {
  every(intervalMs, task) {
    let handle: ReturnType<typeof setInterval> | null = setInterval(task, intervalMs);
    return () => {
      if (handle) {
        clearInterval(handle);
        handle = null;
      }
    };
  },
};
