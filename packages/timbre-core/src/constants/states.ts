import type { JobState } from '../schemas';

/**
 * Valid conversion job state transitions
 */
export const JOB_STATE_TRANSITIONS: Record<JobState, JobState[]> = {
  queued: ['running', 'cancelled', 'failed'],
  running: ['completed', 'failed'],
  completed: [],
  failed: [],
  cancelled: []
};
