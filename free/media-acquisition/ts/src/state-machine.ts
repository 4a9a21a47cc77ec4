/**
 * Acquisition and Task State Machines
 *
 * Stages of one acquisition:
 *   INIT -> CACHE_CHECK -> QUOTA_CHECK -> HANDLER_RESOLUTION -> METADATA_EXTRACTION
 *        -> CONTENT_FETCH -> PERSIST -> RECORD_AND_CACHE -> DONE
 *
 * `FAILED` is reachable from any non-terminal stage. A cache hit jumps from
 * CACHE_CHECK straight to DONE; a single-flight follower jumps from
 * METADATA_EXTRACTION to DONE once the leader's result is cached.
 *
 * Task lifecycle: pending -> processing -> completed | failed, and
 * pending -> cancelled. Terminal states are final.
 */

import { createLogger, errorMessage } from '@media-relay/plugin-utils';
import type { TaskStatus } from './types.js';

const logger = createLogger('media-acquisition:state-machine');

export type AcquisitionStage =
  | 'INIT'
  | 'CACHE_CHECK'
  | 'QUOTA_CHECK'
  | 'HANDLER_RESOLUTION'
  | 'METADATA_EXTRACTION'
  | 'CONTENT_FETCH'
  | 'PERSIST'
  | 'RECORD_AND_CACHE'
  | 'DONE'
  | 'FAILED';

const STAGE_TRANSITIONS: Record<AcquisitionStage, AcquisitionStage[]> = {
  INIT:                ['CACHE_CHECK', 'FAILED'],
  CACHE_CHECK:         ['QUOTA_CHECK', 'DONE', 'FAILED'],
  QUOTA_CHECK:         ['HANDLER_RESOLUTION', 'FAILED'],
  HANDLER_RESOLUTION:  ['METADATA_EXTRACTION', 'FAILED'],
  METADATA_EXTRACTION: ['CONTENT_FETCH', 'DONE', 'FAILED'],
  CONTENT_FETCH:       ['PERSIST', 'FAILED'],
  PERSIST:             ['RECORD_AND_CACHE', 'FAILED'],
  RECORD_AND_CACHE:    ['DONE', 'FAILED'],
  DONE:                [],
  FAILED:              [],
};

/** Progress reported on entering each stage. FAILED keeps the last value. */
export const STAGE_PROGRESS: Record<Exclude<AcquisitionStage, 'FAILED'>, number> = {
  INIT: 0,
  CACHE_CHECK: 0,
  QUOTA_CHECK: 5,
  HANDLER_RESOLUTION: 5,
  METADATA_EXTRACTION: 10,
  CONTENT_FETCH: 30,
  PERSIST: 70,
  RECORD_AND_CACHE: 90,
  DONE: 100,
};

export function isValidStageTransition(from: AcquisitionStage, to: AcquisitionStage): boolean {
  return STAGE_TRANSITIONS[from].includes(to);
}

export type ProgressReporter = (progress: number, stage: AcquisitionStage) => void | Promise<void>;

/**
 * Tracks one acquisition through its stages, refusing illegal moves and
 * reporting non-decreasing progress.
 */
export class StageTracker {
  private current: AcquisitionStage = 'INIT';
  private progress = 0;
  private readonly history: AcquisitionStage[] = ['INIT'];

  constructor(
    private readonly label: string,
    private readonly reporter?: ProgressReporter
  ) {}

  get stage(): AcquisitionStage {
    return this.current;
  }

  get lastProgress(): number {
    return this.progress;
  }

  get path(): readonly AcquisitionStage[] {
    return this.history;
  }

  get finished(): boolean {
    return STAGE_TRANSITIONS[this.current].length === 0;
  }

  async advance(to: AcquisitionStage): Promise<void> {
    if (!isValidStageTransition(this.current, to)) {
      const allowed = STAGE_TRANSITIONS[this.current];
      throw new Error(
        `Invalid stage transition: ${this.current} -> ${to}. ` +
        `Allowed transitions from ${this.current}: ${allowed.join(', ') || 'none'}`
      );
    }

    logger.debug(`Acquisition ${this.label}: ${this.current} -> ${to}`);
    this.current = to;
    this.history.push(to);

    if (to === 'FAILED') return;

    const next = STAGE_PROGRESS[to];
    if (next <= this.progress) return;
    this.progress = next;
    if (!this.reporter) return;

    // Progress is advisory; a broken reporter must not change the outcome.
    try {
      await this.reporter(next, to);
    } catch (error) {
      logger.warn(`Acquisition ${this.label}: progress report failed at ${to}`, { error: errorMessage(error) });
    }
  }
}

// =============================================================================
// Task lifecycle
// =============================================================================

const TASK_TRANSITIONS: Record<TaskStatus, TaskStatus[]> = {
  pending:    ['processing', 'cancelled'],
  processing: ['completed', 'failed'],
  completed:  [],
  failed:     [],
  cancelled:  [],
};

export function isTerminalStatus(status: TaskStatus): boolean {
  return TASK_TRANSITIONS[status].length === 0;
}

export function isValidTaskTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TASK_TRANSITIONS[from].includes(to);
}

export function assertTaskTransition(taskId: string, from: TaskStatus, to: TaskStatus): void {
  if (!isValidTaskTransition(from, to)) {
    throw new Error(
      `Invalid task transition for ${taskId}: ${from} -> ${to}. ` +
      `Allowed transitions from ${from}: ${TASK_TRANSITIONS[from].join(', ') || 'none'}`
    );
  }
}
