/**
 * Acquisition Task Queues
 *
 * A submitted request becomes a task that moves through
 * pending -> processing -> completed | failed (or pending -> cancelled).
 * Callers poll the task handle; nothing pushes completion to them.
 *
 * BullMqTaskQueue spreads work over any number of worker processes.
 * MemoryTaskQueue runs everything inside the current process.
 */

import { randomUUID } from 'node:crypto';
import { setTimeout as sleep } from 'node:timers/promises';
import { Queue, UnrecoverableError, Worker, type Job } from 'bullmq';
import type { Redis } from 'ioredis';
import { z } from 'zod';
import { createLogger, errorMessage } from '@media-relay/plugin-utils';
import { AcquisitionError, NotFoundError, type AcquisitionFailure, type AcquisitionOutcome } from './errors.js';
import { fingerprint } from './fingerprint.js';
import type { AcquisitionOrchestrator } from './pipeline.js';
import { assertTaskTransition, isTerminalStatus } from './state-machine.js';
import type { AcquisitionRequest, AcquisitionResult, TaskFailure, TaskSnapshot, TaskStatus } from './types.js';

const logger = createLogger('media-acquisition:tasks');

export const DEFAULT_TASK_POLL_INTERVAL_MS = 1000;

export const DEFAULT_TASK_RETENTION_SECONDS = 24 * 60 * 60;

/** Anything that can run one acquisition; the orchestrator in production. */
export type AcquisitionRunner = Pick<AcquisitionOrchestrator, 'process'>;

export interface ResultOptions {
  pollIntervalMs?: number;
  /** Give up after this long. Unset waits indefinitely. */
  timeoutMs?: number;
}

export interface TaskHandle {
  readonly id: string;
  status(): Promise<TaskSnapshot>;
  /** Polls until the task reaches a terminal status. */
  result(options?: ResultOptions): Promise<TaskSnapshot>;
  /** True only when the task was still pending. */
  cancel(): Promise<boolean>;
}

export interface TaskQueue {
  submit(request: AcquisitionRequest): Promise<TaskHandle>;
  get(id: string): Promise<TaskHandle | null>;
  close(): Promise<void>;
}

interface TaskSource {
  snapshot(id: string): Promise<TaskSnapshot>;
  cancel(id: string): Promise<boolean>;
}

class PolledTaskHandle implements TaskHandle {
  constructor(
    readonly id: string,
    private readonly source: TaskSource,
    private readonly defaultPollIntervalMs: number
  ) {}

  status(): Promise<TaskSnapshot> {
    return this.source.snapshot(this.id);
  }

  async result(options: ResultOptions = {}): Promise<TaskSnapshot> {
    const pollIntervalMs = options.pollIntervalMs ?? this.defaultPollIntervalMs;
    const deadline = options.timeoutMs === undefined ? Infinity : Date.now() + options.timeoutMs;

    for (;;) {
      const snapshot = await this.status();
      if (isTerminalStatus(snapshot.status)) {
        return snapshot;
      }
      if (Date.now() + pollIntervalMs > deadline) {
        throw new AcquisitionError('internal', `Task ${this.id} did not finish within ${options.timeoutMs}ms`, {
          details: { taskId: this.id, status: snapshot.status },
        });
      }
      await sleep(pollIntervalMs);
    }
  }

  cancel(): Promise<boolean> {
    return this.source.cancel(this.id);
  }
}

// =============================================================================
// In-process queue
// =============================================================================

export interface MemoryTaskQueueOptions {
  concurrency?: number;
  pollIntervalMs?: number;
  /** Finished tasks are forgotten this long after reaching a terminal status. */
  retentionMs?: number;
  now?: () => Date;
}

interface MemoryTask {
  request: AcquisitionRequest;
  snapshot: TaskSnapshot;
  finishedAt?: number;
}

/** FIFO queue with bounded concurrency, running tasks on the current event loop. */
export class MemoryTaskQueue implements TaskQueue, TaskSource {
  private readonly tasks = new Map<string, MemoryTask>();
  private readonly waiting: string[] = [];
  private readonly active = new Set<Promise<void>>();
  private readonly concurrency: number;
  private readonly pollIntervalMs: number;
  private readonly retentionMs: number;
  private readonly now: () => Date;
  private closed = false;

  constructor(
    private readonly runner: AcquisitionRunner,
    options: MemoryTaskQueueOptions = {}
  ) {
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_TASK_POLL_INTERVAL_MS;
    this.retentionMs = options.retentionMs ?? DEFAULT_TASK_RETENTION_SECONDS * 1000;
    this.now = options.now ?? (() => new Date());
  }

  /** Number of tasks currently held, finished ones included. */
  get size(): number {
    return this.tasks.size;
  }

  async submit(request: AcquisitionRequest): Promise<TaskHandle> {
    if (this.closed) {
      throw new AcquisitionError('internal', 'Task queue is closed');
    }

    this.evictFinished();
    const id = randomUUID();
    const timestamp = this.now().toISOString();
    this.tasks.set(id, {
      request,
      snapshot: {
        id,
        status: 'pending',
        progress: 0,
        fingerprint: fingerprint(request.url),
        createdAt: timestamp,
        updatedAt: timestamp,
      },
    });
    this.waiting.push(id);
    logger.debug('Task queued', { taskId: id, waiting: this.waiting.length });

    this.drain();
    return new PolledTaskHandle(id, this, this.pollIntervalMs);
  }

  async get(id: string): Promise<TaskHandle | null> {
    this.evictFinished();
    return this.tasks.has(id) ? new PolledTaskHandle(id, this, this.pollIntervalMs) : null;
  }

  async snapshot(id: string): Promise<TaskSnapshot> {
    this.evictFinished();
    const task = this.tasks.get(id);
    if (!task) {
      throw new NotFoundError('Task', id);
    }
    return { ...task.snapshot };
  }

  async cancel(id: string): Promise<boolean> {
    const task = this.tasks.get(id);
    if (!task) {
      throw new NotFoundError('Task', id);
    }
    if (task.snapshot.status !== 'pending') {
      return false;
    }
    this.transition(task, 'cancelled');
    const index = this.waiting.indexOf(id);
    if (index >= 0) this.waiting.splice(index, 1);
    logger.info('Task cancelled', { taskId: id });
    return true;
  }

  /** Cancels everything still waiting and waits for running tasks to settle. */
  async close(): Promise<void> {
    this.closed = true;
    for (const id of [...this.waiting]) {
      await this.cancel(id);
    }
    await Promise.all([...this.active]);
  }

  private drain(): void {
    while (this.active.size < this.concurrency && this.waiting.length > 0) {
      const id = this.waiting.shift();
      const task = id === undefined ? undefined : this.tasks.get(id);
      if (!task || task.snapshot.status !== 'pending') continue;

      this.transition(task, 'processing');
      const running: Promise<void> = this.run(task)
        .catch((error) => {
          logger.error('Task runner crashed', { taskId: task.snapshot.id, error: errorMessage(error) });
        })
        .finally(() => {
          this.active.delete(running);
          this.drain();
        });
      this.active.add(running);
    }
  }

  private async run(task: MemoryTask): Promise<void> {
    let outcome: AcquisitionOutcome;
    try {
      outcome = await this.runner.process(task.request, (progress) => {
        if (progress > task.snapshot.progress) {
          task.snapshot.progress = progress;
          task.snapshot.updatedAt = this.now().toISOString();
        }
      });
    } catch (error) {
      task.snapshot.error = { kind: 'internal', message: errorMessage(error), retryable: true };
      this.transition(task, 'failed');
      return;
    }

    if (outcome.ok) {
      task.snapshot.result = outcome.result;
      task.snapshot.progress = 100;
      this.transition(task, 'completed');
    } else {
      task.snapshot.error = toTaskFailure(outcome.error);
      this.transition(task, 'failed');
    }
  }

  private transition(task: MemoryTask, to: TaskStatus): void {
    assertTaskTransition(task.snapshot.id, task.snapshot.status, to);
    const now = this.now();
    task.snapshot.status = to;
    task.snapshot.updatedAt = now.toISOString();
    if (isTerminalStatus(to)) {
      task.finishedAt = now.getTime();
    }
  }

  private evictFinished(): void {
    const cutoff = this.now().getTime() - this.retentionMs;
    let evicted = 0;
    for (const [id, task] of this.tasks) {
      if (task.finishedAt !== undefined && task.finishedAt <= cutoff) {
        this.tasks.delete(id);
        evicted++;
      }
    }
    if (evicted > 0) {
      logger.debug('Finished tasks evicted', { evicted, remaining: this.tasks.size });
    }
  }
}

function toTaskFailure(failure: AcquisitionFailure): TaskFailure {
  return { kind: failure.kind, message: failure.message, stage: failure.stage, retryable: failure.retryable };
}

// =============================================================================
// BullMQ queue
// =============================================================================

export const ACQUISITION_JOB_NAME = 'acquire';

export interface AcquisitionJobData {
  request: AcquisitionRequest;
  fingerprint: string;
}

const TaskFailureSchema = z.object({
  kind: z.string(),
  message: z.string(),
  stage: z.string().optional(),
  retryable: z.boolean().optional(),
});

const TombstoneSchema = z.object({
  fingerprint: z.string().optional(),
  createdAt: z.string(),
  cancelledAt: z.string(),
});

/** Maps a BullMQ job state to a task status; null for states with no task behind them. */
export function mapJobState(state: string): TaskStatus | null {
  switch (state) {
    case 'waiting':
    case 'wait':
    case 'delayed':
    case 'prioritized':
    case 'waiting-children':
      return 'pending';
    case 'active':
      return 'processing';
    case 'completed':
      return 'completed';
    case 'failed':
      return 'failed';
    default:
      return null;
  }
}

/** Reads the failure a worker stored as the job's failed reason. */
export function parseFailedReason(reason: string | undefined): TaskFailure {
  if (!reason) {
    return { kind: 'internal', message: 'Task failed without a reason' };
  }
  try {
    const parsed = TaskFailureSchema.safeParse(JSON.parse(reason));
    if (parsed.success) return parsed.data;
  } catch (error) {
    logger.debug('Failed reason is not structured', { error: errorMessage(error) });
  }
  return { kind: 'internal', message: reason };
}

export interface BullMqTaskQueueOptions {
  queueName: string;
  pollIntervalMs?: number;
  /** How long finished jobs and cancellation markers are kept. */
  retentionSeconds?: number;
}

export class BullMqTaskQueue implements TaskQueue, TaskSource {
  private readonly queue: Queue<AcquisitionJobData, AcquisitionResult>;
  private readonly pollIntervalMs: number;
  private readonly retentionSeconds: number;

  constructor(
    private readonly connection: Redis,
    private readonly options: BullMqTaskQueueOptions
  ) {
    this.queue = new Queue<AcquisitionJobData, AcquisitionResult>(options.queueName, { connection });
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_TASK_POLL_INTERVAL_MS;
    this.retentionSeconds = options.retentionSeconds ?? DEFAULT_TASK_RETENTION_SECONDS;
  }

  async submit(request: AcquisitionRequest): Promise<TaskHandle> {
    const data: AcquisitionJobData = { request, fingerprint: fingerprint(request.url) };
    const job = await this.queue.add(ACQUISITION_JOB_NAME, data, {
      jobId: randomUUID(),
      attempts: 1,
      removeOnComplete: { age: this.retentionSeconds },
      removeOnFail: { age: this.retentionSeconds },
    });
    const id = job.id;
    if (!id) {
      throw new AcquisitionError('internal', 'Queue did not assign a job id');
    }

    logger.info('Task submitted', { taskId: id, queue: this.options.queueName });
    return new PolledTaskHandle(id, this, this.pollIntervalMs);
  }

  async get(id: string): Promise<TaskHandle | null> {
    const job = await this.queue.getJob(id);
    if (job || (await this.connection.exists(this.tombstoneKey(id))) === 1) {
      return new PolledTaskHandle(id, this, this.pollIntervalMs);
    }
    return null;
  }

  async snapshot(id: string): Promise<TaskSnapshot> {
    const job = await this.queue.getJob(id);
    if (!job) {
      return this.cancelledSnapshot(id);
    }

    const status = mapJobState(await job.getState());
    if (!status) {
      throw new NotFoundError('Task', id);
    }
    return this.toSnapshot(id, job, status);
  }

  async cancel(id: string): Promise<boolean> {
    const job = await this.queue.getJob(id);
    if (!job) {
      await this.cancelledSnapshot(id);
      return false;
    }

    if (mapJobState(await job.getState()) !== 'pending') {
      return false;
    }

    try {
      await job.remove();
    } catch (error) {
      // A worker locked the job between the state read and the removal
      logger.debug('Job could not be removed', { taskId: id, error: errorMessage(error) });
      return false;
    }

    const now = new Date().toISOString();
    const tombstone = { fingerprint: job.data.fingerprint, createdAt: new Date(job.timestamp).toISOString(), cancelledAt: now };
    await this.connection.set(this.tombstoneKey(id), JSON.stringify(tombstone), 'EX', this.retentionSeconds);
    logger.info('Task cancelled', { taskId: id });
    return true;
  }

  async close(): Promise<void> {
    await this.queue.close();
  }

  private toSnapshot(id: string, job: Job<AcquisitionJobData, AcquisitionResult>, status: TaskStatus): TaskSnapshot {
    const updated = job.finishedOn ?? job.processedOn ?? job.timestamp;
    const snapshot: TaskSnapshot = {
      id,
      status,
      progress: typeof job.progress === 'number' ? job.progress : 0,
      fingerprint: job.data.fingerprint,
      createdAt: new Date(job.timestamp).toISOString(),
      updatedAt: new Date(updated).toISOString(),
    };

    if (status === 'completed') {
      snapshot.progress = 100;
      snapshot.result = job.returnvalue;
    } else if (status === 'failed') {
      snapshot.error = parseFailedReason(job.failedReason);
    }
    return snapshot;
  }

  private async cancelledSnapshot(id: string): Promise<TaskSnapshot> {
    const raw = await this.connection.get(this.tombstoneKey(id));
    if (!raw) {
      throw new NotFoundError('Task', id);
    }
    const tombstone = TombstoneSchema.parse(JSON.parse(raw));
    return {
      id,
      status: 'cancelled',
      progress: 0,
      fingerprint: tombstone.fingerprint,
      createdAt: tombstone.createdAt,
      updatedAt: tombstone.cancelledAt,
    };
  }

  private tombstoneKey(id: string): string {
    return `${this.options.queueName}:cancelled:${id}`;
  }
}

// =============================================================================
// Worker
// =============================================================================

export interface AcquisitionWorkerOptions {
  queueName: string;
  concurrency: number;
}

/**
 * BullMQ worker running the orchestrator. A failed acquisition is thrown as
 * an UnrecoverableError so the job fails once, with the failure as JSON.
 */
export function createAcquisitionWorker(
  runner: AcquisitionRunner,
  connection: Redis,
  options: AcquisitionWorkerOptions
): Worker<AcquisitionJobData, AcquisitionResult> {
  const worker = new Worker<AcquisitionJobData, AcquisitionResult>(
    options.queueName,
    async (job) => {
      logger.info(`Processing task ${job.id}`, { url: job.data.request.url });
      const outcome = await runner.process(job.data.request, (progress) => job.updateProgress(progress));
      if (!outcome.ok) {
        throw new UnrecoverableError(JSON.stringify(toTaskFailure(outcome.error)));
      }
      return outcome.result;
    },
    { connection, concurrency: options.concurrency }
  );

  worker.on('completed', (job) => {
    logger.info(`Task ${job.id} completed`);
  });

  worker.on('failed', (job, error) => {
    logger.warn(`Task ${job?.id ?? 'unknown'} failed`, { error: parseFailedReason(error.message).message });
  });

  worker.on('error', (error) => {
    logger.error(`Worker error: ${error.message}`);
  });

  return worker;
}
