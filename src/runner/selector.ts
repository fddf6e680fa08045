/**
 * Task selection: manual ids first, then `next_task` until it runs dry.
 */

import { firstToken, validateTaskId } from '../lib/task_id.js';
import type { TransitionLog } from '../lib/transition_log.js';
import { QuitError } from '../types/run.js';
import type { KnownTaskStatus, TaskContext, TaskId } from '../types/task.js';
import { isReadyStatus, type Tracker } from './tracker.js';

/** Exit code of a run ended by SIGINT/SIGTERM */
export const INTERRUPT_EXIT_CODE = 130;

/** Default for TRUDGER_SKIP_NOT_READY_LIMIT */
export const DEFAULT_SKIP_NOT_READY_LIMIT = 5;

/**
 * Parses TRUDGER_SKIP_NOT_READY_LIMIT. Anything but a positive integer
 * falls back to the default.
 */
export function parseSkipLimit(raw: string | undefined): number {
  if (raw === undefined || !/^\s*\d+\s*$/.test(raw)) {
    return DEFAULT_SKIP_NOT_READY_LIMIT;
  }
  const value = Number.parseInt(raw, 10);
  return value >= 1 ? value : DEFAULT_SKIP_NOT_READY_LIMIT;
}

/**
 * Result of asking for the next task. Idle ends the run with exit 0.
 */
export type Selection =
  | { kind: 'task'; id: TaskId; status: KnownTaskStatus }
  | { kind: 'idle'; reason: 'no_task' | 'no_next_task' | 'no_ready_task' };

/**
 * Throws `QuitError(130, 'interrupted')` once the signal has fired.
 */
export function checkInterrupted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new QuitError(INTERRUPT_EXIT_CODE, 'interrupted');
  }
}

export interface TaskSelectorOptions {
  tracker: Tracker;
  log: TransitionLog;
  manualTasks: readonly TaskId[];
  skipLimit?: number;
  signal?: AbortSignal;
}

export class TaskSelector {
  private readonly tracker: Tracker;
  private readonly log: TransitionLog;
  private readonly queue: TaskId[];
  private readonly skipLimit: number;
  private readonly signal: AbortSignal | undefined;

  constructor(options: TaskSelectorOptions) {
    this.tracker = options.tracker;
    this.log = options.log;
    this.queue = [...options.manualTasks];
    this.skipLimit = options.skipLimit ?? DEFAULT_SKIP_NOT_READY_LIMIT;
    this.signal = options.signal;
  }

  /**
   * Checks every manual id before any task runs.
   */
  async precheck(): Promise<void> {
    for (const id of this.queue) {
      checkInterrupted(this.signal);
      await this.ensureReady(id);
    }
  }

  async next(): Promise<Selection> {
    const manual = this.queue.shift();
    if (manual !== undefined) {
      const status = await this.ensureReady(manual);
      return { kind: 'task', id: manual, status };
    }

    let skipped = 0;
    for (;;) {
      checkInterrupted(this.signal);
      const candidate = await this.nextCandidate();
      if (candidate.kind === 'idle') {
        return candidate;
      }

      const status = await this.tracker.queryStatus(bareContext(candidate.id));
      if (status === null) {
        console.error(`Task ${candidate.id} missing status.`);
        throw new QuitError(1, `task_missing_status:${candidate.id}`);
      }
      if (isReadyStatus(status)) {
        return { kind: 'task', id: candidate.id, status };
      }

      await this.log.record('skip_not_ready', { task: candidate.id, status });
      skipped++;
      if (skipped >= this.skipLimit) {
        await this.log.record('idle no_ready_task', { attempts: skipped });
        console.error(`Task ${candidate.id} is not ready (status: ${status}).`);
        return { kind: 'idle', reason: 'no_ready_task' };
      }
    }
  }

  private async nextCandidate(): Promise<{ kind: 'candidate'; id: TaskId } | Extract<Selection, { kind: 'idle' }>> {
    const result = await this.tracker.nextTask();
    if (result.spawnError !== undefined) {
      console.error(result.spawnError);
      throw new QuitError(result.exitCode, `next_task_failed:${result.spawnError}`);
    }
    if (result.exitCode === 1) {
      await this.log.record('idle next_task_exit=1');
      return { kind: 'idle', reason: 'no_next_task' };
    }
    if (result.exitCode !== 0) {
      console.error(`next_task command failed with exit code ${result.exitCode}.`);
      throw new QuitError(result.exitCode, `next_task_failed:${result.exitCode}`);
    }

    const token = firstToken(result.stdout);
    if (token === '') {
      await this.log.record('idle no_task');
      return { kind: 'idle', reason: 'no_task' };
    }
    const validation = validateTaskId(token);
    if (!validation.ok) {
      console.error(`next_task returned an invalid task id: ${token} (${validation.message})`);
      throw new QuitError(1, `next_task_invalid_task_id:${validation.reason}`);
    }
    return { kind: 'candidate', id: validation.id };
  }

  private async ensureReady(id: TaskId): Promise<KnownTaskStatus> {
    const status = await this.tracker.queryStatus(bareContext(id));
    if (status !== null && isReadyStatus(status)) {
      return status;
    }
    console.error(`Task ${id} is not ready (status: ${status ?? ''}).`);
    throw new QuitError(1, `task_not_ready:${id}`);
  }
}

/** Context used for status checks before a task is started. */
function bareContext(id: TaskId): TaskContext {
  return { id, show: null, status: null, startedAt: 0 };
}
