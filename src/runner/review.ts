/**
 * Per-task state machine: solve once, then review until the tracker
 * reports a terminal status or the review rounds run out.
 */

import type { TransitionLog } from '../lib/transition_log.js';
import { QuitError } from '../types/run.js';
import type { KnownTaskStatus, Outcome, TaskContext } from '../types/task.js';
import { checkInterrupted } from './selector.js';
import type { Tracker } from './tracker.js';

/**
 * Maps the status read after a review round to its outcome.
 */
export function outcomeFor(status: KnownTaskStatus): Outcome {
  switch (status) {
    case 'closed':
      return 'closed';
    case 'blocked':
      return 'blocked';
    case 'ready':
    case 'open':
    case 'in_progress':
      return 'retry';
  }
}

export interface ReviewLoopOptions {
  tracker: Tracker;
  log: TransitionLog;
  /** Review rounds per task; at least 1 */
  limit: number;
  signal?: AbortSignal;
}

export class ReviewLoop {
  private readonly tracker: Tracker;
  private readonly log: TransitionLog;
  private readonly limit: number;
  private readonly signal: AbortSignal | undefined;

  constructor(options: ReviewLoopOptions) {
    this.tracker = options.tracker;
    this.log = options.log;
    this.limit = options.limit;
    this.signal = options.signal;
  }

  /**
   * Drives one task to `closed` or `blocked` and runs the matching hook.
   *
   * A task whose rounds run out is set to `blocked` in the tracker
   * before `on_requires_human` runs.
   *
   * @throws {QuitError} On any command failure, a missing status after
   * review, or an interrupt
   */
  async run(task: TaskContext): Promise<Exclude<Outcome, 'retry'>> {
    checkInterrupted(this.signal);
    await this.log.record('state=SOLVING', { task: task.id, loop: 0 });
    await this.tracker.updateStatus(task, 'in_progress');

    checkInterrupted(this.signal);
    await this.tracker.show(task);

    checkInterrupted(this.signal);
    await this.tracker.solve(task);

    let loop = 0;
    for (;;) {
      await this.log.record('state=REVIEWING', { task: task.id, loop });

      checkInterrupted(this.signal);
      await this.tracker.show(task);

      checkInterrupted(this.signal);
      await this.tracker.review(task);

      checkInterrupted(this.signal);
      const status = await this.tracker.queryStatus(task);
      if (status === null) {
        await this.log.record('review_state_missing', { task: task.id });
        console.error(`Task ${task.id} missing status after review.`);
        throw new QuitError(1, `task_missing_status_after_review:${task.id}`);
      }
      await this.log.record('review_state', { task: task.id, status });

      const outcome = outcomeFor(status);
      if (outcome === 'closed') {
        this.tracker.completed.push(task.id);
        await this.log.record('completed', { task: task.id });
        await this.tracker.runHook(task, 'on_completed');
        return 'closed';
      }
      if (outcome === 'blocked') {
        await this.escalate(task);
        return 'blocked';
      }

      loop++;
      if (loop < this.limit) {
        await this.log.record('review_loop_retry', { task: task.id, loop, limit: this.limit });
        continue;
      }

      await this.log.record('review_loop_exhausted', { task: task.id, loops: loop, limit: this.limit });
      await this.tracker.updateStatus(task, 'blocked');
      task.status = 'blocked';
      await this.escalate(task);
      return 'blocked';
    }
  }

  private async escalate(task: TaskContext): Promise<void> {
    this.tracker.needsHuman.push(task.id);
    await this.log.record('needs_human', { task: task.id });
    await this.tracker.runHook(task, 'on_requires_human');
  }
}
