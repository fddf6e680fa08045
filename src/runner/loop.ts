/**
 * Run loop: selects tasks one at a time and drives each through the
 * review loop until selection goes idle or something ends the run.
 */

import type { CommandExecutor } from '../lib/command.js';
import type { NotificationDispatcher } from '../lib/notify.js';
import type { TransitionLog } from '../lib/transition_log.js';
import type { TrudgerConfig } from '../types/config.js';
import { isQuitError, QuitError, type AgentPrompts, type RunSummary } from '../types/run.js';
import type { TaskContext, TaskId } from '../types/task.js';
import { ReviewLoop } from './review.js';
import { checkInterrupted, TaskSelector } from './selector.js';
import { Tracker } from './tracker.js';

export interface RunLoopOptions {
  config: TrudgerConfig;
  configPath: string;
  runner: CommandExecutor;
  log: TransitionLog;
  dispatcher: NotificationDispatcher;
  prompts: AgentPrompts;
  manualTasks?: readonly TaskId[];
  skipLimit?: number;
  /** Aborted on SIGINT/SIGTERM; checked between steps */
  signal?: AbortSignal;
  /** Millisecond clock, injectable for tests */
  now?: () => number;
}

/**
 * Converts anything thrown by the loop into a QuitError.
 */
export function toQuitError(error: unknown): QuitError {
  if (isQuitError(error)) {
    return error;
  }
  return new QuitError(1, `error:${error instanceof Error ? error.message : String(error)}`);
}

/**
 * Runs tasks until the run ends. Never throws; the returned summary
 * carries the exit code.
 *
 * @example
 * ```typescript
 * const summary = await runLoop({ config, configPath, runner, log, dispatcher, prompts });
 * process.exitCode = summary.exitCode;
 * ```
 */
export async function runLoop(options: RunLoopOptions): Promise<RunSummary> {
  const { log, dispatcher, signal } = options;
  const now = options.now ?? Date.now;
  const tracker = new Tracker({
    config: options.config,
    configPath: options.configPath,
    runner: options.runner,
    log,
    prompts: options.prompts,
  });
  const selector = new TaskSelector({
    tracker,
    log,
    manualTasks: options.manualTasks ?? [],
    skipLimit: options.skipLimit,
    signal,
  });
  const reviewLoop = new ReviewLoop({ tracker, log, limit: options.config.review_loop_limit, signal });

  let current: TaskContext | null = null;
  let quit: QuitError;

  try {
    await dispatcher.onRunBoundary('run_start');
    checkInterrupted(signal);
    await selector.precheck();

    for (;;) {
      checkInterrupted(signal);
      const selection = await selector.next();
      if (selection.kind === 'idle') {
        throw new QuitError(0, selection.reason);
      }

      const task: TaskContext = { id: selection.id, show: null, status: selection.status, startedAt: now() };
      current = task;
      await dispatcher.onTaskBoundary('task_start', task);
      try {
        await reviewLoop.run(task);
      } finally {
        await dispatcher.onTaskBoundary('task_end', task);
      }

      await log.record('task_lists', {
        completed: tracker.completed.join(','),
        needs_human: tracker.needsHuman.join(','),
      });
      current = null;
    }
  } catch (error) {
    quit = toQuitError(error);
  }

  const reason = quit.reason.trim() === '' ? 'unknown' : quit.reason;
  try {
    await log.record('quit', { reason });
    if (quit.code !== 0 && current !== null) {
      await tracker.resetOnAbort(current);
    }
  } catch (error) {
    console.warn(`Warning: ${error instanceof Error ? error.message : String(error)}`);
  } finally {
    await dispatcher.onRunBoundary('run_end', quit.code);
  }

  return {
    exitCode: quit.code,
    reason: quit.reason,
    completed: [...tracker.completed],
    needsHuman: [...tracker.needsHuman],
  };
}
