/**
 * Notification dispatch.
 *
 * Turns run boundaries, task boundaries and transitions into invocations
 * of `hooks.on_notification`, filtered by the configured scope. Hook
 * failures are reported and never end the run.
 *
 * Failure reports are recorded with origin `notification`. TransitionLog
 * does not forward those to subscribers, so a failing hook in `all_logs`
 * scope cannot trigger itself.
 */

import { join } from 'node:path';
import type { NotificationScope } from '../types/config.js';
import type { NotificationEventKind, NotificationPayload } from '../types/notification.js';
import type { TaskContext } from '../types/task.js';
import type { Transition, TransitionFields } from '../types/transition.js';
import type { CommandEnv } from './env.js';
import type { CommandExecutor } from './command.js';
import { atomicWriteJson, createScratchDir, removeDir } from './fs.js';
import { renderTransition, type TransitionLog } from './transition_log.js';

export const REDACTED = '[REDACTED]';

/** Field keys whose values never leave the process through a notification. */
const REDACTED_KEYS = new Set(['command', 'args']);

/**
 * Replaces the values of `command=` and `args=` inside free text.
 *
 * The `command=` value runs up to ` args=` (or the end); the `args=` value
 * runs to the end of the text.
 *
 * @example
 * ```typescript
 * redactMessageText('cmd start command=echo hi args=x');
 * // 'cmd start command=[REDACTED] args=[REDACTED]'
 * ```
 */
export function redactMessageText(text: string): string {
  let result = text;

  const command = /(^|\s)command=/.exec(result);
  if (command) {
    const valueStart = command.index + command[0].length;
    const argsAt = result.indexOf(' args=', valueStart);
    const valueEnd = argsAt === -1 ? result.length : argsAt;
    result = result.slice(0, valueStart) + REDACTED + result.slice(valueEnd);
  }

  const args = /(^|\s)args=/.exec(result);
  if (args) {
    result = result.slice(0, args.index + args[0].length) + REDACTED;
  }

  return result;
}

/**
 * Renders a transition for a notification payload, with command lines
 * and arguments redacted.
 */
export function redactTransition(transition: Pick<Transition, 'message' | 'fields'>): string {
  const fields: TransitionFields = {};
  for (const [key, value] of Object.entries(transition.fields)) {
    fields[key] = REDACTED_KEYS.has(key) ? REDACTED : value;
  }
  return renderTransition(redactMessageText(transition.message), fields);
}

/**
 * First non-blank line of task_show output, trimmed; '' when unknown.
 */
export function describeTask(show: string | null): string {
  if (show === null) {
    return '';
  }
  for (const line of show.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed !== '') {
      return trimmed;
    }
  }
  return '';
}

/**
 * Options for creating a NotificationDispatcher.
 */
export interface NotificationDispatcherOptions {
  /** Notification hook; unset disables dispatch */
  hook?: string;
  scope: NotificationScope;
  runner: CommandExecutor;
  log: TransitionLog;
  configPath: string;
  /** Absolute working directory reported to the hook */
  folder: string;
  /** Millisecond clock, injectable for tests */
  now?: () => number;
}

/**
 * Dispatches scoped notification events to the configured hook.
 *
 * @example
 * ```typescript
 * const dispatcher = new NotificationDispatcher({ hook, scope, runner, log, configPath, folder });
 * dispatcher.attach();
 * await dispatcher.onRunBoundary('run_start');
 * ```
 */
export class NotificationDispatcher {
  private readonly hook: string | null;
  private readonly scope: NotificationScope;
  private readonly runner: CommandExecutor;
  private readonly log: TransitionLog;
  private readonly configPath: string;
  private readonly folder: string;
  private readonly now: () => number;
  private readonly runStartedAt: number;
  private currentTask: TaskContext | null = null;

  constructor(options: NotificationDispatcherOptions) {
    this.hook = options.hook && options.hook.trim() !== '' ? options.hook : null;
    this.scope = options.scope;
    this.runner = options.runner;
    this.log = options.log;
    this.configPath = options.configPath;
    this.folder = options.folder;
    this.now = options.now ?? Date.now;
    this.runStartedAt = this.now();
  }

  /**
   * Subscribes to the transition log when the scope is `all_logs`.
   */
  attach(): void {
    if (this.hook !== null && this.scope === 'all_logs') {
      this.log.subscribe((transition) => this.onTransition(transition));
    }
  }

  /**
   * `run_start` reports a zero duration; `run_end` the time since the
   * dispatcher was created and the final exit code.
   */
  async onRunBoundary(event: 'run_start' | 'run_end', exitCode?: number): Promise<void> {
    if (this.scope !== 'run_boundaries') {
      return;
    }
    const payload = this.basePayload(event, event === 'run_start' ? 0 : this.now() - this.runStartedAt);
    if (event === 'run_end' && exitCode !== undefined) {
      payload.exit_code = exitCode;
    }
    await this.dispatch(payload);
  }

  /**
   * Tracks the current task for log events and, in `task_boundaries`
   * scope, notifies the hook.
   */
  async onTaskBoundary(event: 'task_start' | 'task_end', task: TaskContext): Promise<void> {
    this.currentTask = task;
    try {
      if (this.scope !== 'task_boundaries') {
        return;
      }
      const duration = event === 'task_start' ? 0 : this.now() - task.startedAt;
      const payload = this.basePayload(event, duration);
      payload.task_id = task.id;
      payload.task_description = event === 'task_start' ? '' : describeTask(task.show);
      await this.dispatch(payload);
    } finally {
      if (event === 'task_end') {
        this.currentTask = null;
      }
    }
  }

  async onTransition(transition: Transition): Promise<void> {
    if (transition.origin !== 'loop' || this.scope !== 'all_logs') {
      return;
    }
    const payload = this.basePayload('log', this.now() - this.runStartedAt);
    if (this.currentTask) {
      payload.task_id = this.currentTask.id;
      payload.task_description = describeTask(this.currentTask.show);
    }
    payload.message = redactTransition(transition);
    await this.dispatch(payload);
  }

  private basePayload(event: NotificationEventKind, durationMs: number): NotificationPayload {
    return {
      event,
      duration_ms: durationMs,
      folder: this.folder,
      task_id: '',
      task_description: '',
    };
  }

  private async dispatch(payload: NotificationPayload): Promise<void> {
    if (this.hook === null) {
      return;
    }

    const taskField = payload.task_id === '' ? 'none' : payload.task_id;
    let dir: string | null = null;
    try {
      dir = await createScratchDir('trudger-notify-');
      const payloadPath = join(dir, 'payload.json');
      await atomicWriteJson(payloadPath, payload);

      const result = await this.runner.run({
        label: 'notification',
        command: this.hook,
        task: this.currentTask?.id ?? null,
        env: this.buildEnv(payload, payloadPath),
        capture: false,
        origin: 'notification',
      });

      if (result.spawnError !== undefined) {
        await this.reportFailure(payload.event, taskField, { err: result.spawnError });
      } else if (result.exitCode !== 0) {
        await this.reportFailure(payload.event, taskField, { exit_code: result.exitCode });
      }
    } catch (error) {
      await this.reportFailure(payload.event, taskField, {
        err: error instanceof Error ? error.message : String(error),
      });
    } finally {
      if (dir !== null) {
        await removeDir(dir).catch((error: unknown) => {
          console.warn(
            `Warning: failed to remove notification payload ${dir}: ${
              error instanceof Error ? error.message : String(error)
            }`
          );
        });
      }
    }
  }

  private buildEnv(payload: NotificationPayload, payloadPath: string): CommandEnv {
    const env: CommandEnv = {
      TRUDGER_CONFIG_PATH: this.configPath,
      TRUDGER_NOTIFY_EVENT: payload.event,
      TRUDGER_NOTIFY_DURATION_MS: String(payload.duration_ms),
      TRUDGER_NOTIFY_FOLDER: payload.folder,
      TRUDGER_NOTIFY_TASK_ID: payload.task_id,
      TRUDGER_NOTIFY_TASK_DESCRIPTION: payload.task_description,
      TRUDGER_NOTIFY_PAYLOAD_PATH: payloadPath,
    };
    if (payload.exit_code !== undefined) {
      env.TRUDGER_NOTIFY_EXIT_CODE = String(payload.exit_code);
    }
    if (payload.message !== undefined) {
      env.TRUDGER_NOTIFY_MESSAGE = payload.message;
    }
    return env;
  }

  private async reportFailure(
    event: NotificationEventKind,
    task: string,
    detail: { exit_code: number } | { err: string }
  ): Promise<void> {
    const suffix = 'exit_code' in detail ? `exit_code=${detail.exit_code}` : `err=${detail.err}`;
    console.warn(`Warning: notification hook failed event=${event} task=${task} ${suffix}`);
    await this.log.record('notification_hook_failed', { event, task, ...detail }, 'notification');
  }
}
