/**
 * Tracker, agent and hook invocations for one run.
 *
 * Each method builds a fresh environment from the run state and the
 * current TaskContext, runs one command and turns a failure into a
 * QuitError carrying the run's reason token.
 */

import type { CommandExecutor, CommandResult } from '../lib/command.js';
import { describeFailure } from '../lib/command.js';
import type { CommandEnv } from '../lib/env.js';
import { firstToken } from '../lib/task_id.js';
import type { TransitionLog } from '../lib/transition_log.js';
import type { TrudgerConfig } from '../types/config.js';
import type { AgentPrompts } from '../types/run.js';
import { QuitError } from '../types/run.js';
import { KNOWN_TASK_STATUSES, type KnownTaskStatus, type TaskContext, type TaskId } from '../types/task.js';

export type TargetStatus = 'in_progress' | 'blocked';
export type OutcomeHook = 'on_completed' | 'on_requires_human';

/**
 * Status token read from `task_status`, or why it could not be read.
 */
export type StatusRead = { ok: true; token: string } | { ok: false; error: string };

export function isKnownStatus(token: string): token is KnownTaskStatus {
  return KNOWN_TASK_STATUSES.some((status) => status === token);
}

/** Selectable statuses. */
export function isReadyStatus(status: KnownTaskStatus): boolean {
  return status === 'ready' || status === 'open';
}

export interface TrackerOptions {
  config: TrudgerConfig;
  configPath: string;
  runner: CommandExecutor;
  log: TransitionLog;
  prompts: AgentPrompts;
}

/**
 * Runs configured commands on behalf of the run loop and keeps the
 * run-wide lists of completed and escalated tasks.
 */
export class Tracker {
  readonly completed: TaskId[] = [];
  readonly needsHuman: TaskId[] = [];

  private readonly config: TrudgerConfig;
  private readonly configPath: string;
  private readonly runner: CommandExecutor;
  private readonly log: TransitionLog;
  private readonly prompts: AgentPrompts;

  constructor(options: TrackerOptions) {
    this.config = options.config;
    this.configPath = options.configPath;
    this.runner = options.runner;
    this.log = options.log;
    this.prompts = options.prompts;
  }

  /**
   * Environment for one invocation. Unset values stay absent.
   */
  env(task: TaskContext | null, extra: Partial<CommandEnv> = {}): CommandEnv {
    const env: CommandEnv = { TRUDGER_CONFIG_PATH: this.configPath };
    if (task) {
      env.TRUDGER_TASK_ID = task.id;
      if (task.show !== null) env.TRUDGER_TASK_SHOW = task.show;
      if (task.status !== null) env.TRUDGER_TASK_STATUS = task.status;
    }
    if (this.completed.length > 0) env.TRUDGER_COMPLETED = this.completed.join(',');
    if (this.needsHuman.length > 0) env.TRUDGER_NEEDS_HUMAN = this.needsHuman.join(',');
    return { ...env, ...extra };
  }

  nextTask(): Promise<CommandResult> {
    return this.runner.run({
      label: 'next_task',
      command: this.config.commands.next_task,
      env: this.env(null),
      capture: true,
    });
  }

  /**
   * Runs `task_show` and stores its output on the context.
   */
  async show(task: TaskContext): Promise<void> {
    task.show = null;
    const result = await this.runner.run({
      label: 'task_show',
      command: this.config.commands.task_show,
      task: task.id,
      env: this.env(task),
      capture: true,
    });
    if (result.spawnError !== undefined || result.exitCode !== 0) {
      throw new QuitError(1, `error:task_show ${describeFailure(result)}`);
    }
    task.show = result.stdout;
  }

  /**
   * Runs `task_status` and returns the first token of its output.
   */
  async readStatus(task: TaskContext): Promise<StatusRead> {
    const result = await this.runner.run({
      label: 'task_status',
      command: this.config.commands.task_status,
      task: task.id,
      env: this.env(task),
      capture: true,
    });
    if (result.spawnError !== undefined || result.exitCode !== 0) {
      return { ok: false, error: `task_status ${describeFailure(result)}` };
    }
    return { ok: true, token: firstToken(result.stdout) };
  }

  /**
   * Queries and stores the task's status. Returns null for empty output.
   *
   * @throws {QuitError} When the command fails or prints an unknown status
   */
  async queryStatus(task: TaskContext): Promise<KnownTaskStatus | null> {
    task.status = null;
    const read = await this.readStatus(task);
    if (!read.ok) {
      throw new QuitError(1, `task_status_failed:${read.error}`);
    }
    if (read.token === '') {
      return null;
    }
    if (!isKnownStatus(read.token)) {
      await this.log.record('unknown_task_status', { task: task.id, status: read.token });
      console.error(`Task ${task.id} has unknown status: ${read.token}.`);
      throw new QuitError(1, `unknown_task_status:${task.id}:${read.token}`);
    }
    task.status = read.token;
    return read.token;
  }

  /**
   * Runs `task_update_status` with TRUDGER_TARGET_STATUS set.
   */
  async updateStatus(task: TaskContext, target: TargetStatus): Promise<void> {
    const result = await this.runner.run({
      label: 'task_update_status',
      command: this.config.commands.task_update_status,
      task: task.id,
      env: this.env(task, { TRUDGER_TARGET_STATUS: target }),
      capture: false,
    });
    if (result.spawnError !== undefined || result.exitCode !== 0) {
      throw new QuitError(1, `error:task_update_status failed to set status ${target} (${describeFailure(result)})`);
    }
  }

  /** Runs the solve agent with TRUDGER_PROMPT only. */
  async solve(task: TaskContext): Promise<void> {
    const result = await this.runner.run({
      label: 'agent_solve',
      command: this.config.agent_command,
      task: task.id,
      env: this.env(task, { TRUDGER_PROMPT: this.prompts.solve }),
      capture: false,
    });
    if (result.spawnError !== undefined || result.exitCode !== 0) {
      await this.log.record('solve_failed', { task: task.id });
      console.error(`Agent solve failed for task ${task.id}: ${describeFailure(result)}.`);
      throw new QuitError(1, `solve_failed:${task.id}`);
    }
  }

  /** Runs the review agent with TRUDGER_REVIEW_PROMPT only. */
  async review(task: TaskContext): Promise<void> {
    const result = await this.runner.run({
      label: 'agent_review',
      command: this.config.agent_review_command,
      task: task.id,
      env: this.env(task, { TRUDGER_REVIEW_PROMPT: this.prompts.review }),
      capture: false,
    });
    if (result.spawnError !== undefined || result.exitCode !== 0) {
      await this.log.record('review_failed', { task: task.id });
      console.error(`Agent review failed for task ${task.id}: ${describeFailure(result)}.`);
      throw new QuitError(1, `review_failed:${task.id}`);
    }
  }

  async runHook(task: TaskContext, hook: OutcomeHook): Promise<void> {
    const result = await this.runner.run({
      label: hook,
      command: this.config.hooks[hook],
      task: task.id,
      env: this.env(task),
      capture: false,
    });
    if (result.spawnError !== undefined || result.exitCode !== 0) {
      throw new QuitError(1, `error:hook ${hook} ${describeFailure(result)}`);
    }
  }

  /**
   * Returns an in-progress task to the pool after an aborted run.
   * Never throws: every failure is a warning plus a transition.
   */
  async resetOnAbort(task: TaskContext): Promise<void> {
    const resetCommand = this.config.commands.reset_task;
    if (resetCommand === undefined) {
      return;
    }

    const read = await this.readStatus(task);
    if (!read.ok) {
      console.warn(`Warning: failed to check task status for task ${task.id}, skipping reset: ${read.error}`);
      await this.log.record('reset_task_skip', {
        task: task.id,
        reason: 'task_status_failed',
        err: read.error,
      });
      return;
    }
    if (read.token === '') {
      console.warn(`Warning: commands.task_status returned an empty status for task ${task.id}, skipping reset.`);
      await this.log.record('reset_task_skip', { task: task.id, reason: 'task_status_empty' });
      return;
    }
    if (read.token !== 'in_progress') {
      await this.log.record('reset_task_skip', { task: task.id, status: read.token });
      return;
    }

    const result = await this.runner.run({
      label: 'reset_task',
      command: resetCommand,
      task: task.id,
      env: this.env(task),
      capture: false,
    });
    if (result.spawnError !== undefined || result.exitCode !== 0) {
      const err = `reset_task ${describeFailure(result)}`;
      console.warn(`Warning: failed to reset task ${task.id}: ${err}`);
      await this.log.record('reset_task_failed', { task: task.id, err });
      return;
    }
    await this.log.record('reset_task', { task: task.id });
  }
}
