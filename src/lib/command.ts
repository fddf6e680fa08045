/**
 * Shell command execution.
 *
 * Every tracker command, agent invocation and hook is an opaque shell
 * string run as `bash -lc <command>`. Context is passed only through the
 * environment; no positional arguments are added.
 */

import { spawn } from 'node:child_process';
import { constants } from 'node:os';
import type { TaskId } from '../types/task.js';
import type { TransitionOrigin } from '../types/transition.js';
import {
  assembleEnv,
  buildChildEnv,
  DEFAULT_ENV_LIMITS,
  type CommandEnv,
  type EnvLimits,
} from './env.js';
import type { TransitionLog } from './transition_log.js';

/** Exit code used when the shell itself cannot be started */
export const SPAWN_FAILURE_EXIT_CODE = 127;

/**
 * One command invocation.
 */
export interface CommandInvocation {
  /** Short label for the log, e.g. `task-status` or `agent_solve` */
  label: string;
  /** Shell command string; callers never pass an empty one */
  command: string;
  /** Task the command runs for, if any */
  task?: TaskId | null;
  /** TRUDGER_* context */
  env: CommandEnv;
  /** Pipe stdout back to the caller instead of inheriting the terminal */
  capture: boolean;
  /** Tags every transition recorded for this invocation (default `loop`) */
  origin?: TransitionOrigin;
}

/**
 * Result of running a command.
 */
export interface CommandResult {
  /** Process exit code; 127 when the shell could not be spawned */
  exitCode: number;
  /** Captured stdout; empty when not capturing */
  stdout: string;
  /** Set when the process could not be started at all */
  spawnError?: string;
}

/**
 * Anything that can execute an invocation. The run loop, the selector and
 * the notification dispatcher depend on this, not on CommandRunner.
 */
export interface CommandExecutor {
  run(invocation: CommandInvocation): Promise<CommandResult>;
}

/**
 * Shell used to interpret command strings.
 */
export interface ShellSpec {
  command: string;
  args: string[];
}

export const DEFAULT_SHELL: ShellSpec = { command: 'bash', args: ['-lc'] };

/**
 * Options for creating a CommandRunner.
 */
export interface CommandRunnerOptions {
  log: TransitionLog;
  /** Environment inherited by children (default: process.env) */
  baseEnv?: NodeJS.ProcessEnv;
  shell?: ShellSpec;
  limits?: EnvLimits;
}

/**
 * Spawns commands one at a time with a freshly assembled environment.
 */
export class CommandRunner implements CommandExecutor {
  private readonly log: TransitionLog;
  private readonly baseEnv: NodeJS.ProcessEnv;
  private readonly shell: ShellSpec;
  private readonly limits: EnvLimits;

  constructor(options: CommandRunnerOptions) {
    this.log = options.log;
    this.baseEnv = options.baseEnv ?? process.env;
    this.shell = options.shell ?? DEFAULT_SHELL;
    this.limits = options.limits ?? DEFAULT_ENV_LIMITS;
  }

  async run(invocation: CommandInvocation): Promise<CommandResult> {
    const origin = invocation.origin ?? 'loop';
    const task = invocation.task ?? 'none';

    await this.log.record(
      'cmd start',
      {
        label: invocation.label,
        task,
        mode: 'bash_lc',
        command: invocation.command,
        args: '',
      },
      origin
    );

    const assembled = assembleEnv(invocation.env, this.limits);
    if (assembled.total) {
      console.warn(
        `Warning: TRUDGER_* env payload is ${assembled.total.originalBytes} bytes; truncating to ${assembled.total.truncatedBytes} bytes for command execution.`
      );
      await this.log.record(
        'env_truncate_total',
        {
          label: invocation.label,
          task,
          original_bytes: assembled.total.originalBytes,
          truncated_bytes: assembled.total.truncatedBytes,
        },
        origin
      );
    }
    for (const strip of assembled.nulStripped) {
      console.warn(`Warning: ${strip.key} contained ${strip.removed} NUL byte(s); removing them for command execution.`);
      await this.log.record(
        'env_strip_nul',
        { label: invocation.label, task, key: strip.key, removed: strip.removed },
        origin
      );
    }
    for (const truncation of assembled.truncations) {
      console.warn(
        `Warning: ${truncation.key} is ${truncation.originalBytes} bytes; truncating to ${truncation.truncatedBytes} bytes for command execution.`
      );
      await this.log.record(
        'env_truncate',
        {
          label: invocation.label,
          task,
          key: truncation.key,
          original_bytes: truncation.originalBytes,
          truncated_bytes: truncation.truncatedBytes,
        },
        origin
      );
    }

    const result = await this.spawnShell(invocation, buildChildEnv(this.baseEnv, assembled.values));

    if (result.spawnError !== undefined) {
      await this.log.record(
        'cmd spawn_failed',
        { label: invocation.label, task, err: result.spawnError },
        origin
      );
    } else {
      await this.log.record('cmd exit', { label: invocation.label, task, exit: result.exitCode }, origin);
    }
    return result;
  }

  private spawnShell(invocation: CommandInvocation, env: NodeJS.ProcessEnv): Promise<CommandResult> {
    return new Promise<CommandResult>((resolve) => {
      let stdout = '';
      let settled = false;

      const settle = (result: CommandResult) => {
        if (settled) return;
        settled = true;
        resolve(result);
      };
      const spawnFailure = (message: string): CommandResult => ({
        exitCode: SPAWN_FAILURE_EXIT_CODE,
        stdout: '',
        spawnError: `Failed to run command '${invocation.command}': ${message}`,
      });

      try {
        const child = spawn(this.shell.command, [...this.shell.args, invocation.command], {
          env,
          stdio: invocation.capture ? ['inherit', 'pipe', 'inherit'] : 'inherit',
        });

        child.stdout?.setEncoding('utf8');
        child.stdout?.on('data', (chunk: string) => {
          stdout += chunk;
        });

        child.on('error', (error: Error) => {
          settle(spawnFailure(error.message));
        });

        child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
          if (code !== null && code < 0) {
            // Negative codes are libuv errors from a failed spawn.
            settle(spawnFailure(`spawn error ${code}`));
            return;
          }
          settle({ exitCode: code ?? signalExitCode(signal), stdout });
        });
      } catch (error) {
        // spawn throws synchronously on arguments it rejects outright.
        settle(spawnFailure(error instanceof Error ? error.message : String(error)));
      }
    });
  }
}

/**
 * Shell convention for a child killed by a signal: 128 + the signal
 * number, or 1 when the signal is unknown on this platform.
 */
export function signalExitCode(signal: NodeJS.Signals | null): number {
  if (signal === null) {
    return 1;
  }
  for (const [name, value] of Object.entries(constants.signals)) {
    if (name === signal && typeof value === 'number') {
      return 128 + value;
    }
  }
  return 1;
}

/**
 * Describes a failed result for error messages: either the exit code or
 * the spawn failure.
 */
export function describeFailure(result: CommandResult): string {
  if (result.spawnError !== undefined) {
    return `could not start (${result.spawnError})`;
  }
  return `failed with exit code ${result.exitCode}`;
}
