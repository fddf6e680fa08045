/**
 * Run-level error and result types.
 */

import type { TaskId } from './task.js';

/**
 * Ends the run with an exit code. `reason` is a short token such as
 * `no_task`, `task_not_ready:tr-1` or `interrupted`.
 */
export class QuitError extends Error {
  constructor(
    public readonly code: number,
    public readonly reason: string
  ) {
    super(`quit: ${reason} (exit ${code})`);
    this.name = 'QuitError';
  }
}

/**
 * Type guard for QuitError.
 */
export function isQuitError(error: unknown): error is QuitError {
  return error instanceof QuitError;
}

/**
 * Summary returned by runLoop.
 */
export interface RunSummary {
  /** Process exit code */
  exitCode: number;
  /** Reason token of the final quit */
  reason: string;
  /** Tasks closed during the run, in order */
  completed: TaskId[];
  /** Tasks escalated to a human during the run, in order */
  needsHuman: TaskId[];
}

/**
 * Rendered agent prompts.
 */
export interface AgentPrompts {
  solve: string;
  review: string;
}
