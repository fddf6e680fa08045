/**
 * Task identity, status and per-task context.
 */

declare const taskIdBrand: unique symbol;

/**
 * A task id that passed `validateTaskId`. Only validated ids may reach a
 * subprocess environment.
 */
export type TaskId = string & { readonly [taskIdBrand]: true };

/** Why a candidate task id was rejected. */
export type TaskIdRejection = 'empty' | 'too_long' | 'invalid_first_char' | 'invalid_char';

export type TaskIdValidation =
  | { ok: true; id: TaskId }
  | { ok: false; reason: TaskIdRejection; message: string };

/**
 * Status tokens understood by the run loop. Anything else printed by
 * `task_status` is reported as unknown.
 */
export type KnownTaskStatus = 'ready' | 'open' | 'in_progress' | 'closed' | 'blocked';

export const KNOWN_TASK_STATUSES: readonly KnownTaskStatus[] = [
  'ready',
  'open',
  'in_progress',
  'closed',
  'blocked',
];

/**
 * Result of a review round.
 * Closed and Blocked end the task; Retry runs another review round.
 */
export type Outcome = 'closed' | 'blocked' | 'retry';

/**
 * Mutable record for the task currently in flight.
 */
export interface TaskContext {
  /** Validated task id */
  id: TaskId;
  /** Output of the last task_show, if any */
  show: string | null;
  /** First token of the last task_status, if any */
  status: string | null;
  /** Milliseconds timestamp of task_start */
  startedAt: number;
}
