/**
 * TypeScript interfaces for trudger.yml configuration.
 *
 * The loader (`lib/config.ts`) guarantees every required field is present
 * and non-blank before any of these reach the run loop.
 */

/**
 * Granularity at which the notification hook is invoked.
 */
export type NotificationScope = 'all_logs' | 'task_boundaries' | 'run_boundaries';

/** Every accepted notification scope, in schema order. */
export const NOTIFICATION_SCOPES: readonly NotificationScope[] = [
  'all_logs',
  'task_boundaries',
  'run_boundaries',
];

/** Scope used when a notification hook is set without an explicit scope. */
export const DEFAULT_NOTIFICATION_SCOPE: NotificationScope = 'task_boundaries';

/**
 * Tracker commands. All are opaque shell strings run through `bash -lc`.
 */
export interface CommandsConfig {
  /** Prints the next task id as its first token; exit 1 or empty output means "no tasks" */
  next_task: string;
  /** Prints a free-form description of TRUDGER_TASK_ID */
  task_show: string;
  /** Prints the status of TRUDGER_TASK_ID as its first token */
  task_status: string;
  /** Sets TRUDGER_TASK_ID to TRUDGER_TARGET_STATUS */
  task_update_status: string;
  /** Returns an in-progress task to the pool when a run aborts (optional) */
  reset_task?: string;
}

/**
 * Outcome and lifecycle hooks.
 */
export interface HooksConfig {
  /** Runs after a task reaches status closed */
  on_completed: string;
  /** Runs after a task is blocked or exhausts its review rounds */
  on_requires_human: string;
  /** Populates TRUDGER_DOCTOR_SCRATCH_DIR for `trudger doctor` (optional) */
  on_doctor_setup?: string;
  /** Receives TRUDGER_NOTIFY_* payloads (optional) */
  on_notification?: string;
  /** Which events reach on_notification */
  on_notification_scope?: NotificationScope;
}

/**
 * Complete configuration for one trudger run.
 */
export interface TrudgerConfig {
  /** Agent invocation for the solve step */
  agent_command: string;
  /** Agent invocation for each review round */
  agent_review_command: string;
  /** Tracker commands */
  commands: CommandsConfig;
  /** Outcome hooks */
  hooks: HooksConfig;
  /** Maximum review rounds per task; a positive integer */
  review_loop_limit: number;
  /** Transition log sink; missing or empty disables file logging */
  log_path?: string;
}
