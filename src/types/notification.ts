/**
 * Notification payload types.
 */

export type NotificationEventKind = 'run_start' | 'run_end' | 'task_start' | 'task_end' | 'log';

/**
 * Payload handed to the notification hook, both as TRUDGER_NOTIFY_*
 * variables and as a JSON file.
 */
export interface NotificationPayload {
  event: NotificationEventKind;
  duration_ms: number;
  /** Absolute working directory of the run */
  folder: string;
  /** Only set for run_end */
  exit_code?: number;
  /** Empty string outside a task */
  task_id: string;
  /** Empty string outside a task or before the first task_show */
  task_description: string;
  /** Redacted transition text; only set for log events */
  message?: string;
}
