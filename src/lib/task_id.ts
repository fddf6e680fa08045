/**
 * Task id validation and manual task list parsing.
 *
 * Task ids flow into shell-executed commands through the environment, so
 * this is the only gate between tracker output and a subprocess.
 */

import type { TaskId, TaskIdValidation } from '../types/task.js';

/** Maximum UTF-8 length of a task id */
export const TASK_ID_MAX_BYTES = 200;

const FIRST_CHAR = /^[A-Za-z0-9]/;
const BODY = /^[A-Za-z0-9._:-]*$/;

function isTaskId(value: string): value is TaskId {
  return (
    value.length > 0 &&
    Buffer.byteLength(value, 'utf8') <= TASK_ID_MAX_BYTES &&
    FIRST_CHAR.test(value) &&
    BODY.test(value.slice(1))
  );
}

/**
 * Validates a candidate task id.
 *
 * Rules, checked in order: non-empty, at most 200 bytes, first character
 * ASCII alphanumeric, remaining characters in `[A-Za-z0-9._:-]`.
 *
 * @example
 * ```typescript
 * validateTaskId('tr-1');      // { ok: true, id: 'tr-1' }
 * validateTaskId('-tr');       // { ok: false, reason: 'invalid_first_char', ... }
 * ```
 */
export function validateTaskId(value: string): TaskIdValidation {
  if (value.length === 0) {
    return { ok: false, reason: 'empty', message: 'task id must not be empty' };
  }
  const bytes = Buffer.byteLength(value, 'utf8');
  if (bytes > TASK_ID_MAX_BYTES) {
    return {
      ok: false,
      reason: 'too_long',
      message: `task id is ${bytes} bytes (max ${TASK_ID_MAX_BYTES})`,
    };
  }
  if (!FIRST_CHAR.test(value)) {
    return {
      ok: false,
      reason: 'invalid_first_char',
      message: 'task id must start with an ASCII letter or digit',
    };
  }
  if (!isTaskId(value)) {
    return {
      ok: false,
      reason: 'invalid_char',
      message: 'task id may only contain A-Z, a-z, 0-9, ".", "_", ":" and "-"',
    };
  }
  return { ok: true, id: value };
}

/**
 * Error thrown when a manual task list cannot be parsed.
 */
export class ManualTaskError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ManualTaskError';
  }
}

/**
 * Parses repeated `-t/--task` values into an ordered list of task ids.
 *
 * Each raw value may hold a comma-separated list. Segments are trimmed;
 * an empty segment is an error rather than being skipped.
 *
 * @throws {ManualTaskError} On an empty segment or an invalid id
 */
export function parseManualTasks(rawValues: readonly string[]): TaskId[] {
  const tasks: TaskId[] = [];
  for (const raw of rawValues) {
    const segments = raw.split(',');
    for (let index = 0; index < segments.length; index++) {
      const trimmed = segments[index].trim();
      if (trimmed === '') {
        throw new ManualTaskError(
          `Invalid -t/--task value: empty segment in ${JSON.stringify(raw)} at index ${index}.`
        );
      }
      const result = validateTaskId(trimmed);
      if (!result.ok) {
        throw new ManualTaskError(`Invalid -t/--task value ${JSON.stringify(trimmed)}: ${result.message}.`);
      }
      tasks.push(result.id);
    }
  }
  return tasks;
}

/**
 * Returns the first whitespace-delimited token of command output, or ''.
 */
export function firstToken(output: string): string {
  const match = output.match(/\S+/);
  return match ? match[0] : '';
}
