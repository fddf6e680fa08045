/**
 * `trudger doctor`: checks the tracker integration against a scratch
 * tracker populated by `hooks.on_doctor_setup`. The task `next_task`
 * returns is walked through reset, in_progress, the outcome hooks and
 * closed, reading `task_status` back after every change.
 *
 * Doctor mode never dispatches notifications.
 */

import type { TrudgerConfig } from '../types/config.js';
import { KNOWN_TASK_STATUSES } from '../types/task.js';
import type { CommandExecutor, CommandResult } from './command.js';
import { describeFailure } from './command.js';
import type { CommandEnv } from './env.js';
import { createScratchDir, removeDir } from './fs.js';
import { firstToken, validateTaskId } from './task_id.js';

/**
 * Outcome of one doctor check.
 */
export interface DoctorCheck {
  name: string;
  ok: boolean;
  detail: string;
}

export interface DoctorResult {
  ok: boolean;
  checks: DoctorCheck[];
}

export interface DoctorOptions {
  config: TrudgerConfig;
  configPath: string;
  runner: CommandExecutor;
}

class DoctorFailure extends Error {
  constructor(
    public readonly check: string,
    message: string
  ) {
    super(message);
    this.name = 'DoctorFailure';
  }
}

/**
 * Prints one line per check: `[OK] name: detail` or `[FAIL] name: detail`.
 */
export function formatDoctorCheck(check: DoctorCheck): string {
  return `${check.ok ? '[OK]' : '[FAIL]'} ${check.name}: ${check.detail}`;
}

/** Status tokens a freshly reset task may report. */
const RESET_STATUSES: readonly string[] = ['ready', 'open'];

async function runChecks(
  options: DoctorOptions,
  setupCommand: string,
  scratchDir: string,
  checks: DoctorCheck[]
): Promise<void> {
  const { config, runner } = options;
  const env = (extra: Partial<CommandEnv> = {}): CommandEnv => ({
    TRUDGER_CONFIG_PATH: options.configPath,
    TRUDGER_DOCTOR_SCRATCH_DIR: scratchDir,
    ...extra,
  });
  // Commands run in the invocation directory; the scratch path only travels in the env.
  const run = async (
    check: string,
    field: string,
    command: string,
    extra: Partial<CommandEnv> = {},
    capture = true
  ): Promise<CommandResult> => {
    const result = await runner.run({
      label: check,
      command,
      task: extra.TRUDGER_TASK_ID,
      env: env(extra),
      capture,
    });
    if (result.spawnError !== undefined || result.exitCode !== 0) {
      throw new DoctorFailure(check, `${field} ${describeFailure(result)}`);
    }
    return result;
  };

  const setup = await runner.run({ label: 'doctor_setup', command: setupCommand, env: env(), capture: false });
  if (setup.spawnError !== undefined || setup.exitCode !== 0) {
    throw new DoctorFailure('on_doctor_setup', `hooks.on_doctor_setup ${describeFailure(setup)}`);
  }
  checks.push({ name: 'on_doctor_setup', ok: true, detail: scratchDir });

  const next = await runner.run({ label: 'next_task', command: config.commands.next_task, env: env(), capture: true });
  if (next.spawnError !== undefined || (next.exitCode !== 0 && next.exitCode !== 1)) {
    throw new DoctorFailure('next_task', `commands.next_task ${describeFailure(next)}`);
  }
  const token = next.exitCode === 0 ? firstToken(next.stdout) : '';
  if (token === '') {
    throw new DoctorFailure(
      'next_task',
      'commands.next_task returned no task; hooks.on_doctor_setup must create at least one ready task.'
    );
  }
  const validation = validateTaskId(token);
  if (!validation.ok) {
    throw new DoctorFailure('next_task', `commands.next_task returned an invalid task id: ${validation.message}`);
  }
  const id = validation.id;
  checks.push({ name: 'next_task', ok: true, detail: id });

  const show = await run('task_show', 'commands.task_show', config.commands.task_show, { TRUDGER_TASK_ID: id });
  checks.push({ name: 'task_show', ok: true, detail: 'exit 0' });

  const readStatus = async (after: string): Promise<string> => {
    const result = await run('task_status', 'commands.task_status', config.commands.task_status, {
      TRUDGER_TASK_ID: id,
    });
    const status = firstToken(result.stdout);
    if (status === '') {
      throw new DoctorFailure('task_status', `commands.task_status printed no status for ${id} ${after}`);
    }
    if (!KNOWN_TASK_STATUSES.some((known) => known === status)) {
      throw new DoctorFailure('task_status', `commands.task_status printed unknown status '${status}' ${after}`);
    }
    return status;
  };
  const expectStatus = async (check: string, after: string, accepted: readonly string[]): Promise<string> => {
    const status = await readStatus(after);
    if (!accepted.includes(status)) {
      throw new DoctorFailure(
        check,
        `doctor expected commands.task_status to return ${accepted.map((s) => `'${s}'`).join('/')} ${after}, got '${status}'.`
      );
    }
    checks.push({ name: check, ok: true, detail: `status ${status}` });
    return status;
  };
  const resetTask = async (): Promise<string | null> => {
    const resetCommand = config.commands.reset_task;
    if (resetCommand === undefined) return null;
    await run('reset_task', 'commands.reset_task', resetCommand, { TRUDGER_TASK_ID: id });
    return expectStatus('reset_task', 'after reset_task', RESET_STATUSES);
  };
  const updateStatus = async (target: string): Promise<string> => {
    await run(
      'task_update_status',
      'commands.task_update_status',
      config.commands.task_update_status,
      { TRUDGER_TASK_ID: id, TRUDGER_TARGET_STATUS: target },
      false
    );
    return expectStatus(`update_${target}`, `after task_update_status to ${target}`, [target]);
  };

  const initial = await readStatus('before any change');
  checks.push({ name: 'task_status', ok: true, detail: initial });

  await resetTask();
  let status = await updateStatus('in_progress');
  status = (await resetTask()) ?? status;

  const hookEnv: Partial<CommandEnv> = {
    TRUDGER_TASK_ID: id,
    TRUDGER_TASK_SHOW: show.stdout,
    TRUDGER_TASK_STATUS: status,
  };
  await run('on_completed', 'hooks.on_completed', config.hooks.on_completed, hookEnv, false);
  checks.push({ name: 'on_completed', ok: true, detail: 'exit 0' });
  await run('on_requires_human', 'hooks.on_requires_human', config.hooks.on_requires_human, hookEnv, false);
  checks.push({ name: 'on_requires_human', ok: true, detail: 'exit 0' });

  await updateStatus('closed');
}

/**
 * Runs the doctor checks and removes the scratch directory afterwards.
 * A cleanup failure fails the doctor.
 */
export async function runDoctor(options: DoctorOptions): Promise<DoctorResult> {
  const checks: DoctorCheck[] = [];

  const setupCommand = options.config.hooks.on_doctor_setup;
  if (setupCommand === undefined) {
    checks.push({ name: 'on_doctor_setup', ok: false, detail: 'hooks.on_doctor_setup must not be empty.' });
    return { ok: false, checks };
  }

  let scratchDir: string;
  try {
    scratchDir = await createScratchDir('trudger-doctor-');
  } catch (error) {
    checks.push({ name: 'scratch', ok: false, detail: error instanceof Error ? error.message : String(error) });
    return { ok: false, checks };
  }

  let ok = true;
  try {
    await runChecks(options, setupCommand, scratchDir, checks);
  } catch (error) {
    ok = false;
    const name = error instanceof DoctorFailure ? error.check : 'doctor';
    checks.push({ name, ok: false, detail: error instanceof Error ? error.message : String(error) });
  }

  try {
    await removeDir(scratchDir);
  } catch (error) {
    ok = false;
    checks.push({
      name: 'cleanup',
      ok: false,
      detail: `doctor scratch cleanup failed: ${error instanceof Error ? error.message : String(error)}`,
    });
  }

  return { ok, checks };
}
