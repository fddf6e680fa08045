import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { readFileSync } from 'node:fs';
import { access, mkdtemp, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { CommandRunner } from '@/lib/command.js';
import {
  describeTask,
  NotificationDispatcher,
  redactMessageText,
  redactTransition,
} from '@/lib/notify.js';
import { TransitionLog } from '@/lib/transition_log.js';
import type { NotificationScope } from '@/types/config.js';
import { createTaskContext, ScriptedExecutor } from '../helpers/mocks.js';

describe('redaction', () => {
  it('replaces command and args values in free text', () => {
    expect(redactMessageText('cmd start label=x command=curl -H "Authorization: t" args=--x y')).toBe(
      'cmd start label=x command=[REDACTED] args=[REDACTED]'
    );
    expect(redactMessageText('command=only')).toBe('command=[REDACTED]');
    expect(redactMessageText('quit reason=no_task')).toBe('quit reason=no_task');
  });

  it('redacts command and args fields of a transition', () => {
    expect(
      redactTransition({
        message: 'cmd start',
        fields: { label: 'agent_solve', task: 'tr-1', mode: 'bash_lc', command: 'agent --key s3', args: '' },
      })
    ).toBe('cmd start label=agent_solve task=tr-1 mode=bash_lc command=[REDACTED] args=[REDACTED]');
  });
});

describe('describeTask', () => {
  it('returns the first non-blank line, trimmed', () => {
    expect(describeTask('\n   \n  Fix the parser  \nmore detail')).toBe('Fix the parser');
  });

  it('returns an empty string when unknown', () => {
    expect(describeTask(null)).toBe('');
    expect(describeTask(' \n')).toBe('');
  });
});

function makeDispatcher(
  scope: NotificationScope,
  options: { hook?: string; runner?: ScriptedExecutor; log?: TransitionLog; clock?: number[] } = {}
) {
  const runner = options.runner ?? new ScriptedExecutor();
  const log = options.log ?? new TransitionLog();
  const ticks = options.clock ?? [1000];
  const now = () => (ticks.length > 1 ? (ticks.shift() ?? 0) : ticks[0]);
  const dispatcher = new NotificationDispatcher({
    hook: 'hook' in options ? options.hook : 'notify-hook',
    scope,
    runner,
    log,
    configPath: '/cfg/trudger.yml',
    folder: '/work',
    now,
  });
  dispatcher.attach();
  return { dispatcher, runner, log };
}

describe('NotificationDispatcher', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('never invokes the runner when no hook is configured', async () => {
    for (const scope of ['all_logs', 'task_boundaries', 'run_boundaries'] as const) {
      const { dispatcher, runner, log } = makeDispatcher(scope, { hook: undefined });
      const task = createTaskContext('tr-1');
      await dispatcher.onRunBoundary('run_start');
      await dispatcher.onTaskBoundary('task_start', task);
      await log.record('state=SOLVING', { task: 'tr-1', loop: 0 });
      await log.record('cmd start', { command: 'x' });
      await dispatcher.onTaskBoundary('task_end', task);
      await dispatcher.onRunBoundary('run_end', 0);
      expect(runner.calls).toHaveLength(0);
    }
  });

  it('run_boundaries fires only run_start and run_end', async () => {
    const { dispatcher, runner, log } = makeDispatcher('run_boundaries', { clock: [1000, 1250] });
    const task = createTaskContext('tr-1');

    await dispatcher.onRunBoundary('run_start');
    await dispatcher.onTaskBoundary('task_start', task);
    await log.record('state=SOLVING', { task: 'tr-1', loop: 0 });
    await dispatcher.onTaskBoundary('task_end', task);
    await dispatcher.onRunBoundary('run_end', 3);

    expect(runner.calls.map((call) => call.env)).toEqual([
      expect.objectContaining({ TRUDGER_NOTIFY_EVENT: 'run_start', TRUDGER_NOTIFY_DURATION_MS: '0' }),
      expect.objectContaining({
        TRUDGER_NOTIFY_EVENT: 'run_end',
        TRUDGER_NOTIFY_DURATION_MS: '250',
        TRUDGER_NOTIFY_EXIT_CODE: '3',
      }),
    ]);
    expect(runner.calls[0].env.TRUDGER_NOTIFY_EXIT_CODE).toBeUndefined();
  });

  it('task_boundaries fires task_start and task_end with task details', async () => {
    const { dispatcher, runner, log } = makeDispatcher('task_boundaries', { clock: [0, 5000] });
    const task = createTaskContext('tr-1', { startedAt: 1000 });

    await dispatcher.onRunBoundary('run_start');
    await dispatcher.onTaskBoundary('task_start', task);
    task.show = 'Fix the parser\nmore';
    await log.record('state=SOLVING', { task: 'tr-1', loop: 0 });
    await dispatcher.onTaskBoundary('task_end', task);
    await dispatcher.onRunBoundary('run_end', 0);

    expect(runner.calls).toHaveLength(2);
    const [start, end] = runner.calls;
    expect(start.origin).toBe('notification');
    expect(start.env).toMatchObject({
      TRUDGER_CONFIG_PATH: '/cfg/trudger.yml',
      TRUDGER_NOTIFY_EVENT: 'task_start',
      TRUDGER_NOTIFY_DURATION_MS: '0',
      TRUDGER_NOTIFY_FOLDER: '/work',
      TRUDGER_NOTIFY_TASK_ID: 'tr-1',
      TRUDGER_NOTIFY_TASK_DESCRIPTION: '',
    });
    expect(end.env).toMatchObject({
      TRUDGER_NOTIFY_EVENT: 'task_end',
      TRUDGER_NOTIFY_DURATION_MS: '4000',
      TRUDGER_NOTIFY_TASK_DESCRIPTION: 'Fix the parser',
    });
    expect(end.env.TRUDGER_NOTIFY_EXIT_CODE).toBeUndefined();
    expect(end.env.TRUDGER_NOTIFY_MESSAGE).toBeUndefined();
  });

  it('all_logs fires once per loop transition with a redacted message', async () => {
    const { dispatcher, runner, log } = makeDispatcher('all_logs');
    const task = createTaskContext('tr-1', { show: 'Title' });

    await dispatcher.onRunBoundary('run_start');
    await dispatcher.onTaskBoundary('task_start', task);
    await log.record('cmd start', { label: 'agent_solve', task: 'tr-1', mode: 'bash_lc', command: 'agent', args: '' });
    await dispatcher.onTaskBoundary('task_end', task);
    await dispatcher.onRunBoundary('run_end', 0);

    expect(runner.calls).toHaveLength(1);
    expect(runner.calls[0].env).toMatchObject({
      TRUDGER_NOTIFY_EVENT: 'log',
      TRUDGER_NOTIFY_TASK_ID: 'tr-1',
      TRUDGER_NOTIFY_TASK_DESCRIPTION: 'Title',
      TRUDGER_NOTIFY_MESSAGE: 'cmd start label=agent_solve task=tr-1 mode=bash_lc command=[REDACTED] args=[REDACTED]',
    });
  });

  it('writes the payload to a JSON file and removes it afterwards', async () => {
    let payload: unknown = null;
    let payloadPath = '';
    const runner = new ScriptedExecutor().on('notification', (invocation) => {
      payloadPath = invocation.env.TRUDGER_NOTIFY_PAYLOAD_PATH ?? '';
      payload = JSON.parse(readFileSync(payloadPath, 'utf-8'));
      return {};
    });
    const { dispatcher } = makeDispatcher('run_boundaries', { runner, clock: [0, 40] });

    await dispatcher.onRunBoundary('run_end', 2);

    expect(payload).toEqual({
      event: 'run_end',
      duration_ms: 40,
      folder: '/work',
      task_id: '',
      task_description: '',
      exit_code: 2,
    });
    await expect(access(payloadPath)).rejects.toThrow();
  });

  it('reports a failing hook once and continues', async () => {
    const log = new TransitionLog();
    const runner = new ScriptedExecutor().on('notification', { exitCode: 4 });
    const { dispatcher } = makeDispatcher('task_boundaries', { runner, log });
    const recordSpy = vi.spyOn(log, 'record');

    await expect(dispatcher.onTaskBoundary('task_start', createTaskContext('tr-9'))).resolves.toBeUndefined();

    expect(recordSpy.mock.calls).toEqual([
      ['notification_hook_failed', { event: 'task_start', task: 'tr-9', exit_code: 4 }, 'notification'],
    ]);
    expect(console.warn).toHaveBeenCalledWith(
      'Warning: notification hook failed event=task_start task=tr-9 exit_code=4'
    );
  });
});

describe('NotificationDispatcher with a real shell', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'trudger-notify-test-'));
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  it('does not re-dispatch its own failure in all_logs scope', async () => {
    const logPath = join(testDir, 'trudger.log');
    const countPath = join(testDir, 'count');
    const log = new TransitionLog({ path: logPath });
    const runner = new CommandRunner({ log, shell: { command: 'bash', args: ['-c'] }, baseEnv: { PATH: process.env.PATH } });
    const dispatcher = new NotificationDispatcher({
      hook: `echo x >> '${countPath}'; exit 3`,
      scope: 'all_logs',
      runner,
      log,
      configPath: '/cfg/trudger.yml',
      folder: testDir,
    });
    dispatcher.attach();

    await log.record('state=SOLVING', { task: 'tr-1', loop: 0 });

    expect(await readFile(countPath, 'utf-8')).toBe('x\n');
    const messages = (await readFile(logPath, 'utf-8'))
      .trimEnd()
      .split('\n')
      .map((line) => line.split(' ').slice(1, 2).join(' '));
    expect(messages).toEqual(['state=SOLVING', 'cmd', 'cmd', 'notification_hook_failed']);
    const lines = (await readFile(logPath, 'utf-8')).trimEnd().split('\n');
    expect(lines[3]).toMatch(/ notification_hook_failed event=log task=none exit_code=3$/);
  });
});
