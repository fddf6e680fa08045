import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { doctorCommand } from '@/commands/doctor.js';
import { runCommand } from '@/commands/run.js';

interface Fixtures {
  configPath: string;
  logPath: string;
  promptPaths: { solve: string; review: string };
}

async function writeFixtures(dir: string, options: { nextTask?: string; notify?: string } = {}): Promise<Fixtures> {
  const logPath = join(dir, 'trudger.log');
  const configPath = join(dir, 'trudger.yml');
  const lines = [
    'agent_command: "true"',
    'agent_review_command: "true"',
    'review_loop_limit: 1',
    `log_path: ${JSON.stringify(logPath)}`,
    'commands:',
    `  next_task: ${JSON.stringify(options.nextTask ?? 'exit 1')}`,
    '  task_show: "true"',
    '  task_status: echo ready',
    '  task_update_status: "true"',
    'hooks:',
    '  on_completed: "true"',
    '  on_requires_human: "true"',
  ];
  if (options.notify !== undefined) {
    lines.push(`  on_notification: ${JSON.stringify(options.notify)}`, '  on_notification_scope: run_boundaries');
  }
  await writeFile(configPath, `${lines.join('\n')}\n`, 'utf-8');
  const promptPaths = { solve: join(dir, 'trudge.md'), review: join(dir, 'trudge_review.md') };
  await writeFile(promptPaths.solve, 'Solve the task.\n', 'utf-8');
  await writeFile(promptPaths.review, 'Review the task.\n', 'utf-8');
  return { configPath, logPath, promptPaths };
}

describe('runCommand', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'trudger-run-test-'));
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  it('rejects an empty -t segment before reading the config', async () => {
    const code = await runCommand({ config: join(testDir, 'missing.yml'), task: ['tr-1,,tr-2'] });

    expect(code).toBe(1);
    expect(console.error).toHaveBeenCalledWith('Invalid -t/--task value: empty segment in "tr-1,,tr-2" at index 1.');
  });

  it('exits 1 when the config file is missing', async () => {
    const path = join(testDir, 'missing.yml');

    const code = await runCommand({ config: path, task: [] });

    expect(code).toBe(1);
    expect(console.error).toHaveBeenCalledWith(`Configuration error: Config file not found: ${path}.`);
  });

  it('exits 1 when a prompt file is missing', async () => {
    const { configPath, promptPaths } = await writeFixtures(testDir);
    await rm(promptPaths.review);

    const code = await runCommand({ config: configPath, task: [], promptPaths });

    expect(code).toBe(1);
    expect(console.error).toHaveBeenCalledWith(`Missing prompt file: ${promptPaths.review}`);
  });

  it('exits 0 when the tracker has nothing to do', async () => {
    const { configPath, logPath, promptPaths } = await writeFixtures(testDir);

    const code = await runCommand({ config: configPath, task: [], promptPaths });

    expect(code).toBe(0);
    const messages = (await readFile(logPath, 'utf-8'))
      .trimEnd()
      .split('\n')
      .map((line) => line.slice(line.indexOf(' ') + 1));
    expect(messages.slice(-2)).toEqual(['idle next_task_exit=1', 'quit reason=no_next_task']);
    expect(console.log).toHaveBeenCalledWith('Reason: no_next_task');
  });
});

describe('runCommand signal handling', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'trudger-signal-test-'));
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  it('records the quit and dispatches run_end with 130 on a second signal', async () => {
    const startedPath = join(testDir, 'started');
    const notifyPath = join(testDir, 'notifications');
    const { configPath, logPath, promptPaths } = await writeFixtures(testDir, {
      nextTask: `: > '${startedPath}'; sleep 2; exit 1`,
      notify: `printf '%s:%s\\n' "$TRUDGER_NOTIFY_EVENT" "\${TRUDGER_NOTIFY_EXIT_CODE-}" >> '${notifyPath}'`,
    });
    const exit = vi.fn();

    const pending = runCommand({ config: configPath, task: [], promptPaths, exit });
    await vi.waitFor(() => expect(existsSync(startedPath)).toBe(true), { timeout: 5000, interval: 20 });
    process.emit('SIGINT');
    process.emit('SIGINT');
    await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(130), { timeout: 5000, interval: 20 });

    const notifications = (await readFile(notifyPath, 'utf-8')).trimEnd().split('\n');
    expect(notifications.slice(0, 2)).toEqual(['run_start:', 'run_end:130']);
    const messages = (await readFile(logPath, 'utf-8'))
      .trimEnd()
      .split('\n')
      .map((line) => line.slice(line.indexOf(' ') + 1));
    expect(messages).toContain('quit reason=interrupted');

    // The stubbed exit lets the loop finish once next_task returns.
    await pending;
  });
});

describe('doctorCommand', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('rejects -t/--task', async () => {
    await expect(doctorCommand({ task: ['tr-1'] })).resolves.toBe(1);
    expect(console.error).toHaveBeenCalledWith('-t/--task is not supported in doctor mode.');
  });
});
