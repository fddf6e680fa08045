import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { escapeLogValue, formatTimestamp, renderTransition, TransitionLog } from '@/lib/transition_log.js';
import type { Transition } from '@/types/transition.js';

const fixedNow = () => new Date('2024-01-02T03:04:05.678Z');

describe('escapeLogValue', () => {
  it('escapes newline, carriage return and tab', () => {
    expect(escapeLogValue('a\nb\rc\td')).toBe('a\\nb\\rc\\td');
  });
});

describe('formatTimestamp', () => {
  it('uses second precision UTC', () => {
    expect(formatTimestamp(fixedNow())).toBe('2024-01-02T03:04:05Z');
  });
});

describe('renderTransition', () => {
  it('renders fields in insertion order', () => {
    expect(renderTransition('cmd exit', { label: 'task_show', task: 'tr-1', exit: 0 })).toBe(
      'cmd exit label=task_show task=tr-1 exit=0'
    );
  });
});

describe('TransitionLog', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'trudger-log-test-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  it('appends exactly one line per record with escaped values', async () => {
    const path = join(testDir, 'trudger.log');
    const log = new TransitionLog({ path, now: fixedNow });

    await log.record('cmd start', { command: 'echo "a\nb"', args: '' });
    await log.record('quit', { reason: 'no_task' });

    const content = await readFile(path, 'utf-8');
    expect(content).toBe(
      '2024-01-02T03:04:05Z cmd start command=echo "a\\nb" args=\n' +
        '2024-01-02T03:04:05Z quit reason=no_task\n'
    );
  });

  it('forwards loop transitions to subscribers without a sink', async () => {
    const log = new TransitionLog({ now: fixedNow });
    const seen: Transition[] = [];
    log.subscribe(async (transition) => {
      seen.push(transition);
    });

    await log.record('state=SOLVING', { task: 'tr-1', loop: 0 });

    expect(seen).toHaveLength(1);
    expect(seen[0]).toEqual({
      timestamp: '2024-01-02T03:04:05Z',
      message: 'state=SOLVING',
      fields: { task: 'tr-1', loop: 0 },
      origin: 'loop',
    });
  });

  it('writes but never forwards notification transitions', async () => {
    const path = join(testDir, 'trudger.log');
    const log = new TransitionLog({ path, now: fixedNow });
    const listener = vi.fn(async () => undefined);
    log.subscribe(listener);

    await log.record('notification_hook_failed', { event: 'log', task: 'none', exit_code: 3 }, 'notification');

    expect(listener).not.toHaveBeenCalled();
    expect(await readFile(path, 'utf-8')).toBe(
      '2024-01-02T03:04:05Z notification_hook_failed event=log task=none exit_code=3\n'
    );
  });

  it('warns once and keeps running when the sink cannot be written', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const log = new TransitionLog({ path: join(testDir, 'missing', 'dir', 'trudger.log'), now: fixedNow });
    const listener = vi.fn(async () => undefined);
    log.subscribe(listener);

    await log.record('first');
    await log.record('second');

    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0])).toMatch(/^Warning: transition logging disabled log_path=/);
    expect(listener).toHaveBeenCalledTimes(2);
  });
});
