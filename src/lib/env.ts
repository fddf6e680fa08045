/**
 * Environment assembly for spawned commands.
 *
 * Task and run context reaches commands only through TRUDGER_* variables.
 * Oversized values make execve fail with E2BIG, so every value is capped
 * per key and the whole TRUDGER_* block is capped in aggregate.
 */

import type { TaskId } from '../types/task.js';

/** Per-value cap in UTF-8 bytes */
export const ENV_VALUE_MAX_BYTES = 64 * 1024;

/** Cap for the sum of all `KEY=VALUE\0` entries set by trudger */
export const ENV_TOTAL_MAX_BYTES = 128 * 1024;

/**
 * Every variable trudger manages. Keys not set for an invocation are
 * removed from the inherited environment so no context leaks between
 * commands.
 */
export const TRUDGER_ENV_KEYS = [
  'TRUDGER_CONFIG_PATH',
  'TRUDGER_DOCTOR_SCRATCH_DIR',
  'TRUDGER_TASK_ID',
  'TRUDGER_TASK_SHOW',
  'TRUDGER_TASK_STATUS',
  'TRUDGER_TARGET_STATUS',
  'TRUDGER_PROMPT',
  'TRUDGER_REVIEW_PROMPT',
  'TRUDGER_COMPLETED',
  'TRUDGER_NEEDS_HUMAN',
  'TRUDGER_NOTIFY_EVENT',
  'TRUDGER_NOTIFY_DURATION_MS',
  'TRUDGER_NOTIFY_FOLDER',
  'TRUDGER_NOTIFY_EXIT_CODE',
  'TRUDGER_NOTIFY_TASK_ID',
  'TRUDGER_NOTIFY_TASK_DESCRIPTION',
  'TRUDGER_NOTIFY_MESSAGE',
  'TRUDGER_NOTIFY_PAYLOAD_PATH',
] as const;

export type TrudgerEnvKey = (typeof TRUDGER_ENV_KEYS)[number];

/**
 * Context values for one invocation. TRUDGER_CONFIG_PATH is always set;
 * an undefined key is absent from the child environment. TRUDGER_TASK_ID
 * only takes a validated TaskId.
 */
export type CommandEnv = { TRUDGER_CONFIG_PATH: string; TRUDGER_TASK_ID?: TaskId } & Partial<
  Record<Exclude<TrudgerEnvKey, 'TRUDGER_CONFIG_PATH' | 'TRUDGER_TASK_ID'>, string>
>;

/** Large, least critical payloads, in the order they give up bytes. */
const REDUCIBLE_KEYS: readonly TrudgerEnvKey[] = [
  'TRUDGER_TASK_SHOW',
  'TRUDGER_PROMPT',
  'TRUDGER_REVIEW_PROMPT',
];

/**
 * Result of truncating a string to a UTF-8 byte budget.
 */
export interface Utf8Truncation {
  value: string;
  originalBytes: number;
  truncatedBytes: number;
}

/**
 * Truncates `value` to at most `maxBytes` UTF-8 bytes, cutting at the
 * nearest character boundary at or below the limit.
 *
 * @example
 * ```typescript
 * truncateUtf8('héllo', 2).value; // 'h'
 * ```
 */
export function truncateUtf8(value: string, maxBytes: number): Utf8Truncation {
  const bytes = Buffer.from(value, 'utf8');
  if (bytes.length <= maxBytes) {
    return { value, originalBytes: bytes.length, truncatedBytes: bytes.length };
  }

  let cut = Math.max(0, maxBytes);
  // 10xxxxxx is a continuation byte: cutting before it would split a character.
  while (cut > 0 && (bytes[cut] & 0xc0) === 0x80) {
    cut--;
  }

  return {
    value: bytes.subarray(0, cut).toString('utf8'),
    originalBytes: bytes.length,
    truncatedBytes: cut,
  };
}

/**
 * One variable that was cut to fit.
 */
export interface EnvTruncation {
  key: TrudgerEnvKey;
  originalBytes: number;
  truncatedBytes: number;
}

/**
 * One variable that had NUL bytes removed; execve cannot carry them.
 */
export interface EnvNulStrip {
  key: TrudgerEnvKey;
  removed: number;
}

/**
 * Outcome of assembling the TRUDGER_* block for one invocation.
 */
export interface EnvAssembly {
  /** Final values, only for keys that are set */
  values: Partial<Record<TrudgerEnvKey, string>>;
  /** Keys whose values contained NUL bytes, in TRUDGER_ENV_KEYS order */
  nulStripped: EnvNulStrip[];
  /** Per-key truncations, in TRUDGER_ENV_KEYS order */
  truncations: EnvTruncation[];
  /** Set when the aggregate cap forced extra truncation */
  total: { originalBytes: number; truncatedBytes: number } | null;
}

/**
 * Size limits, injectable for tests.
 */
export interface EnvLimits {
  valueMaxBytes: number;
  totalMaxBytes: number;
}

export const DEFAULT_ENV_LIMITS: EnvLimits = {
  valueMaxBytes: ENV_VALUE_MAX_BYTES,
  totalMaxBytes: ENV_TOTAL_MAX_BYTES,
};

function entryBytes(key: string, value: string | undefined, maxBytes: number): number {
  if (value === undefined) {
    return 0;
  }
  // Approximates execve accounting for "KEY=VALUE\0".
  return key.length + 1 + truncateUtf8(value, maxBytes).truncatedBytes + 1;
}

type EnvValues = Partial<Record<TrudgerEnvKey, string>>;

function payloadBytes(env: EnvValues, maxima: Map<TrudgerEnvKey, number>, fallback: number): number {
  let total = 0;
  for (const key of TRUDGER_ENV_KEYS) {
    total += entryBytes(key, env[key], maxima.get(key) ?? fallback);
  }
  return total;
}

/**
 * Applies the per-value and aggregate caps to a command environment.
 */
export function assembleEnv(input: CommandEnv, limits: EnvLimits = DEFAULT_ENV_LIMITS): EnvAssembly {
  const env: EnvValues = {};
  const nulStripped: EnvNulStrip[] = [];
  for (const key of TRUDGER_ENV_KEYS) {
    const value = input[key];
    if (value === undefined) {
      continue;
    }
    const cleaned = value.replace(/\0/g, '');
    if (cleaned.length !== value.length) {
      nulStripped.push({ key, removed: value.length - cleaned.length });
    }
    env[key] = cleaned;
  }

  const maxima = new Map<TrudgerEnvKey, number>();
  const total = payloadBytes(env, maxima, limits.valueMaxBytes);
  let totalResult: EnvAssembly['total'] = null;

  if (total > limits.totalMaxBytes) {
    let over = total - limits.totalMaxBytes;
    for (const key of REDUCIBLE_KEYS) {
      const value = env[key];
      if (over === 0 || value === undefined) {
        continue;
      }
      const max = maxima.get(key) ?? limits.valueMaxBytes;
      const current = truncateUtf8(value, max).truncatedBytes;
      if (current === 0) {
        continue;
      }
      maxima.set(key, Math.min(max, Math.max(0, current - over)));
      const reduced = current - truncateUtf8(value, maxima.get(key) ?? max).truncatedBytes;
      over = Math.max(0, over - reduced);
    }

    const newTotal = payloadBytes(env, maxima, limits.valueMaxBytes);
    if (newTotal < total) {
      totalResult = { originalBytes: total, truncatedBytes: newTotal };
    }
  }

  const values: EnvValues = {};
  const truncations: EnvTruncation[] = [];
  for (const key of TRUDGER_ENV_KEYS) {
    const value = env[key];
    if (value === undefined) {
      continue;
    }
    const result = truncateUtf8(value, maxima.get(key) ?? limits.valueMaxBytes);
    if (result.truncatedBytes !== result.originalBytes) {
      truncations.push({
        key,
        originalBytes: result.originalBytes,
        truncatedBytes: result.truncatedBytes,
      });
    }
    values[key] = result.value;
  }

  return { values, nulStripped, truncations, total: totalResult };
}

/**
 * Builds the child environment: the inherited environment with every
 * managed key removed, plus the assembled values.
 */
export function buildChildEnv(
  base: NodeJS.ProcessEnv,
  values: Partial<Record<TrudgerEnvKey, string>>
): NodeJS.ProcessEnv {
  const managed = new Set<string>(TRUDGER_ENV_KEYS);
  const child: NodeJS.ProcessEnv = {};
  for (const [key, value] of Object.entries(base)) {
    if (!managed.has(key) && value !== undefined) {
      child[key] = value;
    }
  }
  return { ...child, ...values };
}
