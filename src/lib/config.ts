/**
 * Configuration loading and validation.
 *
 * The config file is YAML. It is parsed with `yaml`, checked for removed
 * and unknown keys, then validated against `schemas/config.schema.json`.
 */

import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import { NOTIFICATION_SCOPES, type TrudgerConfig } from '../types/config.js';
import { loadSchema, validateWithSchema } from './schema.js';

/** JSON schema for the config file, resolved from this module. */
export const CONFIG_SCHEMA_PATH = fileURLToPath(new URL('../../schemas/config.schema.json', import.meta.url));

/**
 * Error thrown when configuration loading or validation fails.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Returns `~/.config/trudger.yml` for the current user.
 */
export function defaultConfigPath(): string {
  return join(homedir(), '.config', 'trudger.yml');
}

const KNOWN_KEYS: Record<string, readonly string[]> = {
  '': ['agent_command', 'agent_review_command', 'review_loop_limit', 'log_path', 'commands', 'hooks'],
  commands: ['next_task', 'task_show', 'task_status', 'task_update_status', 'reset_task'],
  hooks: ['on_completed', 'on_requires_human', 'on_doctor_setup', 'on_notification', 'on_notification_scope'],
};

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Lists keys not understood by this version, as dotted paths.
 */
export function findUnknownKeys(root: Record<string, unknown>): string[] {
  const unknown: string[] = [];
  for (const [section, known] of Object.entries(KNOWN_KEYS)) {
    const value = section === '' ? root : root[section];
    if (!isMapping(value)) {
      continue;
    }
    for (const key of Object.keys(value)) {
      if (!known.includes(key)) {
        unknown.push(section === '' ? key : `${section}.${key}`);
      }
    }
  }
  return unknown;
}

function isCommand(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

function isOptionalCommand(value: unknown): boolean {
  return value === undefined || isCommand(value);
}

/**
 * Structural check mirroring the schema, used to narrow the parsed
 * document once Ajv has accepted it.
 */
export function isTrudgerConfig(value: unknown): value is TrudgerConfig {
  if (!isMapping(value)) return false;
  if (!isCommand(value.agent_command) || !isCommand(value.agent_review_command)) return false;
  const limit = value.review_loop_limit;
  if (typeof limit !== 'number' || !Number.isInteger(limit) || limit < 1) return false;
  if (value.log_path !== undefined && typeof value.log_path !== 'string') return false;

  const commands = value.commands;
  if (!isMapping(commands)) return false;
  if (!isCommand(commands.next_task) || !isCommand(commands.task_show)) return false;
  if (!isCommand(commands.task_status) || !isCommand(commands.task_update_status)) return false;
  if (!isOptionalCommand(commands.reset_task)) return false;

  const hooks = value.hooks;
  if (!isMapping(hooks)) return false;
  if (!isCommand(hooks.on_completed) || !isCommand(hooks.on_requires_human)) return false;
  if (!isOptionalCommand(hooks.on_doctor_setup) || !isOptionalCommand(hooks.on_notification)) return false;
  const scope = hooks.on_notification_scope;
  return scope === undefined || NOTIFICATION_SCOPES.some((known) => known === scope);
}

/**
 * Parses and validates config text. Exposed separately from loadConfig so
 * it can be tested without touching the file system.
 *
 * @throws {ConfigError} On YAML errors, removed keys or schema violations
 */
export async function parseConfig(text: string, configPath: string): Promise<TrudgerConfig> {
  let document: unknown;
  try {
    document = YAML.parse(text);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse config ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      configPath,
      error instanceof Error ? error : undefined
    );
  }

  if (!isMapping(document)) {
    throw new ConfigError(`Invalid config ${configPath}: the document root must be a mapping.`, configPath);
  }

  if ('codex_command' in document) {
    throw new ConfigError(
      `Invalid config ${configPath}: codex_command has been removed. Use agent_command and agent_review_command instead.`,
      configPath
    );
  }

  for (const key of findUnknownKeys(document)) {
    console.warn(`Warning: Unknown config key: ${key}`);
  }

  const schema = await loadSchema(CONFIG_SCHEMA_PATH);
  const result = validateWithSchema(document, schema, isTrudgerConfig);
  if (!result.valid) {
    throw new ConfigError(
      `Invalid config ${configPath}:\n${result.errors.map((error) => `  - ${error}`).join('\n')}`,
      configPath
    );
  }
  return result.data;
}

/**
 * Loads and validates a trudger configuration file.
 *
 * @param configPath - Path to the YAML file
 * @param isDefaultPath - Whether the path came from the default location
 * @throws {ConfigError} If the file is missing, unreadable or invalid
 *
 * @example
 * ```typescript
 * const config = await loadConfig(defaultConfigPath(), true);
 * ```
 */
export async function loadConfig(configPath: string, isDefaultPath = false): Promise<TrudgerConfig> {
  let text: string;
  try {
    text = await readFile(configPath, 'utf-8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT') {
      const hint = isDefaultPath
        ? ` trudger reads ${configPath} by default; create it or pass -c/--config <path>.`
        : '';
      throw new ConfigError(`Config file not found: ${configPath}.${hint}`, configPath);
    }
    throw new ConfigError(
      `Failed to read config ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      configPath,
      error instanceof Error ? error : undefined
    );
  }
  return parseConfig(text, configPath);
}
