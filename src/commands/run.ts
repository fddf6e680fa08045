import { resolve } from 'node:path';
import { CommandRunner } from '../lib/command.js';
import { ConfigError, defaultConfigPath, loadConfig } from '../lib/config.js';
import { NotificationDispatcher } from '../lib/notify.js';
import { loadPrompts, PromptError, type PromptPaths } from '../lib/prompts.js';
import { ManualTaskError, parseManualTasks } from '../lib/task_id.js';
import { TransitionLog } from '../lib/transition_log.js';
import { runLoop } from '../runner/loop.js';
import { INTERRUPT_EXIT_CODE, parseSkipLimit } from '../runner/selector.js';
import { DEFAULT_NOTIFICATION_SCOPE, type TrudgerConfig } from '../types/config.js';
import type { AgentPrompts } from '../types/run.js';
import type { TaskId } from '../types/task.js';

export interface RunCommandOptions {
  /** -c/--config; the default path is used when unset */
  config?: string;
  /** Raw -t/--task values */
  task: string[];
  /** Overrides the prompt locations (tests) */
  promptPaths?: PromptPaths;
  /** Ends the process after a second signal (default: process.exit) */
  exit?: (code: number) => void;
}

export interface LoadedConfig {
  config: TrudgerConfig;
  /** Absolute path, exported as TRUDGER_CONFIG_PATH */
  configPath: string;
}

/**
 * Resolves and loads the config. Shared by run and doctor modes.
 */
export async function resolveConfig(configOption: string | undefined): Promise<LoadedConfig> {
  const configPath = resolve(configOption ?? defaultConfigPath());
  const config = await loadConfig(configPath, configOption === undefined);
  return { config, configPath };
}

/**
 * Runs the task loop and returns the process exit code.
 */
export async function runCommand(options: RunCommandOptions): Promise<number> {
  let manualTasks: TaskId[];
  try {
    manualTasks = parseManualTasks(options.task);
  } catch (error) {
    if (error instanceof ManualTaskError) {
      console.error(error.message);
      return 1;
    }
    throw error;
  }

  let loaded: LoadedConfig;
  let prompts: AgentPrompts;
  try {
    loaded = await resolveConfig(options.config);
    prompts = await loadPrompts(options.promptPaths);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Configuration error: ${error.message}`);
      return 1;
    }
    if (error instanceof PromptError) {
      console.error(error.message);
      return 1;
    }
    throw error;
  }
  const { config, configPath } = loaded;

  const log = new TransitionLog({ path: config.log_path });
  const runner = new CommandRunner({ log });
  const dispatcher = new NotificationDispatcher({
    hook: config.hooks.on_notification,
    scope: config.hooks.on_notification_scope ?? DEFAULT_NOTIFICATION_SCOPE,
    runner,
    log,
    configPath,
    folder: process.cwd(),
  });
  dispatcher.attach();

  // First signal stops at the next step boundary; a second one records the
  // quit, attempts run_end and exits without waiting for the current command.
  const abortController = new AbortController();
  const exit = options.exit ?? ((code: number) => process.exit(code));
  let signalCount = 0;
  const forceExit = async (): Promise<void> => {
    try {
      await log.record('quit', { reason: 'interrupted' });
      await dispatcher.onRunBoundary('run_end', INTERRUPT_EXIT_CODE);
    } finally {
      exit(INTERRUPT_EXIT_CODE);
    }
  };
  const signalHandler = (signal: string) => {
    signalCount++;
    if (signalCount === 1) {
      console.log(`\n${signal} received, stopping after the current command...`);
      abortController.abort();
    } else if (signalCount === 2) {
      console.log('\nForce exit');
      forceExit().catch((error: unknown) => {
        console.error(`Failed to report the interrupted run: ${error instanceof Error ? error.message : String(error)}`);
      });
    }
  };
  const sigintHandler = () => signalHandler('SIGINT');
  const sigtermHandler = () => signalHandler('SIGTERM');
  process.on('SIGINT', sigintHandler);
  process.on('SIGTERM', sigtermHandler);

  try {
    const summary = await runLoop({
      config,
      configPath,
      runner,
      log,
      dispatcher,
      prompts,
      manualTasks,
      skipLimit: parseSkipLimit(process.env.TRUDGER_SKIP_NOT_READY_LIMIT),
      signal: abortController.signal,
    });

    console.log('\n--- Run Complete ---');
    console.log(`Reason: ${summary.reason}`);
    console.log(`Completed: ${summary.completed.join(',') || '(none)'}`);
    console.log(`Needs human: ${summary.needsHuman.join(',') || '(none)'}`);
    return summary.exitCode;
  } finally {
    process.off('SIGINT', sigintHandler);
    process.off('SIGTERM', sigtermHandler);
  }
}
