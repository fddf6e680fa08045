import { CommandRunner } from '../lib/command.js';
import { ConfigError } from '../lib/config.js';
import { formatDoctorCheck, runDoctor } from '../lib/doctor.js';
import { TransitionLog } from '../lib/transition_log.js';
import { resolveConfig, type LoadedConfig } from './run.js';

export interface DoctorCommandOptions {
  config?: string;
  task: string[];
}

/**
 * Runs `trudger doctor` and returns the process exit code.
 */
export async function doctorCommand(options: DoctorCommandOptions): Promise<number> {
  if (options.task.length > 0) {
    console.error('-t/--task is not supported in doctor mode.');
    return 1;
  }

  let loaded: LoadedConfig;
  try {
    loaded = await resolveConfig(options.config);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Configuration error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  const log = new TransitionLog({ path: loaded.config.log_path });
  const result = await runDoctor({
    config: loaded.config,
    configPath: loaded.configPath,
    runner: new CommandRunner({ log }),
  });

  for (const check of result.checks) {
    console.log(formatDoctorCheck(check));
  }
  console.log('\n--- Summary ---');
  console.log(result.ok ? 'All checks passed.' : 'Doctor found problems.');
  return result.ok ? 0 : 1;
}
