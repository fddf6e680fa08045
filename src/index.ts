#!/usr/bin/env node

import { Command } from "commander";
import { doctorCommand } from "./commands/doctor.js";
import { runCommand } from "./commands/run.js";

interface GlobalOptions {
  config?: string;
  task: string[];
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const program = new Command();

program
  .name("trudger")
  .description("Drive tracker tasks through an agent solve/review loop")
  .version("0.1.0")
  .option("-c, --config <path>", "Path to configuration file (default: ~/.config/trudger.yml)")
  .option("-t, --task <ids>", "Task id(s) to process first; repeatable, comma-separated", collect, [])
  .argument("[args...]")
  .action(async (args: string[]) => {
    if (args.length > 0) {
      console.error(
        `Positional arguments are not supported (got: ${args.join(" ")}). Pass task ids with -t/--task <id>[,<id>...].`
      );
      process.exit(1);
    }
    process.exitCode = (await runCommand(program.opts<GlobalOptions>())) & 0xff;
  });

program
  .command("doctor")
  .description("Check the tracker integration in a scratch directory")
  .action(async () => {
    process.exitCode = await doctorCommand(program.opts<GlobalOptions>());
  });

export async function main(): Promise<void> {
  await program.parseAsync(process.argv);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
