import { Command, Option } from "commander";

import { cleanCommand } from "./clean.js";
import { loadConfigForCli, type GlobalCliOptions } from "./config.js";
import { initCommand } from "./init.js";
import { revisionsCommand } from "./revisions.js";
import { runCommand } from "./run.js";
import { snapshotCommand } from "./snapshot.js";

export function buildCli(): Command {
  const program = new Command();

  const resolveConfig = (command: Command) => {
    const globals = command.optsWithGlobals() as GlobalCliOptions;
    const { config, configPath, source } = loadConfigForCli({
      explicitConfigPath: globals.config,
    });
    if (globals.debug) {
      console.error(`Config: ${configPath ?? "(defaults)"} [${source}]`);
    }
    return config;
  };

  program
    .name("snapjobs")
    .description("Run batch jobs against snapshots of a git working tree")
    .version("0.1.0")
    .option("--config <path>", "Config file (defaults to <repo>/snapjobs.yaml)")
    .option("--debug", "Show error details and stack traces", false);

  program
    .command("init")
    .description("Write a default snapjobs.yaml at the repo root")
    .option("--force", "Overwrite existing repo config", false)
    .action(async (opts) => {
      await initCommand({ force: opts.force });
    });

  program
    .command("run")
    .description("Run jobs, each in its own checkout of one snapshot of the working tree")
    .argument("<command...>", "Command to run; put it after --")
    .option("--jobs <n>", "Number of identical jobs", (v: string) => parseInt(v, 10))
    .option(
      "--each <value>",
      "One job per value; {} in the command is replaced by the value (repeatable)",
      collect,
      [],
    )
    .option("--snapshot", "Force snapshot isolation on")
    .option("--no-snapshot", "Run against the live working tree")
    .option("--max-parallel <n>", "Max jobs running at once", (v: string) => parseInt(v, 10))
    .addOption(new Option("--backend <name>", "Execution backend").choices(["local", "slurm"]))
    .action(async (command: string[], opts, cmd: Command) => {
      const config = resolveConfig(cmd);
      await runCommand(config, {
        command,
        jobs: opts.jobs,
        each: opts.each,
        snapshot: opts.snapshot,
        maxParallel: opts.maxParallel,
        backend: opts.backend,
      });
    });

  program
    .command("snapshot")
    .description("Capture the working tree into a new revision branch")
    .option("--prefix <prefix>", "Revision name prefix (default: snapshot.branch_prefix)")
    .option("--no-push", "Do not push the revision branch")
    .action(async (opts, cmd: Command) => {
      const config = resolveConfig(cmd);
      await snapshotCommand(config, {
        prefix: opts.prefix,
        push: opts.push === false ? false : undefined,
      });
    });

  program
    .command("revisions")
    .description("List revision branches of this repository")
    .option("--prefix <prefix>", "Revision name prefix (default: snapshot.branch_prefix)")
    .option("--json", "Emit JSON output", false)
    .action(async (opts, cmd: Command) => {
      const config = resolveConfig(cmd);
      await revisionsCommand(config, { prefix: opts.prefix, json: opts.json });
    });

  program
    .command("clean")
    .description("Remove job views left behind by interrupted batches")
    .option("--base-dir <dir>", "Directory holding the views (default: snapshot.worktree_dir)")
    .option("--dry-run", "Show what would be removed", false)
    .option("--force", "Skip confirmation", false)
    .action(async (opts, cmd: Command) => {
      const config = resolveConfig(cmd);
      await cleanCommand(config, {
        baseDir: opts.baseDir,
        dryRun: opts.dryRun,
        force: opts.force,
      });
    });

  return program;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}
