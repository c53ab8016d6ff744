import { stdin as input, stdout as output } from "node:process";
import { createInterface } from "node:readline/promises";

import {
  buildStaleViewPlan,
  executeStaleViewPlan,
  type StaleViewPlan,
} from "../core/cleanup.js";
import type { SnapjobsConfig } from "../core/config.js";
import { defaultViewBaseDir } from "../core/paths.js";
import { locateRepository } from "../git/repo-locator.js";

import { normalizeCommandError } from "./command-errors.js";

type CleanOptions = {
  baseDir?: string;
  force?: boolean;
  dryRun?: boolean;
  cwd?: string;
};

const CLEAN_COMMAND_PERMISSIONS_HINT = "Check file permissions of the view directories and try again.";

export async function cleanCommand(config: SnapjobsConfig, opts: CleanOptions): Promise<void> {
  try {
    const root = locateRepository(opts.cwd ?? process.cwd());
    const baseDir = opts.baseDir ?? config.snapshot.worktree_dir ?? defaultViewBaseDir(root);

    const plan = await buildStaleViewPlan(baseDir, { treeRoot: root });
    if (plan.views.length === 0) {
      console.log(`No stale views of ${root} under ${plan.baseDir}.`);
      return;
    }

    printPlan(plan);

    if (opts.dryRun) {
      console.log("Dry run only. No views were removed.");
      return;
    }

    const confirmed = await confirmCleanupOrAbort(plan, opts);
    if (!confirmed) return;

    await executeStaleViewPlan(plan, { log: (msg) => console.log(msg) });
    console.log("Cleanup complete.");
  } catch (error) {
    throw normalizeCommandError(error, "Clean command failed.", CLEAN_COMMAND_PERMISSIONS_HINT);
  }
}

function printPlan(plan: StaleViewPlan): void {
  console.log(`Stale views under ${plan.baseDir}:`);
  for (const { rootDir, marker } of plan.views) {
    console.log(`- ${marker.jobId} [${marker.strategy}, ${marker.revision}]: ${rootDir}`);
  }
}

async function confirmCleanupOrAbort(plan: StaleViewPlan, opts: CleanOptions): Promise<boolean> {
  if (opts.force ?? false) {
    return true;
  }
  const confirmed = await confirmCleanup(plan.views.length);
  if (!confirmed) {
    console.log("Cleanup cancelled.");
  }
  return confirmed;
}

async function confirmCleanup(count: number): Promise<boolean> {
  if (!input.isTTY || !output.isTTY) {
    console.log("Non-interactive session detected. Re-run with --force to skip confirmation.");
    return false;
  }

  const rl = createInterface({ input, output });
  const answer = await rl.question(`Proceed with deleting ${count} view(s)? (y/N) `);
  rl.close();

  return /^y(es)?$/i.test(answer.trim());
}
