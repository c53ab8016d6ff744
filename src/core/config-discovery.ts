import fs from "node:fs";
import path from "node:path";

import { findRepoRoot } from "../git/repo-locator.js";

import { defaultConfig, type SnapjobsConfig } from "./config.js";
import { loadConfigFile } from "./config-loader.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

// =============================================================================
// CONSTANTS
// =============================================================================

export const REPO_CONFIG_FILE = "snapjobs.yaml";

// =============================================================================
// TYPES
// =============================================================================

export type ConfigSource = "explicit" | "repo" | "defaults";

export type ConfigResolution = {
  config: SnapjobsConfig;
  configPath: string | null;
  source: ConfigSource;
  repoRoot: string | null;
};

export type InitResult = {
  repoRoot: string;
  configPath: string;
  status: "created" | "exists" | "overwritten";
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function resolveConfig(args: {
  explicitPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}): ConfigResolution {
  const cwd = args.cwd ?? process.cwd();
  const repoRoot = findRepoRoot(cwd);

  if (args.explicitPath) {
    const configPath = path.resolve(cwd, args.explicitPath);
    return {
      config: loadConfigFile(configPath, { env: args.env }),
      configPath,
      source: "explicit",
      repoRoot,
    };
  }

  if (repoRoot) {
    const configPath = repoConfigPath(repoRoot);
    if (fs.existsSync(configPath)) {
      return {
        config: loadConfigFile(configPath, { env: args.env }),
        configPath,
        source: "repo",
        repoRoot,
      };
    }
  }

  return { config: defaultConfig(), configPath: null, source: "defaults", repoRoot };
}

export function initRepoConfig(args: { cwd?: string; force?: boolean }): InitResult {
  const cwd = args.cwd ?? process.cwd();
  const repoRoot = findRepoRoot(cwd);
  if (!repoRoot) {
    throw createMissingRepoError(cwd);
  }

  const configPath = repoConfigPath(repoRoot);
  const hasConfig = fs.existsSync(configPath);
  const force = args.force ?? false;

  if (hasConfig && !force) {
    return { repoRoot, configPath, status: "exists" };
  }

  fs.writeFileSync(configPath, defaultRepoConfigYaml(), "utf8");

  const status = hasConfig && force ? "overwritten" : "created";
  return { repoRoot, configPath, status };
}

export function repoConfigPath(repoRoot: string): string {
  return path.join(repoRoot, REPO_CONFIG_FILE);
}

// =============================================================================
// INTERNALS
// =============================================================================

function createMissingRepoError(cwd: string): UserFacingError {
  const resolvedCwd = path.resolve(cwd);
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Repository not found.",
    message: `No git repository found in ${resolvedCwd} or its parent directories.`,
    hint: "Run this command inside a git repo (or run `git init` first).",
  });
}

function defaultRepoConfigYaml(): string {
  return [
    "# snapjobs configuration (repo-scoped)",
    "#",
    "# Loaded from <repo>/snapjobs.yaml, or from --config <path>.",
    "# Env vars like ${HOME} are expanded; unset vars are an error.",
    "",
    "snapshot:",
    "  # Capture the working tree into a revision branch and run each job in its own checkout.",
    "  enabled: false",
    "  branch_prefix: slurm-job",
    "",
    "  # Sub-paths linked back to this tree so outputs land in one place.",
    "  symlink_paths:",
    "    - outputs",
    "    - multirun",
    "    - .submitit",
    "",
    "  # Pushing lets other machines fetch the revision. Failure only warns.",
    "  push_to_remote: true",
    "  remote: origin",
    "",
    "  # Where job views are created (relative to this file). Default: the repo's parent dir.",
    "  # worktree_dir: ../snapjobs-views",
    "",
    "  # worktree | clone",
    "  checkout: worktree",
    "",
    "  # What to do when isolation cannot be set up: live runs against this tree.",
    "  on_snapshot_failure: live   # live | abort",
    "  on_isolation_failure: live  # live | fail",
    "",
    "  # explicit: jobs get their directory passed in. ambient: the process chdirs (one job at a time).",
    "  context_mode: explicit",
    "",
    "launcher:",
    "  backend: local  # local | slurm",
    "  max_parallel: 4",
    "  slurm:",
    "    # partition: gpu",
    "    # time_minutes: 60",
    "    extra_args: []",
    "",
  ].join("\n");
}
