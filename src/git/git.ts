import { execa, type Options } from "execa";

import { GitError } from "../core/errors.js";

export type GitResult = { stdout: string; stderr: string; exitCode: number };

export async function git(cwd: string, args: string[], opts: Options = {}): Promise<GitResult> {
  try {
    const res = await execa("git", args, {
      cwd,
      stdio: "pipe",
      env: process.env,
      ...opts,
    });
    return {
      stdout: outputToString(res.stdout),
      stderr: outputToString(res.stderr),
      exitCode: res.exitCode ?? -1,
    };
  } catch (err) {
    throw buildGitError(args, cwd, err);
  }
}

// Runs git without throwing on a non-zero exit; callers interpret the exit code.
export async function gitUnchecked(cwd: string, args: string[]): Promise<GitResult> {
  const res = await execa("git", args, { cwd, stdio: "pipe", reject: false });
  return {
    stdout: outputToString(res.stdout),
    stderr: outputToString(res.stderr),
    exitCode: res.exitCode ?? -1,
  };
}

export async function currentBranch(cwd: string): Promise<string> {
  const res = await git(cwd, ["rev-parse", "--abbrev-ref", "HEAD"]);
  return res.stdout.trim();
}

export async function headSha(cwd: string): Promise<string> {
  const res = await git(cwd, ["rev-parse", "HEAD"]);
  return res.stdout.trim();
}

export async function branchExists(cwd: string, branch: string): Promise<boolean> {
  const res = await gitUnchecked(cwd, ["rev-parse", "--verify", "--quiet", `refs/heads/${branch}`]);
  return res.exitCode === 0;
}

export async function deleteLocalBranch(cwd: string, branch: string): Promise<void> {
  await git(cwd, ["branch", "-D", branch]);
}

export async function getConfigValue(cwd: string, key: string): Promise<string | null> {
  const res = await gitUnchecked(cwd, ["config", "--get", key]);
  const value = res.stdout.trim();
  return res.exitCode === 0 && value.length > 0 ? value : null;
}

// Tracked plus untracked files, honouring .gitignore, info/exclude and core.excludesFile.
export async function listWorkingTreeFiles(cwd: string): Promise<string[]> {
  const res = await git(cwd, ["ls-files", "--cached", "--others", "--exclude-standard", "-z"]);
  return splitNulList(res.stdout);
}

export async function listTrackedFiles(cwd: string): Promise<string[]> {
  const res = await git(cwd, ["ls-files", "-z"]);
  return splitNulList(res.stdout);
}

export async function hasStagedChanges(cwd: string): Promise<boolean> {
  const res = await gitUnchecked(cwd, ["diff", "--cached", "--quiet"]);
  if (res.exitCode === 0) return false;
  if (res.exitCode === 1) return true;

  throw new GitError(`git diff --cached --quiet failed (cwd=${cwd}): ${res.stderr}`, {
    stdout: res.stdout,
    stderr: res.stderr,
  });
}

const FALLBACK_IDENTITY = { name: "snapjobs", email: "snapjobs@localhost" };

export async function commitAll(cwd: string, message: string): Promise<void> {
  const [name, email] = await Promise.all([
    getConfigValue(cwd, "user.name"),
    getConfigValue(cwd, "user.email"),
  ]);

  const identity = [
    ...(name ? [] : ["-c", `user.name=${FALLBACK_IDENTITY.name}`]),
    ...(email ? [] : ["-c", `user.email=${FALLBACK_IDENTITY.email}`]),
  ];

  await git(cwd, [...identity, "commit", "--no-verify", "-m", message]);
}

export async function pushBranch(cwd: string, remote: string, branch: string): Promise<void> {
  await git(cwd, ["push", "-u", remote, branch]);
}

export type BranchSummary = {
  name: string;
  sha: string;
  createdAt: string;
};

export async function listBranches(cwd: string, prefix: string): Promise<BranchSummary[]> {
  const res = await git(cwd, [
    "for-each-ref",
    "--sort=creatordate",
    "--format=%(refname:short)%09%(objectname)%09%(creatordate:iso-strict)",
    `refs/heads/${prefix}*`,
  ]);

  return res.stdout
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => {
      const [name = "", sha = "", createdAt = ""] = line.split("\t");
      return { name, sha, createdAt };
    });
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

export function buildGitError(args: string[], cwd: string | undefined, err: unknown): GitError {
  const { stdout, stderr, message } = resolveExecaErrorOutput(err);
  const detail = stderr || message || "Unknown git error.";
  const location = cwd ? ` (cwd=${cwd})` : "";
  return new GitError(`git ${args.join(" ")} failed${location}: ${detail}`, { stdout, stderr });
}

export function gitErrorOutput(err: unknown): { stdout: string; stderr: string } {
  if (!(err instanceof GitError)) return { stdout: "", stderr: "" };
  const { stdout, stderr } = resolveExecaErrorOutput(err.cause);
  return { stdout, stderr };
}

function resolveExecaErrorOutput(err: unknown): {
  stdout: string;
  stderr: string;
  message: string;
} {
  if (!err || typeof err !== "object") {
    return { stdout: "", stderr: "", message: err === undefined ? "" : String(err) };
  }

  const record = err as Record<string, unknown>;
  const stdout = outputToString(record.stdout);
  const stderr = outputToString(record.stderr);
  const message = typeof record.message === "string" ? record.message : "";

  return { stdout, stderr, message };
}

function outputToString(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined || value === null) return "";
  if (value instanceof Uint8Array) return Buffer.from(value).toString("utf8");
  if (Array.isArray(value)) return value.map((item) => outputToString(item)).join("\n");
  return String(value);
}

function splitNulList(output: string): string[] {
  const seen = new Set<string>();
  for (const entry of output.split("\0")) {
    if (entry.length > 0) seen.add(entry);
  }
  return [...seen];
}
