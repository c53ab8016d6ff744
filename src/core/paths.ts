import os from "node:os";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  snapjobsHome: string;
};

export type ResolveSnapjobsHomeOptions = {
  snapjobsHome?: string;
  env?: NodeJS.ProcessEnv;
};

// =============================================================================
// CONTEXT
// =============================================================================

export function resolveSnapjobsHome(opts: ResolveSnapjobsHomeOptions = {}): string {
  if (opts.snapjobsHome) {
    return path.resolve(opts.snapjobsHome);
  }

  const env = opts.env ?? process.env;
  if (env.SNAPJOBS_HOME) {
    return path.resolve(env.SNAPJOBS_HOME);
  }

  return path.join(os.homedir(), ".snapjobs");
}

export function createPathsContext(opts: ResolveSnapjobsHomeOptions = {}): PathsContext {
  return { snapjobsHome: resolveSnapjobsHome(opts) };
}

// =============================================================================
// PATH HELPERS
// =============================================================================

export function logsBaseDir(projectName: string, paths?: PathsContext): string {
  const home = paths?.snapjobsHome ?? resolveSnapjobsHome();
  return path.join(home, "logs", projectName);
}

export function batchLogsDir(projectName: string, batchId: string, paths?: PathsContext): string {
  return path.join(logsBaseDir(projectName, paths), `batch-${batchId}`);
}

export function launcherLogPath(projectName: string, batchId: string, paths?: PathsContext): string {
  return path.join(batchLogsDir(projectName, batchId, paths), "launcher.jsonl");
}

export function jobLogPath(
  projectName: string,
  batchId: string,
  jobId: string,
  paths?: PathsContext,
): string {
  return path.join(batchLogsDir(projectName, batchId, paths), "jobs", `${jobId}.log`);
}

// Views default to the originating tree's parent so they share its filesystem.
export function defaultViewBaseDir(treeRoot: string): string {
  return path.dirname(path.resolve(treeRoot));
}

export const VIEW_MARKER_FILE = "snapjobs-view.json";
export const VIEW_CHECKOUT_DIR = "code";

export function viewMarkerPath(viewRootDir: string): string {
  return path.join(viewRootDir, VIEW_MARKER_FILE);
}

export function viewCheckoutPath(viewRootDir: string): string {
  return path.join(viewRootDir, VIEW_CHECKOUT_DIR);
}
