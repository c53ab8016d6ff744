/**
 * BatchLauncher: the scheduler side of snapshot isolation.
 *
 * One revision per batch, captured before any job starts. Each job then gets
 * provision -> run -> release, with release attempted no matter how the job ended.
 * Isolation problems and task failures are reported under separate categories.
 */

import path from "node:path";

import { release } from "../../core/cleanup.js";
import type { SnapshotConfig } from "../../core/config.js";
import { formatErrorMessage } from "../../core/error-format.js";
import {
  ContextSwitchError,
  isIsolationError,
  JobCancelledError,
  SnapjobsError,
} from "../../core/errors.js";
import {
  ExecutionContextGuard,
  type ProcessDirectory,
  type TaskContext,
} from "../../core/execution-context.js";
import { provision, type IsolatedView } from "../../core/isolation.js";
import {
  JsonlLogger,
  logBatchEvent,
  logIsolationEvent,
  type EventLogger,
} from "../../core/logger.js";
import { jobLogPath, launcherLogPath, type PathsContext } from "../../core/paths.js";
import { createRevision, type RevisionRecord } from "../../core/snapshot.js";
import { defaultBatchId } from "../../core/utils.js";
import { findRepoRoot, locateRepository } from "../../git/repo-locator.js";

import type { ExecutionBackend, JobOutcome, JobSpec } from "./backends/execution-backend.js";
import { mapWithConcurrencyLimit } from "./concurrency.js";

// =============================================================================
// TYPES
// =============================================================================

export type JobStatus = "succeeded" | "failed" | "cancelled";
export type JobIsolation = "isolated" | "fallback" | "disabled";
export type FailureCategory = "task" | "isolation";

export type JobResult = {
  jobId: string;
  jobIndex: number;
  status: JobStatus;
  isolation: JobIsolation;
  workingDir?: string;
  exitCode?: number;
  value?: unknown;
  backendJobId?: string;
  error?: string;
  errorCategory?: FailureCategory;
  durationMs: number;
};

export type BatchResult = {
  batchId: string;
  treeRoot: string;
  revision: RevisionRecord | null;
  snapshotError?: string;
  jobs: JobResult[];
  succeeded: number;
  failed: number;
  cancelled: number;
  logPath?: string;
};

export type LaunchBatchOptions = {
  /** Directory inside the originating tree. */
  treeRoot: string;
  jobs: JobSpec[];
  snapshot: SnapshotConfig;
  backend: ExecutionBackend;
  maxParallel?: number;
  batchId?: string;
  signal?: AbortSignal;
  /** Events go here instead of the batch's launcher.jsonl. */
  logger?: EventLogger;
  paths?: PathsContext;
  /** Write each job's output under the batch log directory. */
  writeJobLogs?: boolean;
  processDirectory?: ProcessDirectory;
  now?: () => Date;
};

type BatchState = {
  batchId: string;
  root: string;
  projectName: string;
  revision: RevisionRecord | null;
  isolation: JobIsolation;
  guard: ExecutionContextGuard;
  logger: EventLogger;
  opts: LaunchBatchOptions;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function launchBatch(opts: LaunchBatchOptions): Promise<BatchResult> {
  assertUniqueJobIds(opts.jobs);

  const batchId = opts.batchId ?? defaultBatchId(opts.now?.());
  const root = resolveTreeRoot(opts);
  const projectName = path.basename(root);

  let ownedLogger: JsonlLogger | null = null;
  let logger: EventLogger;
  if (opts.logger) {
    logger = opts.logger;
  } else {
    ownedLogger = new JsonlLogger(launcherLogPath(projectName, batchId, opts.paths), { batchId });
    logger = ownedLogger;
  }

  try {
    logBatchEvent(logger, "batch.start", {
      tree_root: root,
      jobs: opts.jobs.length,
      snapshot_enabled: opts.snapshot.enabled,
      backend: opts.backend.name,
    });

    const { revision, snapshotError } = await prepareRevision(root, opts, logger);
    const isolation: JobIsolation = !opts.snapshot.enabled
      ? "disabled"
      : revision
        ? "isolated"
        : "fallback";

    const state: BatchState = {
      batchId,
      root,
      projectName,
      revision,
      isolation,
      guard: new ExecutionContextGuard({
        mode: opts.snapshot.context_mode,
        processDirectory: opts.processDirectory,
        logger,
      }),
      logger,
      opts,
    };

    const { results } = await mapWithConcurrencyLimit(
      opts.jobs,
      (job, index) => runJob(state, job, index),
      {
        limit: resolveParallelism(opts, logger),
        signal: opts.signal,
        onSkipped: (job, index) => skippedResult(state, job, index),
      },
    );

    const result: BatchResult = {
      batchId,
      treeRoot: root,
      revision,
      snapshotError,
      jobs: results,
      succeeded: results.filter((job) => job.status === "succeeded").length,
      failed: results.filter((job) => job.status === "failed").length,
      cancelled: results.filter((job) => job.status === "cancelled").length,
      logPath: ownedLogger?.filePath,
    };

    logBatchEvent(logger, "batch.complete", {
      revision: revision?.id ?? null,
      succeeded: result.succeeded,
      failed: result.failed,
      cancelled: result.cancelled,
    });

    return result;
  } finally {
    ownedLogger?.close();
  }
}

// =============================================================================
// REVISION
// =============================================================================

function resolveTreeRoot(opts: LaunchBatchOptions): string {
  if (opts.snapshot.enabled && opts.snapshot.on_snapshot_failure === "abort") {
    return locateRepository(opts.treeRoot);
  }
  return findRepoRoot(opts.treeRoot) ?? path.resolve(opts.treeRoot);
}

async function prepareRevision(
  root: string,
  opts: LaunchBatchOptions,
  logger: EventLogger,
): Promise<{ revision: RevisionRecord | null; snapshotError?: string }> {
  if (!opts.snapshot.enabled) return { revision: null };

  try {
    const revision = await createRevision(root, opts.snapshot.branch_prefix, {
      push: opts.snapshot.push_to_remote,
      remote: opts.snapshot.remote,
      logger,
      now: opts.now,
    });
    return { revision };
  } catch (err) {
    logIsolationEvent(logger, "snapshot_failed", err, {
      policy: opts.snapshot.on_snapshot_failure,
    });
    if (opts.snapshot.on_snapshot_failure === "abort") {
      throw err;
    }
    console.warn(
      `Warning: snapshot failed, jobs will run against the live tree: ${formatErrorMessage(err)}`,
    );
    return { revision: null, snapshotError: formatErrorMessage(err) };
  }
}

function resolveParallelism(opts: LaunchBatchOptions, logger: EventLogger): number {
  const requested = opts.maxParallel ?? 1;
  // Ambient switching changes process-wide state; only one job may hold it.
  if (opts.snapshot.context_mode === "ambient" && requested > 1) {
    logBatchEvent(logger, "batch.parallel_capped", { requested, effective: 1 });
    return 1;
  }
  return requested;
}

// =============================================================================
// JOBS
// =============================================================================

async function runJob(state: BatchState, job: JobSpec, jobIndex: number): Promise<JobResult> {
  const startedAt = Date.now();
  const { logger, opts } = state;
  const base = { jobId: job.id, jobIndex };

  if (opts.signal?.aborted) {
    return skippedResult(state, job, jobIndex);
  }
  if (!opts.backend.supports(job)) {
    const message = `Backend ${opts.backend.name} cannot run ${job.kind} job ${job.id}.`;
    logBatchEvent(logger, "job.failed", { jobId: job.id, category: "task", message });
    return {
      ...base,
      status: "failed",
      isolation: state.isolation,
      error: message,
      errorCategory: "task",
      durationMs: Date.now() - startedAt,
    };
  }

  let view: IsolatedView | null = null;
  let isolation = state.isolation;

  if (state.revision) {
    try {
      view = await provision(state.revision, job.id, {
        baseDir: opts.snapshot.worktree_dir,
        redirectPaths: opts.snapshot.symlink_paths,
        strategy: opts.snapshot.checkout,
        logger,
      });
    } catch (err) {
      logIsolationEvent(logger, "provision_failed", err, {
        jobId: job.id,
        policy: opts.snapshot.on_isolation_failure,
      });
      if (opts.snapshot.on_isolation_failure === "fail") {
        return {
          ...base,
          status: "failed",
          isolation: "fallback",
          error: formatErrorMessage(err),
          errorCategory: "isolation",
          durationMs: Date.now() - startedAt,
        };
      }
      isolation = "fallback";
    }
  }

  logBatchEvent(logger, "job.start", {
    jobId: job.id,
    job_index: jobIndex,
    isolation,
    working_dir: view?.path ?? state.root,
  });

  try {
    const execute = (context: TaskContext): Promise<JobOutcome> => dispatchJob(state, job, context);
    const outcome = view
      ? await state.guard.run(view, execute, { jobIndex, signal: opts.signal })
      : await state.guard.runIdentity(execute, {
          jobId: job.id,
          jobIndex,
          workingDir: state.root,
          signal: opts.signal,
        });

    return finishJob(state, {
      ...base,
      isolation,
      workingDir: view?.path ?? state.root,
      outcome,
      startedAt,
    });
  } catch (err) {
    return failJob(state, { ...base, isolation, error: err, startedAt });
  } finally {
    if (view) {
      await releaseView(view, logger);
    }
  }
}

async function dispatchJob(
  state: BatchState,
  job: JobSpec,
  context: TaskContext,
): Promise<JobOutcome> {
  const logPath = state.opts.writeJobLogs
    ? jobLogPath(state.projectName, state.batchId, job.id, state.opts.paths)
    : undefined;

  const handle = state.opts.backend.dispatch({ job, context, originDir: state.root, logPath });
  return await handle.result;
}

function finishJob(
  state: BatchState,
  input: {
    jobId: string;
    jobIndex: number;
    isolation: JobIsolation;
    workingDir: string;
    outcome: JobOutcome;
    startedAt: number;
  },
): JobResult {
  const { outcome } = input;
  const durationMs = Date.now() - input.startedAt;
  const common = {
    jobId: input.jobId,
    jobIndex: input.jobIndex,
    isolation: input.isolation,
    workingDir: input.workingDir,
    exitCode: outcome.exitCode,
    backendJobId: outcome.backendJobId,
    durationMs,
  };

  if (outcome.cancelled) {
    logBatchEvent(state.logger, "job.cancelled", { jobId: input.jobId });
    return { ...common, status: "cancelled" };
  }

  if (outcome.exitCode !== 0) {
    const message = `Job exited with code ${outcome.exitCode}.`;
    logBatchEvent(state.logger, "job.failed", {
      jobId: input.jobId,
      category: "task",
      exit_code: outcome.exitCode,
      message,
      stderr: outcome.stderr ?? "",
    });
    return { ...common, status: "failed", error: message, errorCategory: "task" };
  }

  logBatchEvent(state.logger, "job.succeeded", {
    jobId: input.jobId,
    duration_ms: durationMs,
  });
  return { ...common, status: "succeeded", value: outcome.value };
}

function failJob(
  state: BatchState,
  input: {
    jobId: string;
    jobIndex: number;
    isolation: JobIsolation;
    error: unknown;
    startedAt: number;
  },
): JobResult {
  const durationMs = Date.now() - input.startedAt;
  const common = { jobId: input.jobId, jobIndex: input.jobIndex, isolation: input.isolation };

  if (input.error instanceof JobCancelledError) {
    logBatchEvent(state.logger, "job.cancelled", { jobId: input.jobId });
    return { ...common, status: "cancelled", durationMs };
  }

  const message = formatErrorMessage(input.error);
  if (isIsolationError(input.error) || input.error instanceof ContextSwitchError) {
    logIsolationEvent(state.logger, "context_failed", input.error, { jobId: input.jobId });
    return { ...common, status: "failed", error: message, errorCategory: "isolation", durationMs };
  }

  logBatchEvent(state.logger, "job.failed", {
    jobId: input.jobId,
    category: "task",
    error_name: input.error instanceof Error ? input.error.name : "Error",
    message,
  });
  return { ...common, status: "failed", error: message, errorCategory: "task", durationMs };
}

function skippedResult(state: BatchState, job: JobSpec, jobIndex: number): JobResult {
  logBatchEvent(state.logger, "job.cancelled", { jobId: job.id, stage: "queued" });
  return {
    jobId: job.id,
    jobIndex,
    status: "cancelled",
    isolation: state.isolation,
    durationMs: 0,
  };
}

// Release problems are reported but never change the job's outcome.
async function releaseView(view: IsolatedView, logger: EventLogger): Promise<void> {
  try {
    await release(view, { logger });
  } catch (err) {
    logIsolationEvent(logger, "cleanup_failed", err, { jobId: view.jobId, path: view.rootDir });
    console.warn(`Warning: ${formatErrorMessage(err)}`);
  }
}

function assertUniqueJobIds(jobs: JobSpec[]): void {
  const seen = new Set<string>();
  for (const job of jobs) {
    if (seen.has(job.id)) {
      throw new SnapjobsError(`Duplicate job id in batch: ${job.id}`);
    }
    seen.add(job.id);
  }
}
