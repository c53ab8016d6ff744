/**
 * ExecutionContextGuard: runs a job's task against its view and guarantees the
 * caller's context afterwards.
 *
 * "explicit" mode hands the task its working directory through TaskContext and never
 * touches process state. "ambient" mode changes the process working directory for the
 * duration of the task; it is only sound when one job owns the process, so a second
 * ambient switch while one is active is refused.
 */

import { formatErrorMessage } from "./error-format.js";
import { ContextSwitchError, JobCancelledError } from "./errors.js";
import type { IsolatedView } from "./isolation.js";
import { logBatchEvent, NOOP_LOGGER, type EventLogger } from "./logger.js";
import type { RevisionRecord } from "./snapshot.js";

// =============================================================================
// TYPES
// =============================================================================

export type ContextMode = "explicit" | "ambient";

export type ExecutionContext = {
  previousDir: string;
  targetDir: string;
};

export type TaskContext = {
  jobId: string;
  jobIndex: number;
  workingDir: string;
  isolated: boolean;
  revision?: RevisionRecord;
  signal: AbortSignal;
};

export type Task<T> = (context: TaskContext) => Promise<T> | T;

export type ProcessDirectory = {
  cwd(): string;
  chdir(dir: string): void;
};

export type ExecutionContextGuardOptions = {
  mode?: ContextMode;
  processDirectory?: ProcessDirectory;
  logger?: EventLogger;
};

export type RunOptions = {
  jobIndex?: number;
  signal?: AbortSignal;
};

export type RunIdentityOptions = RunOptions & {
  jobId: string;
  workingDir?: string;
};

export const PROCESS_DIRECTORY: ProcessDirectory = {
  cwd: () => process.cwd(),
  chdir: (dir) => process.chdir(dir),
};

// One active ambient context per process (per injected directory in tests).
const activeContexts = new WeakMap<ProcessDirectory, ExecutionContext>();

// =============================================================================
// GUARD
// =============================================================================

export class ExecutionContextGuard {
  readonly mode: ContextMode;
  private readonly processDirectory: ProcessDirectory;
  private readonly logger: EventLogger;

  constructor(opts: ExecutionContextGuardOptions = {}) {
    this.mode = opts.mode ?? "explicit";
    this.processDirectory = opts.processDirectory ?? PROCESS_DIRECTORY;
    this.logger = opts.logger ?? NOOP_LOGGER;
  }

  async run<T>(view: IsolatedView, task: Task<T>, opts: RunOptions = {}): Promise<T> {
    const signal = opts.signal ?? new AbortController().signal;
    throwIfCancelled(view.jobId, signal);

    const context: TaskContext = {
      jobId: view.jobId,
      jobIndex: opts.jobIndex ?? 0,
      workingDir: view.path,
      isolated: true,
      revision: view.revision,
      signal,
    };

    if (this.mode === "explicit") {
      return await task(context);
    }

    return await this.runAmbient(view.path, context, task);
  }

  // Runs the task where the caller already is; used when isolation is off or fell back.
  async runIdentity<T>(task: Task<T>, opts: RunIdentityOptions): Promise<T> {
    const signal = opts.signal ?? new AbortController().signal;
    throwIfCancelled(opts.jobId, signal);

    return await task({
      jobId: opts.jobId,
      jobIndex: opts.jobIndex ?? 0,
      workingDir: opts.workingDir ?? this.processDirectory.cwd(),
      isolated: false,
      signal,
    });
  }

  activeContext(): ExecutionContext | null {
    return activeContexts.get(this.processDirectory) ?? null;
  }

  private async runAmbient<T>(
    targetDir: string,
    context: TaskContext,
    task: Task<T>,
  ): Promise<T> {
    const active = activeContexts.get(this.processDirectory);
    if (active) {
      throw new ContextSwitchError(
        `Cannot switch to ${targetDir} for job ${context.jobId}: the process is already running in ${active.targetDir}. Use explicit context mode when jobs share a process.`,
      );
    }

    const previousDir = this.processDirectory.cwd();
    try {
      this.processDirectory.chdir(targetDir);
    } catch (err) {
      throw new ContextSwitchError(
        `Cannot switch to ${targetDir} for job ${context.jobId}: ${formatErrorMessage(err)}`,
        err,
      );
    }

    activeContexts.set(this.processDirectory, { previousDir, targetDir });
    logBatchEvent(this.logger, "context.entered", { jobId: context.jobId, dir: targetDir });

    try {
      return await task(context);
    } finally {
      activeContexts.delete(this.processDirectory);
      this.restore(previousDir, context.jobId);
    }
  }

  private restore(previousDir: string, jobId: string): void {
    try {
      this.processDirectory.chdir(previousDir);
    } catch (err) {
      throw new ContextSwitchError(
        `Could not restore working directory ${previousDir} after job ${jobId}: ${formatErrorMessage(err)}`,
        err,
      );
    }
    logBatchEvent(this.logger, "context.restored", { jobId, dir: previousDir });
  }
}

function throwIfCancelled(jobId: string, signal: AbortSignal): void {
  if (signal.aborted) {
    throw new JobCancelledError(jobId, signal.reason);
  }
}
