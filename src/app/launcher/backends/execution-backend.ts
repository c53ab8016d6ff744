/**
 * ExecutionBackend: how a prepared job actually runs.
 * The launcher owns snapshots, views and context; a backend only receives the
 * TaskContext and returns a handle to await.
 */

import type { TaskContext, Task } from "../../../core/execution-context.js";

// =============================================================================
// TYPES
// =============================================================================

export type CommandJob = {
  kind: "command";
  id: string;
  command: string;
  env?: Record<string, string>;
};

export type FunctionJob = {
  kind: "function";
  id: string;
  run: Task<unknown>;
};

export type JobSpec = CommandJob | FunctionJob;

export type DispatchRequest = {
  job: JobSpec;
  context: TaskContext;
  /** Root of the originating tree. */
  originDir: string;
  /** Where the backend should write the job's combined output, if anywhere. */
  logPath?: string;
};

export type JobOutcome = {
  exitCode: number;
  stdout?: string;
  stderr?: string;
  value?: unknown;
  /** Identifier assigned by the backend (pid, scheduler job id). */
  backendJobId?: string;
  cancelled?: boolean;
};

export type JobHandle = {
  id: string;
  result: Promise<JobOutcome>;
};

export type ExecutionBackend = {
  readonly name: string;
  supports(job: JobSpec): boolean;
  dispatch(request: DispatchRequest): JobHandle;
};

// =============================================================================
// HELPERS
// =============================================================================

export function jobEnvironment(request: DispatchRequest): Record<string, string> {
  const { context } = request;
  const env: Record<string, string> = {
    SNAPJOBS_JOB_ID: context.jobId,
    SNAPJOBS_JOB_INDEX: String(context.jobIndex),
    SNAPJOBS_ORIGIN: request.originDir,
  };
  if (context.revision) {
    env.SNAPJOBS_REVISION = context.revision.id;
  }
  if (request.job.kind === "command" && request.job.env) {
    Object.assign(env, request.job.env);
  }
  return env;
}

const OUTPUT_PREVIEW_LIMIT = 4000;

export function previewOutput(text: string, limit = OUTPUT_PREVIEW_LIMIT): string {
  if (text.length <= limit) return text;
  return `...${text.slice(text.length - limit)}`;
}
