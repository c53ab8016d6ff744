/**
 * SlurmBackend submits command jobs with `sbatch --wait`, so the handle settles when the
 * cluster job ends. The view must live on a filesystem the compute nodes can see.
 */

import { execa } from "execa";

import type { SlurmConfig } from "../../../core/config.js";

import {
  jobEnvironment,
  previewOutput,
  type DispatchRequest,
  type ExecutionBackend,
  type JobHandle,
  type JobOutcome,
  type JobSpec,
} from "./execution-backend.js";

export type CommandResult = { exitCode: number; stdout: string; stderr: string; cancelled: boolean };

export type CommandRunner = (
  file: string,
  args: string[],
  opts: { cwd: string; env: Record<string, string>; signal: AbortSignal },
) => Promise<CommandResult>;

export type SlurmBackendOptions = {
  slurm?: Partial<SlurmConfig>;
  sbatchPath?: string;
  runner?: CommandRunner;
};

export class SlurmBackend implements ExecutionBackend {
  readonly name = "slurm";
  private readonly runner: CommandRunner;

  constructor(private readonly opts: SlurmBackendOptions = {}) {
    this.runner = opts.runner ?? runWithExeca;
  }

  supports(job: JobSpec): boolean {
    return job.kind === "command";
  }

  dispatch(request: DispatchRequest): JobHandle {
    const { job, context } = request;
    if (job.kind !== "command") {
      throw new TypeError(`The slurm backend submits commands; job ${job.id} is a function.`);
    }

    const args = buildSbatchArgs(request, job.command, this.opts.slurm ?? {});
    const result = (async (): Promise<JobOutcome> => {
      const res = await this.runner(this.opts.sbatchPath ?? "sbatch", args, {
        cwd: context.workingDir,
        env: jobEnvironment(request),
        signal: context.signal,
      });

      return {
        exitCode: res.exitCode,
        stdout: previewOutput(res.stdout),
        stderr: previewOutput(res.stderr),
        backendJobId: parseSbatchJobId(res.stdout),
        cancelled: res.cancelled,
      };
    })();

    return { id: job.id, result };
  }
}

export function buildSbatchArgs(
  request: DispatchRequest,
  command: string,
  slurm: Partial<SlurmConfig>,
): string[] {
  const args = [
    "--parsable",
    "--wait",
    `--job-name=${request.context.jobId}`,
    `--chdir=${request.context.workingDir}`,
    "--export=ALL",
  ];

  if (slurm.partition) args.push(`--partition=${slurm.partition}`);
  if (slurm.time_minutes) args.push(`--time=${slurm.time_minutes}`);
  if (request.logPath) args.push(`--output=${request.logPath}`);
  args.push(...(slurm.extra_args ?? []));
  args.push(`--wrap=${command}`);

  return args;
}

// `--parsable` prints "<jobid>" or "<jobid>;<cluster>" on the first line.
export function parseSbatchJobId(stdout: string): string | undefined {
  const firstLine = stdout.split("\n").find((line) => line.trim().length > 0);
  if (!firstLine) return undefined;
  const [jobId] = firstLine.trim().split(";");
  return jobId && /^\d+$/.test(jobId) ? jobId : undefined;
}

async function runWithExeca(
  file: string,
  args: string[],
  opts: { cwd: string; env: Record<string, string>; signal: AbortSignal },
): Promise<CommandResult> {
  const res = await execa(file, args, {
    cwd: opts.cwd,
    reject: false,
    stdio: "pipe",
    env: { ...process.env, ...opts.env },
    cancelSignal: opts.signal,
  });

  return {
    exitCode: res.exitCode ?? -1,
    stdout: typeof res.stdout === "string" ? res.stdout : "",
    stderr: typeof res.stderr === "string" ? res.stderr : "",
    cancelled: res.isCanceled,
  };
}
