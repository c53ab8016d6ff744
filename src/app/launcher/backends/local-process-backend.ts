/**
 * LocalProcessBackend runs command jobs as child processes of the launcher.
 * The child's cwd is the job's working directory; the launcher process never changes its own.
 */

import { execaCommand } from "execa";
import fse from "fs-extra";

import {
  jobEnvironment,
  previewOutput,
  type DispatchRequest,
  type ExecutionBackend,
  type JobHandle,
  type JobOutcome,
  type JobSpec,
} from "./execution-backend.js";

export type LocalProcessBackendOptions = {
  timeoutSeconds?: number;
};

export class LocalProcessBackend implements ExecutionBackend {
  readonly name = "local";

  constructor(private readonly opts: LocalProcessBackendOptions = {}) {}

  supports(job: JobSpec): boolean {
    return job.kind === "command";
  }

  dispatch(request: DispatchRequest): JobHandle {
    const { job, context } = request;
    if (job.kind !== "command") {
      throw new TypeError(`The local backend runs commands; job ${job.id} is a function.`);
    }

    const subprocess = execaCommand(job.command, {
      cwd: context.workingDir,
      shell: true,
      reject: false,
      stdio: "pipe",
      env: { ...process.env, ...jobEnvironment(request) },
      cancelSignal: context.signal,
      timeout: this.opts.timeoutSeconds ? this.opts.timeoutSeconds * 1000 : undefined,
    });

    const backendJobId = subprocess.pid === undefined ? undefined : String(subprocess.pid);

    const result = (async (): Promise<JobOutcome> => {
      const res = await subprocess;
      const stdout = typeof res.stdout === "string" ? res.stdout : "";
      const stderr = typeof res.stderr === "string" ? res.stderr : "";

      if (request.logPath) {
        const combined = `${stdout}\n${stderr}`.trim();
        await fse.outputFile(request.logPath, combined.length > 0 ? `${combined}\n` : "");
      }

      return {
        exitCode: res.exitCode ?? -1,
        stdout: previewOutput(stdout),
        stderr: previewOutput(stderr),
        backendJobId,
        cancelled: res.isCanceled,
      };
    })();

    return { id: job.id, result };
  }
}
