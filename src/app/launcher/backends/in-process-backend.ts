/**
 * InProcessBackend runs function jobs on the launcher's own event loop.
 * Tasks share the process, so they must use TaskContext.workingDir rather than process.cwd().
 */

import type {
  DispatchRequest,
  ExecutionBackend,
  JobHandle,
  JobOutcome,
  JobSpec,
} from "./execution-backend.js";

export class InProcessBackend implements ExecutionBackend {
  readonly name = "in-process";

  supports(job: JobSpec): boolean {
    return job.kind === "function";
  }

  dispatch(request: DispatchRequest): JobHandle {
    const { job, context } = request;
    if (job.kind !== "function") {
      throw new TypeError(`The in-process backend runs functions; job ${job.id} is a command.`);
    }

    const result = (async (): Promise<JobOutcome> => {
      const value = await job.run(context);
      return { exitCode: 0, value };
    })();

    return { id: job.id, result };
  }
}
