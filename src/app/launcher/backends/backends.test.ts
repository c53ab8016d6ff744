import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { defaultConfig } from "../../../core/config.js";
import type { TaskContext } from "../../../core/execution-context.js";
import type { RevisionRecord } from "../../../core/snapshot.js";

import {
  InProcessBackend,
  LocalProcessBackend,
  SlurmBackend,
  buildSbatchArgs,
  createExecutionBackend,
  jobEnvironment,
  parseSbatchJobId,
  previewOutput,
  type CommandRunner,
  type DispatchRequest,
} from "./index.js";

// =============================================================================
// HELPERS
// =============================================================================

const REVISION: RevisionRecord = {
  id: "slurm-job-20240301-120000",
  baseCommit: "1111111111111111111111111111111111111111",
  commit: "2222222222222222222222222222222222222222",
  sourceBranch: "main",
  treeRoot: "/home/user/project",
  createdAt: "2024-03-01T12:00:00.000Z",
  published: true,
};

function makeContext(overrides: Partial<TaskContext> = {}): TaskContext {
  return {
    jobId: "job-1",
    jobIndex: 1,
    workingDir: "/views/job-1/code",
    isolated: true,
    revision: REVISION,
    signal: new AbortController().signal,
    ...overrides,
  };
}

function commandRequest(command: string, overrides: Partial<DispatchRequest> = {}): DispatchRequest {
  return {
    job: { kind: "command", id: "job-1", command },
    context: makeContext(),
    originDir: "/home/user/project",
    ...overrides,
  };
}

const tempDirs: string[] = [];

function makeDir(): string {
  const dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "backends-")));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

// =============================================================================
// SHARED HELPERS
// =============================================================================

describe("jobEnvironment", () => {
  it("describes the job and lets the job override values", () => {
    const env = jobEnvironment(
      commandRequest("./train.sh", {
        job: {
          kind: "command",
          id: "job-1",
          command: "./train.sh",
          env: { SEED: "7", SNAPJOBS_ORIGIN: "/custom" },
        },
      }),
    );

    expect(env).toEqual({
      SNAPJOBS_JOB_ID: "job-1",
      SNAPJOBS_JOB_INDEX: "1",
      SNAPJOBS_ORIGIN: "/custom",
      SNAPJOBS_REVISION: "slurm-job-20240301-120000",
      SEED: "7",
    });
  });

  it("omits the revision for jobs running in the live tree", () => {
    const env = jobEnvironment(
      commandRequest("true", { context: makeContext({ isolated: false, revision: undefined }) }),
    );

    expect(env.SNAPJOBS_REVISION).toBeUndefined();
  });
});

describe("previewOutput", () => {
  it("keeps the tail of long output", () => {
    expect(previewOutput("abcdef", 3)).toBe("...def");
    expect(previewOutput("abc", 3)).toBe("abc");
  });
});

describe("createExecutionBackend", () => {
  it("follows the launcher config unless overridden", () => {
    const launcher = defaultConfig().launcher;

    expect(createExecutionBackend(launcher).name).toBe("local");
    expect(createExecutionBackend({ ...launcher, backend: "slurm" }).name).toBe("slurm");
    expect(createExecutionBackend(launcher, "slurm").name).toBe("slurm");
  });
});

// =============================================================================
// SLURM
// =============================================================================

describe("SlurmBackend", () => {
  it("builds sbatch arguments in a stable order", () => {
    const args = buildSbatchArgs(
      commandRequest("./train.sh lr=0.1", { logPath: "/logs/job-1.log" }),
      "./train.sh lr=0.1",
      { partition: "gpu", time_minutes: 90, extra_args: ["--gres=gpu:1"] },
    );

    expect(args).toEqual([
      "--parsable",
      "--wait",
      "--job-name=job-1",
      "--chdir=/views/job-1/code",
      "--export=ALL",
      "--partition=gpu",
      "--time=90",
      "--output=/logs/job-1.log",
      "--gres=gpu:1",
      "--wrap=./train.sh lr=0.1",
    ]);
  });

  it("parses the job id printed by --parsable", () => {
    expect(parseSbatchJobId("12345;cluster-a\n")).toBe("12345");
    expect(parseSbatchJobId("\n678\n")).toBe("678");
    expect(parseSbatchJobId("Submitted batch job 1")).toBeUndefined();
    expect(parseSbatchJobId("")).toBeUndefined();
  });

  it("submits through the runner and reports the outcome", async () => {
    const calls: Array<{ file: string; args: string[]; cwd: string; env: Record<string, string> }> =
      [];
    const runner: CommandRunner = async (file, args, opts) => {
      calls.push({ file, args, cwd: opts.cwd, env: opts.env });
      return { exitCode: 0, stdout: "4242\n", stderr: "", cancelled: false };
    };
    const backend = new SlurmBackend({ runner, sbatchPath: "/opt/slurm/bin/sbatch" });

    const handle = backend.dispatch(commandRequest("./train.sh"));
    const outcome = await handle.result;

    expect(handle.id).toBe("job-1");
    expect(outcome).toEqual({
      exitCode: 0,
      stdout: "4242\n",
      stderr: "",
      backendJobId: "4242",
      cancelled: false,
    });
    expect(calls).toHaveLength(1);
    expect(calls[0]?.file).toBe("/opt/slurm/bin/sbatch");
    expect(calls[0]?.cwd).toBe("/views/job-1/code");
    expect(calls[0]?.args.at(-1)).toBe("--wrap=./train.sh");
    expect(calls[0]?.env.SNAPJOBS_REVISION).toBe("slurm-job-20240301-120000");
  });

  it("only accepts command jobs", () => {
    const backend = new SlurmBackend();

    expect(backend.supports({ kind: "function", id: "f", run: () => 1 })).toBe(false);
    expect(() =>
      backend.dispatch({
        job: { kind: "function", id: "f", run: () => 1 },
        context: makeContext(),
        originDir: "/home/user/project",
      }),
    ).toThrow("The slurm backend submits commands; job f is a function.");
  });
});

// =============================================================================
// IN-PROCESS
// =============================================================================

describe("InProcessBackend", () => {
  it("runs the function with the job's context", async () => {
    const backend = new InProcessBackend();

    const handle = backend.dispatch({
      job: { kind: "function", id: "job-1", run: (context) => `ran in ${context.workingDir}` },
      context: makeContext(),
      originDir: "/home/user/project",
    });

    expect(await handle.result).toEqual({ exitCode: 0, value: "ran in /views/job-1/code" });
  });

  it("rejects the handle when the function throws", async () => {
    const backend = new InProcessBackend();

    const handle = backend.dispatch({
      job: {
        kind: "function",
        id: "job-1",
        run: () => {
          throw new Error("loss is NaN");
        },
      },
      context: makeContext(),
      originDir: "/home/user/project",
    });

    await expect(handle.result).rejects.toThrow("loss is NaN");
  });
});

// =============================================================================
// LOCAL PROCESS
// =============================================================================

describe("LocalProcessBackend", () => {
  it("runs the command in the job's working directory with its environment", async () => {
    const workingDir = makeDir();
    const backend = new LocalProcessBackend();

    const outcome = await backend.dispatch(
      commandRequest("echo $SNAPJOBS_JOB_ID:$SNAPJOBS_REVISION && pwd", {
        context: makeContext({ workingDir }),
      }),
    ).result;

    expect(outcome.exitCode).toBe(0);
    expect(outcome.stdout).toBe(`job-1:slurm-job-20240301-120000\n${workingDir}`);
    expect(outcome.cancelled).toBe(false);
  });

  it("reports a non-zero exit and writes the combined log", async () => {
    const workingDir = makeDir();
    const logPath = path.join(workingDir, "logs", "job-1.log");
    const backend = new LocalProcessBackend();

    const outcome = await backend.dispatch(
      commandRequest("echo out; echo err 1>&2; exit 3", {
        context: makeContext({ workingDir }),
        logPath,
      }),
    ).result;

    expect(outcome.exitCode).toBe(3);
    expect(outcome.stdout).toBe("out");
    expect(outcome.stderr).toBe("err");
    expect(fs.readFileSync(logPath, "utf8")).toBe("out\nerr\n");
  });

  it("stops the command when the job is cancelled", async () => {
    const workingDir = makeDir();
    const controller = new AbortController();
    const backend = new LocalProcessBackend();

    const handle = backend.dispatch(
      commandRequest("sleep 10", {
        context: makeContext({ workingDir, signal: controller.signal }),
      }),
    );
    controller.abort();
    const outcome = await handle.result;

    expect(outcome.cancelled).toBe(true);
    expect(outcome.exitCode).not.toBe(0);
  });
});
