import { createExecutionBackend, type BackendName } from "../app/launcher/backends/index.js";
import { launchBatch, type BatchResult, type JobResult } from "../app/launcher/batch-launcher.js";
import type { SnapjobsConfig } from "../core/config.js";

import { normalizeCommandError } from "./command-errors.js";
import { buildCommandJobs } from "./job-specs.js";

export type RunCommandOptions = {
  command: string[];
  jobs?: number;
  each?: string[];
  snapshot?: boolean;
  maxParallel?: number;
  backend?: BackendName;
  cwd?: string;
};

export async function runCommand(
  config: SnapjobsConfig,
  opts: RunCommandOptions,
): Promise<BatchResult> {
  const stopHandler = createStopSignalHandler();

  try {
    const jobs = buildCommandJobs({ command: opts.command, jobs: opts.jobs, each: opts.each });
    const snapshot = { ...config.snapshot, enabled: opts.snapshot ?? config.snapshot.enabled };

    const result = await launchBatch({
      treeRoot: opts.cwd ?? process.cwd(),
      jobs,
      snapshot,
      backend: createExecutionBackend(config.launcher, opts.backend),
      maxParallel: opts.maxParallel ?? config.launcher.max_parallel,
      signal: stopHandler.signal,
      writeJobLogs: true,
    });

    printBatchSummary(result);
    if (result.failed > 0 || result.cancelled > 0) {
      process.exitCode = 1;
    }
    return result;
  } catch (error) {
    throw normalizeCommandError(error, "Run failed.");
  } finally {
    stopHandler.cleanup();
  }
}

// =============================================================================
// OUTPUT
// =============================================================================

function printBatchSummary(result: BatchResult): void {
  if (result.revision) {
    const published = result.revision.published ? " (pushed)" : "";
    console.log(`Revision ${result.revision.id} @ ${result.revision.commit.slice(0, 12)}${published}`);
  } else if (result.snapshotError) {
    console.log(`Snapshot failed; jobs ran against ${result.treeRoot}.`);
  }

  for (const job of result.jobs) {
    console.log(formatJobLine(job));
  }

  console.log(
    `Batch ${result.batchId}: ${result.succeeded} succeeded, ${result.failed} failed, ${result.cancelled} cancelled.`,
  );
  if (result.logPath) {
    console.log(`Logs: ${result.logPath}`);
  }
}

export function formatJobLine(job: JobResult): string {
  const exit = job.exitCode === undefined ? "" : ` exit=${job.exitCode}`;
  const error = job.error ? ` [${job.errorCategory ?? "task"}] ${job.error}` : "";
  return `- ${job.jobId}: ${job.status} (${job.isolation})${exit}${error}`;
}

// =============================================================================
// SIGNALS
// =============================================================================

type StopSignalHandler = {
  signal: AbortSignal;
  cleanup(): void;
};

function createStopSignalHandler(): StopSignalHandler {
  const controller = new AbortController();
  const signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

  const onSignal = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) return;
    console.log(`Received ${signal}. Cancelling queued jobs and releasing views.`);
    controller.abort(signal);
  };

  for (const signal of signals) {
    process.on(signal, onSignal);
  }

  return {
    signal: controller.signal,
    cleanup() {
      for (const signal of signals) {
        process.off(signal, onSignal);
      }
    },
  };
}
