import type { LauncherConfig } from "../../../core/config.js";

import type { ExecutionBackend } from "./execution-backend.js";
import { InProcessBackend } from "./in-process-backend.js";
import { LocalProcessBackend } from "./local-process-backend.js";
import { SlurmBackend } from "./slurm-backend.js";

export type BackendName = LauncherConfig["backend"];

export function createExecutionBackend(
  launcher: LauncherConfig,
  override?: BackendName,
): ExecutionBackend {
  const name = override ?? launcher.backend;
  if (name === "slurm") {
    return new SlurmBackend({ slurm: launcher.slurm });
  }
  return new LocalProcessBackend();
}

export * from "./execution-backend.js";
export { InProcessBackend, LocalProcessBackend, SlurmBackend };
export { buildSbatchArgs, parseSbatchJobId, type CommandRunner } from "./slurm-backend.js";
