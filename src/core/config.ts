import { z } from "zod";

export const DEFAULT_SYMLINK_PATHS = ["outputs", "multirun", ".submitit"];

export const SnapshotConfigSchema = z
  .object({
    enabled: z.boolean().default(false),
    branch_prefix: z.string().min(1).default("slurm-job"),
    symlink_paths: z.array(z.string().min(1)).default(DEFAULT_SYMLINK_PATHS),
    push_to_remote: z.boolean().default(true),
    remote: z.string().min(1).default("origin"),
    worktree_dir: z.string().min(1).optional(),
    checkout: z.enum(["worktree", "clone"]).default("worktree"),
    on_snapshot_failure: z.enum(["live", "abort"]).default("live"),
    on_isolation_failure: z.enum(["live", "fail"]).default("live"),
    context_mode: z.enum(["explicit", "ambient"]).default("explicit"),
  })
  .strict();

const SlurmSchema = z
  .object({
    partition: z.string().min(1).optional(),
    time_minutes: z.number().int().positive().optional(),
    extra_args: z.array(z.string()).default([]),
  })
  .strict();

export const LauncherConfigSchema = z
  .object({
    backend: z.enum(["local", "slurm"]).default("local"),
    max_parallel: z.number().int().positive().default(4),
    slurm: SlurmSchema.default({}),
  })
  .strict();

export const SnapjobsConfigSchema = z
  .object({
    snapshot: SnapshotConfigSchema.default({}),
    launcher: LauncherConfigSchema.default({}),
  })
  .strict();

export type SnapshotConfig = z.infer<typeof SnapshotConfigSchema>;
export type LauncherConfig = z.infer<typeof LauncherConfigSchema>;
export type SlurmConfig = LauncherConfig["slurm"];
export type SnapjobsConfig = z.infer<typeof SnapjobsConfigSchema>;

export function defaultConfig(): SnapjobsConfig {
  return SnapjobsConfigSchema.parse({});
}
