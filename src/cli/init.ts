import { initRepoConfig } from "../core/config-discovery.js";

// =============================================================================
// INIT (repo-scoped scaffolding)
// =============================================================================

export async function initCommand(opts: {
  force?: boolean;
  cwd?: string;
}): Promise<{ created: boolean; configPath: string }> {
  const result = initRepoConfig({ cwd: opts.cwd, force: opts.force ?? false });

  if (result.status === "created") {
    console.log(`Created snapjobs config at ${result.configPath}`);
  } else if (result.status === "overwritten") {
    console.log(`Overwrote snapjobs config at ${result.configPath}`);
  } else {
    console.log(`snapjobs config already exists at ${result.configPath}`);
  }

  return { created: result.status !== "exists", configPath: result.configPath };
}
