import { resolveConfig, type ConfigResolution } from "../core/config-discovery.js";

// =============================================================================
// CONFIG DISCOVERY (CLI)
// =============================================================================

export type LoadConfigForCliArgs = {
  explicitConfigPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

export function loadConfigForCli(args: LoadConfigForCliArgs): ConfigResolution {
  return resolveConfig({
    explicitPath: args.explicitConfigPath,
    cwd: args.cwd,
    env: args.env,
  });
}

export type GlobalCliOptions = {
  config?: string;
  debug?: boolean;
};
