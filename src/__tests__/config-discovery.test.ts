import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { defaultConfig } from "../core/config.js";
import { initRepoConfig, repoConfigPath, resolveConfig } from "../core/config-discovery.js";
import { loadConfigFile } from "../core/config-loader.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

const tempDirs: string[] = [];

function makeRepo(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-discovery-"));
  tempDirs.push(dir);
  fs.mkdirSync(path.join(dir, ".git"));
  return dir;
}

function makeDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-discovery-"));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

describe("resolveConfig", () => {
  it("falls back to defaults when the repo has no config", () => {
    const repo = makeRepo();

    const result = resolveConfig({ cwd: repo });

    expect(result.source).toBe("defaults");
    expect(result.configPath).toBeNull();
    expect(result.repoRoot).toBe(repo);
    expect(result.config).toEqual(defaultConfig());
  });

  it("loads the repo config from a nested directory", () => {
    const repo = makeRepo();
    fs.writeFileSync(repoConfigPath(repo), "snapshot:\n  enabled: true\n", "utf8");
    const nested = path.join(repo, "src", "models");
    fs.mkdirSync(nested, { recursive: true });

    const result = resolveConfig({ cwd: nested });

    expect(result.source).toBe("repo");
    expect(result.configPath).toBe(path.join(repo, "snapjobs.yaml"));
    expect(result.config.snapshot.enabled).toBe(true);
  });

  it("prefers an explicit config path relative to the cwd", () => {
    const repo = makeRepo();
    fs.writeFileSync(repoConfigPath(repo), "snapshot:\n  enabled: true\n", "utf8");
    fs.writeFileSync(
      path.join(repo, "cluster.yaml"),
      "launcher:\n  backend: slurm\n",
      "utf8",
    );

    const result = resolveConfig({ cwd: repo, explicitPath: "cluster.yaml" });

    expect(result.source).toBe("explicit");
    expect(result.configPath).toBe(path.join(repo, "cluster.yaml"));
    expect(result.config.launcher.backend).toBe("slurm");
    expect(result.config.snapshot.enabled).toBe(false);
  });

  it("works outside a repository", () => {
    const dir = makeDir();

    const result = resolveConfig({ cwd: dir });

    expect(result.repoRoot).toBeNull();
    expect(result.source).toBe("defaults");
  });
});

describe("initRepoConfig", () => {
  it("writes a default config that loads back to the defaults", () => {
    const repo = makeRepo();

    const result = initRepoConfig({ cwd: repo });

    expect(result.status).toBe("created");
    expect(result.configPath).toBe(path.join(repo, "snapjobs.yaml"));
    expect(loadConfigFile(result.configPath)).toEqual(defaultConfig());
  });

  it("keeps an existing config unless forced", () => {
    const repo = makeRepo();
    const configPath = repoConfigPath(repo);
    fs.writeFileSync(configPath, "snapshot:\n  enabled: true\n", "utf8");

    expect(initRepoConfig({ cwd: repo }).status).toBe("exists");
    expect(fs.readFileSync(configPath, "utf8")).toBe("snapshot:\n  enabled: true\n");

    expect(initRepoConfig({ cwd: repo, force: true }).status).toBe("overwritten");
    expect(fs.readFileSync(configPath, "utf8")).toContain("# snapjobs configuration");
  });

  it("fails outside a repository", () => {
    const dir = makeDir();

    let error: unknown;
    try {
      initRepoConfig({ cwd: dir });
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(UserFacingError);
    if (!(error instanceof UserFacingError)) return;
    expect(error.code).toBe(USER_FACING_ERROR_CODES.config);
    expect(error.title).toBe("Repository not found.");
  });
});
