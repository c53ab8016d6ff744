import fs from "node:fs/promises";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createTempGitRepo, type TempGitRepo } from "../../test/helpers/temp-git-repo.js";
import { main } from "../index.js";

describe("acceptance: snapjobs CLI", () => {
  let repo: TempGitRepo;
  let originalCwd: string;
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    repo = await createTempGitRepo({ files: { "app.py": "print('v1')\n" } });

    originalCwd = process.cwd();
    process.chdir(repo.repoDir);

    logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    process.exitCode = 0;
  });

  afterEach(async () => {
    process.chdir(originalCwd);
    vi.restoreAllMocks();
    await repo.cleanup();
    process.exitCode = 0;
  });

  it("writes the repo config on init and keeps it on a second run", async () => {
    await main(["node", "snapjobs", "init"]);
    await main(["node", "snapjobs", "init"]);

    const configPath = path.join(repo.repoDir, "snapjobs.yaml");
    expect(await fs.readFile(configPath, "utf8")).toContain("# snapjobs configuration");
    expect(logSpy.mock.calls.map((call) => call[0])).toEqual([
      `Created snapjobs config at ${configPath}`,
      `snapjobs config already exists at ${configPath}`,
    ]);
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("runs a sweep against a snapshot and leaves outputs in the working tree", async () => {
    await repo.writeFile(
      "snapjobs.yaml",
      "snapshot:\n  enabled: true\n  push_to_remote: false\n  symlink_paths: [outputs]\n",
    );
    await repo.writeFile("app.py", "print('v2')\n");

    await main([
      "node",
      "snapjobs",
      "run",
      "--each",
      "a",
      "--each",
      "b",
      "--",
      "sh",
      "-c",
      "cat app.py > outputs/{}.txt",
    ]);

    expect(errorSpy).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(0);
    expect(await repo.readFile("outputs/a.txt")).toBe("print('v2')\n");
    expect(await repo.readFile("outputs/b.txt")).toBe("print('v2')\n");

    const lines = logSpy.mock.calls.map((call) => String(call[0]));
    expect(lines).toContain("- job-0-a: succeeded (isolated) exit=0");
    expect(lines).toContain("- job-1-b: succeeded (isolated) exit=0");

    const entries = await fs.readdir(repo.tempRoot);
    expect(entries.filter((entry) => entry.includes("-job-"))).toEqual([]);

    logSpy.mockClear();
    await main(["node", "snapjobs", "revisions", "--json"]);
    const revisions = JSON.parse(String(logSpy.mock.calls[0]?.[0])) as Array<{ name: string }>;
    expect(revisions).toHaveLength(1);
    expect(revisions[0]?.name.startsWith("slurm-job-")).toBe(true);
  });

  it("renders user-facing errors and sets the exit code", async () => {
    await main(["node", "snapjobs", "run", "--jobs", "2", "--each", "x", "--", "true"]);

    expect(process.exitCode).toBe(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0]?.[0]).toBe(
      [
        "Error: Run failed.",
        "Use either --jobs or --each, not both.",
        "Hint: Example: snapjobs run --each 0.1 --each 0.01 -- ./train.sh --lr {}",
      ].join("\n"),
    );
  });
});
