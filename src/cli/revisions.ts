import type { SnapjobsConfig } from "../core/config.js";
import { listBranches, type BranchSummary } from "../git/git.js";
import { locateRepository } from "../git/repo-locator.js";

import { normalizeCommandError } from "./command-errors.js";

// =============================================================================
// COMMANDS
// =============================================================================

export async function revisionsCommand(
  config: SnapjobsConfig,
  opts: { prefix?: string; json?: boolean; cwd?: string },
): Promise<BranchSummary[]> {
  try {
    const root = locateRepository(opts.cwd ?? process.cwd());
    const prefix = opts.prefix ?? config.snapshot.branch_prefix;
    const revisions = await listBranches(root, `${prefix}-`);

    if (opts.json) {
      console.log(JSON.stringify(revisions, null, 2));
      return revisions;
    }

    if (revisions.length === 0) {
      console.log(`No revisions with prefix ${prefix} in ${root}.`);
      return revisions;
    }

    printRevisionList(revisions);
    return revisions;
  } catch (error) {
    throw normalizeCommandError(error, "Listing revisions failed.");
  }
}

// =============================================================================
// OUTPUT
// =============================================================================

function printRevisionList(revisions: BranchSummary[]): void {
  const rows = revisions.map((revision) => ({
    name: revision.name,
    commit: revision.sha.slice(0, 12),
    createdAt: formatTimestamp(revision.createdAt),
  }));

  const headers = { name: "Revision", commit: "Commit", createdAt: "Created" };
  const widths = {
    name: columnWidth(
      rows.map((row) => row.name),
      headers.name,
    ),
    commit: columnWidth(
      rows.map((row) => row.commit),
      headers.commit,
    ),
  };

  console.log(
    `${pad(headers.name, widths.name)}  ${pad(headers.commit, widths.commit)}  ${headers.createdAt}`,
  );
  for (const row of rows) {
    console.log(`${pad(row.name, widths.name)}  ${pad(row.commit, widths.commit)}  ${row.createdAt}`);
  }
}

function columnWidth(values: string[], header: string): number {
  const lengths = values.map((value) => value.length);
  return Math.max(header.length, ...lengths, 4);
}

function pad(value: string, width: number): string {
  return value.padEnd(width);
}

function formatTimestamp(ts: string): string {
  const parsed = new Date(ts);
  if (Number.isNaN(parsed.getTime())) return ts;
  return parsed
    .toISOString()
    .replace("T", " ")
    .replace(/\.\d+Z$/, "Z");
}
