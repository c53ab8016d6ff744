import fse from "fs-extra";
import { z } from "zod";

import { viewMarkerPath } from "./paths.js";
import { writeJsonFile } from "./utils.js";

export const CheckoutStrategySchema = z.enum(["worktree", "clone"]);
export type CheckoutStrategy = z.infer<typeof CheckoutStrategySchema>;

export const ViewMarkerSchema = z.object({
  jobId: z.string().min(1),
  revision: z.string().min(1),
  treeRoot: z.string().min(1),
  createdAt: z.string(),
  strategy: CheckoutStrategySchema,
});
export type ViewMarker = z.infer<typeof ViewMarkerSchema>;

export async function writeViewMarker(rootDir: string, marker: ViewMarker): Promise<void> {
  await writeJsonFile(viewMarkerPath(rootDir), marker);
}

// Returns null for directories that are not views or whose marker is unreadable.
export async function readViewMarker(rootDir: string): Promise<ViewMarker | null> {
  const markerPath = viewMarkerPath(rootDir);
  if (!(await fse.pathExists(markerPath))) return null;

  let raw: unknown;
  try {
    raw = await fse.readJson(markerPath);
  } catch {
    return null;
  }

  const parsed = ViewMarkerSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}
