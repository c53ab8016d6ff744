import type { CommandJob } from "../app/launcher/backends/execution-backend.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { slugify } from "../core/utils.js";

export const VALUE_PLACEHOLDER = "{}";

export type JobSpecInput = {
  command: string[];
  jobs?: number;
  each?: string[];
};

/**
 * Builds the batch for `snapjobs run`: one job per `--each` value, with `{}` in the
 * command replaced by that value, or `--jobs` identical copies.
 */
export function buildCommandJobs(input: JobSpecInput): CommandJob[] {
  const command = commandLine(input.command);
  const each = input.each ?? [];

  if (each.length > 0 && input.jobs !== undefined) {
    throw invalidJobsError("Use either --jobs or --each, not both.");
  }

  if (each.length > 0) {
    return each.map((value, index): CommandJob => ({
      kind: "command",
      id: `job-${index}-${slugify(value) || "value"}`,
      command: command.split(VALUE_PLACEHOLDER).join(shellQuote(value)),
    }));
  }

  const count = input.jobs ?? 1;
  if (!Number.isInteger(count) || count < 1) {
    throw invalidJobsError("--jobs must be a positive integer.");
  }

  return Array.from({ length: count }, (_, index): CommandJob => ({
    kind: "command",
    id: `job-${index}`,
    command,
  }));
}

// A single argument is taken as a shell command line; several are quoted and joined.
export function commandLine(args: string[]): string {
  if (args.length === 0 || args.every((arg) => arg.trim().length === 0)) {
    throw invalidJobsError("A command is required after --.");
  }
  if (args.length === 1) return args[0] ?? "";
  return args.map((arg) => shellQuote(arg)).join(" ");
}

export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_\-.,:/=@%+{}]+$/.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function invalidJobsError(message: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Invalid job options.",
    message,
    hint: "Example: snapjobs run --each 0.1 --each 0.01 -- ./train.sh --lr {}",
  });
}
