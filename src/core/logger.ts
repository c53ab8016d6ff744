import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  batch_id: string;
  job_id?: string;
  payload?: JsonObject;
};

export type LogEventInput = JsonObject & {
  type: string;
  batchId?: string;
  jobId?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

type EventDefaults = {
  batchId?: string;
  jobId?: string;
};

type LogFailureAction = "write" | "close";

export type EventLogger = {
  log(event: LogEventInput): void;
};

export const NOOP_LOGGER: EventLogger = { log: () => undefined };

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger implements EventLogger {
  private readonly fileDescriptor: number;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
    this.isDebugEnabled = resolveLoggerDebugEnabled();
  }

  log(event: LogEventInput): void {
    const normalized = eventWithTs(event, this.defaults);
    this.append(normalized);
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

// Keeps events in memory; used by library callers without a log file and by tests.
export class MemoryLogger implements EventLogger {
  readonly events: LogEvent[] = [];

  constructor(private readonly defaults: EventDefaults = {}) {}

  log(event: LogEventInput): void {
    this.events.push(eventWithTs(event, { batchId: "-", ...this.defaults }));
  }

  ofType(type: string): LogEvent[] {
    return this.events.filter((event) => event.type === type);
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { batchId: providedBatchId, jobId, payload, ts, type, ...rest } = event;

  const batchId = providedBatchId ?? defaults.batchId;
  if (!batchId) {
    throw new Error("batch_id is required for log events");
  }

  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const resolvedJobId = jobId ?? defaults.jobId;

  const result: LogEvent = {
    ...rest,
    ts: normalizedTs,
    type,
    batch_id: batchId,
  };

  if (resolvedJobId) {
    result.job_id = resolvedJobId;
  }
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

export function logBatchEvent(
  logger: EventLogger,
  type: string,
  fields: JsonObject & { jobId?: string; ts?: string | Date } = {},
): void {
  const { jobId, ts, ...rest } = fields;
  const event: LogEventInput = { type, ...rest };

  if (jobId !== undefined) {
    event.jobId = jobId;
  }
  if (ts !== undefined) {
    event.ts = ts;
  }

  logger.log(event);
}

// Isolation infrastructure problems are tagged separately from task failures.
export function logIsolationEvent(
  logger: EventLogger,
  type: string,
  error: unknown,
  fields: JsonObject & { jobId?: string } = {},
): void {
  const errorName = error instanceof Error ? error.name : "Error";
  logBatchEvent(logger, `isolation.${type}`, {
    ...fields,
    category: "isolation",
    error_name: errorName,
    message: formatErrorMessage(error),
  });
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stackLine = formatErrorLines(error, { mode: "debug" }).find(
    (line) => line.kind === "stack",
  );
  return stackLine ? `${message}\n${stackLine.text}` : message;
}

function resolveLoggerDebugEnabled(): boolean {
  let debugFlag = false;

  for (const arg of process.argv) {
    if (arg === "--") break;
    if (arg === "--debug") debugFlag = true;
    if (arg === "--no-debug") debugFlag = false;
  }

  return debugFlag;
}
