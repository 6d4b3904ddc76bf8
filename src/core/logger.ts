// JSON Lines run log.
// One event per line: { ts, type, run_id, unit_id?, payload? }. Each write is synced so a killed
// run still leaves every event it emitted. Write failures warn on stderr and never abort a run.

import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

export type LogPayload = Record<string, unknown>;

export type LogEvent = {
  ts: string;
  type: string;
  run_id: string;
  unit_id?: string;
  payload?: LogPayload;
};

export type LogEventInput = {
  type: string;
  runId?: string;
  unitId?: string;
  payload?: LogPayload;
  ts?: string | Date;
};

type EventDefaults = {
  runId?: string;
  unitId?: string;
};

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger {
  private readonly fileDescriptor: number;
  private closed = false;

  constructor(
    readonly filePath: string,
    private readonly defaults: EventDefaults = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
  }

  log(event: LogEventInput): void {
    if (this.closed) return;
    const line = `${JSON.stringify(eventWithTs(event, this.defaults))}\n`;
    try {
      fs.writeSync(this.fileDescriptor, line);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(`Warning: failed to write log event to ${this.filePath}: ${formatErrorMessage(err)}`);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(`Warning: failed to close log file ${this.filePath}: ${formatErrorMessage(err)}`);
    }
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const runId = event.runId ?? defaults.runId;
  if (!runId) {
    throw new Error("run_id is required for log events");
  }

  const ts = event.ts instanceof Date ? event.ts.toISOString() : (event.ts ?? isoNow());
  const result: LogEvent = { ts, type: event.type, run_id: runId };

  const unitId = event.unitId ?? defaults.unitId;
  if (unitId) {
    result.unit_id = unitId;
  }
  if (event.payload && Object.keys(event.payload).length > 0) {
    result.payload = event.payload;
  }

  return result;
}

export function logRunEvent(
  logger: JsonlLogger | undefined,
  type: string,
  fields: { unitId?: string; payload?: LogPayload } = {},
): void {
  logger?.log({ type, unitId: fields.unitId, payload: fields.payload });
}
