// One JSON event per line on the output sink. The final event is always `run_report` for runs
// that reach the orchestrator.

import type { LogPayload } from "../core/logger.js";
import type { UnitProgress } from "../testing/orchestrator.js";
import type { RunReport, UnitOutcome } from "../testing/result.js";

import type { PlanSummary, Reporter, TextSink } from "./reporter.js";
import { toStructuredReport } from "./summary.js";

export type JsonReporterEventType =
  | "plan_summary"
  | "no_units"
  | "dry_run"
  | "unit_start"
  | "unit_result"
  | "run_report";

export type JsonReporterEvent = {
  type: JsonReporterEventType;
  ts: string;
  payload: LogPayload;
};

export class JsonReporter implements Reporter {
  constructor(
    private readonly sink: TextSink,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  planSummary(plan: PlanSummary): void {
    this.emit("plan_summary", {
      source: plan.source,
      direct_count: plan.directCount,
      dependent_count: plan.dependentCount,
      include_dependents: plan.includeDependents,
      unmapped_paths: plan.unmappedPaths,
    });
  }

  noUnits(): void {
    this.emit("no_units", {});
  }

  dryRun(): void {
    this.emit("dry_run", {});
  }

  unitStart(progress: UnitProgress): void {
    this.emit("unit_start", {
      unit: progress.unit.name,
      index: progress.index + 1,
      total: progress.total,
    });
  }

  unitResult(progress: UnitProgress & { outcome: UnitOutcome }): void {
    this.emit("unit_result", {
      unit: progress.unit.name,
      status: progress.outcome.status,
      exit_code: progress.outcome.exit_code,
      duration_ms: progress.outcome.duration_ms,
    });
  }

  report(report: RunReport): void {
    this.emit("run_report", toStructuredReport(report));
  }

  private emit(type: JsonReporterEventType, payload: LogPayload): void {
    const event: JsonReporterEvent = { type, ts: this.clock().toISOString(), payload };
    this.sink.write(`${JSON.stringify(event)}\n`);
  }
}
