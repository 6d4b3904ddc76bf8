/*
Purpose: derive the exit status, structured form and human summary of a finished run.
Assumptions: reports come from TestOrchestrator and already hold one outcome per unit.
Usage: process.exitCode = summarize(report); sink.write(renderHumanReport(report, { verbose }));
*/

import { createAnsiFormatter, type AnsiFormatter } from "../core/error-format.js";
import { EXIT_CODES } from "../core/errors.js";
import { formatSeconds } from "../core/utils.js";
import { failedOutcomes, type RunReport, type UnitOutcome } from "../testing/result.js";

// =============================================================================
// TYPES
// =============================================================================

export type StructuredUnit = {
  unit_id: string;
  name: string;
  direct: boolean;
  status: UnitOutcome["status"];
  exit_code: number | null;
  duration_ms: number;
  skip_reason: string | null;
  error: { kind: string; message: string } | null;
  output: string;
};

export type StructuredReport = {
  run_id: string;
  runner: string;
  source: RunReport["source"];
  include_dependents: boolean;
  dry_run: boolean;
  fail_fast: boolean;
  status: RunReport["status"];
  final_state: RunReport["final_state"];
  stop_reason: string | null;
  counts: { total: number; passed: number; failed: number; skipped: number };
  duration_ms: number;
  units: StructuredUnit[];
};

export type HumanReportOptions = {
  verbose: boolean;
  format?: AnsiFormatter;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function summarize(report: RunReport): number {
  return report.status === "success" ? EXIT_CODES.success : EXIT_CODES.testsFailed;
}

export function toStructuredReport(report: RunReport): StructuredReport {
  return {
    run_id: report.run_id,
    runner: report.runner,
    source: report.source,
    include_dependents: report.include_dependents,
    dry_run: report.dry_run,
    fail_fast: report.fail_fast,
    status: report.status,
    final_state: report.final_state,
    stop_reason: report.stop_reason,
    counts: { ...report.counts },
    duration_ms: report.duration_ms,
    units: report.outcomes.map((outcome) => ({
      unit_id: outcome.unit_id,
      name: outcome.name,
      direct: outcome.direct,
      status: outcome.status,
      exit_code: outcome.exit_code,
      duration_ms: outcome.duration_ms,
      skip_reason: outcome.skip_reason ?? null,
      error: outcome.error ? { ...outcome.error } : null,
      output: outcome.output,
    })),
  };
}

export function renderHumanReport(report: RunReport, options: HumanReportOptions): string {
  const format = options.format ?? createAnsiFormatter(false);
  const lines: string[] = [];

  if (report.dry_run) {
    lines.push("crates that would be tested:");
    for (const outcome of report.outcomes) {
      lines.push(`    ${outcome.name}${outcome.direct ? "" : " (dependent)"}`);
    }
  }

  const failed = failedOutcomes(report);
  if (failed.length > 0) {
    // Verbose runs already streamed this output.
    if (!options.verbose) {
      lines.push("failed crate output:", "");
      for (const outcome of failed) {
        lines.push(`---- ${outcome.name} output ----`, describeFailure(outcome), "");
      }
    }

    lines.push("failed crates:");
    for (const outcome of failed) {
      lines.push(`    ${outcome.name}`);
    }
  }

  const skippedByFailFast = report.outcomes.filter((outcome) => outcome.skip_reason === "fail-fast");
  if (skippedByFailFast.length > 0) {
    if (lines.length > 0) lines.push("");
    lines.push("skipped crates (fail-fast):");
    for (const outcome of skippedByFailFast) {
      lines.push(`    ${outcome.name}`);
    }
  }

  if (lines.length > 0) lines.push("");
  lines.push(renderSummaryLine(report, format));

  return lines.join("\n");
}

export function renderSummaryLine(report: RunReport, format: AnsiFormatter): string {
  const verdict =
    report.status === "success" ? format("ok", ["bold", "green"]) : format("FAILED", ["bold", "red"]);
  const { passed, failed, skipped } = report.counts;

  return (
    `test result: ${verdict}. ${passed} passed; ${failed} failed; ${skipped} skipped; ` +
    `finished in ${formatSeconds(report.duration_ms)}`
  );
}

// =============================================================================
// INTERNALS
// =============================================================================

function describeFailure(outcome: UnitOutcome): string {
  const output = outcome.output.trimEnd();
  if (output.length > 0) {
    return output;
  }
  return outcome.error?.message ?? "(no output)";
}
