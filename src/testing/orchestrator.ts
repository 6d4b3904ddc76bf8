/**
 * Sequential test orchestrator.
 * Purpose: run the affected units one at a time and record one outcome per unit.
 * Assumptions: the affected set is already ordered; the invoker never throws for test failures.
 * Usage: new TestOrchestrator({ invoker, runId, failFast, dryRun }).run(affected, graph).
 *
 * Lifecycle: idle -> running -> (stopped | completed). A failure with fail-fast enabled moves the
 * run to stopped; every unit after it is recorded as skipped without an attempt.
 */

import { TestChangedError } from "../core/errors.js";
import { logRunEvent, type JsonlLogger, type LogPayload } from "../core/logger.js";
import type { AffectedSet, Unit } from "../graph/schema.js";
import type { UnitGraph } from "../graph/unit-graph.js";
import { SIGNAL_EXIT_CODE, type InvocationResult, type TestInvoker } from "../runner/invoker.js";

import { countOutcomes, type RunReport, type UnitOutcome } from "./result.js";

// =============================================================================
// TYPES
// =============================================================================

export type OrchestratorPhase = "idle" | "running" | "stopped" | "completed";

export type UnitProgress = {
  unit: Unit;
  index: number;
  total: number;
};

export interface RunObserver {
  unitStart?(progress: UnitProgress): void;
  unitResult?(progress: UnitProgress & { outcome: UnitOutcome }): void;
}

export type TestOrchestratorOptions = {
  invoker: TestInvoker;
  runId: string;
  failFast: boolean;
  dryRun: boolean;
  runnerArgs?: readonly string[];
  // Receives live output while a command runs; set for verbose runs.
  onOutput?: (chunk: string) => void;
  observer?: RunObserver;
  logger?: JsonlLogger;
  now?: () => number;
};

// =============================================================================
// ORCHESTRATOR
// =============================================================================

export class TestOrchestrator {
  private phaseValue: OrchestratorPhase = "idle";
  private readonly now: () => number;
  private readonly runnerArgs: readonly string[];

  constructor(private readonly options: TestOrchestratorOptions) {
    this.now = options.now ?? Date.now;
    this.runnerArgs = options.runnerArgs ?? [];
  }

  get phase(): OrchestratorPhase {
    return this.phaseValue;
  }

  async run(affected: AffectedSet, graph: UnitGraph): Promise<RunReport> {
    if (this.phaseValue !== "idle") {
      throw new TestChangedError(`Orchestrator already ran (phase=${this.phaseValue}).`);
    }
    this.phaseValue = "running";

    const { dryRun, failFast, logger } = this.options;
    const startedAt = this.now();
    const direct = new Set(affected.direct_unit_ids);
    const total = affected.unit_ids.length;
    const outcomes: UnitOutcome[] = [];
    let stopped = false;

    logRunEvent(logger, "run.start", {
      payload: {
        source: affected.source,
        include_dependents: affected.include_dependents,
        units: [...affected.unit_ids],
        dry_run: dryRun,
        fail_fast: failFast,
      },
    });

    for (const [index, unitId] of affected.unit_ids.entries()) {
      const unit = graph.requireUnit(unitId);
      const isDirect = direct.has(unitId);

      if (dryRun) {
        outcomes.push(skippedOutcome(unit, isDirect, "dry-run"));
        continue;
      }

      if (stopped) {
        outcomes.push(skippedOutcome(unit, isDirect, "fail-fast"));
        continue;
      }

      const progress: UnitProgress = { unit, index, total };
      const outcome = await this.attempt(progress, isDirect);
      outcomes.push(outcome);

      if (outcome.status === "failed" && failFast) {
        stopped = true;
        this.phaseValue = "stopped";
      }
    }

    if (!stopped) {
      this.phaseValue = "completed";
    }

    const counts = countOutcomes(outcomes);
    const report: RunReport = {
      run_id: this.options.runId,
      runner: this.options.invoker.name,
      source: affected.source,
      include_dependents: affected.include_dependents,
      dry_run: dryRun,
      fail_fast: failFast,
      status: counts.failed > 0 ? "failure" : "success",
      final_state: stopped ? "stopped" : "completed",
      stop_reason: stopped ? "fail-fast" : null,
      outcomes: outcomes.map((outcome) => Object.freeze(outcome)),
      counts,
      duration_ms: this.now() - startedAt,
    };

    logRunEvent(logger, "run.complete", {
      payload: {
        status: report.status,
        final_state: report.final_state,
        passed: counts.passed,
        failed: counts.failed,
        skipped: counts.skipped,
        duration_ms: report.duration_ms,
      },
    });

    return Object.freeze(report);
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async attempt(progress: UnitProgress, isDirect: boolean): Promise<UnitOutcome> {
    const { unit } = progress;
    const { invoker, observer, logger, onOutput } = this.options;

    observer?.unitStart?.(progress);
    logRunEvent(logger, "unit.start", {
      unitId: unit.id,
      payload: { index: progress.index + 1, total: progress.total, direct: isDirect },
    });

    const startedAt = this.now();
    const result = await invoker.invoke({ unit, args: this.runnerArgs, onOutput });
    const outcome = toOutcome(unit, isDirect, result, this.now() - startedAt);

    observer?.unitResult?.({ ...progress, outcome });

    const payload: LogPayload = {
      status: outcome.status,
      exit_code: outcome.exit_code,
      duration_ms: outcome.duration_ms,
    };
    if (outcome.error) {
      payload.error = { kind: outcome.error.kind, message: outcome.error.message };
    }
    logRunEvent(logger, "unit.complete", { unitId: unit.id, payload });

    return outcome;
  }
}

// =============================================================================
// OUTCOME BUILDERS
// =============================================================================

function toOutcome(
  unit: Unit,
  direct: boolean,
  result: InvocationResult,
  durationMs: number,
): UnitOutcome {
  const base = { unit_id: unit.id, name: unit.name, direct, output: result.output, duration_ms: durationMs };

  if (result.kind === "start-failed") {
    return {
      ...base,
      status: "failed",
      exit_code: null,
      error: { kind: "invocation", message: result.error.message },
    };
  }

  if (result.exitCode === 0) {
    return { ...base, status: "passed", exit_code: 0 };
  }

  const message =
    result.exitCode === SIGNAL_EXIT_CODE
      ? "Test command was terminated by a signal."
      : `Test command exited with code ${result.exitCode}.`;

  return {
    ...base,
    status: "failed",
    exit_code: result.exitCode,
    error: { kind: "test-failure", message },
  };
}

function skippedOutcome(unit: Unit, direct: boolean, reason: "fail-fast" | "dry-run"): UnitOutcome {
  return {
    unit_id: unit.id,
    name: unit.name,
    direct,
    status: "skipped",
    exit_code: null,
    output: "",
    duration_ms: 0,
    skip_reason: reason,
  };
}
