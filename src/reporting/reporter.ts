import type { AffectedSetSource } from "../graph/schema.js";
import type { RunObserver, UnitProgress } from "../testing/orchestrator.js";
import type { RunReport, UnitOutcome } from "../testing/result.js";

// =============================================================================
// TYPES
// =============================================================================

export type TextSink = {
  write(chunk: string): unknown;
};

export type PlanSummary = {
  source: AffectedSetSource;
  directCount: number;
  dependentCount: number;
  includeDependents: boolean;
  unmappedPaths: string[];
};

/** Progress and result output for one run; the orchestrator drives it as its observer. */
export interface Reporter extends RunObserver {
  planSummary(plan: PlanSummary): void;
  noUnits(): void;
  dryRun(): void;
  unitStart(progress: UnitProgress): void;
  unitResult(progress: UnitProgress & { outcome: UnitOutcome }): void;
  report(report: RunReport): void;
}
