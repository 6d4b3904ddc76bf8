import { createAnsiFormatter, type AnsiFormatter } from "../core/error-format.js";
import { pluralize } from "../core/utils.js";
import type { UnitProgress } from "../testing/orchestrator.js";
import type { RunReport, UnitOutcome } from "../testing/result.js";

import type { PlanSummary, Reporter, TextSink } from "./reporter.js";
import { renderHumanReport } from "./summary.js";

export type ConsoleReporterOptions = {
  verbose: boolean;
  format?: AnsiFormatter;
};

export class ConsoleReporter implements Reporter {
  private readonly verbose: boolean;
  private readonly format: AnsiFormatter;

  constructor(
    private readonly sink: TextSink,
    options: ConsoleReporterOptions,
  ) {
    this.verbose = options.verbose;
    this.format = options.format ?? createAnsiFormatter(false);
  }

  planSummary(plan: PlanSummary): void {
    if (plan.source === "override") {
      this.sink.write(
        `re-running ${plan.directCount} selected ${pluralize(plan.directCount, "crate")}\n\n`,
      );
    } else {
      const skipping = plan.includeDependents ? "" : "skipping ";
      this.sink.write(
        `discovered ${plan.directCount} changed ${pluralize(plan.directCount, "crate")}; ` +
          `${skipping}${plan.dependentCount} dependent ${pluralize(plan.dependentCount, "crate")}\n\n`,
      );
    }

    if (this.verbose && plan.unmappedPaths.length > 0) {
      const count = plan.unmappedPaths.length;
      this.note(`ignoring ${count} changed ${pluralize(count, "path")} outside any crate`);
      for (const unmapped of plan.unmappedPaths) {
        this.sink.write(`    ${unmapped}\n`);
      }
      this.sink.write("\n");
    }
  }

  noUnits(): void {
    this.sink.write("no crates to test\n");
  }

  dryRun(): void {
    this.note("dry run mode enabled, skipping actual tests");
  }

  unitStart(progress: UnitProgress): void {
    if (this.verbose) {
      this.sink.write(`test crate ${progress.unit.name}\n`);
      return;
    }
    this.sink.write(`test crate ${progress.unit.name} ... `);
  }

  unitResult(progress: UnitProgress & { outcome: UnitOutcome }): void {
    if (this.verbose) {
      this.sink.write("\n");
      return;
    }

    const verdict =
      progress.outcome.status === "passed"
        ? this.format("ok", ["bold", "green"])
        : this.format("FAILED", ["bold", "red"]);
    this.sink.write(`${verdict}\n`);
  }

  report(report: RunReport): void {
    this.sink.write("\n");
    this.sink.write(`${renderHumanReport(report, { verbose: this.verbose, format: this.format })}\n`);
  }

  private note(message: string): void {
    this.sink.write(`${this.format("note", ["bold", "cyan"])}: ${message}\n`);
  }
}
