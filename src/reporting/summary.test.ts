import { describe, expect, it } from "vitest";

import { outcome, runReport } from "../__tests__/report.fixtures.js";
import { createAnsiFormatter } from "../core/error-format.js";

import { renderHumanReport, renderSummaryLine, summarize, toStructuredReport } from "./summary.js";

// =============================================================================
// FIXTURES
// =============================================================================

const failFastReport = runReport([
  outcome({ unit_id: "alpha" }),
  outcome({
    unit_id: "bravo",
    status: "failed",
    exit_code: 101,
    output: "thread 'main' panicked\n",
    error: { kind: "test-failure", message: "Test command exited with code 101." },
  }),
  outcome({
    unit_id: "charlie",
    direct: false,
    status: "skipped",
    exit_code: null,
    duration_ms: 0,
    skip_reason: "fail-fast",
  }),
]);

const passingReport = runReport([outcome({ unit_id: "alpha" }), outcome({ unit_id: "bravo" })]);

// =============================================================================
// TESTS
// =============================================================================

describe("summarize", () => {
  it("maps success to 0 and failure to the tests-failed exit code", () => {
    expect(summarize(passingReport)).toBe(0);
    expect(summarize(failFastReport)).toBe(20);
  });

  it("treats a dry run as success", () => {
    const dryRun = runReport(
      [outcome({ unit_id: "alpha", status: "skipped", exit_code: null, skip_reason: "dry-run" })],
      { dry_run: true },
    );

    expect(summarize(dryRun)).toBe(0);
  });
});

describe("toStructuredReport", () => {
  it("lists every unit with status, exit code and output", () => {
    const structured = toStructuredReport(failFastReport);

    expect(structured.status).toBe("failure");
    expect(structured.final_state).toBe("stopped");
    expect(structured.stop_reason).toBe("fail-fast");
    expect(structured.counts).toEqual({ total: 3, passed: 1, failed: 1, skipped: 1 });
    expect(structured.units).toEqual([
      {
        unit_id: "alpha",
        name: "alpha",
        direct: true,
        status: "passed",
        exit_code: 0,
        duration_ms: 10,
        skip_reason: null,
        error: null,
        output: "",
      },
      {
        unit_id: "bravo",
        name: "bravo",
        direct: true,
        status: "failed",
        exit_code: 101,
        duration_ms: 10,
        skip_reason: null,
        error: { kind: "test-failure", message: "Test command exited with code 101." },
        output: "thread 'main' panicked\n",
      },
      {
        unit_id: "charlie",
        name: "charlie",
        direct: false,
        status: "skipped",
        exit_code: null,
        duration_ms: 0,
        skip_reason: "fail-fast",
        error: null,
        output: "",
      },
    ]);
  });

  it("round-trips through JSON unchanged", () => {
    const structured = toStructuredReport(failFastReport);

    expect(JSON.parse(JSON.stringify(structured))).toEqual(structured);
  });
});

describe("renderHumanReport", () => {
  it("prints failed output, failed and skipped lists, then the summary line", () => {
    expect(renderHumanReport(failFastReport, { verbose: false })).toBe(
      [
        "failed crate output:",
        "",
        "---- bravo output ----",
        "thread 'main' panicked",
        "",
        "failed crates:",
        "    bravo",
        "",
        "skipped crates (fail-fast):",
        "    charlie",
        "",
        "test result: FAILED. 1 passed; 1 failed; 1 skipped; finished in 1.23s",
      ].join("\n"),
    );
  });

  it("omits captured output in verbose mode", () => {
    const rendered = renderHumanReport(failFastReport, { verbose: true });

    expect(rendered.split("\n").slice(0, 3)).toEqual(["failed crates:", "    bravo", ""]);
    expect(rendered).not.toContain("failed crate output:");
  });

  it("prints only the summary line when everything passed", () => {
    expect(renderHumanReport(passingReport, { verbose: false })).toBe(
      "test result: ok. 2 passed; 0 failed; 0 skipped; finished in 1.23s",
    );
  });

  it("falls back to the error message when a failed unit produced no output", () => {
    const report = runReport([
      outcome({
        unit_id: "alpha",
        status: "failed",
        exit_code: null,
        error: { kind: "invocation", message: "Failed to start `cargo test -p alpha`: spawn cargo ENOENT" },
      }),
    ]);

    expect(renderHumanReport(report, { verbose: false }).split("\n").slice(0, 4)).toEqual([
      "failed crate output:",
      "",
      "---- alpha output ----",
      "Failed to start `cargo test -p alpha`: spawn cargo ENOENT",
    ]);
  });

  it("lists the planned units for a dry run", () => {
    const report = runReport(
      [
        outcome({ unit_id: "alpha", status: "skipped", exit_code: null, skip_reason: "dry-run" }),
        outcome({
          unit_id: "bravo",
          direct: false,
          status: "skipped",
          exit_code: null,
          skip_reason: "dry-run",
        }),
      ],
      { dry_run: true, duration_ms: 0 },
    );

    expect(renderHumanReport(report, { verbose: false })).toBe(
      [
        "crates that would be tested:",
        "    alpha",
        "    bravo (dependent)",
        "",
        "test result: ok. 0 passed; 0 failed; 2 skipped; finished in 0.00s",
      ].join("\n"),
    );
  });
});

describe("renderSummaryLine", () => {
  it("colors the verdict when a formatter is enabled", () => {
    expect(renderSummaryLine(passingReport, createAnsiFormatter(true))).toBe(
      "test result: \x1b[32m\x1b[1mok\x1b[22m\x1b[39m. 2 passed; 0 failed; 0 skipped; finished in 1.23s",
    );
  });
});
