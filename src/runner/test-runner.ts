/**
 * Test runner variants.
 * Purpose: describe how each supported runner builds its per-unit command and checks availability.
 * Assumptions: both variants are cargo subcommands run from the workspace root.
 * Usage: resolveTestRunner(config.runner).command("core") -> { file: "cargo", args: [...] }.
 */

import { execa } from "execa";

import type { TestRunnerKind } from "../core/config.js";
import { RunnerNotInstalledError } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type TestCommand = {
  file: string;
  args: string[];
};

export type TestRunner = {
  kind: TestRunnerKind;
  name: string;
  command(unitName: string): TestCommand;
  // null when the runner ships with the toolchain and needs no check.
  installCheck: TestCommand | null;
  installationTip: string;
};

// =============================================================================
// RUNNERS
// =============================================================================

const CARGO_RUNNER: TestRunner = {
  kind: "cargo",
  name: "cargo",
  command: (unitName) => ({ file: "cargo", args: ["test", "-p", unitName] }),
  installCheck: null,
  installationTip: "cargo ships with the Rust toolchain; install it from https://rustup.rs.",
};

const NEXTEST_RUNNER: TestRunner = {
  kind: "nextest",
  name: "nextest",
  command: (unitName) => ({
    file: "cargo",
    args: ["nextest", "run", "--no-tests=pass", "-p", unitName],
  }),
  installCheck: { file: "cargo", args: ["nextest", "--version"] },
  installationTip: "To install nextest, run `cargo install cargo-nextest`.",
};

const TEST_RUNNERS: Record<TestRunnerKind, TestRunner> = {
  cargo: CARGO_RUNNER,
  nextest: NEXTEST_RUNNER,
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function resolveTestRunner(kind: TestRunnerKind): TestRunner {
  return TEST_RUNNERS[kind];
}

export function formatTestCommand(command: TestCommand): string {
  return [command.file, ...command.args].join(" ");
}

export async function isRunnerInstalled(runner: TestRunner, cwd: string): Promise<boolean> {
  if (!runner.installCheck) {
    return true;
  }

  const res = await execa(runner.installCheck.file, runner.installCheck.args, {
    cwd,
    stdio: "ignore",
    reject: false,
  });
  return !res.failed && res.exitCode === 0;
}

export async function ensureRunnerInstalled(runner: TestRunner, cwd: string): Promise<void> {
  if (await isRunnerInstalled(runner, cwd)) {
    return;
  }
  throw new RunnerNotInstalledError(runner.name, runner.installationTip);
}
