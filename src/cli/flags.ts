import path from "node:path";

import type { Command } from "commander";

import {
  TEST_RUNNER_KINDS,
  type OutputFormat,
  type ProjectConfig,
  type TestRunnerKind,
} from "../core/config.js";
import { ConfigError } from "../core/errors.js";

export type CliFlags = {
  workspace?: string;
  config?: string;
  from?: string;
  to?: string;
  runner?: string;
  skipDependents?: boolean;
  dependents?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
  failFast?: boolean;
  crates?: string;
  json?: boolean;
  logFile?: string;
  debug?: boolean;
};

export type ChangeSelection =
  | { mode: "uncommitted" }
  | { mode: "range"; from: string; to: string }
  | { mode: "override"; crates: string[] };

export type RunSettings = {
  runner: TestRunnerKind;
  includeDependents: boolean;
  failFast: boolean;
  dryRun: boolean;
  verbose: boolean;
  output: OutputFormat;
  runnerArgs: string[];
  logFile: string | null;
};

// =============================================================================
// FLAG REGISTRATION
// =============================================================================

export function registerTestChangedFlags(command: Command): void {
  command
    .option("-w, --workspace <path>", "Workspace directory (default: current working directory)")
    .option(
      "-c, --config <path>",
      "Config file (default: <workspace>/.test-changed.yaml or .test-changed.yml)",
    )
    .option("--from <ref>", "Test changes since this git ref instead of uncommitted changes")
    .option("--to <ref>", "End of the --from range (default: HEAD)")
    .option("-r, --runner <name>", `Test runner (${TEST_RUNNER_KINDS.join(" | ")})`)
    .option("-s, --skip-dependents", "Test only the crates that changed")
    .option("--dependents", "Also test crates that depend on the changed ones")
    .option("-d, --dry-run", "List the crates that would be tested without running them")
    .option("-v, --verbose", "Stream test output while it runs")
    .option("--fail-fast", "Stop after the first failing crate")
    .option("--no-fail-fast", "Test every crate even after a failure")
    .option("--crates <names>", "Comma-separated crates to re-run, ignoring detected changes")
    .option("--json", "Emit JSON Lines events instead of human output")
    .option("--log-file <path>", "Append run events to a JSONL log file")
    .option("--debug", "Show error codes, causes and stack traces");
}

// =============================================================================
// FLAG RESOLUTION
// =============================================================================

export function readCliFlags(command: Command): CliFlags {
  return command.opts<CliFlags>();
}

export function resolveChangeSelection(flags: CliFlags): ChangeSelection {
  if (flags.to !== undefined && flags.from === undefined) {
    throw new ConfigError("--to requires --from.", {
      hint: "Pass --from <ref> to select a commit range, or drop --to to test uncommitted changes.",
    });
  }

  if (flags.crates !== undefined) {
    if (flags.from !== undefined) {
      throw new ConfigError("--crates cannot be combined with --from.", {
        hint: "Use --crates to re-run specific crates, or --from to test a commit range.",
      });
    }

    const crates = parseCrateList(flags.crates);
    if (crates.length === 0) {
      throw new ConfigError("--crates needs at least one crate name.", {
        hint: "Pass a comma-separated list, e.g. --crates core,cli.",
      });
    }
    return { mode: "override", crates };
  }

  if (flags.from !== undefined) {
    return { mode: "range", from: flags.from, to: flags.to ?? "HEAD" };
  }

  return { mode: "uncommitted" };
}

/** Flags override the config file; the config file already carries the defaults. */
export function resolveRunSettings(input: {
  flags: CliFlags;
  config: ProjectConfig;
  passthroughArgs: string[];
  cwd: string;
}): RunSettings {
  const { flags, config } = input;

  if (flags.skipDependents && flags.dependents) {
    throw new ConfigError("--skip-dependents and --dependents cannot be combined.");
  }

  let includeDependents = config.include_dependents;
  if (flags.skipDependents) includeDependents = false;
  if (flags.dependents) includeDependents = true;

  const logFile =
    flags.logFile !== undefined ? path.resolve(input.cwd, flags.logFile) : (config.log_file ?? null);

  return {
    runner: flags.runner !== undefined ? parseRunnerKind(flags.runner) : config.runner,
    includeDependents,
    failFast: flags.failFast ?? config.fail_fast,
    dryRun: flags.dryRun ?? false,
    verbose: flags.verbose ?? config.verbose,
    output: flags.json ? "json" : config.output,
    runnerArgs: [...config.runner_args, ...input.passthroughArgs],
    logFile,
  };
}

export function parseCrateList(raw: string): string[] {
  const crates: string[] = [];
  for (const part of raw.split(",")) {
    const name = part.trim();
    if (name.length > 0 && !crates.includes(name)) {
      crates.push(name);
    }
  }
  return crates;
}

function parseRunnerKind(value: string): TestRunnerKind {
  const kind = TEST_RUNNER_KINDS.find((candidate) => candidate === value);
  if (!kind) {
    throw new ConfigError(`Unknown test runner '${value}'.`, {
      hint: `Expected one of: ${TEST_RUNNER_KINDS.join(", ")}.`,
    });
  }
  return kind;
}
