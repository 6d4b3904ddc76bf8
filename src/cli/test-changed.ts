/*
Purpose: the test-changed command: detect changes, pick the affected crates, run their tests.
Assumptions: fatal errors propagate to the entrypoint, which renders them and sets the exit code.
Usage: process.exitCode = await testChangedCommand({ flags, passthroughArgs }, createDefaultPorts());
*/

import path from "node:path";

import { resolveProjectConfig } from "../core/config-loader.js";
import { formatErrorMessage, resolveColorEnabled } from "../core/error-format.js";
import { ConfigError, EXIT_CODES } from "../core/errors.js";
import { JsonlLogger, logRunEvent } from "../core/logger.js";
import { compareStrings, defaultRunId } from "../core/utils.js";
import { createGitVcs, type Vcs } from "../git/vcs.js";
import { countDependents, expandAffectedSet, overrideAffectedSet } from "../graph/expand.js";
import { toPosixPath } from "../graph/paths.js";
import { collectChangedPaths, resolveChangedUnits } from "../graph/resolve.js";
import type { AffectedSet } from "../graph/schema.js";
import { UnitGraph } from "../graph/unit-graph.js";
import { createReporter, summarize, type PlanSummary, type TextSink } from "../reporting/index.js";
import { createCommandInvoker, type TestInvoker } from "../runner/invoker.js";
import { ensureRunnerInstalled, resolveTestRunner, type TestRunner } from "../runner/test-runner.js";
import { TestOrchestrator } from "../testing/orchestrator.js";
import { createCargoMetadataProvider } from "../workspace/cargo-metadata.js";
import type { WorkspaceMetadataProvider } from "../workspace/schema.js";

import { resolveChangeSelection, resolveRunSettings, type ChangeSelection, type CliFlags } from "./flags.js";

// =============================================================================
// TYPES
// =============================================================================

export type OutputStream = TextSink & { isTTY?: boolean };

export type TestChangedPorts = {
  vcs: Vcs;
  metadata: WorkspaceMetadataProvider;
  createInvoker: (runner: TestRunner, cwd: string) => TestInvoker;
  checkRunner: (runner: TestRunner, cwd: string) => Promise<void>;
  stdout: OutputStream;
  stderr: OutputStream;
  cwd: string;
  now?: () => Date;
};

export type TestChangedInput = {
  flags: CliFlags;
  passthroughArgs: string[];
};

type Plan = {
  affected: AffectedSet;
  summary: PlanSummary;
};

export function createDefaultPorts(): TestChangedPorts {
  return {
    vcs: createGitVcs(),
    metadata: createCargoMetadataProvider(),
    createInvoker: (runner, cwd) => createCommandInvoker({ runner, cwd }),
    checkRunner: ensureRunnerInstalled,
    stdout: process.stdout,
    stderr: process.stderr,
    cwd: process.cwd(),
  };
}

// =============================================================================
// COMMAND
// =============================================================================

export async function testChangedCommand(
  input: TestChangedInput,
  ports: TestChangedPorts,
): Promise<number> {
  const { flags } = input;
  const selection = resolveChangeSelection(flags);
  const workspaceDir = path.resolve(ports.cwd, flags.workspace ?? ".");

  const { config } = resolveProjectConfig({
    workspaceRoot: workspaceDir,
    explicitPath: flags.config !== undefined ? path.resolve(ports.cwd, flags.config) : undefined,
  });
  const settings = resolveRunSettings({
    flags,
    config,
    passthroughArgs: input.passthroughArgs,
    cwd: ports.cwd,
  });

  const metadata = await ports.metadata.load(workspaceDir);
  const graph = UnitGraph.build({ workspaceRoot: metadata.workspace_root, units: metadata.units });

  const runId = defaultRunId(ports.now?.());
  const logger = settings.logFile ? openRunLog(settings.logFile, runId) : undefined;
  const reporter = createReporter({
    output: settings.output,
    sink: ports.stdout,
    verbose: settings.verbose,
    useColor: resolveColorEnabled({ stream: ports.stdout }),
  });

  try {
    const plan = await planAffectedSet({
      selection,
      graph,
      includeDependents: settings.includeDependents,
      vcs: ports.vcs,
      workspaceDir,
      logger,
    });
    reporter.planSummary(plan.summary);

    if (plan.affected.unit_ids.length === 0) {
      reporter.noUnits();
      logRunEvent(logger, "run.skip", { payload: { reason: "no-units" } });
      return EXIT_CODES.success;
    }

    const runner = resolveTestRunner(settings.runner);
    if (settings.dryRun) {
      reporter.dryRun();
    } else {
      await ports.checkRunner(runner, graph.workspaceRoot);
    }

    // Streamed output shares stdout with human progress but must stay off the JSON event stream.
    const outputSink = settings.output === "json" ? ports.stderr : ports.stdout;
    const orchestrator = new TestOrchestrator({
      invoker: ports.createInvoker(runner, graph.workspaceRoot),
      runId,
      failFast: settings.failFast,
      dryRun: settings.dryRun,
      runnerArgs: settings.runnerArgs,
      onOutput: settings.verbose ? (chunk) => outputSink.write(chunk) : undefined,
      observer: reporter,
      logger,
    });

    const report = await orchestrator.run(plan.affected, graph);
    reporter.report(report);
    return summarize(report);
  } finally {
    logger?.close();
  }
}

// =============================================================================
// PLANNING
// =============================================================================

async function planAffectedSet(input: {
  selection: ChangeSelection;
  graph: UnitGraph;
  includeDependents: boolean;
  vcs: Vcs;
  workspaceDir: string;
  logger?: JsonlLogger;
}): Promise<Plan> {
  const { selection, graph } = input;

  if (selection.mode === "override") {
    const affected = overrideAffectedSet(selection.crates, graph);
    return {
      affected,
      summary: {
        source: "override",
        directCount: affected.unit_ids.length,
        dependentCount: 0,
        includeDependents: false,
        unmappedPaths: [],
      },
    };
  }

  const repoRoot = await input.vcs.resolveRepoRoot(input.workspaceDir);
  const files =
    selection.mode === "range"
      ? await input.vcs.listChangesBetween(repoRoot, selection.from, selection.to)
      : await input.vcs.listUncommittedChanges(repoRoot);

  const changedPaths = collectChangedPaths(files).map((file) => path.join(repoRoot, file));
  const resolution = resolveChangedUnits(changedPaths, graph);
  const unmappedPaths = resolution.unmapped_paths.map((file) =>
    toPosixPath(path.relative(repoRoot, file)),
  );

  logRunEvent(input.logger, "changes.resolved", {
    payload: {
      mode: selection.mode,
      changed_files: files.length,
      direct_units: [...resolution.unit_ids].sort(compareStrings),
      unmapped_paths: unmappedPaths,
    },
  });

  const affected = expandAffectedSet(resolution.unit_ids, graph, input.includeDependents);
  return {
    affected,
    summary: {
      source: "changes",
      directCount: affected.direct_unit_ids.length,
      dependentCount: countDependents(resolution.unit_ids, graph),
      includeDependents: input.includeDependents,
      unmappedPaths,
    },
  };
}

// =============================================================================
// RUN LOG
// =============================================================================

function openRunLog(logFile: string, runId: string): JsonlLogger {
  try {
    return new JsonlLogger(logFile, { runId });
  } catch (err) {
    throw new ConfigError(`Cannot open log file ${logFile}: ${formatErrorMessage(err)}`, {
      cause: err,
      hint: "Point --log-file (or log_file in the config) at a writable file path.",
    });
  }
}
