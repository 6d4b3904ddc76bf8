// Error taxonomy for test-changed.
// Fatal errors (config, graph, diff, runner availability) abort a run before any test command
// starts. InvocationError is never thrown past the orchestrator: it becomes a failed outcome.

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  graph: "GRAPH_ERROR",
  diff: "DIFF_ERROR",
  runnerNotInstalled: "RUNNER_NOT_INSTALLED",
  invocation: "INVOCATION_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export const EXIT_CODES = {
  success: 0,
  unknown: 1,
  config: 2,
  runnerNotInstalled: 10,
  testsFailed: 20,
  graph: 40,
  diff: 50,
} as const;

export const GRAPH_ERROR_REASONS = {
  unknownDependency: "UNKNOWN_DEPENDENCY",
  duplicateUnit: "DUPLICATE_UNIT",
  metadataUnavailable: "METADATA_UNAVAILABLE",
} as const;

export type GraphErrorReason = (typeof GRAPH_ERROR_REASONS)[keyof typeof GRAPH_ERROR_REASONS];

// =============================================================================
// BASE CLASSES
// =============================================================================

export class TestChangedError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "TestChangedError";
  }
}

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
  exitCode?: number;
};

export class UserFacingError extends TestChangedError {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly exitCode: number;

  constructor(input: UserFacingErrorInput) {
    super(input.message, input.cause);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.exitCode = input.exitCode ?? EXIT_CODES.unknown;
  }
}

// =============================================================================
// FATAL ERRORS
// =============================================================================

export class ConfigError extends UserFacingError {
  constructor(message: string, options: { cause?: unknown; hint?: string } = {}) {
    super({
      code: USER_FACING_ERROR_CODES.config,
      title: "Configuration invalid.",
      message,
      hint: options.hint,
      cause: options.cause,
      exitCode: EXIT_CODES.config,
    });
    this.name = "ConfigError";
  }
}

export class GraphError extends UserFacingError {
  readonly reason: GraphErrorReason;
  readonly unitId?: string;

  constructor(input: {
    reason: GraphErrorReason;
    message: string;
    unitId?: string;
    hint?: string;
    cause?: unknown;
  }) {
    super({
      code: USER_FACING_ERROR_CODES.graph,
      title: "Workspace graph invalid.",
      message: input.message,
      hint: input.hint,
      cause: input.cause,
      exitCode: EXIT_CODES.graph,
    });
    this.name = "GraphError";
    this.reason = input.reason;
    this.unitId = input.unitId;
  }
}

export class DiffError extends UserFacingError {
  readonly stdout: string;
  readonly stderr: string;

  constructor(
    message: string,
    output: { stdout?: string; stderr?: string; cause?: unknown; hint?: string } = {},
  ) {
    super({
      code: USER_FACING_ERROR_CODES.diff,
      title: "Could not list changed files.",
      message,
      hint: output.hint,
      cause: output.cause,
      exitCode: EXIT_CODES.diff,
    });
    this.name = "DiffError";
    this.stdout = output.stdout ?? "";
    this.stderr = output.stderr ?? "";
  }
}

export class RunnerNotInstalledError extends UserFacingError {
  readonly runnerName: string;

  constructor(runnerName: string, installationTip: string) {
    super({
      code: USER_FACING_ERROR_CODES.runnerNotInstalled,
      title: "Test runner not installed.",
      message: `Test runner '${runnerName}' is not installed.`,
      hint: installationTip,
      exitCode: EXIT_CODES.runnerNotInstalled,
    });
    this.name = "RunnerNotInstalledError";
    this.runnerName = runnerName;
  }
}

// =============================================================================
// PER-UNIT ERRORS
// =============================================================================

export class InvocationError extends TestChangedError {
  readonly command: string;

  constructor(command: string, reason: string, cause?: unknown) {
    super(`Failed to start \`${command}\`: ${reason}`, cause);
    this.name = "InvocationError";
    this.command = command;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function resolveExitCode(error: unknown): number {
  if (error instanceof UserFacingError) {
    return error.exitCode;
  }
  return EXIT_CODES.unknown;
}
