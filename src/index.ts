#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { CommanderError, type Command } from "commander";

import { renderErrorReport, resolveDebugFlagFromArgv } from "./core/error-format.js";
import { buildCli } from "./cli/index.js";
import { ConfigError, EXIT_CODES, resolveExitCode } from "./core/errors.js";

// =============================================================================
// ERROR HANDLING
// =============================================================================

function configureCliErrorHandling(program: Command): void {
  program.configureOutput({
    outputError: (_message: string, _write: (chunk: string) => void) => undefined,
  });

  program.exitOverride();
}

function isHelpOrVersionExit(error: unknown): boolean {
  if (!(error instanceof CommanderError)) {
    return false;
  }

  return (
    error.code === "commander.helpDisplayed" ||
    error.code === "commander.version" ||
    error.code === "commander.help"
  );
}

function resolveDebugEnabled(argv: string[], program: Command): boolean {
  const argvDebug = resolveDebugFlagFromArgv(argv);
  if (argvDebug !== undefined) {
    return argvDebug;
  }

  const options = program.opts<{ debug?: boolean }>();
  return Boolean(options.debug);
}

// Commander reports usage mistakes (unknown option, missing value) as its own errors.
function normalizeCliError(error: unknown): unknown {
  if (!(error instanceof CommanderError)) {
    return error;
  }
  return new ConfigError(error.message.replace(/^error:\s*/, ""), {
    cause: error,
    hint: "Run `test-changed --help` for usage.",
  });
}

export async function main(argv: string[], program: Command = buildCli()): Promise<void> {
  configureCliErrorHandling(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (isHelpOrVersionExit(error)) {
      process.exitCode = EXIT_CODES.success;
      return;
    }

    const normalized = normalizeCliError(error);
    const debug = resolveDebugEnabled(argv, program);
    console.error(renderErrorReport(normalized, { debug }));
    process.exitCode = resolveExitCode(normalized);
  }
}

// =============================================================================
// DIRECT EXECUTION
// =============================================================================

function isDirectExecution(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  // npm links the bin through a symlink; the module URL points at the real file.
  return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
}

if (isDirectExecution()) {
  void main(process.argv);
}
