import { Command, type ParseOptions } from "commander";

import { ConfigError } from "../core/errors.js";

import { readCliFlags, registerTestChangedFlags } from "./flags.js";
import { createDefaultPorts, testChangedCommand, type TestChangedPorts } from "./test-changed.js";

// =============================================================================
// RUNNER ARGUMENTS
// =============================================================================

export type SplitArgv = {
  cliArgv: string[];
  runnerArgs: string[];
};

// Everything after the first `--` belongs to the test runner and never reaches commander.
export function splitRunnerArgs(argv: readonly string[]): SplitArgv {
  const separator = argv.indexOf("--");
  if (separator === -1) {
    return { cliArgv: [...argv], runnerArgs: [] };
  }
  return { cliArgv: argv.slice(0, separator), runnerArgs: argv.slice(separator + 1) };
}

class TestChangedProgram extends Command {
  runnerArgs: string[] = [];

  override async parseAsync(argv?: readonly string[], parseOptions?: ParseOptions): Promise<this> {
    const { cliArgv, runnerArgs } = splitRunnerArgs(argv ?? process.argv);
    this.runnerArgs = runnerArgs;
    return super.parseAsync(cliArgv, parseOptions);
  }
}

function rejectStrayArguments(operands: readonly string[]): void {
  const [first] = operands;
  if (first === undefined) return;

  throw new ConfigError(`Unexpected argument '${first}'.`, {
    hint: "Pass test runner arguments after --, e.g. `test-changed -- --nocapture`.",
  });
}

// =============================================================================
// PROGRAM
// =============================================================================

export function buildCli(resolvePorts: () => TestChangedPorts = createDefaultPorts): Command {
  const program = new TestChangedProgram();

  program
    .name("test-changed")
    .description("Run tests for the Cargo crates affected by your changes")
    .version("0.1.0")
    .usage("[options] [-- runner-args...]");

  registerTestChangedFlags(program);

  program.action(async (_opts: unknown, command: Command) => {
    rejectStrayArguments(command.args);
    process.exitCode = await testChangedCommand(
      { flags: readCliFlags(command), passthroughArgs: program.runnerArgs },
      resolvePorts(),
    );
  });

  return program;
}
