/**
 * Test command invoker.
 * Purpose: run one unit's test command and capture its combined output and exit status.
 * Assumptions: one command runs at a time; the caller decides what a nonzero exit means.
 * Usage: createCommandInvoker({ runner, cwd }).invoke({ unit, args, onOutput }).
 */

import { StringDecoder } from "node:string_decoder";

import { execa } from "execa";

import { InvocationError } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import { isRecord } from "../core/utils.js";
import type { Unit } from "../graph/schema.js";

import { formatTestCommand, type TestRunner } from "./test-runner.js";

// =============================================================================
// TYPES
// =============================================================================

export type InvocationRequest = {
  unit: Unit;
  args: readonly string[];
  onOutput?: (chunk: string) => void;
};

export type InvocationResult =
  | { kind: "exited"; exitCode: number; output: string }
  | { kind: "start-failed"; error: InvocationError; output: string };

export interface TestInvoker {
  readonly name: string;
  invoke(request: InvocationRequest): Promise<InvocationResult>;
}

export type CommandInvokerOptions = {
  runner: TestRunner;
  cwd: string;
};

// Reported when a command ends without an exit code (terminated by a signal).
export const SIGNAL_EXIT_CODE = -1;

// =============================================================================
// PUBLIC API
// =============================================================================

export function createCommandInvoker(options: CommandInvokerOptions): TestInvoker {
  const { runner, cwd } = options;

  return {
    name: runner.name,
    invoke: async (request) => {
      const base = runner.command(request.unit.name);
      const command = { file: base.file, args: [...base.args, ...request.args] };
      const display = formatTestCommand(command);

      try {
        const subprocess = execa(command.file, command.args, {
          cwd,
          all: true,
          reject: false,
          stdin: "ignore",
          env: process.env,
        });

        // A multi-byte character can straddle two chunks; the decoder holds the partial bytes.
        const decoder = new StringDecoder("utf8");
        const onOutput = request.onOutput;
        if (onOutput && subprocess.all) {
          subprocess.all.on("data", (chunk: Buffer | string) => {
            const text = typeof chunk === "string" ? chunk : decoder.write(chunk);
            if (text.length > 0) onOutput(text);
          });
        }

        const res = await subprocess;
        const rest = decoder.end();
        if (onOutput && rest.length > 0) onOutput(rest);
        const output = res.all ?? "";

        if (typeof res.exitCode === "number") {
          return { kind: "exited", exitCode: res.exitCode, output };
        }
        if (res.signal) {
          return { kind: "exited", exitCode: SIGNAL_EXIT_CODE, output };
        }

        return {
          kind: "start-failed",
          error: new InvocationError(display, describeStartFailure(res)),
          output,
        };
      } catch (err) {
        return {
          kind: "start-failed",
          error: new InvocationError(display, formatErrorMessage(err), err),
          output: "",
        };
      }
    },
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function describeStartFailure(result: unknown): string {
  if (isRecord(result)) {
    for (const key of ["originalMessage", "shortMessage", "message"]) {
      const value = result[key];
      if (typeof value === "string" && value.length > 0) {
        return value;
      }
    }
  }
  return "process did not report an exit status";
}
