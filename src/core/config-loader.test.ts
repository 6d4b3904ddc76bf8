import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { loadProjectConfig, resolveProjectConfig } from "./config-loader.js";
import { ConfigError } from "./errors.js";

// =============================================================================
// HELPERS
// =============================================================================

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
  delete process.env.TEST_CHANGED_LOG_DIR;
});

function makeWorkspace(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "test-changed-config-"));
  tempDirs.push(dir);
  return dir;
}

function writeConfig(dir: string, fileName: string, contents: string): string {
  const configPath = path.join(dir, fileName);
  fs.writeFileSync(configPath, contents, "utf8");
  return configPath;
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}

// =============================================================================
// TESTS
// =============================================================================

describe("loadProjectConfig", () => {
  it("applies defaults for omitted keys", () => {
    const dir = makeWorkspace();
    const configPath = writeConfig(dir, ".test-changed.yaml", "runner: nextest\n");

    expect(loadProjectConfig(configPath)).toEqual({
      runner: "nextest",
      include_dependents: true,
      fail_fast: true,
      verbose: false,
      output: "human",
      runner_args: [],
      log_file: undefined,
    });
  });

  it("treats an empty file as all defaults", () => {
    const dir = makeWorkspace();
    const configPath = writeConfig(dir, ".test-changed.yaml", "");

    expect(loadProjectConfig(configPath).runner).toBe("cargo");
  });

  it("expands environment variables and resolves log_file against the config directory", () => {
    const dir = makeWorkspace();
    process.env.TEST_CHANGED_LOG_DIR = "logs";
    const configPath = writeConfig(
      dir,
      ".test-changed.yaml",
      "log_file: ${TEST_CHANGED_LOG_DIR}/events.jsonl\nrunner_args: [\"--quiet\"]\n",
    );

    const config = loadProjectConfig(configPath);

    expect(config.log_file).toBe(path.join(dir, "logs", "events.jsonl"));
    expect(config.runner_args).toEqual(["--quiet"]);
  });

  it("names the key path of an unset environment variable", () => {
    const dir = makeWorkspace();
    const configPath = writeConfig(dir, ".test-changed.yaml", "runner_args:\n  - ${MISSING_TC_VAR}\n");

    const error = captureError(() => loadProjectConfig(configPath));

    expect(error).toBeInstanceOf(ConfigError);
    expect((error as ConfigError).message).toBe(
      `Environment variable MISSING_TC_VAR is not set but is referenced in ${configPath} (runner_args.0).`,
    );
    expect((error as ConfigError).hint).toBe(
      "Fix the config file and rerun, or pass --config <path>.",
    );
  });

  it("rejects unknown keys and invalid enum values", () => {
    const dir = makeWorkspace();
    const configPath = writeConfig(dir, ".test-changed.yaml", "runner: jest\nparallel: 4\n");

    const error = captureError(() => loadProjectConfig(configPath));

    expect(error).toBeInstanceOf(ConfigError);
    const message = (error as ConfigError).message;
    expect(message).toContain(`Invalid config at ${configPath}:`);
    expect(message).toContain('runner: Expected one of "cargo", "nextest", received "jest"');
    expect(message).toContain("<root>: Unrecognized keys: parallel");
  });

  it("reports YAML parse errors with line and column", () => {
    const dir = makeWorkspace();
    const configPath = writeConfig(dir, ".test-changed.yaml", "runner: cargo\nfail_fast: [\n");

    const error = captureError(() => loadProjectConfig(configPath));

    expect(error).toBeInstanceOf(ConfigError);
    expect((error as ConfigError).message).toMatch(
      /^Failed to parse YAML config at .+ \(line \d+, column \d+\): /,
    );
  });

  it("fails when the file does not exist", () => {
    const dir = makeWorkspace();
    const missing = path.join(dir, "nope.yaml");

    const error = captureError(() => loadProjectConfig(missing));

    expect(error).toBeInstanceOf(ConfigError);
    expect((error as ConfigError).message).toBe(`Config file not found at ${missing}.`);
  });
});

describe("resolveProjectConfig", () => {
  it("falls back to defaults when the workspace has no config file", () => {
    const dir = makeWorkspace();

    const resolution = resolveProjectConfig({ workspaceRoot: dir });

    expect(resolution.source).toBe("defaults");
    expect(resolution.configPath).toBeNull();
    expect(resolution.config.fail_fast).toBe(true);
  });

  it("discovers the .yml variant", () => {
    const dir = makeWorkspace();
    const configPath = writeConfig(dir, ".test-changed.yml", "include_dependents: false\n");

    const resolution = resolveProjectConfig({ workspaceRoot: dir });

    expect(resolution.source).toBe("workspace");
    expect(resolution.configPath).toBe(configPath);
    expect(resolution.config.include_dependents).toBe(false);
  });

  it("resolves an explicit path relative to the workspace", () => {
    const dir = makeWorkspace();
    fs.mkdirSync(path.join(dir, "ci"));
    writeConfig(dir, "ci/test-changed.yaml", "output: json\n");

    const resolution = resolveProjectConfig({ workspaceRoot: dir, explicitPath: "ci/test-changed.yaml" });

    expect(resolution.source).toBe("explicit");
    expect(resolution.configPath).toBe(path.join(dir, "ci", "test-changed.yaml"));
    expect(resolution.config.output).toBe("json");
  });
});
