import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import {
  CONFIG_FILE_NAMES,
  ProjectConfigSchema,
  defaultProjectConfig,
  type ProjectConfig,
} from "./config.js";
import { ConfigError } from "./errors.js";
import { isRecord } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type ConfigSource = "explicit" | "workspace" | "defaults";

export type ConfigResolution = {
  config: ProjectConfig;
  configPath: string | null;
  source: ConfigSource;
};

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (isRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const INVALID_CONFIG_HINT = "Fix the config file and rerun, or pass --config <path>.";

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!isRecord(error)) {
    return null;
  }

  const mark = error.mark;
  if (!isRecord(mark)) {
    return null;
  }

  const { line, column } = mark;
  if (typeof line !== "number" || typeof column !== "number") {
    return null;
  }

  return { line: line + 1, column: column + 1 };
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "invalid_enum_value") {
        const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
        return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function withConfigHint(error: unknown): never {
  if (error instanceof ConfigError && !error.hint) {
    throw new ConfigError(error.message, { cause: error.cause, hint: INVALID_CONFIG_HINT });
  }
  throw error;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadProjectConfig(configPath: string): ProjectConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found at ${absolutePath}.`, {
      hint: "Pass an existing file to --config, or drop the flag to use defaults.",
    });
  }

  try {
    let raw: string;
    try {
      raw = fs.readFileSync(absolutePath, "utf8");
    } catch (err) {
      throw new ConfigError(`Failed to read config at ${absolutePath}`, { cause: err });
    }

    let doc: unknown;
    try {
      doc = yaml.load(raw);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      const location = resolveYamlErrorLocation(err);
      const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
      throw new ConfigError(`Failed to parse YAML config at ${absolutePath}${locationDetail}: ${detail}`, {
        cause: err,
      });
    }

    // An empty file is a valid config that keeps every default.
    const expanded = expandEnv(doc ?? {}, { file: absolutePath, trail: [] });

    const parsed = ProjectConfigSchema.safeParse(expanded);
    if (!parsed.success) {
      const details = formatIssues(parsed.error.issues);
      throw new ConfigError(`Invalid config at ${absolutePath}:\n${details}`, { cause: parsed.error });
    }

    const cfg = parsed.data;
    const configDir = path.dirname(absolutePath);

    return {
      ...cfg,
      log_file: cfg.log_file === undefined ? undefined : path.resolve(configDir, cfg.log_file),
    };
  } catch (err) {
    withConfigHint(err);
  }
}

export function findWorkspaceConfig(workspaceRoot: string): string | null {
  for (const fileName of CONFIG_FILE_NAMES) {
    const candidate = path.join(workspaceRoot, fileName);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

export function resolveProjectConfig(args: {
  workspaceRoot: string;
  explicitPath?: string;
}): ConfigResolution {
  if (args.explicitPath) {
    const configPath = path.resolve(args.workspaceRoot, args.explicitPath);
    return { config: loadProjectConfig(configPath), configPath, source: "explicit" };
  }

  const discovered = findWorkspaceConfig(args.workspaceRoot);
  if (discovered) {
    return { config: loadProjectConfig(discovered), configPath: discovered, source: "workspace" };
  }

  return { config: defaultProjectConfig(), configPath: null, source: "defaults" };
}
