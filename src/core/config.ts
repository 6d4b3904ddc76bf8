import { z } from "zod";

export const TEST_RUNNER_KINDS = ["cargo", "nextest"] as const;
export type TestRunnerKind = (typeof TEST_RUNNER_KINDS)[number];

export const OUTPUT_FORMATS = ["human", "json"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const CONFIG_FILE_NAMES = [".test-changed.yaml", ".test-changed.yml"] as const;

export const ProjectConfigSchema = z
  .object({
    runner: z.enum(TEST_RUNNER_KINDS).default("cargo"),

    // Expand the directly-changed set to every unit that transitively depends on it.
    include_dependents: z.boolean().default(true),
    fail_fast: z.boolean().default(true),
    verbose: z.boolean().default(false),
    output: z.enum(OUTPUT_FORMATS).default("human"),

    // Appended verbatim to every test command, before any `--` passthrough from the CLI.
    runner_args: z.array(z.string()).default([]),

    log_file: z.string().min(1).optional(),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

export function defaultProjectConfig(): ProjectConfig {
  return ProjectConfigSchema.parse({});
}
