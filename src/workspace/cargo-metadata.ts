// Cargo workspace metadata provider.
// Purpose: derive units and their intra-workspace dependency edges from `cargo metadata`.
// Assumes package names are unique within a workspace, so they double as unit ids.

import path from "node:path";

import { execa } from "execa";
import { z } from "zod";

import { formatIssues } from "../core/config-loader.js";
import { GraphError, GRAPH_ERROR_REASONS } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import { compareStrings, isRecord } from "../core/utils.js";
import type { UnitDescriptor } from "../graph/schema.js";

import type { WorkspaceMetadata, WorkspaceMetadataProvider } from "./schema.js";

// =============================================================================
// SCHEMA
// =============================================================================

const CargoDependencySchema = z.object({
  name: z.string().min(1),
  kind: z.enum(["dev", "build"]).nullable().optional(),
});

const CargoPackageSchema = z.object({
  name: z.string().min(1),
  id: z.string().min(1),
  manifest_path: z.string().min(1),
  dependencies: z.array(CargoDependencySchema).default([]),
});

export const CargoMetadataSchema = z.object({
  packages: z.array(CargoPackageSchema),
  workspace_members: z.array(z.string()),
  workspace_root: z.string().min(1),
});

export type CargoMetadata = z.infer<typeof CargoMetadataSchema>;

export const CARGO_METADATA_ARGS = ["metadata", "--format-version", "1", "--no-deps", "--all-features"];

// =============================================================================
// PUBLIC API
// =============================================================================

export function createCargoMetadataProvider(): WorkspaceMetadataProvider {
  return {
    load: loadCargoWorkspace,
  };
}

export async function loadCargoWorkspace(workspaceRoot: string): Promise<WorkspaceMetadata> {
  const manifestPath = path.join(workspaceRoot, "Cargo.toml");

  let stdout: string;
  try {
    const res = await execa("cargo", [...CARGO_METADATA_ARGS, "--manifest-path", manifestPath], {
      cwd: workspaceRoot,
      stdio: "pipe",
    });
    stdout = res.stdout;
  } catch (err) {
    throw new GraphError({
      reason: GRAPH_ERROR_REASONS.metadataUnavailable,
      message: `cargo metadata failed for ${manifestPath}: ${describeCommandFailure(err)}`,
      hint: "Check that cargo is installed and the workspace manifest parses.",
      cause: err,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch (err) {
    throw new GraphError({
      reason: GRAPH_ERROR_REASONS.metadataUnavailable,
      message: `cargo metadata returned invalid JSON: ${formatErrorMessage(err)}`,
      cause: err,
    });
  }

  return parseCargoMetadata(raw);
}

/**
 * Convert a `cargo metadata` document into workspace units.
 * Only workspace members become units; dependency lists keep the names of other members
 * (normal, dev and build alike) and drop registry crates and self-references.
 */
export function parseCargoMetadata(raw: unknown): WorkspaceMetadata {
  const parsed = CargoMetadataSchema.safeParse(raw);
  if (!parsed.success) {
    throw new GraphError({
      reason: GRAPH_ERROR_REASONS.metadataUnavailable,
      message: `Unexpected cargo metadata format:\n${formatIssues(parsed.error.issues)}`,
      cause: parsed.error,
    });
  }

  const metadata = parsed.data;
  const memberIds = new Set(metadata.workspace_members);
  const members = metadata.packages.filter((pkg) => memberIds.has(pkg.id));
  const memberNames = new Set(members.map((pkg) => pkg.name));

  const units: UnitDescriptor[] = members.map((pkg) => {
    const dependencies: string[] = [];
    for (const dependency of pkg.dependencies) {
      if (!memberNames.has(dependency.name)) continue;
      if (dependency.name === pkg.name) continue;
      if (dependencies.includes(dependency.name)) continue;
      dependencies.push(dependency.name);
    }

    return {
      id: pkg.name,
      name: pkg.name,
      root: path.dirname(pkg.manifest_path),
      dependencies,
    };
  });

  units.sort((a, b) => compareStrings(a.name, b.name));

  return { workspace_root: metadata.workspace_root, units };
}

// =============================================================================
// INTERNALS
// =============================================================================

function describeCommandFailure(error: unknown): string {
  if (isRecord(error)) {
    const stderr = error.stderr;
    if (typeof stderr === "string" && stderr.trim().length > 0) {
      return stderr.trim();
    }
  }
  return formatErrorMessage(error);
}
