// Affected-set expansion.
// Purpose: turn the directly-changed units into the ordered set the orchestrator runs.
// Assumes every id handed in by the resolver exists in the graph; override ids are validated here.

import { GraphError, GRAPH_ERROR_REASONS } from "../core/errors.js";

import type { AffectedSet } from "./schema.js";
import { compareUnitsByName, type UnitGraph } from "./unit-graph.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export function expandAffectedSet(
  direct: Iterable<string>,
  graph: UnitGraph,
  includeDependents: boolean,
): AffectedSet {
  const directIds = new Set(direct);
  const expanded = includeDependents ? graph.transitiveDependentsOf(directIds) : directIds;

  return {
    source: "changes",
    include_dependents: includeDependents,
    unit_ids: sortUnitIds(expanded, graph),
    direct_unit_ids: sortUnitIds(directIds, graph),
  };
}

export function overrideAffectedSet(ids: Iterable<string>, graph: UnitGraph): AffectedSet {
  const unique = new Set<string>();

  for (const id of ids) {
    if (!graph.has(id)) {
      throw new GraphError({
        reason: GRAPH_ERROR_REASONS.unknownDependency,
        message: `Crate '${id}' is not a member of this workspace.`,
        unitId: id,
        hint: "Pass names of workspace members to --crates.",
      });
    }
    unique.add(id);
  }

  const unitIds = sortUnitIds(unique, graph);
  return {
    source: "override",
    include_dependents: false,
    unit_ids: unitIds,
    direct_unit_ids: [...unitIds],
  };
}

/** Dependents that expansion would add on top of the direct set. */
export function countDependents(direct: Iterable<string>, graph: UnitGraph): number {
  const directIds = new Set(direct);
  return graph.transitiveDependentsOf(directIds).size - directIds.size;
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

function sortUnitIds(ids: Iterable<string>, graph: UnitGraph): string[] {
  return Array.from(ids)
    .map((id) => graph.requireUnit(id))
    .sort(compareUnitsByName)
    .map((unit) => unit.id);
}
