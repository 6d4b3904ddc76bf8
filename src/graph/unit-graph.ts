// Workspace unit graph.
// Purpose: hold the immutable set of units, their reverse-dependency index and ownership roots.
// Assumes unit ids are unique and every dependency id names another unit in the same workspace.

import { GraphError, GRAPH_ERROR_REASONS } from "../core/errors.js";
import { compareStrings } from "../core/utils.js";

import { buildOwnershipIndex, resolveOwner, type OwnershipIndex } from "./ownership.js";
import { toWorkspaceRelative } from "./paths.js";
import type { Unit, UnitDescriptor } from "./schema.js";

export type UnitGraphInput = {
  workspaceRoot: string;
  units: UnitDescriptor[];
};

const EMPTY_DEPENDENTS: ReadonlySet<string> = new Set<string>();

export class UnitGraph {
  readonly workspaceRoot: string;
  readonly units: readonly Unit[];

  private readonly unitsById: ReadonlyMap<string, Unit>;
  private readonly reverse: ReadonlyMap<string, ReadonlySet<string>>;
  private readonly ownership: OwnershipIndex;

  private constructor(workspaceRoot: string, units: Unit[]) {
    this.workspaceRoot = workspaceRoot;
    this.unitsById = new Map(units.map((unit) => [unit.id, unit]));
    this.units = Object.freeze([...units].sort(compareUnitsByName));
    this.reverse = buildReverseIndex(units);
    this.ownership = buildOwnershipIndex(workspaceRoot, units);
  }

  // ===========================================================================
  // CONSTRUCTION
  // ===========================================================================

  static build(input: UnitGraphInput): UnitGraph {
    const ids = new Set<string>();
    for (const descriptor of input.units) {
      if (ids.has(descriptor.id)) {
        throw new GraphError({
          reason: GRAPH_ERROR_REASONS.duplicateUnit,
          message: `Unit id '${descriptor.id}' is declared more than once.`,
          unitId: descriptor.id,
        });
      }
      ids.add(descriptor.id);
    }

    const units: Unit[] = input.units.map((descriptor) => {
      const dependencies: string[] = [];
      for (const dependency of descriptor.dependencies) {
        if (!ids.has(dependency)) {
          throw new GraphError({
            reason: GRAPH_ERROR_REASONS.unknownDependency,
            message: `Unit '${descriptor.id}' depends on unknown unit '${dependency}'.`,
            unitId: dependency,
          });
        }
        if (dependency === descriptor.id || dependencies.includes(dependency)) {
          continue;
        }
        dependencies.push(dependency);
      }

      return Object.freeze({
        id: descriptor.id,
        name: descriptor.name,
        root: descriptor.root,
        dependencies: Object.freeze(dependencies),
      });
    });

    return new UnitGraph(input.workspaceRoot, units);
  }

  // ===========================================================================
  // LOOKUPS
  // ===========================================================================

  has(id: string): boolean {
    return this.unitsById.has(id);
  }

  getUnit(id: string): Unit | undefined {
    return this.unitsById.get(id);
  }

  requireUnit(id: string): Unit {
    const unit = this.unitsById.get(id);
    if (!unit) {
      throw new GraphError({
        reason: GRAPH_ERROR_REASONS.unknownDependency,
        message: `Unknown unit '${id}'.`,
        unitId: id,
        hint: `Known units: ${this.units.map((u) => u.name).join(", ") || "<none>"}.`,
      });
    }
    return unit;
  }

  /** Deepest unit root containing the path, or null for workspace-level and outside paths. */
  unitContaining(filePath: string): string | null {
    const relative = toWorkspaceRelative(this.workspaceRoot, filePath);
    if (relative === null) {
      return null;
    }
    return resolveOwner(this.ownership, relative);
  }

  // ===========================================================================
  // DEPENDENTS
  // ===========================================================================

  dependentsOf(id: string): ReadonlySet<string> {
    return this.reverse.get(id) ?? EMPTY_DEPENDENTS;
  }

  /** Breadth-first closure over the reverse index; the result always contains the input ids. */
  transitiveDependentsOf(ids: Iterable<string>): Set<string> {
    const visited = new Set<string>();
    const queue: string[] = [];

    for (const id of ids) {
      if (visited.has(id)) continue;
      visited.add(id);
      queue.push(id);
    }

    for (let cursor = 0; cursor < queue.length; cursor += 1) {
      for (const dependent of this.dependentsOf(queue[cursor])) {
        if (visited.has(dependent)) continue;
        visited.add(dependent);
        queue.push(dependent);
      }
    }

    return visited;
  }
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

function buildReverseIndex(units: Unit[]): ReadonlyMap<string, ReadonlySet<string>> {
  const reverse = new Map<string, Set<string>>();

  for (const unit of units) {
    for (const dependency of unit.dependencies) {
      const dependents = reverse.get(dependency) ?? new Set<string>();
      dependents.add(unit.id);
      reverse.set(dependency, dependents);
    }
  }

  return reverse;
}

export function compareUnitsByName(a: Unit, b: Unit): number {
  if (a.name !== b.name) {
    return compareStrings(a.name, b.name);
  }
  return compareStrings(a.id, b.id);
}
