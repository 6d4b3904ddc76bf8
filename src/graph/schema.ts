// Unit graph data model.
// Purpose: shared shapes for workspace units, changed files and affected sets.
// Assumes unit roots are absolute directories and changed paths are repo-relative POSIX paths.

export type UnitDescriptor = {
  id: string;
  name: string;
  root: string;
  dependencies: string[];
};

export type Unit = Readonly<{
  id: string;
  name: string;
  root: string;
  dependencies: readonly string[];
}>;

export type ChangeKind = "added" | "modified" | "removed" | "renamed";

export type ChangedFile = {
  path: string;
  old_path: string | null;
  change: ChangeKind;
};

export type AffectedSetSource = "changes" | "override";

export type AffectedSet = {
  source: AffectedSetSource;
  include_dependents: boolean;
  unit_ids: string[];
  direct_unit_ids: string[];
};
