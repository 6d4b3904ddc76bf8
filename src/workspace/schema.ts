import type { UnitDescriptor } from "../graph/schema.js";

export type WorkspaceMetadata = {
  workspace_root: string;
  units: UnitDescriptor[];
};

export interface WorkspaceMetadataProvider {
  load(workspaceRoot: string): Promise<WorkspaceMetadata>;
}
