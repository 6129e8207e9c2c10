import type { ArtifactNodeInfo } from '@stagecraft/core';
import type { ModelCacheEntry } from '@stagecraft/pipeline';

export interface ArtifactGraphNode extends ArtifactNodeInfo {
  /** Unique identifier `${kind}:${fingerprint}` */
  id: string;
  label: string;
}

export interface ArtifactGraphEdge {
  id: string;
  /** The consumed artifact */
  source: string;
  /** The artifact it is mounted into */
  target: string;
  label: string;
}

export interface ArtifactGraph {
  nodes: ArtifactGraphNode[];
  edges: ArtifactGraphEdge[];
}

export interface ModelEntrySummary extends ModelCacheEntry {
  /** `${kind}:${identifier}` */
  model: string;
}

export interface PruneSummary {
  /** Temp directories removed, relative to the artifact store */
  tempDirs: string[];
  /** Temp directories of interrupted model fetches, relative to the model cache */
  modelTempDirs: string[];
}
