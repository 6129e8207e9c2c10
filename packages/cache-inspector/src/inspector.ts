import {
  createProcessRunner,
  listArtifacts,
  logger as rootLogger,
  pruneTempDirs,
  readArtifactNode,
  removeArtifact,
} from '@stagecraft/core';
import type { Logger, PruneOptions } from '@stagecraft/core';
import { CommandModelFetcher, FsModelCache, describeModel } from '@stagecraft/pipeline';
import type { ModelCache, ModelKind, ProjectConfig } from '@stagecraft/pipeline';
import type { ArtifactGraph, ArtifactGraphEdge, ArtifactGraphNode, ModelEntrySummary, PruneSummary } from './types.js';

export interface CacheInspectorOptions {
  /** Artifact store root (the engine root) */
  storeRoot: string;
  modelCache: ModelCache;
  logger?: Logger;
}

export interface ArtifactEviction {
  removed: boolean;
  /** Artifacts that mounted the evicted one, as `${kind}:${fingerprint}` */
  dependents: string[];
}

function nodeId(kind: string, fingerprint: string): string {
  return `${kind}:${fingerprint}`;
}

/**
 * Read-mostly view over the artifact store and the model cache
 */
export class CacheInspector {
  private readonly storeRoot: string;
  private readonly modelCache: ModelCache;
  private readonly logger: Logger;

  constructor(options: CacheInspectorOptions) {
    this.storeRoot = options.storeRoot;
    this.modelCache = options.modelCache;
    this.logger = options.logger ?? rootLogger.child({ component: 'cache-inspector' });
  }

  /** Inspector over the caches a project config points at */
  static forProject(project: ProjectConfig, logger?: Logger): CacheInspector {
    const modelCache = new FsModelCache({
      root: project.modelCacheRoot,
      fetcher: new CommandModelFetcher({ runner: createProcessRunner(), python: project.python }),
      retry: project.fetchRetry,
      logger: logger?.child({ component: 'model-cache' }),
    });
    return new CacheInspector({ storeRoot: project.cacheRoot, modelCache, logger });
  }

  /**
   * Build the artifact graph from disk. Edges run from a consumed artifact
   * to the artifact it is mounted into.
   */
  async getGraph(): Promise<ArtifactGraph> {
    const rawNodes = await listArtifacts(this.storeRoot);
    const nodes: ArtifactGraphNode[] = rawNodes
      .map((node) => ({
        ...node,
        id: nodeId(node.kind, node.fingerprint),
        label: `${node.kind} ${node.fingerprint.slice(0, 12)}`,
      }))
      .sort((a, b) => a.id.localeCompare(b.id));

    const edges: ArtifactGraphEdge[] = [];
    for (const node of nodes) {
      for (const dep of node.deps) {
        const source = nodeId(dep.targetKind, dep.targetFingerprint);
        edges.push({
          id: `${source}->${node.id}:${dep.linkPath}`,
          source,
          target: node.id,
          label: dep.linkPath,
        });
      }
    }

    return { nodes, edges };
  }

  async listModels(): Promise<ModelEntrySummary[]> {
    const entries = await this.modelCache.list();
    return entries.map((entry) => ({ ...entry, model: describeModel(entry.request) }));
  }

  /**
   * Remove one artifact. Artifacts that mounted it stay; their next build
   * finds them cached or rebuilds them as usual.
   */
  async evictArtifact(kind: string, fingerprint: string): Promise<ArtifactEviction> {
    const node = await readArtifactNode(this.storeRoot, kind, fingerprint);
    if (!node) return { removed: false, dependents: [] };

    const graph = await this.getGraph();
    const id = nodeId(kind, fingerprint);
    const dependents = graph.edges.filter((edge) => edge.source === id).map((edge) => edge.target);

    await removeArtifact(this.storeRoot, kind, fingerprint);
    this.logger.info('artifact evicted', { kind, fingerprint, dependents });
    return { removed: true, dependents };
  }

  async evictModel(kind: ModelKind, key: string): Promise<boolean> {
    const removed = await this.modelCache.evict(kind, key);
    if (removed) this.logger.info('model cache entry evicted', { kind, key });
    return removed;
  }

  /**
   * Remove temp directories left by interrupted builds and model fetches.
   * Recent ones are kept, since they may belong to a build still running.
   */
  async prune(options: PruneOptions = {}): Promise<PruneSummary> {
    const tempDirs = await pruneTempDirs(this.storeRoot, options);
    const modelTempDirs = await this.modelCache.pruneTemp(options);
    if (tempDirs.length || modelTempDirs.length) {
      this.logger.info('pruned temp directories', { artifacts: tempDirs.length, models: modelTempDirs.length });
    }
    return { tempDirs, modelTempDirs };
  }
}
