import type { ModuleId } from '../parser/types.js';

export type ModuleCategory = 'critical' | 'important' | 'standard' | 'entry-point';

export interface ImportEdge {
  from: ModuleId;
  to: ModuleId;
}

export interface GraphNode {
  id: ModuleId;
  label: string;
  inDegree: number;
  category: ModuleCategory;
}

export interface DependencyGraph {
  /** Outgoing edges per module; every key is a scanned module. */
  outgoing: Map<ModuleId, Set<ModuleId>>;
  /** Number of distinct modules importing each module. */
  inDegree: Map<ModuleId, number>;
  /** Sorted by id. */
  nodes: GraphNode[];
  /** Sorted by `from`, then `to`. */
  edges: ImportEdge[];
}

export interface GraphStats {
  nodeCount: number;
  edgeCount: number;
  categories: Record<ModuleCategory, number>;
}
