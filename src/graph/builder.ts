import type { ModuleId } from '../parser/types.js';
import { moduleIdToLabel } from '../discovery/module-id.js';
import { categorize } from './category.js';
import type {
  DependencyGraph,
  GraphNode,
  GraphStats,
  ImportEdge,
  ModuleCategory,
} from './types.js';

export interface BuildOptions {
  /** Modules dropped before counting: neither nodes nor edge endpoints. */
  excludeModules?: Iterable<ModuleId>;
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function buildDependencyGraph(
  imports: ReadonlyMap<ModuleId, ReadonlySet<ModuleId>>,
  options: BuildOptions = {}
): DependencyGraph {
  const excluded = new Set(options.excludeModules ?? []);
  const ids = [...imports.keys()].filter((id) => !excluded.has(id)).sort(compareIds);

  const outgoing = new Map<ModuleId, Set<ModuleId>>();
  for (const id of ids) {
    outgoing.set(id, new Set(imports.get(id) ?? []));
  }

  const inDegree = new Map<ModuleId, number>();
  for (const id of ids) {
    inDegree.set(id, 0);
  }
  for (const targets of outgoing.values()) {
    for (const target of targets) {
      const count = inDegree.get(target);
      if (count !== undefined) {
        inDegree.set(target, count + 1);
      }
    }
  }

  const nodes: GraphNode[] = ids.map((id) => {
    const count = inDegree.get(id) ?? 0;
    return {
      id,
      label: moduleIdToLabel(id),
      inDegree: count,
      category: categorize(count),
    };
  });

  const edges: ImportEdge[] = [];
  for (const from of ids) {
    const targets = [...(outgoing.get(from) ?? [])].sort(compareIds);
    for (const to of targets) {
      if (outgoing.has(to)) {
        edges.push({ from, to });
      }
    }
  }

  return { outgoing, inDegree, nodes, edges };
}

export function getGraphStats(graph: DependencyGraph): GraphStats {
  const categories: Record<ModuleCategory, number> = {
    'entry-point': 0,
    standard: 0,
    important: 0,
    critical: 0,
  };
  for (const node of graph.nodes) {
    categories[node.category]++;
  }

  return {
    nodeCount: graph.nodes.length,
    edgeCount: graph.edges.length,
    categories,
  };
}
