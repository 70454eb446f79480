import type { ExtractionWarning } from '../parser/types.js';
import { getGraphStats } from '../graph/builder.js';
import type {
  DependencyGraph,
  GraphNode,
  GraphStats,
  ImportEdge,
} from '../graph/types.js';
import { writeFileContent } from '../utils/file-utils.js';

export interface GraphArtifact {
  root: string;
  nodes: GraphNode[];
  edges: ImportEdge[];
  stats: GraphStats;
  skipped: Pick<ExtractionWarning, 'moduleId' | 'reason' | 'message'>[];
}

export function toGraphArtifact(
  root: string,
  graph: DependencyGraph,
  warnings: ExtractionWarning[]
): GraphArtifact {
  return {
    root,
    nodes: graph.nodes,
    edges: graph.edges,
    stats: getGraphStats(graph),
    skipped: warnings.map(({ moduleId, reason, message }) => ({
      moduleId,
      reason,
      message,
    })),
  };
}

export async function writeGraphArtifact(
  filePath: string,
  artifact: GraphArtifact
): Promise<void> {
  await writeFileContent(filePath, JSON.stringify(artifact, null, 2) + '\n');
}
