import { CATEGORY_ORDER } from '../graph/category.js';
import type { DependencyGraph, ModuleCategory } from '../graph/types.js';

interface CategoryStyle {
  fillColor: string;
  legend: string;
}

export const CATEGORY_STYLES: Record<ModuleCategory, CategoryStyle> = {
  critical: { fillColor: 'orangered', legend: 'Red: >5 (critical)' },
  important: { fillColor: 'gold', legend: 'Yellow: 3-5 (important)' },
  standard: { fillColor: 'lightskyblue', legend: 'Blue: 1-2 (standard)' },
  'entry-point': { fillColor: 'palegreen', legend: 'Green: 0 (entry point)' },
};

export interface DotOptions {
  graphName?: string;
  title?: string;
}

export function quoteDot(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\r?\n/g, '\\n');
  return `"${escaped}"`;
}

function formatAttributes(attributes: Record<string, string>): string {
  const pairs = Object.entries(attributes).map(
    ([key, value]) => `${key}=${quoteDot(value)}`
  );
  return `[${pairs.join(', ')}]`;
}

export function buildLegend(title: string): string {
  const entries = CATEGORY_ORDER.map((category) => CATEGORY_STYLES[category].legend);
  return [
    title,
    '',
    'Colour legend (how many modules import each module):',
    entries.join('     '),
  ].join('\n');
}

/**
 * Serializes the graph as Graphviz DOT source. Output depends only on the
 * graph, so identical graphs give byte-identical source.
 */
export function toDot(graph: DependencyGraph, options: DotOptions = {}): string {
  const graphName = options.graphName ?? 'ProjectDependencies';
  const title = options.title ?? 'Project Dependency Map';

  const lines: string[] = [
    `// ${title}`,
    `digraph ${quoteDot(graphName)} {`,
    `  graph ${formatAttributes({
      rankdir: 'LR',
      splines: 'ortho',
      nodesep: '0.8',
      fontsize: '12',
      label: buildLegend(title),
    })};`,
    `  node ${formatAttributes({ shape: 'box', style: 'rounded,filled' })};`,
    `  edge ${formatAttributes({ color: 'gray40' })};`,
  ];

  if (graph.nodes.length > 0) {
    lines.push('');
  }
  for (const node of graph.nodes) {
    lines.push(
      `  ${quoteDot(node.id)} ${formatAttributes({
        label: node.label,
        fillcolor: CATEGORY_STYLES[node.category].fillColor,
      })};`
    );
  }

  if (graph.edges.length > 0) {
    lines.push('');
  }
  for (const edge of graph.edges) {
    lines.push(`  ${quoteDot(edge.from)} -> ${quoteDot(edge.to)};`);
  }

  lines.push('}');
  return lines.join('\n') + '\n';
}
