import { isAbsolute, relative, resolve } from 'path';
import type { MapperConfig } from '../config/index.js';
import { discoverModules, type DiscoveryResult } from '../discovery/index.js';
import { toModuleId } from '../discovery/module-id.js';
import { extractAllImports } from '../parser/index.js';
import type { ExtractionWarning, ModuleId } from '../parser/types.js';
import { buildDependencyGraph } from '../graph/builder.js';
import type { DependencyGraph } from '../graph/types.js';
import { renderDependencyGraph, type RenderOutcome } from '../render/index.js';
import type { GraphRenderer } from '../render/graphviz.js';
import { toPosixPath } from '../utils/file-utils.js';
import { logger } from '../utils/logger.js';
import { toGraphArtifact, writeGraphArtifact } from './artifact.js';

export interface DependencyMapOptions {
  root: string;
  config: MapperConfig;
  /** Files of the tool itself; never drawn when they fall under the root. */
  selfFiles?: string[];
  renderer?: GraphRenderer;
}

export interface DependencyMapResult {
  discovery: DiscoveryResult;
  graph: DependencyGraph;
  warnings: ExtractionWarning[];
  /** Absent when the tree holds no source files. */
  render?: RenderOutcome;
}

export function resolveSelfModules(
  root: string,
  selfFiles: string[],
  extensions: string[]
): ModuleId[] {
  const ids: ModuleId[] = [];
  for (const file of selfFiles) {
    const rel = relative(resolve(root), resolve(file));
    if (!rel || rel.startsWith('..') || isAbsolute(rel)) continue;
    ids.push(toModuleId(toPosixPath(rel), extensions));
  }
  return ids;
}

function reportDiscovery(discovery: DiscoveryResult): void {
  for (const exclusion of discovery.excluded) {
    const kind = exclusion.reason === 'directory' ? 'directory' : 'backup file';
    logger.info(`Excluded ${kind}: ${exclusion.path}`);
  }
  for (const collision of discovery.collisions) {
    logger.warn(
      `Module ${collision.id} is defined by both ${collision.replaced} and ${collision.kept}; using ${collision.kept}`
    );
  }
}

function reportUnavailableRenderer(
  outcome: Extract<RenderOutcome, { status: 'renderer-unavailable' }>
): void {
  logger.error(outcome.error.message);
  if (outcome.error.details) {
    console.error(`\n${outcome.error.details}\n`);
  }
  logger.info(`The graph source was still saved as ${outcome.sourcePath}`);
}

/**
 * Full run: scan → parse all → aggregate → render. Files that fail to parse
 * are reported and left out of the graph; a missing renderer is reported and
 * the run still succeeds.
 */
export async function generateDependencyMap(
  options: DependencyMapOptions
): Promise<DependencyMapResult> {
  const { config } = options;
  const root = resolve(options.root);

  logger.debug(`Root: ${root}`);
  logger.debug(`Options: ${JSON.stringify(config)}`);

  // Phase 1: Discover modules
  logger.startSpinner('Scanning project modules...');
  let discovery: DiscoveryResult;
  try {
    discovery = await discoverModules(root, config);
  } catch (error) {
    logger.failSpinner('Scan failed');
    throw error;
  }
  logger.succeedSpinner(`Found ${discovery.modules.size} module(s)`);
  reportDiscovery(discovery);

  if (discovery.modules.size === 0) {
    logger.warn(`No source files found in ${root}`);
    return {
      discovery,
      graph: buildDependencyGraph(new Map()),
      warnings: [],
    };
  }

  // Phase 2: Extract local imports
  logger.startSpinner('Analyzing dependencies...');
  const { imports, warnings } = await extractAllImports(discovery.modules, config);
  logger.succeedSpinner(`Analyzed ${imports.size} module(s)`);

  for (const warning of warnings) {
    logger.warn(`Could not analyze ${warning.filePath}: ${warning.message}`);
  }

  // Phase 3: Build the graph
  const excludeModules = [
    ...resolveSelfModules(root, options.selfFiles ?? [], config.extensions),
    ...warnings.map((w) => w.moduleId),
  ];
  const graph = buildDependencyGraph(imports, { excludeModules });
  logger.debug(`Graph: ${graph.nodes.length} node(s), ${graph.edges.length} edge(s)`);

  if (config.jsonPath) {
    await writeGraphArtifact(config.jsonPath, toGraphArtifact(root, graph, warnings));
    logger.info(`Graph data written to ${config.jsonPath}`);
  }

  // Phase 4: Render
  logger.startSpinner('Generating diagram...');
  let render: RenderOutcome;
  try {
    render = await renderDependencyGraph(graph, config, options.renderer);
  } catch (error) {
    logger.failSpinner('Rendering failed');
    throw error;
  }

  if (render.status === 'rendered') {
    logger.succeedSpinner(`Dependency map saved as ${render.imagePath}`);
  } else {
    logger.failSpinner('Diagram not rendered');
    reportUnavailableRenderer(render);
  }

  return { discovery, graph, warnings, render };
}
