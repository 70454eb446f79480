import { join } from 'path';
import type { MapperConfig } from '../config/index.js';
import type { DependencyGraph } from '../graph/types.js';
import { RendererUnavailableError } from '../utils/error-handler.js';
import { removeFile, writeFileContent } from '../utils/file-utils.js';
import { logger } from '../utils/logger.js';
import { toDot } from './dot.js';
import { GraphvizRenderer, type GraphRenderer } from './graphviz.js';

export type RenderOptions = Pick<
  MapperConfig,
  'outputName' | 'outputDir' | 'format' | 'view' | 'keepSource'
>;

export type RenderOutcome =
  | { status: 'rendered'; imagePath: string; sourcePath?: string }
  | {
      status: 'renderer-unavailable';
      sourcePath: string;
      error: RendererUnavailableError;
    };

export function getSourcePath(options: Pick<RenderOptions, 'outputName' | 'outputDir'>): string {
  return join(options.outputDir, `${options.outputName}.gv`);
}

export function getImagePath(
  options: Pick<RenderOptions, 'outputName' | 'outputDir' | 'format'>
): string {
  return join(options.outputDir, `${options.outputName}.${options.format}`);
}

/**
 * Writes the DOT source, then renders it. The source is written first so it
 * survives when the renderer is missing; an unavailable renderer is an
 * outcome, not an error.
 */
export async function renderDependencyGraph(
  graph: DependencyGraph,
  options: RenderOptions,
  renderer: GraphRenderer = new GraphvizRenderer()
): Promise<RenderOutcome> {
  const sourcePath = getSourcePath(options);
  await writeFileContent(sourcePath, toDot(graph));
  logger.debug(`Wrote graph source: ${sourcePath}`);

  try {
    await renderer.ensureAvailable();
  } catch (error) {
    if (error instanceof RendererUnavailableError) {
      return { status: 'renderer-unavailable', sourcePath, error };
    }
    throw error;
  }

  const imagePath = getImagePath(options);
  await renderer.render(sourcePath, imagePath, options.format);

  if (!options.keepSource) {
    await removeFile(sourcePath);
  }

  if (options.view) {
    try {
      await renderer.view(imagePath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.debug(`Could not open ${imagePath}: ${message}`);
    }
  }

  return {
    status: 'rendered',
    imagePath,
    sourcePath: options.keepSource ? sourcePath : undefined,
  };
}

export { toDot } from './dot.js';
export { GraphvizRenderer, type GraphRenderer } from './graphviz.js';
