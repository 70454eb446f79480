import { execa } from 'execa';
import { existsSync } from 'fs';
import type { OutputFormat } from '../config/index.js';
import {
  RenderError,
  RendererUnavailableError,
} from '../utils/error-handler.js';
import { logger } from '../utils/logger.js';

export const GRAPHVIZ_DOWNLOAD_URL = 'https://graphviz.org/download/';

/**
 * Anything able to turn DOT source into an image. The pipeline only talks to
 * this interface, so tests can swap Graphviz for an in-process fake.
 */
export interface GraphRenderer {
  readonly name: string;
  /** Throws RendererUnavailableError when the renderer cannot run. */
  ensureAvailable(): Promise<void>;
  render(sourcePath: string, outputPath: string, format: OutputFormat): Promise<void>;
  view(filePath: string): Promise<void>;
}

async function findDot(): Promise<string> {
  // Try dot in PATH first
  try {
    await execa('dot', ['-V'], { stdio: 'pipe' });
    return 'dot';
  } catch (error) {
    logger.debug(`dot not found in PATH: ${error instanceof Error ? error.message : String(error)}`);
  }

  // Check common installation locations
  const possiblePaths = [
    '/usr/local/bin/dot',
    '/opt/homebrew/bin/dot',
    '/usr/bin/dot',
    'C:\\Program Files\\Graphviz\\bin\\dot.exe',
  ];

  for (const path of possiblePaths) {
    if (existsSync(path)) {
      try {
        await execa(path, ['-V'], { stdio: 'pipe' });
        return path;
      } catch (error) {
        logger.debug(`Unusable dot at ${path}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }

  throw new RendererUnavailableError(
    'Graphviz (dot)',
    `Make sure Graphviz is installed and its bin directory is on the system PATH.\nDownload: ${GRAPHVIZ_DOWNLOAD_URL}`
  );
}

export function getViewerCommand(
  filePath: string,
  platform: NodeJS.Platform = process.platform
): [string, string[]] {
  switch (platform) {
    case 'darwin':
      return ['open', [filePath]];
    case 'win32':
      return ['cmd', ['/c', 'start', '""', filePath]];
    default:
      return ['xdg-open', [filePath]];
  }
}

export class GraphvizRenderer implements GraphRenderer {
  readonly name = 'Graphviz';
  private dotPath: string | null = null;

  async ensureAvailable(): Promise<void> {
    this.dotPath = await findDot();
  }

  async render(
    sourcePath: string,
    outputPath: string,
    format: OutputFormat
  ): Promise<void> {
    const dotPath = this.dotPath ?? (await findDot());
    logger.debug(`Rendering ${sourcePath} with ${dotPath}`);

    try {
      await execa(dotPath, [`-T${format}`, sourcePath, '-o', outputPath], {
        stdio: 'pipe',
      });
    } catch (error) {
      if (error instanceof Error) {
        throw new RenderError(
          `Graphviz failed to render ${sourcePath}`,
          error.message
        );
      }
      throw error;
    }
  }

  async view(filePath: string): Promise<void> {
    const [command, args] = getViewerCommand(filePath);
    await execa(command, args, { stdio: 'ignore' });
  }
}
