import { readdir } from 'fs/promises';
import type { Dirent } from 'fs';
import { join, resolve } from 'path';
import type { MapperConfig } from '../config/index.js';
import type { ModuleId, ModuleRecord } from '../parser/types.js';
import { ScanError } from '../utils/error-handler.js';
import {
  getFileExtension,
  isDirectory,
  relativePosixPath,
} from '../utils/file-utils.js';
import { logger } from '../utils/logger.js';
import { isDeclarationFile, toModuleId } from './module-id.js';

export type DiscoveryConfig = Pick<
  MapperConfig,
  'extensions' | 'excludeDirs' | 'backupMarker'
>;

export interface Exclusion {
  path: string;
  reason: 'directory' | 'backup';
}

export interface ModuleCollision {
  id: ModuleId;
  kept: string;
  replaced: string;
}

export interface DiscoveryResult {
  root: string;
  modules: Map<ModuleId, ModuleRecord>;
  excluded: Exclusion[];
  collisions: ModuleCollision[];
}

export function isBackupFile(fileName: string, marker: string): boolean {
  return fileName.toLowerCase().includes(marker.toLowerCase());
}

/**
 * Walks `root` and maps every source file to its dotted module identifier.
 *
 * Directory entries are visited in lexicographic order, so when two files map
 * to the same identifier the later one wins deterministically. Any directory
 * that cannot be read fails the whole scan.
 */
export async function discoverModules(
  root: string,
  config: DiscoveryConfig
): Promise<DiscoveryResult> {
  const absRoot = resolve(root);
  if (!(await isDirectory(absRoot))) {
    throw new ScanError(
      `Cannot scan ${absRoot}: not a directory`,
      'Pass an existing project directory as the root.'
    );
  }

  const excludedDirs = new Set(config.excludeDirs);
  const extensions = new Set(config.extensions.map((ext) => ext.toLowerCase()));

  const result: DiscoveryResult = {
    root: absRoot,
    modules: new Map(),
    excluded: [],
    collisions: [],
  };

  async function walk(dir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ScanError(`Cannot read directory ${dir}`, message);
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      const relPath = relativePosixPath(absRoot, fullPath);

      if (entry.isDirectory()) {
        if (excludedDirs.has(entry.name)) {
          logger.debug(`Skipping excluded directory: ${relPath}`);
          result.excluded.push({ path: relPath, reason: 'directory' });
          continue;
        }
        await walk(fullPath);
        continue;
      }

      if (!entry.isFile()) continue;
      if (!extensions.has(getFileExtension(entry.name))) continue;
      if (isDeclarationFile(entry.name)) continue;

      if (isBackupFile(entry.name, config.backupMarker)) {
        logger.debug(`Skipping backup file: ${relPath}`);
        result.excluded.push({ path: relPath, reason: 'backup' });
        continue;
      }

      const id = toModuleId(relPath, config.extensions);
      const previous = result.modules.get(id);
      if (previous) {
        result.collisions.push({
          id,
          kept: relPath,
          replaced: previous.relativePath,
        });
      }

      result.modules.set(id, {
        id,
        filePath: fullPath,
        relativePath: relPath,
      });
    }
  }

  await walk(absRoot);
  return result;
}
