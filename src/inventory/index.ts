import { basename, dirname } from 'path';
import type { MapperConfig } from '../config/index.js';
import { discoverModules } from '../discovery/index.js';
import { classifyFailure, extractDeclarations } from '../parser/index.js';
import type { ExtractionWarning } from '../parser/types.js';
import { writeFileContent } from '../utils/file-utils.js';
import { logger } from '../utils/logger.js';

export type InventoryConfig = Pick<MapperConfig, 'language' | 'extensions' | 'backupMarker'>;

export interface InventoryEntry {
  filePath: string;
  classes: string[];
  functions: string[];
}

export interface Inventory {
  entries: InventoryEntry[];
  warnings: ExtractionWarning[];
}

/**
 * Lists declarations across the whole tree. Only backup files are skipped;
 * the directory exclusions of the dependency map do not apply here.
 */
export async function scanInventory(
  root: string,
  config: InventoryConfig
): Promise<Inventory> {
  const discovery = await discoverModules(root, { ...config, excludeDirs: [] });
  const records = [...discovery.modules.values()].sort((a, b) =>
    a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0
  );

  const inventory: Inventory = { entries: [], warnings: [] };

  for (const record of records) {
    try {
      const { classes, functions } = await extractDeclarations(
        record.filePath,
        config.language
      );
      inventory.entries.push({ filePath: record.filePath, classes, functions });
    } catch (error) {
      const reason = classifyFailure(error);
      if (reason === undefined || !(error instanceof Error)) {
        throw error;
      }
      logger.debug(`Skipping ${record.relativePath}: ${error.message}`);
      inventory.warnings.push({
        moduleId: record.id,
        filePath: record.filePath,
        reason,
        message: error.message,
      });
    }
  }

  return inventory;
}

function formatList(title: string, names: string[]): string {
  return `  ${title}:\n` + names.map((name) => `    - ${name}\n`).join('');
}

export function formatInventory(entries: InventoryEntry[]): string {
  let report = '';
  for (const entry of entries) {
    report += `\nFile: ${basename(entry.filePath)} (${dirname(entry.filePath)})\n`;
    if (entry.classes.length > 0) {
      report += formatList('Classes', entry.classes);
    }
    if (entry.functions.length > 0) {
      report += formatList('Functions/Methods', entry.functions);
    }
  }
  return report;
}

export async function writeInventoryReport(
  reportPath: string,
  entries: InventoryEntry[]
): Promise<string> {
  const report = formatInventory(entries);
  await writeFileContent(reportPath, report);
  return report;
}
