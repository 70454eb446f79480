#!/usr/bin/env node

import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { logger, setVerbose } from './utils/logger.js';
import { handleError } from './utils/error-handler.js';
import { DEFAULT_INVENTORY_REPORT, resolveConfig } from './config/index.js';
import { generateDependencyMap } from './mapper/index.js';
import { scanInventory, writeInventoryReport } from './inventory/index.js';
import { createProgram, type InventoryOptions, type MapOptions } from './program.js';

const VERSION = '0.1.0';
const selfFile = fileURLToPath(import.meta.url);
const defaultRoot = dirname(selfFile);

async function main() {
  const program = createProgram(VERSION, { map: runMap, inventory: runInventory });
  await program.parseAsync(process.argv);
}

async function runMap(root: string | undefined, options: MapOptions): Promise<void> {
  if (options.verbose) {
    setVerbose(true);
  }

  logger.info(`modgraph v${VERSION}`);

  const config = resolveConfig({
    language: options.language,
    excludeDirs: options.excludeDir.length > 0 ? options.excludeDir : undefined,
    outputName: options.output,
    outputDir: options.outDir,
    format: options.format,
    view: options.view,
    keepSource: options.keepSource,
    jsonPath: options.json,
  });

  await generateDependencyMap({
    root: resolve(root ?? defaultRoot),
    config,
    selfFiles: [selfFile],
  });
}

async function runInventory(
  root: string | undefined,
  options: InventoryOptions
): Promise<void> {
  if (options.verbose) {
    setVerbose(true);
  }

  const scanRoot = resolve(root ?? defaultRoot);
  const config = resolveConfig({ language: options.language });

  logger.startSpinner(`Building inventory of ${scanRoot}...`);
  const inventory = await scanInventory(scanRoot, config);
  logger.succeedSpinner(`Listed ${inventory.entries.length} file(s)`);

  for (const warning of inventory.warnings) {
    logger.warn(`Could not parse ${warning.filePath}: ${warning.message}`);
  }

  const reportPath = resolve(options.report ?? join(scanRoot, DEFAULT_INVENTORY_REPORT));
  const report = await writeInventoryReport(reportPath, inventory.entries);
  process.stdout.write(report);
  logger.success(`Inventory saved to ${reportPath}`);
}

// Run the CLI
main().catch(handleError);
