import type {
  Declarations,
  ExtractionFailure,
  ExtractionResult,
  ImportMap,
  Language,
  ModuleId,
  ModuleRecord,
} from './types.js';
import * as tsParser from './typescript-parser.js';
import * as pyParser from './python-parser.js';
import type { MapperConfig } from '../config/index.js';
import {
  DecodeError,
  FileNotFoundError,
  ParseError,
} from '../utils/error-handler.js';
import { readTextFile } from '../utils/file-utils.js';
import { logger } from '../utils/logger.js';

export type ExtractionConfig = Pick<MapperConfig, 'language' | 'extensions'>;

export function classifyFailure(error: unknown): ExtractionFailure | undefined {
  if (error instanceof DecodeError) return 'decode';
  if (error instanceof ParseError) return 'syntax';
  if (error instanceof FileNotFoundError) return 'missing';
  return undefined;
}

/**
 * Returns the subset of `knownIds` the module imports. Files that cannot be
 * decoded, parsed or found contribute no imports and carry a warning instead.
 */
export async function extractImports(
  record: ModuleRecord,
  knownIds: ReadonlySet<ModuleId>,
  config: ExtractionConfig
): Promise<ExtractionResult> {
  try {
    const content = await readTextFile(record.filePath);
    const imports =
      config.language === 'typescript'
        ? tsParser.extractTypeScriptImports(
            content,
            record.filePath,
            record.relativePath,
            knownIds,
            config.extensions
          )
        : pyParser.extractPythonImports(content, record.filePath, knownIds);

    return { moduleId: record.id, imports };
  } catch (error) {
    const reason = classifyFailure(error);
    if (reason === undefined || !(error instanceof Error)) {
      throw error;
    }
    return {
      moduleId: record.id,
      imports: new Set(),
      warning: {
        moduleId: record.id,
        filePath: record.filePath,
        reason,
        message: error.message,
      },
    };
  }
}

export async function extractAllImports(
  modules: ReadonlyMap<ModuleId, ModuleRecord>,
  config: ExtractionConfig
): Promise<ImportMap> {
  const knownIds = new Set(modules.keys());
  const ids = [...knownIds].sort();
  const result: ImportMap = { imports: new Map(), warnings: [] };

  for (const id of ids) {
    const record = modules.get(id);
    if (!record) continue;

    logger.debug(`Analyzing module: ${id}`);
    const extraction = await extractImports(record, knownIds, config);
    result.imports.set(id, extraction.imports);
    if (extraction.warning) {
      result.warnings.push(extraction.warning);
    }
    logger.debug(`  Found ${extraction.imports.size} local import(s)`);
  }

  return result;
}

export async function extractDeclarations(
  filePath: string,
  language: Language
): Promise<Declarations> {
  const content = await readTextFile(filePath);
  if (language === 'typescript') {
    return tsParser.extractTypeScriptDeclarations(content, filePath);
  }
  return pyParser.extractPythonDeclarations(content, filePath);
}
