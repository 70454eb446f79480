import { resolve } from 'path';
import { ConfigError } from '../utils/error-handler.js';
import type { Language } from '../parser/types.js';

export const DEFAULT_OUTPUT_NAME = 'project_dependency_map';
export const DEFAULT_BACKUP_MARKER = 'backup';
export const DEFAULT_INVENTORY_REPORT = 'inventory_report.txt';

export const LANGUAGES: readonly Language[] = ['typescript', 'python'];

export const OUTPUT_FORMATS = ['png', 'svg', 'pdf', 'jpg'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

interface LanguageDefaults {
  extensions: string[];
  excludeDirs: string[];
}

const LANGUAGE_DEFAULTS: Record<Language, LanguageDefaults> = {
  typescript: {
    extensions: ['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs'],
    excludeDirs: ['node_modules', '.git', 'dist', 'coverage'],
  },
  python: {
    extensions: ['.py'],
    excludeDirs: ['src', 'venv', '.git', '__pycache__'],
  },
};

/**
 * Settings shared by discovery, extraction and rendering. Everything the
 * pipeline would otherwise hardcode lives here so tests can scan synthetic
 * trees with their own exclusions.
 */
export interface MapperConfig {
  language: Language;
  extensions: string[];
  excludeDirs: string[];
  backupMarker: string;
  outputName: string;
  outputDir: string;
  format: OutputFormat;
  view: boolean;
  keepSource: boolean;
  jsonPath?: string;
}

export interface ConfigOverrides {
  language?: string;
  excludeDirs?: string[];
  backupMarker?: string;
  outputName?: string;
  outputDir?: string;
  format?: string;
  view?: boolean;
  keepSource?: boolean;
  jsonPath?: string;
}

export function isLanguage(value: string): value is Language {
  return LANGUAGES.some((language) => language === value);
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export function resolveConfig(overrides: ConfigOverrides = {}): MapperConfig {
  const language = overrides.language ?? 'typescript';
  if (!isLanguage(language)) {
    throw new ConfigError(
      `Unsupported language: ${language}`,
      `Supported languages: ${LANGUAGES.join(', ')}`
    );
  }

  const format = overrides.format ?? 'png';
  if (!isOutputFormat(format)) {
    throw new ConfigError(
      `Unsupported output format: ${format}`,
      `Supported formats: ${OUTPUT_FORMATS.join(', ')}`
    );
  }

  const outputName = (overrides.outputName ?? DEFAULT_OUTPUT_NAME).trim();
  if (!outputName) {
    throw new ConfigError('Output name must not be empty');
  }

  const backupMarker = overrides.backupMarker ?? DEFAULT_BACKUP_MARKER;
  if (!backupMarker) {
    throw new ConfigError('Backup marker must not be empty');
  }

  const defaults = LANGUAGE_DEFAULTS[language];

  return {
    language,
    extensions: [...defaults.extensions],
    excludeDirs: [...(overrides.excludeDirs ?? defaults.excludeDirs)],
    backupMarker,
    outputName,
    outputDir: resolve(overrides.outputDir ?? process.cwd()),
    format,
    view: overrides.view ?? true,
    keepSource: overrides.keepSource ?? false,
    jsonPath: overrides.jsonPath ? resolve(overrides.jsonPath) : undefined,
  };
}
