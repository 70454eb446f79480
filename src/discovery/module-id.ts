import type { ModuleId } from '../parser/types.js';

const DECLARATION_FILE_REGEX = /\.d\.(ts|mts|cts)$/i;

export function isDeclarationFile(fileName: string): boolean {
  return DECLARATION_FILE_REGEX.test(fileName);
}

export function stripExtension(path: string, extensions: string[]): string {
  const lower = path.toLowerCase();
  const match = [...extensions]
    .sort((a, b) => b.length - a.length)
    .find((ext) => lower.endsWith(ext.toLowerCase()));
  return match ? path.slice(0, path.length - match.length) : path;
}

/**
 * `pkg/util/strings.ts` → `pkg.util.strings`. Takes a POSIX path relative to
 * the scan root.
 */
export function toModuleId(relativePath: string, extensions: string[]): ModuleId {
  return stripExtension(relativePath, extensions)
    .split('/')
    .filter((segment) => segment.length > 0)
    .join('.');
}

export function moduleIdToLabel(id: ModuleId): string {
  return id.split('.').join('\n');
}
