import { readFile, writeFile, mkdir, access, stat, rm } from 'fs/promises';
import { constants } from 'fs';
import { dirname, extname, relative, sep } from 'path';
import { DecodeError, FileNotFoundError } from './error-handler.js';

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

export async function readBinaryFile(filePath: string): Promise<Buffer> {
  try {
    return await readFile(filePath);
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      throw new FileNotFoundError(filePath);
    }
    throw error;
  }
}

/**
 * Reads a file as strict UTF-8. Invalid byte sequences raise a DecodeError
 * instead of being replaced with U+FFFD.
 */
export async function readTextFile(filePath: string): Promise<string> {
  const bytes = await readBinaryFile(filePath);
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    throw new DecodeError(filePath);
  }
}

export async function writeFileContent(
  filePath: string,
  content: string
): Promise<void> {
  await ensureDirectory(dirname(filePath));
  await writeFile(filePath, content, 'utf-8');
}

export async function removeFile(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
}

export async function ensureDirectory(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

export function getFileExtension(filePath: string): string {
  return extname(filePath).toLowerCase();
}

export function toPosixPath(filePath: string): string {
  return filePath.split(sep).join('/');
}

export function relativePosixPath(root: string, filePath: string): string {
  return toPosixPath(relative(root, filePath));
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
