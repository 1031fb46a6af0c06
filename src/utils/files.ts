/**
 * File System Utilities
 *
 * Output writers for packaged datasets, with path sanitization so document
 * keys can never write outside their memory directory.
 */

import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * Error class for path traversal detection
 */
export class PathTraversalError extends Error {
  code: string;

  constructor(message: string = 'Path traversal detected') {
    super(message);
    this.name = 'PathTraversalError';
    this.code = 'PATH_TRAVERSAL_DETECTED';
  }
}

/**
 * Resolve `inputPath` against `baseDir` and make sure it stays inside it.
 *
 * @throws PathTraversalError if the resolved path escapes baseDir
 */
export function sanitizePath(inputPath: string, baseDir: string): string {
  const resolvedBase = path.resolve(baseDir);
  const resolvedPath = path.resolve(baseDir, inputPath);

  if (resolvedPath !== resolvedBase && !resolvedPath.startsWith(resolvedBase + path.sep)) {
    throw new PathTraversalError(`Path traversal detected: ${inputPath} escapes ${resolvedBase}`);
  }

  return resolvedPath;
}

export async function ensureDirectory(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/** Write a UTF-8 file, creating parent directories */
export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
  await fs.writeFile(filePath, content, 'utf-8');
}

/** Pretty-printed JSON with a trailing newline */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await writeTextFile(filePath, JSON.stringify(data, null, 2) + '\n');
}
